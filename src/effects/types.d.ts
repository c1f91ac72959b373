import {PricingPolicy} from '../pure/types';

// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type RedisConfig = {
    readonly host: string;
    readonly port: number;
}

export type GeocoderConfig = {
    readonly baseUrl: string;
    readonly userAgent: string;
    readonly timeoutMs: number;
    readonly cacheTtlSeconds: number;
}

export type ShippingConfig = {
    readonly ratePerKm: number;
}

export type AwsConfig = {
    readonly region: string;
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly monitoringEndpoint: string;
    readonly analyticsEndpoint: string;
}

export type ProductionConfig = {
    readonly database: DatabaseConfig;
    readonly redis: RedisConfig;
    readonly geocoder: GeocoderConfig;
    readonly shipping: ShippingConfig;
    readonly pricing: PricingPolicy;
    readonly aws: AwsConfig;
}
