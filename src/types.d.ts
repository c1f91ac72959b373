// Non domain types

export type Coordinates = {
    readonly latitude: number;
    readonly longitude: number;
};

export type CacheEntry = {
    readonly key: string;
    readonly value: string;
    readonly ttlSeconds: number;
};
