/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * This file contains the real implementations that connect to actual services:
 * - PostgreSQL for books, customers, discounts, assignments and orders
 * - Nominatim (over HTTP) for geocoding, cached in Redis
 * - LocalStack CloudWatch/SNS for monitoring
 * - LocalStack Kinesis for analytics
 */
import {Book, Customer, Discount, Order} from '../domain';
import {CacheEntry, Coordinates} from '../types';
import {AnalyticsEvent, DiscountAssignment, ShippingUnavailableAlert} from '../pure/types';
import {
  AnalyticsService,
  AppEffects,
  BookRepository,
  Clock,
  CustomerRepository,
  DiscountRepository,
  LockService,
  MonitoringService,
  ShippingCostProvider,
} from '../pure/effects';
import {createDiscount} from '../pure/discounts';
import {defaultPricingPolicy} from '../pure/pricing';
import {DEFAULT_RATE_PER_KM, distanceKm, shippingCostForDistance} from '../pure/shipping';
import {AwsConfig, GeocoderConfig, ProductionConfig} from './types';
import {DiscountDataError} from './EffectsError';
import {InProcessLockService} from './InProcessLockService';
import {Pool, PoolClient} from 'pg';
import {createClient} from 'redis';
import axios, {AxiosInstance} from 'axios';
import {CloudWatchClient, PutMetricDataCommand} from '@aws-sdk/client-cloudwatch';
import {PublishCommand, SNSClient} from '@aws-sdk/client-sns';
import {KinesisClient, PutRecordCommand} from '@aws-sdk/client-kinesis';
import {EitherAsync, Maybe} from 'purify-ts';

// ============================================================================
// Configuration
// ============================================================================

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// Load configuration from environment variables
export function loadConfigFromEnv(): ProductionConfig {
  return {
    database: {
      host: process.env.DATABASE_HOST || 'localhost',
      port: numberFromEnv('DATABASE_PORT', 5432),
      user: process.env.DATABASE_USER || 'appuser',
      password: process.env.DATABASE_PASSWORD || 'apppassword',
      database: process.env.DATABASE_NAME || 'bookstore',
    },
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: numberFromEnv('REDIS_PORT', 6379),
    },
    geocoder: {
      baseUrl: process.env.GEOCODER_URL || 'https://nominatim.openstreetmap.org',
      userAgent: process.env.GEOCODER_USER_AGENT || 'bookstore-pricing',
      timeoutMs: numberFromEnv('GEOCODER_TIMEOUT_MS', 5000),
      cacheTtlSeconds: numberFromEnv('GEOCODE_CACHE_TTL_SECONDS', 86400),
    },
    shipping: {
      ratePerKm: numberFromEnv('SHIPPING_RATE_PER_KM', DEFAULT_RATE_PER_KM),
    },
    pricing: {
      storeLocation: process.env.STORE_LOCATION || defaultPricingPolicy.storeLocation,
      freeShippingThreshold: numberFromEnv('FREE_SHIPPING_THRESHOLD', defaultPricingPolicy.freeShippingThreshold),
    },
    aws: {
      region: process.env.AWS_DEFAULT_REGION || 'us-east-1',
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || 'test',
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || 'test',
      monitoringEndpoint: process.env.AWS_ENDPOINT_MONITORING || 'http://localhost:4566',
      analyticsEndpoint: process.env.AWS_ENDPOINT_ANALYTICS || 'http://localhost:4567',
    },
  };
}

// ============================================================================
// Row Types
// ============================================================================

type BookRow = {
  title: string;
  author: string;
  price: string;
};

type CustomerRow = {
  username: string;
  location: string;
  signup_date: Date;
};

type DiscountRow = {
  id: number;
  valid_from: Date;
  valid_until: Date;
  percent_off: string;
  uses_remaining: number;
  coupon_code: string | null;
  author_scope: string | null;
};

type AssignedDiscountRow = DiscountRow & {
  username: string;
};

type StoredOrderLine = {
  title: string;
  quantity: number;
};

type OrderRow = {
  username: string;
  lines: StoredOrderLine[];
  placed_at: Date;
};

const toBook = (row: BookRow): Book => ({
  title: row.title,
  author: row.author,
  unitPrice: parseFloat(row.price),
});

function toDiscount(row: DiscountRow): Discount {
  return createDiscount({
    id: row.id,
    validFrom: row.valid_from,
    validUntil: row.valid_until,
    percentOff: parseFloat(row.percent_off),
    usesRemaining: row.uses_remaining,
    couponCode: row.coupon_code,
    author: row.author_scope,
  }).caseOf({
    Left: (errors) => { throw new DiscountDataError(errors); },
    Right: (discount) => discount,
  });
}

function discountValues(discount: Discount): unknown[] {
  return [
    discount.id,
    discount.validFrom,
    discount.validUntil,
    discount.percentOff,
    discount.usesRemaining,
    discount.kind === 'coupon' ? discount.couponCode : null,
    discount.kind === 'author' ? discount.author : null,
  ];
}

export async function inTransaction<T>(
  pool: Pick<Pool, 'connect'>,
  work: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    // keep the original failure; a failed rollback is only logged
    await client.query('ROLLBACK')
      .catch((rollbackError: unknown) => console.error('Rollback failed:', rollbackError));
    throw error;
  } finally {
    client.release();
  }
}

// ============================================================================
// PostgreSQL Book Repository
// ============================================================================

class PostgresBookRepository implements BookRepository {
  constructor(private pool: Pool) {}

  async getByTitles(titles: string[]): Promise<Record<string, Book>> {
    if (titles.length === 0) {
      return {};
    }

    const result = await this.pool.query<BookRow>(
      'SELECT title, author, price FROM books WHERE title = ANY($1)',
      [titles]
    );

    const books: Record<string, Book> = {};
    for (const row of result.rows) {
      books[row.title] = toBook(row);
    }
    return books;
  }
}

// ============================================================================
// PostgreSQL Customer Repository
// ============================================================================

class PostgresCustomerRepository implements CustomerRepository {
  constructor(private pool: Pool) {}

  async getByUsername(username: string): Promise<Customer | null> {
    const [customer] = await this.load([username]);
    return customer ?? null;
  }

  async getAll(): Promise<Customer[]> {
    return this.load(null);
  }

  async appendDiscounts(assignments: DiscountAssignment[]): Promise<void> {
    if (assignments.length === 0) {
      return;
    }

    await inTransaction(this.pool, async (client) => {
      for (const assignment of assignments) {
        await this.insertDiscount(client, assignment.username, assignment.discount);
      }
    });
  }

  async replaceDiscounts(username: string, discounts: Discount[]): Promise<void> {
    await inTransaction(this.pool, async (client) => {
      await client.query('DELETE FROM customer_discounts WHERE username = $1', [username]);
      for (const discount of discounts) {
        await this.insertDiscount(client, username, discount);
      }
    });
  }

  async saveOrder(order: Order): Promise<void> {
    const lines: StoredOrderLine[] = order.lines.map(line => ({title: line.book.title, quantity: line.quantity}));
    await this.pool.query(
      `INSERT INTO customer_orders (username, lines, placed_at) VALUES ($1, $2::jsonb, $3)
       ON CONFLICT (username) DO UPDATE SET lines = EXCLUDED.lines, placed_at = EXCLUDED.placed_at`,
      [order.customerUsername, JSON.stringify(lines), order.placedAt]
    );
  }

  private async insertDiscount(client: PoolClient, username: string, discount: Discount): Promise<void> {
    // position is a serial column, so list order follows insertion order
    await client.query(
      `INSERT INTO customer_discounts
         (username, id, valid_from, valid_until, percent_off, uses_remaining, coupon_code, author_scope)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [username, ...discountValues(discount)]
    );
  }

  /**
   * Load customers with their discounts and current order.
   * @param usernames the customers to load, or null for all of them
   */
  private async load(usernames: string[] | null): Promise<Customer[]> {
    const filter = usernames === null ? '' : 'WHERE username = ANY($1)';
    const params = usernames === null ? [] : [usernames];

    const [customers, discounts, orders] = await Promise.all([
      this.pool.query<CustomerRow>(
        `SELECT username, location, signup_date FROM customers ${filter} ORDER BY username`, params),
      this.pool.query<AssignedDiscountRow>(
        `SELECT username, id, valid_from, valid_until, percent_off, uses_remaining, coupon_code, author_scope
         FROM customer_discounts ${filter} ORDER BY position`, params),
      this.pool.query<OrderRow>(
        `SELECT username, lines, placed_at FROM customer_orders ${filter}`, params),
    ]);

    const titles = [...new Set(orders.rows.flatMap(row => row.lines.map(line => line.title)))];
    const books = await new PostgresBookRepository(this.pool).getByTitles(titles);

    return customers.rows.map(row => ({
      username: row.username,
      location: row.location,
      signupDate: row.signup_date,
      activeDiscounts: discounts.rows.filter(d => d.username === row.username).map(toDiscount),
      currentOrder: Maybe.fromNullable(orders.rows.find(o => o.username === row.username))
        .map(orderRow => toOrder(orderRow, books))
        .extractNullable(),
    }));
  }
}

function toOrder(row: OrderRow, books: Record<string, Book>): Order {
  return {
    customerUsername: row.username,
    placedAt: row.placed_at,
    lines: row.lines.map(line => {
      const book = books[line.title];
      if (!book) {
        throw new Error(`Order for ${row.username} references unknown book "${line.title}"`);
      }
      return {book, quantity: line.quantity};
    }),
  };
}

// ============================================================================
// PostgreSQL Discount Repository
// ============================================================================

const DISCOUNT_COLUMNS = 'id, valid_from, valid_until, percent_off, uses_remaining, coupon_code, author_scope';

class PostgresDiscountRepository implements DiscountRepository {
  constructor(private pool: Pool) {}

  async getById(id: number): Promise<Discount | null> {
    const result = await this.pool.query<DiscountRow>(
      `SELECT ${DISCOUNT_COLUMNS} FROM discounts WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toDiscount(result.rows[0]);
  }

  async getByCouponCode(couponCode: string): Promise<Discount | null> {
    const result = await this.pool.query<DiscountRow>(
      `SELECT ${DISCOUNT_COLUMNS} FROM discounts WHERE coupon_code = $1 ORDER BY id LIMIT 1`,
      [couponCode]
    );
    return result.rows.length === 0 ? null : toDiscount(result.rows[0]);
  }

  async save(discount: Discount): Promise<void> {
    await this.pool.query(
      `INSERT INTO discounts (${DISCOUNT_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (id) DO UPDATE SET
         valid_from = EXCLUDED.valid_from,
         valid_until = EXCLUDED.valid_until,
         percent_off = EXCLUDED.percent_off,
         uses_remaining = EXCLUDED.uses_remaining,
         coupon_code = EXCLUDED.coupon_code,
         author_scope = EXCLUDED.author_scope`,
      discountValues(discount)
    );
  }
}

// ============================================================================
// Geocoding & Shipping
// ============================================================================

export interface CacheService {
  get(key: string): Promise<string | null>;
  set(entry: CacheEntry): Promise<void>;
}

export interface Geocoder {
  locate(place: string): Promise<Maybe<Coordinates>>;
}

type NominatimPlace = {
  lat: string;
  lon: string;
};

const toCoordinates = (latitude: number, longitude: number): Maybe<Coordinates> =>
  Number.isFinite(latitude) && Number.isFinite(longitude)
    ? Maybe.of({latitude, longitude})
    : Maybe.empty();

const parseCacheEntry = (value: string): Maybe<Coordinates> => {
  const parts = value.split(',');
  return parts.length === 2 && parts.every(part => part.trim() !== '')
    ? toCoordinates(Number(parts[0]), Number(parts[1]))
    : Maybe.empty();
};

type GeocoderClient = Pick<AxiosInstance, 'get'>;

const createGeocoderClient = (config: GeocoderConfig): GeocoderClient =>
  axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {'User-Agent': config.userAgent},
  });

/**
 * Looks places up on a Nominatim server. The cache only saves lookups: when it
 * fails or holds an unreadable entry, the server is asked instead.
 */
export class NominatimGeocoder implements Geocoder {
  private cacheTtlSeconds: number;

  constructor(
    config: GeocoderConfig,
    private cache: CacheService,
    private client: GeocoderClient = createGeocoderClient(config)
  ) {
    this.cacheTtlSeconds = config.cacheTtlSeconds;
  }

  async locate(place: string): Promise<Maybe<Coordinates>> {
    const key = `geocode:${place.trim().toLowerCase()}`;
    const cached = await this.readCache(key);
    if (cached.isJust()) {
      return cached;
    }

    const coordinates = await this.search(place);
    await coordinates.caseOf({
      Just: (found) => this.writeCache(key, found),
      Nothing: () => Promise.resolve(),
    });
    return coordinates;
  }

  private async search(place: string): Promise<Maybe<Coordinates>> {
    try {
      const response = await this.client.get<NominatimPlace[]>('/search', {
        params: {q: place, format: 'json', limit: 1},
      });
      return Maybe.fromNullable(response.data[0])
        .chain(hit => toCoordinates(parseFloat(hit.lat), parseFloat(hit.lon)));
    } catch (error) {
      console.error(`Failed to geocode ${place}:`, error);
      throw new Error('Geocoding service unavailable');
    }
  }

  private async readCache(key: string): Promise<Maybe<Coordinates>> {
    const entry = await EitherAsync(() => this.cache.get(key)).run();
    return entry
      .ifLeft(err => console.warn(`Cache read for ${key} failed:`, err))
      .toMaybe()
      .chain(value => Maybe.fromNullable(value))
      .chain(value => parseCacheEntry(value)
        .ifNothing(() => console.warn(`Ignoring unreadable cache entry for ${key}: ${value}`)));
  }

  private async writeCache(key: string, {latitude, longitude}: Coordinates): Promise<void> {
    const written = await EitherAsync(
      () => this.cache.set({key, value: `${latitude},${longitude}`, ttlSeconds: this.cacheTtlSeconds})
    ).run();
    written.ifLeft(err => console.warn(`Cache write for ${key} failed:`, err));
  }
}

/**
 * Quotes shipping from the geodesic distance between the two places.
 */
export class GeocodingShippingCostProvider implements ShippingCostProvider {
  constructor(private geocoder: Geocoder, private ratePerKm: number = DEFAULT_RATE_PER_KM) {}

  async getShippingCost(origin: string, destination: string): Promise<Maybe<number>> {
    const [from, to] = await Promise.all([
      this.geocoder.locate(origin),
      this.geocoder.locate(destination),
    ]);
    return from.chain(start => to.map(end => shippingCostForDistance(distanceKm(start, end), this.ratePerKm)));
  }
}

// ============================================================================
// Redis Cache Service
// ============================================================================

class RedisCacheService implements CacheService {
  constructor(private client: ReturnType<typeof createClient>) {}

  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(key);
    } catch (error) {
      console.error('Failed to read cache entry:', error);
      throw new Error('Cache service unavailable');
    }
  }

  async set(entry: CacheEntry): Promise<void> {
    try {
      await this.client.setEx(entry.key, entry.ttlSeconds, entry.value);
    } catch (error) {
      console.error('Failed to set cache entry:', error);
      throw new Error('Cache service unavailable');
    }
  }
}

// ============================================================================
// CloudWatch Monitoring Service (CloudWatch + SNS)
// ============================================================================

class CloudWatchMonitoringService implements MonitoringService {
  private cloudwatch: CloudWatchClient;
  private sns: SNSClient;
  private snsTopicArn: string;

  constructor(config: AwsConfig) {
    this.cloudwatch = new CloudWatchClient({
      region: config.region,
      endpoint: config.monitoringEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });

    this.sns = new SNSClient({
      region: config.region,
      endpoint: config.monitoringEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });

    // SNS topic ARN (created by init script)
    this.snsTopicArn = `arn:aws:sns:${config.region}:000000000000:order-pricing-alerts`;
  }

  async sendAlerts(alerts: ShippingUnavailableAlert[]): Promise<void> {
    if (alerts.length === 0) {
      return;
    }

    try {
      const metricCommand = new PutMetricDataCommand({
        Namespace: 'OrderPricing',
        MetricData: [
          {
            MetricName: 'ShippingQuoteUnavailable',
            Value: alerts.length,
            Unit: 'Count',
            Timestamp: new Date(),
          },
        ],
      });
      await this.cloudwatch.send(metricCommand);

      const message = alerts
        .map((alert) => `No shipping quote: ${alert.origin} -> ${alert.destination} (customer: ${alert.username})`)
        .join('\n');

      const snsCommand = new PublishCommand({
        TopicArn: this.snsTopicArn,
        Subject: 'Order Pricing Alert: Shipping Unavailable',
        Message: `Orders were priced without a shipping charge:\n\n${message}`,
      });
      await this.sns.send(snsCommand);

      console.log(`Sent ${alerts.length} shipping alerts to monitoring service`);
    } catch (error) {
      console.error('Failed to send monitoring alerts:', error);
      throw new Error('Monitoring service unavailable');
    }
  }
}

// ============================================================================
// Kinesis Analytics Service
// ============================================================================

class KinesisAnalyticsService implements AnalyticsService {
  private kinesis: KinesisClient;
  private streamName: string;

  constructor(config: AwsConfig) {
    this.kinesis = new KinesisClient({
      region: config.region,
      endpoint: config.analyticsEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });

    this.streamName = 'order-pricing-stream';
  }

  async trackEvent(event: AnalyticsEvent): Promise<void> {
    try {
      const command = new PutRecordCommand({
        StreamName: this.streamName,
        PartitionKey: event.username,
        Data: Buffer.from(JSON.stringify({
          ...event,
          timestamp: new Date().toISOString(),
        })),
      });

      await this.kinesis.send(command);
      console.log(`Tracked analytics event for customer: ${event.username}`);
    } catch (error) {
      console.error('Failed to track analytics event:', error);
      throw new Error('Analytics service unavailable');
    }
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

export type ProductionEffects = AppEffects & {
  readonly shutdown: () => Promise<void>;
};

const systemClock: Clock = {
  now: () => new Date(),
};

class EffectsFactory implements ProductionEffects {
  private _pool?: Pool;
  private _redisClient?: ReturnType<typeof createClient>;
  private _bookRepository?: BookRepository;
  private _customerRepository?: CustomerRepository;
  private _discountRepository?: DiscountRepository;
  private _shippingProvider?: ShippingCostProvider;
  private _monitoringService?: MonitoringService;
  private _analyticsService?: AnalyticsService;
  private readonly _locks: LockService = new InProcessLockService();

  constructor(private config: ProductionConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      // Test database connection
      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private async getRedisClient(): Promise<ReturnType<typeof createClient>> {
    if (!this._redisClient) {
      this._redisClient = createClient({
        socket: {
          host: this.config.redis.host,
          port: this.config.redis.port,
        },
      });

      this._redisClient.on('error', (err) => console.error('Redis Client Error:', err));

      await this._redisClient.connect();
      console.log('✅ Connected to Redis');
    }
    return this._redisClient;
  }

  private requirePool(): Pool {
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get books(): BookRepository {
    if (!this._bookRepository) {
      this._bookRepository = new PostgresBookRepository(this.requirePool());
    }
    return this._bookRepository;
  }

  get customers(): CustomerRepository {
    if (!this._customerRepository) {
      this._customerRepository = new PostgresCustomerRepository(this.requirePool());
    }
    return this._customerRepository;
  }

  get discounts(): DiscountRepository {
    if (!this._discountRepository) {
      this._discountRepository = new PostgresDiscountRepository(this.requirePool());
    }
    return this._discountRepository;
  }

  get shipping(): ShippingCostProvider {
    if (!this._shippingProvider) {
      if (!this._redisClient) {
        throw new Error('Redis client not initialized. Call initialize() first.');
      }
      const geocoder = new NominatimGeocoder(this.config.geocoder, new RedisCacheService(this._redisClient));
      this._shippingProvider = new GeocodingShippingCostProvider(geocoder, this.config.shipping.ratePerKm);
    }
    return this._shippingProvider;
  }

  get locks(): LockService {
    return this._locks;
  }

  get clock(): Clock {
    return systemClock;
  }

  get monitoring(): MonitoringService {
    if (!this._monitoringService) {
      this._monitoringService = new CloudWatchMonitoringService(this.config.aws);
    }
    return this._monitoringService;
  }

  get analytics(): AnalyticsService {
    if (!this._analyticsService) {
      this._analyticsService = new KinesisAnalyticsService(this.config.aws);
    }
    return this._analyticsService;
  }

  /**
   * Initialize all connections (PostgreSQL, Redis)
   * Must be called before using the effects
   */
  async initialize(): Promise<void> {
    await this.getPool();
    await this.getRedisClient();
    console.log('✅ All production effects initialized');
  }

  async shutdown(): Promise<void> {
    await this._redisClient?.quit();
    await this._pool?.end();
  }

  /**
   * Static factory method to create and initialize production effects
   */
  static async make(config?: ProductionConfig): Promise<ProductionEffects> {
    const cfg = config || loadConfigFromEnv();
    const effects = new EffectsFactory(cfg);
    await effects.initialize();
    return effects;
  }
}

// Export a factory function
export async function makeAppEffects(config?: ProductionConfig): Promise<ProductionEffects> {
  return EffectsFactory.make(config);
}
