/**
 * Integer setting from the environment, fallback when unset
 * Throws on anything that is not an integer >= min
 */
export function intFromEnv(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export default () => ({
  port: intFromEnv('PORT', 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/marketplace_db',
    maxPoolSize: intFromEnv('MONGO_MAX_POOL_SIZE', 50),
    minPoolSize: intFromEnv('MONGO_MIN_POOL_SIZE', 5),
    maxIdleTimeMS: intFromEnv('MONGO_MAX_IDLE_TIME_MS', 30000),
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: intFromEnv('REDIS_PORT', 6379),
    // без редиса работаем только на транзакциях монги
    enabled: process.env.REDIS_LOCKS_ENABLED !== 'false',
  },
  auction: {
    // every accepted bid pushes the deadline to now + extensionMs
    extensionMs: intFromEnv('AUCTION_EXTENSION_MS', 900000, 1), // 15 minutes
    minIncrementPct: intFromEnv('AUCTION_MIN_INCREMENT_PCT', 5),
  },
  settlement: {
    cronEnabled: process.env.SETTLEMENT_CRON_ENABLED !== 'false',
    batchSize: intFromEnv('SETTLEMENT_BATCH_SIZE', 50, 1),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  jwt: {
    secret: process.env.JWT_SECRET || 'default-secret-key',
    expiresIn: process.env.JWT_EXPIRES_IN || '24h',
  },
  throttle: {
    shortTtl: intFromEnv('THROTTLE_SHORT_TTL', 1000), // 1 second
    shortLimit: intFromEnv('THROTTLE_SHORT_LIMIT', 10),
    mediumTtl: intFromEnv('THROTTLE_MEDIUM_TTL', 10000), // 10 seconds
    mediumLimit: intFromEnv('THROTTLE_MEDIUM_LIMIT', 50),
    longTtl: intFromEnv('THROTTLE_LONG_TTL', 60000), // 1 minute
    longLimit: intFromEnv('THROTTLE_LONG_LIMIT', 200),
  },
  // CORS_ORIGINS=https://example.com,https://app.example.com
  cors: {
    origins: process.env.CORS_ORIGINS || 'http://localhost:3001,http://localhost:3000',
  },
});
