const int = (value: string | undefined, fallback: number): number =>
  value !== undefined && value !== '' ? parseInt(value, 10) : fallback;

export default () => ({
  port: int(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/fractional_market',
    // Transactions require a replica set; every settlement runs in one
    maxPoolSize: int(process.env.MONGO_MAX_POOL_SIZE, 50),
    minPoolSize: int(process.env.MONGO_MIN_POOL_SIZE, 5),
    maxIdleTimeMS: int(process.env.MONGO_MAX_IDLE_TIME_MS, 30000),
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: int(process.env.REDIS_PORT, 6379),
    // Without Redis, subject locks are enforced per process only
    enabled: process.env.REDIS_ENABLED !== 'false',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  jwt: {
    secret: process.env.JWT_SECRET || 'default-secret-key',
    expiresIn: process.env.JWT_EXPIRES_IN || '24h',
  },
  auth: {
    // Comma-separated usernames that register with the OPERATOR role
    operatorUsernames: (process.env.OPERATOR_USERNAMES || '')
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  },
  auction: {
    // Upper bound on bids per offering or listing; closure cost is linear in it
    maxBidsPerSubject: int(process.env.MAX_BIDS_PER_SUBJECT, 500),
    lockTtlSeconds: int(process.env.SUBJECT_LOCK_TTL_SECONDS, 60),
  },
  keeper: {
    enabled: process.env.KEEPER_ENABLED === 'true',
    batchSize: int(process.env.KEEPER_BATCH_SIZE, 20),
  },
  // Rate limiting configuration
  throttle: {
    shortTtl: int(process.env.THROTTLE_SHORT_TTL, 1000), // 1 second
    shortLimit: int(process.env.THROTTLE_SHORT_LIMIT, 10),
    mediumTtl: int(process.env.THROTTLE_MEDIUM_TTL, 10000), // 10 seconds
    mediumLimit: int(process.env.THROTTLE_MEDIUM_LIMIT, 50),
    longTtl: int(process.env.THROTTLE_LONG_TTL, 60000), // 1 minute
    longLimit: int(process.env.THROTTLE_LONG_LIMIT, 200),
  },
  // Production: CORS_ORIGINS=https://example.com,https://app.example.com
  cors: {
    origins: process.env.CORS_ORIGINS || 'http://localhost:3001,http://localhost:3000',
  },
});
