export default () => ({
  // Application
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),

  // Database (SQLite file, or ":memory:" for tests)
  database: {
    path: process.env.DATABASE_PATH || './data/notifications.db',
  },

  // JWT
  jwt: {
    secret: process.env.JWT_SECRET,
    accessTtlMinutes: parseInt(process.env.JWT_ACCESS_TTL_MINUTES || '15', 10),
  },

  // AES-256-GCM key sealing notification credentials
  encryptionKey: process.env.ENCRYPTION_KEY,

  // Instance configuration
  instance: {
    name: process.env.INSTANCE_NAME || 'notification-hub',
    initialAdmins: (process.env.INITIAL_ADMIN_IDS || '')
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
    cacheTtlSeconds: parseInt(process.env.INSTANCE_CONFIG_CACHE_TTL_SECONDS || '60', 10),
  },

  // Template migration
  migration: {
    concurrency: parseInt(process.env.MIGRATION_CONCURRENCY || '4', 10),
  },

  logLevel: process.env.LOG_LEVEL || 'info',
});
