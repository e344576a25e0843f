const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  port: toInt(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  database: {
    host: process.env.DATABASE_HOST || 'localhost',
    port: toInt(process.env.DATABASE_PORT, 5432),
    username: process.env.DATABASE_USERNAME || 'postgres',
    password: process.env.DATABASE_PASSWORD || 'postgres',
    database: process.env.DATABASE_NAME || 'account_login_bot',
    poolSize: toInt(process.env.DATABASE_POOL_SIZE, 10),
    connectionTimeoutMillis: toInt(process.env.DATABASE_TIMEOUT, 5000),
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: toInt(process.env.REDIS_PORT, 6379),
    password: process.env.REDIS_PASSWORD,
  },
  bot: {
    token: process.env.BOT_TOKEN,
    pollTimeoutSeconds: toInt(process.env.BOT_POLL_TIMEOUT_SECONDS, 30),
    idleDelayMs: toInt(process.env.BOT_IDLE_DELAY_MS, 1000),
    errorDelayMs: toInt(process.env.BOT_ERROR_DELAY_MS, 5000),
  },
  account: {
    apiId: toInt(process.env.TELEGRAM_API_ID, 0),
    apiHash: process.env.TELEGRAM_API_HASH,
    connectionRetries: toInt(process.env.TELEGRAM_CONNECTION_RETRIES, 5),
    sessionsDir: process.env.SESSIONS_DIR || 'sessions',
    sandbox: process.env.ACCOUNT_CLIENT_SANDBOX === 'true',
    sandboxCode: process.env.SANDBOX_LOGIN_CODE || '12345',
    sandboxPassword: process.env.SANDBOX_TWO_FACTOR_PASSWORD || undefined,
  },
  metrics: {
    allowedIps: (process.env.METRICS_ALLOWED_IPS || '127.0.0.1,::1,::ffff:127.0.0.1')
      .split(',')
      .map((ip) => ip.trim())
      .filter(Boolean),
  },
  login: {
    flowTtlSeconds: toInt(process.env.LOGIN_FLOW_TTL_SECONDS, 600),
    floodKeyPrefix: 'login:flood:',
  },
});
