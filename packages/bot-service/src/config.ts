type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const val = env[name];
  if (!val) throw new Error(`Missing required env var: ${name}`);
  return val;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const val = env[name];
  if (!val) return fallback;
  const parsed = Number(val);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Env var ${name} must be a positive integer, got "${val}"`);
  }
  return parsed;
}

export interface Config {
  databaseUrl: string;
  redisUrl: string;
  telegramBotToken: string;
  checkIntervalSeconds: number;
  fetchTimeoutSeconds: number;
  healthPort: number;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    databaseUrl: required(env, 'DATABASE_URL'),
    redisUrl: required(env, 'REDIS_URL'),
    telegramBotToken: required(env, 'TELEGRAM_BOT_TOKEN'),
    checkIntervalSeconds: positiveInt(env, 'CHECK_INTERVAL_SECONDS', 300),
    fetchTimeoutSeconds: positiveInt(env, 'FETCH_TIMEOUT_SECONDS', 60),
    healthPort: positiveInt(env, 'HEALTH_PORT', 3000),
  };
}
