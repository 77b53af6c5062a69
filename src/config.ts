import { InvalidArgumentError } from './core/errors.js';

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  nodeEnv: string;
  hideLogs: boolean;
  prettyLogs: boolean;
  apiKey: string | undefined;
  gameSeed: number;
  corsOrigins: string[];
  rateLimitMax: number;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new InvalidArgumentError(`${name} must be an integer of at least ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Builds the server configuration from environment variables
 * Call after dotenv has populated process.env
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = env['NODE_ENV'] || 'development';
  const hideLogs = Boolean(env['HIDE_LOGS']);
  const quiet = hideLogs || nodeEnv === 'production';

  return {
    port: readInteger(env, 'PORT', 3001, 0),
    host: env['HOST'] || '0.0.0.0',
    logLevel: env['LOG_LEVEL'] || (quiet ? 'warn' : 'debug'),
    nodeEnv,
    hideLogs,
    prettyLogs: nodeEnv === 'development' && !hideLogs,
    apiKey: env['API_KEY'] || undefined,
    gameSeed: readInteger(env, 'GAME_SEED', 0, 0),
    corsOrigins: (env['CORS_ORIGIN'] || 'http://localhost:5173')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    rateLimitMax: readInteger(env, 'RATE_LIMIT_MAX', 100, 1)
  };
}
