import { z } from 'zod';
import type { TrackedGame } from './types';

export const TRACKED_GAMES: readonly TrackedGame[] = [
  { appid: 730, name: 'Counter-Strike 2' },
  { appid: 570, name: 'Dota 2' },
  { appid: 440, name: 'Team Fortress 2' },
  { appid: 578080, name: 'PUBG' },
  { appid: 1172470, name: 'Apex Legends' },
  { appid: 2767030, name: 'Marvel Rivals' },
];

// An empty assignment such as `DB_PORT=` counts as unset.
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

// Connection parameters and the API key stay optional; nothing checks them
// before the first store or API call.
const envSchema = z.object({
  DB_DRIVER: z.enum(['postgres', 'sqlite']).default('postgres'),
  DB_HOST: z.string().optional(),
  DB_DATABASE: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_PORT: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(5432)),
  DB_SSL: booleanFlag.default('false'),
  DB_PATH: z.string().min(1).default('./data/steam-stats.db'),
  STEAM_API_KEY: z.string().optional(),
  REQUEST_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(0)),
  COLLECTOR_CONCURRENCY: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).max(3).default(1)),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

export type LogLevel = Env['LOG_LEVEL'];

export type PostgresConfig = {
  driver: 'postgres';
  host?: string;
  database?: string;
  user?: string;
  password?: string;
  port: number;
  ssl: boolean;
};

export type SqliteConfig = {
  driver: 'sqlite';
  path: string;
};

export type DbConfig = PostgresConfig | SqliteConfig;

export type AppConfig = {
  games: readonly TrackedGame[];
  db: DbConfig;
  steamApiKey?: string;
  requestTimeoutMs: number;
  collectorConcurrency: number;
  logLevel: LogLevel;
  nodeEnv: Env['NODE_ENV'];
};

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  games: readonly TrackedGame[] = TRACKED_GAMES
): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    // Construct readable error
    const formatted = parsed.error.flatten();
    const invalid = Object.entries(formatted.fieldErrors)
      .filter(([, msgs]) => msgs && msgs.length)
      .map(([key, msgs]) => `${key}: ${msgs?.join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${invalid}`);
  }

  const data = parsed.data;
  const db: DbConfig =
    data.DB_DRIVER === 'sqlite'
      ? { driver: 'sqlite', path: data.DB_PATH }
      : {
          driver: 'postgres',
          host: data.DB_HOST,
          database: data.DB_DATABASE,
          user: data.DB_USER,
          password: data.DB_PASSWORD,
          port: data.DB_PORT,
          ssl: data.DB_SSL,
        };

  return {
    games,
    db,
    steamApiKey: data.STEAM_API_KEY,
    requestTimeoutMs: data.REQUEST_TIMEOUT_MS,
    collectorConcurrency: data.COLLECTOR_CONCURRENCY,
    logLevel: data.LOG_LEVEL,
    nodeEnv: data.NODE_ENV,
  };
}
