import { Client } from 'pg';
import type { PostgresConfig } from './config';
import type { Logger } from './logger';
import { describeError } from './collector';
import { OBSERVATION_COLUMNS } from './store';
import type { StatsStore } from './store';
import type { Observation, TrackedGame } from './types';

export interface PgConnection {
  connect(): Promise<void>;
  query(text: string, values?: unknown[]): Promise<void>;
  end(): Promise<void>;
}

export type PgConnectionFactory = (config: PostgresConfig) => PgConnection;

const SCHEMA_SQL = [
  `CREATE TABLE IF NOT EXISTS games (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS player_counts (
    id SERIAL PRIMARY KEY,
    game_id INTEGER REFERENCES games(id),
    timestamp INTEGER,
    player_count INTEGER,
    on_sale BOOLEAN,
    discount_percent INTEGER,
    original_price INTEGER,
    final_price INTEGER,
    estimated_owners TEXT
  )`,
];

const INSERT_GAME_SQL = 'INSERT INTO games (id, name) VALUES ($1, $2) ON CONFLICT (id) DO NOTHING';

const INSERT_OBSERVATION_SQL = `INSERT INTO player_counts (${OBSERVATION_COLUMNS.join(', ')})
  VALUES (${OBSERVATION_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})`;

export const connectPg: PgConnectionFactory = (config) => {
  const client = new Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
  return {
    connect: () => client.connect(),
    query: async (text, values) => {
      await client.query(text, values);
    },
    end: () => client.end(),
  };
};

/**
 * Opens a fresh connection per operation. Once connected, the connection is
 * closed whether the operation succeeds or throws.
 */
export class PostgresStore implements StatsStore {
  constructor(
    private readonly config: PostgresConfig,
    private readonly logger: Logger,
    private readonly connectionFactory: PgConnectionFactory = connectPg
  ) {}

  private async withConnection(fn: (conn: PgConnection) => Promise<void>): Promise<void> {
    const conn = this.connectionFactory(this.config);
    await conn.connect();
    try {
      await fn(conn);
    } finally {
      await conn.end();
    }
  }

  async ensureSchema(games: readonly TrackedGame[]): Promise<void> {
    await this.withConnection(async (conn) => {
      await conn.query('BEGIN');
      try {
        for (const sql of SCHEMA_SQL) await conn.query(sql);
        for (const game of games) await conn.query(INSERT_GAME_SQL, [game.appid, game.name]);
        await conn.query('COMMIT');
      } catch (error) {
        await conn.query('ROLLBACK').catch((rollbackError: unknown) => {
          this.logger.warn({ err: describeError(rollbackError) }, 'Rollback failed');
        });
        throw error;
      }
    });
  }

  async insertObservation(observation: Omit<Observation, 'id'>): Promise<void> {
    const values = OBSERVATION_COLUMNS.map((column) => observation[column]);
    await this.withConnection((conn) => conn.query(INSERT_OBSERVATION_SQL, values));
  }

  async close(): Promise<void> {
    // connections are per operation; nothing is held between calls
  }
}
