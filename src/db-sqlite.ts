import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { OBSERVATION_COLUMNS } from './store';
import type { StatsStore } from './store';
import type { Observation, TrackedGame } from './types';

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS games (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS player_counts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    game_id INTEGER REFERENCES games(id),
    timestamp INTEGER,
    player_count INTEGER,
    on_sale INTEGER,
    discount_percent INTEGER,
    original_price INTEGER,
    final_price INTEGER,
    estimated_owners TEXT
  );
`;

const INSERT_OBSERVATION_SQL = `INSERT INTO player_counts (${OBSERVATION_COLUMNS.join(', ')})
  VALUES (${OBSERVATION_COLUMNS.map((column) => `@${column}`).join(', ')})`;

/** Local single-file store. One handle is held until `close()`. */
export class SqliteStore implements StatsStore {
  constructor(readonly db: Database.Database) {
    db.pragma('foreign_keys = ON');
  }

  static open(dbPath: string): SqliteStore {
    const resolved = path.resolve(process.cwd(), dbPath);
    const dir = path.dirname(resolved);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    return new SqliteStore(db);
  }

  async ensureSchema(games: readonly TrackedGame[]): Promise<void> {
    this.db.transaction(() => {
      this.db.exec(SCHEMA_SQL);
      const insertGame = this.db.prepare('INSERT OR IGNORE INTO games (id, name) VALUES (?, ?)');
      for (const game of games) insertGame.run(game.appid, game.name);
    })();
  }

  async insertObservation(observation: Omit<Observation, 'id'>): Promise<void> {
    // better-sqlite3 does not bind booleans
    this.db.prepare(INSERT_OBSERVATION_SQL).run({ ...observation, on_sale: observation.on_sale ? 1 : 0 });
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
