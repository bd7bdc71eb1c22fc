import type { DbConfig } from './config';
import type { Logger } from './logger';
import type { StatsStore } from './store';
import { PostgresStore } from './db-postgres';
import { SqliteStore } from './db-sqlite';

export function createStore(config: DbConfig, logger: Logger): StatsStore {
  switch (config.driver) {
    case 'postgres':
      return new PostgresStore(config, logger);
    case 'sqlite':
      return SqliteStore.open(config.path);
  }
}
