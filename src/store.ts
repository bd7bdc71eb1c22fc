import type { Observation, TrackedGame } from './types';

export interface StatsStore {
  /** Creates both tables if absent and inserts missing games; existing names are left alone. */
  ensureSchema(games: readonly TrackedGame[]): Promise<void>;
  insertObservation(observation: Omit<Observation, 'id'>): Promise<void>;
  close(): Promise<void>;
}

export const OBSERVATION_COLUMNS = [
  'game_id',
  'timestamp',
  'player_count',
  'on_sale',
  'discount_percent',
  'original_price',
  'final_price',
  'estimated_owners',
] as const;
