import Database from 'better-sqlite3';
import pino from 'pino';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SqliteStore } from '../db-sqlite';
import { formatSummary, steamCollectors, trackGames } from '../tracker';
import type { Collectors } from '../tracker';
import type { CollectorResult, SaleInfo, TrackedGame } from '../types';
import { APP_DETAILS_URL, PLAYER_COUNT_URL, noSale } from '../steam';
import { STEAMSPY_URL } from '../steamspy';
import { fakeContext, silentLogger } from './helpers';

const observed = <T>(value: T): CollectorResult<T> => ({ status: 'observed', value });

function stubCollectors(overrides: Partial<Collectors> = {}): Collectors {
  return {
    playerCount: async () => observed(500),
    saleInfo: async () => observed(noSale()),
    estimatedOwners: async () => observed('unknown'),
    ...overrides,
  };
}

const DOTA: TrackedGame = { appid: 570, name: 'Dota 2' };
const TF2: TrackedGame = { appid: 440, name: 'Team Fortress 2' };
const PUBG: TrackedGame = { appid: 578080, name: 'PUBG' };

describe('formatSummary', () => {
  it('prints the sale state and both prices', () => {
    const sale: SaleInfo = { onSale: true, discountPercent: 50, originalPrice: 1999, finalPrice: 999 };

    expect(formatSummary(1234, sale, '1,000,000 .. 2,000,000')).toEqual([
      '- Players: 1234',
      '- On Sale: Yes (50% off)',
      '- Price: 999 / 1999 (cents)',
      '- Owners: 1,000,000 .. 2,000,000',
    ]);
  });
});

describe('steamCollectors', () => {
  it('routes each collector to its endpoint', async () => {
    const { ctx, get } = fakeContext((url) => {
      if (url === PLAYER_COUNT_URL) return { response: { player_count: 42 } };
      if (url === APP_DETAILS_URL) {
        return { '440': { success: true, data: { price_overview: { discount_percent: 0, initial: 0, final: 0 } } } };
      }
      return { owners: '50,000,000 .. 100,000,000' };
    });
    const collectors = steamCollectors(ctx);

    await expect(collectors.playerCount(440)).resolves.toEqual({ status: 'observed', value: 42 });
    await expect(collectors.saleInfo(440)).resolves.toEqual({
      status: 'observed',
      value: { onSale: false, discountPercent: 0, originalPrice: 0, finalPrice: 0 },
    });
    await expect(collectors.estimatedOwners(440)).resolves.toEqual({
      status: 'observed',
      value: '50,000,000 .. 100,000,000',
    });
    expect(get.mock.calls.map(([url]) => url)).toEqual([PLAYER_COUNT_URL, APP_DETAILS_URL, STEAMSPY_URL]);
  });
});

describe('trackGames', () => {
  let store: SqliteStore;

  beforeEach(async () => {
    store = new SqliteStore(new Database(':memory:'));
    await store.ensureSchema([DOTA, TF2]);
  });

  afterEach(async () => {
    await store.close();
  });

  it('records one observation per game', async () => {
    const lines: string[] = [];
    const before = Math.floor(Date.now() / 1000);

    await trackGames([DOTA], {
      store,
      collectors: stubCollectors(),
      logger: silentLogger,
      print: (line) => lines.push(line),
    });

    const rows = store.db.prepare('SELECT game_id, timestamp, player_count, on_sale, estimated_owners FROM player_counts').all();
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ game_id: 570, player_count: 500, on_sale: 0, estimated_owners: 'unknown' });
    const timestamp = store.db.prepare('SELECT timestamp FROM player_counts').pluck().get();
    expect(typeof timestamp).toBe('number');
    expect(Number(timestamp) - before).toBeGreaterThanOrEqual(0);
    expect(Number(timestamp) - before).toBeLessThan(5);

    expect(lines).toEqual([
      '',
      'Tracking Dota 2 (AppID: 570)',
      '- Players: 500',
      '- On Sale: No (0% off)',
      '- Price: n/a / n/a (cents)',
      '- Owners: unknown',
    ]);
  });

  it('logs the run totals at debug level only', async () => {
    const logger = pino({ level: 'silent' });
    const info = vi.spyOn(logger, 'info');
    const debug = vi.spyOn(logger, 'debug');

    await trackGames([DOTA], { store, collectors: stubCollectors(), logger, print: () => {} });

    expect(info).not.toHaveBeenCalled();
    expect(debug).toHaveBeenCalledWith({ tracked: 1, fallbacks: 0 }, 'Tracking completed');
  });

  it('stamps the capture time from the clock', async () => {
    const [report] = await trackGames([DOTA], {
      store,
      collectors: stubCollectors(),
      logger: silentLogger,
      print: () => {},
      now: () => 1700000000999,
    });

    expect(report.observation.timestamp).toBe(1700000000);
  });

  it('reports which collectors fell back', async () => {
    const lines: string[] = [];
    const collectors = stubCollectors({
      playerCount: async () => ({ status: 'fallback', value: 0, reason: 'socket hang up' }),
    });

    const reports = await trackGames([DOTA, TF2], {
      store,
      collectors,
      logger: silentLogger,
      print: (line) => lines.push(line),
    });

    expect(reports.map((r) => r.fallbacks)).toEqual([['playerCount'], ['playerCount']]);
    expect(lines[2]).toBe('- Players: 0');
    expect(store.db.prepare('SELECT COUNT(*) FROM player_counts').pluck().get()).toBe(2);
  });

  it('stops at the first store failure', async () => {
    const playerCount = vi.fn(async (_appid: number) => observed(500));
    const collectors = stubCollectors({ playerCount });

    // PUBG has no game row, so its insert violates the foreign key
    await expect(
      trackGames([DOTA, PUBG, TF2], { store, collectors, logger: silentLogger, print: () => {} })
    ).rejects.toThrow(/FOREIGN KEY constraint failed/);

    expect(playerCount.mock.calls.map(([appid]) => appid)).toEqual([570, 578080]);
    expect(store.db.prepare('SELECT game_id FROM player_counts').pluck().all()).toEqual([570]);
  });

  it('runs collectors one at a time by default', async () => {
    const events: string[] = [];
    const step = <T>(name: string, value: T) => async () => {
      events.push(`start:${name}`);
      await new Promise((resolve) => setTimeout(resolve, 1));
      events.push(`end:${name}`);
      return observed(value);
    };

    await trackGames([DOTA], {
      store,
      collectors: {
        playerCount: step('players', 500),
        saleInfo: step('sale', noSale()),
        estimatedOwners: step('owners', 'unknown'),
      },
      logger: silentLogger,
      print: () => {},
    });

    expect(events).toEqual(['start:players', 'end:players', 'start:sale', 'end:sale', 'start:owners', 'end:owners']);
  });

  it('starts all three collectors together when allowed', async () => {
    const events: string[] = [];
    const step = <T>(name: string, value: T) => async () => {
      events.push(`start:${name}`);
      await new Promise((resolve) => setTimeout(resolve, 1));
      events.push(`end:${name}`);
      return observed(value);
    };

    await trackGames([DOTA], {
      store,
      collectors: {
        playerCount: step('players', 500),
        saleInfo: step('sale', noSale()),
        estimatedOwners: step('owners', 'unknown'),
      },
      logger: silentLogger,
      concurrency: 3,
      print: () => {},
    });

    expect(events.slice(0, 3)).toEqual(['start:players', 'start:sale', 'start:owners']);
  });
});
