import pLimit from 'p-limit';
import type { CollectorContext } from './collector';
import type { Logger } from './logger';
import { recordObservation } from './recorder';
import type { StatsStore } from './store';
import { fetchPlayerCount, fetchSaleInfo } from './steam';
import { fetchEstimatedOwners } from './steamspy';
import type { CollectorResult, Observation, SaleInfo, TrackedGame } from './types';

export type Collectors = {
  playerCount(appid: number): Promise<CollectorResult<number>>;
  saleInfo(appid: number): Promise<CollectorResult<SaleInfo>>;
  estimatedOwners(appid: number): Promise<CollectorResult<string>>;
};

export type TrackerDeps = {
  store: StatsStore;
  collectors: Collectors;
  logger: Logger;
  // how many of one game's three collectors may run at once
  concurrency?: number;
  print?: (line: string) => void;
  now?: () => number;
};

export type TrackReport = {
  game: TrackedGame;
  observation: Omit<Observation, 'id'>;
  fallbacks: Array<keyof Collectors>;
};

export function steamCollectors(ctx: CollectorContext): Collectors {
  return {
    playerCount: (appid) => fetchPlayerCount(ctx, appid),
    saleInfo: (appid) => fetchSaleInfo(ctx, appid),
    estimatedOwners: (appid) => fetchEstimatedOwners(ctx, appid),
  };
}

function formatPrice(cents: number | null): string {
  return cents === null ? 'n/a' : String(cents);
}

export function formatSummary(playerCount: number, sale: SaleInfo, owners: string): string[] {
  return [
    `- Players: ${playerCount}`,
    `- On Sale: ${sale.onSale ? 'Yes' : 'No'} (${sale.discountPercent}% off)`,
    `- Price: ${formatPrice(sale.finalPrice)} / ${formatPrice(sale.originalPrice)} (cents)`,
    `- Owners: ${owners}`,
  ];
}

/**
 * Tracks every game once, in order. Collector failures are already absorbed
 * into fallback values; a store error stops the loop and propagates.
 */
export async function trackGames(games: readonly TrackedGame[], deps: TrackerDeps): Promise<TrackReport[]> {
  const { store, collectors, logger } = deps;
  const print = deps.print ?? console.log;
  const limit = pLimit(deps.concurrency ?? 1);
  const reports: TrackReport[] = [];

  for (const game of games) {
    print('');
    print(`Tracking ${game.name} (AppID: ${game.appid})`);

    const [count, sale, owners] = await Promise.all([
      limit(() => collectors.playerCount(game.appid)),
      limit(() => collectors.saleInfo(game.appid)),
      limit(() => collectors.estimatedOwners(game.appid)),
    ]);

    const observation = await recordObservation(store, game.appid, count.value, sale.value, owners.value, deps.now);
    logger.debug({ appid: game.appid, observation }, 'Recorded observation');

    for (const line of formatSummary(count.value, sale.value, owners.value)) print(line);

    const fallbacks: Array<keyof Collectors> = [];
    if (count.status === 'fallback') fallbacks.push('playerCount');
    if (sale.status === 'fallback') fallbacks.push('saleInfo');
    if (owners.status === 'fallback') fallbacks.push('estimatedOwners');
    reports.push({ game, observation, fallbacks });
  }

  logger.debug(
    {
      tracked: reports.length,
      fallbacks: reports.reduce((sum, report) => sum + report.fallbacks.length, 0),
    },
    'Tracking completed'
  );
  return reports;
}
