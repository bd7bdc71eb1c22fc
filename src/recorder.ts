import type { StatsStore } from './store';
import type { Observation, SaleInfo } from './types';

/**
 * Appends one observation for `appid`, stamped with the current wall-clock
 * second. Store errors are not caught here.
 */
export async function recordObservation(
  store: StatsStore,
  appid: number,
  playerCount: number,
  sale: SaleInfo,
  owners: string,
  now: () => number = Date.now
): Promise<Omit<Observation, 'id'>> {
  const observation: Omit<Observation, 'id'> = {
    game_id: appid,
    timestamp: Math.floor(now() / 1000),
    player_count: playerCount,
    on_sale: sale.onSale,
    discount_percent: sale.discountPercent,
    original_price: sale.originalPrice,
    final_price: sale.finalPrice,
    estimated_owners: owners,
  };
  await store.insertObservation(observation);
  return observation;
}
