import { z } from 'zod';
import { collect } from './collector';
import type { CollectorContext } from './collector';
import type { CollectorResult, SaleInfo } from './types';

export const PLAYER_COUNT_URL = 'https://api.steampowered.com/ISteamUserStats/GetNumberOfCurrentPlayers/v1/';
export const APP_DETAILS_URL = 'https://store.steampowered.com/api/appdetails';

const STORE_COUNTRY = 'us';
const STORE_LANGUAGE = 'en';

const playerCountSchema = z.object({
  response: z.object({
    player_count: z.number().int().nonnegative().optional(),
  }),
});

const priceOverviewSchema = z.object({
  discount_percent: z.number().int(),
  initial: z.number().int(),
  final: z.number().int(),
});

const appDetailsEntrySchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      price_overview: priceOverviewSchema.optional(),
    })
    .optional(),
});

const appDetailsSchema = z.record(z.string(), appDetailsEntrySchema);

export function noSale(): SaleInfo {
  return { onSale: false, discountPercent: 0, originalPrice: null, finalPrice: null };
}

export async function fetchPlayerCount(ctx: CollectorContext, appid: number): Promise<CollectorResult<number>> {
  return collect(ctx, 'player count', appid, () => 0, async () => {
    const body = await ctx.http.get(PLAYER_COUNT_URL, { appid, key: ctx.apiKey });
    const { response } = playerCountSchema.parse(body);
    return response.player_count ?? 0;
  });
}

export async function fetchSaleInfo(ctx: CollectorContext, appid: number): Promise<CollectorResult<SaleInfo>> {
  return collect(ctx, 'sale info', appid, noSale, async () => {
    const body = await ctx.http.get(APP_DETAILS_URL, {
      appids: appid,
      key: ctx.apiKey,
      cc: STORE_COUNTRY,
      l: STORE_LANGUAGE,
    });
    const entry = appDetailsSchema.parse(body)[String(appid)];
    if (!entry) throw new Error(`No store entry for app ${appid}`);
    if (!entry.success) return noSale();
    if (!entry.data) throw new Error(`Store entry for app ${appid} has no data`);

    const price = entry.data.price_overview;
    if (!price) return noSale();
    return {
      onSale: price.discount_percent > 0,
      discountPercent: price.discount_percent,
      originalPrice: price.initial,
      finalPrice: price.final,
    };
  });
}
