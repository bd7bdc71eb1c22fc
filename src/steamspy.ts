import { z } from 'zod';
import { collect } from './collector';
import type { CollectorContext } from './collector';
import type { CollectorResult } from './types';

export const STEAMSPY_URL = 'https://steamspy.com/api.php';

export const UNKNOWN_OWNERS = 'unknown';

const ownersSchema = z.object({
  owners: z.string().optional(),
});

// SteamSpy is keyless; ctx.apiKey is not sent.
export async function fetchEstimatedOwners(ctx: CollectorContext, appid: number): Promise<CollectorResult<string>> {
  return collect<string>(ctx, 'ownership info', appid, () => UNKNOWN_OWNERS, async () => {
    const body = await ctx.http.get(STEAMSPY_URL, { request: 'appdetails', appid });
    return ownersSchema.parse(body).owners ?? UNKNOWN_OWNERS;
  });
}
