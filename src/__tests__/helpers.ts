import pino from 'pino';
import { vi } from 'vitest';
import type { CollectorContext } from '../collector';
import type { QueryParams } from '../http';

export const silentLogger = pino({ level: 'silent' });

export function fakeContext(respond: (url: string, params?: QueryParams) => unknown) {
  const get = vi.fn(async (url: string, params?: QueryParams): Promise<unknown> => respond(url, params));
  const ctx: CollectorContext = { http: { get }, logger: silentLogger, apiKey: 'test-key' };
  return { ctx, get };
}
