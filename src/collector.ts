import { ZodError } from 'zod';
import type { Logger } from './logger';
import type { HttpGetter } from './http';
import type { CollectorResult } from './types';

export type CollectorContext = {
  http: HttpGetter;
  logger: Logger;
  apiKey?: string;
};

export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Runs one collector request. Any failure is logged and replaced by
 * `fallback`; the result records which of the two happened.
 */
export async function collect<T>(
  ctx: CollectorContext,
  what: string,
  appid: number,
  fallback: () => T,
  request: () => Promise<T>
): Promise<CollectorResult<T>> {
  try {
    return { status: 'observed', value: await request() };
  } catch (error) {
    const reason = describeError(error);
    ctx.logger.warn({ appid, err: reason }, `Error fetching ${what}`);
    return { status: 'fallback', value: fallback(), reason };
  }
}
