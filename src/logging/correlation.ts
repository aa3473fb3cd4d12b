/**
 * Correlation ids for tracing one scrape through cache, collector and alerting.
 *
 * Ids live in an AsyncLocalStorage so that overlapping scrape requests each
 * keep their own id across awaits.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

const storage = new AsyncLocalStorage<string>();

/**
 * Format: mx-{base36 timestamp}-{uuid prefix}
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const uuid = randomUUID().slice(0, 8);
  return `mx-${timestamp}-${uuid}`;
}

export function getCorrelationId(): string | undefined {
  return storage.getStore();
}

/**
 * Run `fn` with `id` as the active correlation id. The previous id is
 * visible again once `fn` settles.
 */
export async function withCorrelationAsync<T>(id: string, fn: () => Promise<T>): Promise<T> {
  return storage.run(id, fn);
}
