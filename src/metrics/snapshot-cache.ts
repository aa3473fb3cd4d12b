import { logger } from '../logging/index.js';
import { AggregateSnapshot, EMPTY_SNAPSHOT } from './collector.js';

const log = logger.child('SnapshotCache');

export const DEFAULT_FRESHNESS_MS = 10_000;

export interface CacheEntry {
  snapshot: AggregateSnapshot;
  /** Clock reading when the refresh that produced `snapshot` started; null before the first one */
  refreshedAt: number | null;
  /** Rework-assigned-to-me count the last alert decision was made on */
  lastNotifiedCount: number;
}

/**
 * Produces the next entry from the current one. Runs at most once at a time.
 */
export type RefreshFn = (previous: Readonly<CacheEntry>) => Promise<Pick<CacheEntry, 'snapshot' | 'lastNotifiedCount'>>;

export interface SnapshotCacheConfig {
  refresh: RefreshFn;
  freshnessMs?: number;
  now?: () => number;
}

/**
 * Holds the last collected snapshot and decides, per scrape, whether it is
 * still fresh. The entry is only ever replaced whole, after a refresh has
 * finished, so readers see either the old snapshot or the new one.
 *
 * Callers that arrive while a refresh is running wait for that refresh
 * instead of starting their own.
 */
export class SnapshotCache {
  private entry: Readonly<CacheEntry> = Object.freeze({
    snapshot: EMPTY_SNAPSHOT,
    refreshedAt: null,
    lastNotifiedCount: 0,
  });
  private inFlight: Promise<AggregateSnapshot> | null = null;
  private readonly refresh: RefreshFn;
  private readonly freshnessMs: number;
  private readonly now: () => number;

  constructor(config: SnapshotCacheConfig) {
    this.refresh = config.refresh;
    this.freshnessMs = config.freshnessMs ?? DEFAULT_FRESHNESS_MS;
    this.now = config.now ?? Date.now;
  }

  async getOrRefresh(now: number = this.now()): Promise<AggregateSnapshot> {
    if (this.inFlight) {
      log.debug('Joining refresh in flight');
      return this.inFlight;
    }

    if (this.isFresh(now)) {
      return this.entry.snapshot;
    }

    this.inFlight = this.runRefresh(now).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  isFresh(now: number = this.now()): boolean {
    const { refreshedAt } = this.entry;
    return refreshedAt !== null && now - refreshedAt < this.freshnessMs;
  }

  isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  getEntry(): Readonly<CacheEntry> {
    return this.entry;
  }

  private async runRefresh(startedAt: number): Promise<AggregateSnapshot> {
    try {
      const next = await this.refresh(this.entry);
      this.entry = Object.freeze({
        snapshot: next.snapshot,
        refreshedAt: startedAt,
        lastNotifiedCount: next.lastNotifiedCount,
      });
      return next.snapshot;
    } catch (error) {
      log.error('Refresh failed, keeping previous snapshot', error instanceof Error ? error : { error: String(error) });
      throw error;
    }
  }
}
