import { logger } from '../logging/index.js';
import type { ReworkAlerter } from '../alerts/rework-alerter.js';
import type { MetricsCollector } from './collector.js';
import { renderExposition } from './exposition.js';
import { CacheEntry, SnapshotCache } from './snapshot-cache.js';

const log = logger.child('Pipeline');

export interface MetricsPipelineConfig {
  collector: Pick<MetricsCollector, 'collect'>;
  alerter: Pick<ReworkAlerter, 'maybeNotify'>;
  repositories: readonly string[];
  freshnessMs?: number;
  now?: () => number;
}

/**
 * One scrape: fresh snapshot from the cache, or a new collection followed
 * by the rework alert decision, then rendering. Alerting runs once per
 * collection, never on a cache hit.
 */
export class MetricsPipeline {
  private readonly cache: SnapshotCache;

  constructor(private readonly config: MetricsPipelineConfig) {
    this.cache = new SnapshotCache({
      refresh: previous => this.collectAndAlert(previous),
      freshnessMs: config.freshnessMs,
      now: config.now,
    });
  }

  async scrape(): Promise<string> {
    const snapshot = await this.cache.getOrRefresh();
    return renderExposition(snapshot);
  }

  getCache(): SnapshotCache {
    return this.cache;
  }

  private async collectAndAlert(previous: Readonly<CacheEntry>): Promise<Pick<CacheEntry, 'snapshot' | 'lastNotifiedCount'>> {
    const snapshot = await this.config.collector.collect(this.config.repositories);
    const outcome = await this.config.alerter.maybeNotify(snapshot.reworkAssignedToMe, previous.lastNotifiedCount);

    if (outcome.notified) {
      log.info('Rework alert sent', { count: outcome.newCount, delivered: outcome.delivered });
    }

    return { snapshot, lastNotifiedCount: outcome.newCount };
  }
}
