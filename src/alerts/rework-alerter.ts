import { logger } from '../logging/index.js';
import type { ReworkItem } from '../metrics/collector.js';
import type { MailTransport } from './mailer.js';

const log = logger.child('ReworkAlerter');

export const REWORK_ALERT_SUBJECT = 'GitLab: Rework Assigned to You';

export interface AlertOutcome {
  /** An alert was handed to the transport */
  notified: boolean;
  /** The transport reported success; false when not notified */
  delivered: boolean;
  /** Count to compare the next cycle against */
  newCount: number;
}

export function formatReworkAlert(items: readonly ReworkItem[]): string {
  let body = 'You have been assigned REWORK on the following MRs:\n\n';
  for (const item of items) {
    body += `• ${item.title}\n  ${item.url}\n  Project: ${item.project}\n\n`;
  }
  return body;
}

/**
 * Mails the rework list when it grows past the count last alerted on.
 * Equal or smaller counts stay quiet, so a standing condition is reported
 * once and a shrinking list never triggers a mail.
 */
export class ReworkAlerter {
  constructor(private readonly transport: MailTransport) {}

  async maybeNotify(items: readonly ReworkItem[], lastNotifiedCount: number): Promise<AlertOutcome> {
    const newCount = items.length;

    if (newCount <= lastNotifiedCount) {
      if (newCount < lastNotifiedCount) {
        log.debug('Rework assigned to me went down', { from: lastNotifiedCount, to: newCount });
      }
      return { notified: false, delivered: false, newCount };
    }

    log.info('New rework assigned to me', { from: lastNotifiedCount, to: newCount });
    const result = await this.transport.send(REWORK_ALERT_SUBJECT, formatReworkAlert(items));

    // Not retried: the count still advances so the same list is not re-sent every scrape
    if (!result.ok) {
      log.warn('Rework alert not delivered', { count: newCount, error: result.error.message });
    }

    return { notified: true, delivered: result.ok, newCount };
  }
}
