import type { LabelEvent } from '../gitlab/types.js';

/**
 * The three label names that mark workflow states on a merge request
 */
export interface WatchedLabels {
  rework: string;
  inReview: string;
  reworkDone: string;
}

/**
 * Per-MR durations in fractional hours. `undefined` means "no data" and is
 * distinct from a measured zero.
 */
export interface DerivedTiming {
  timeInRework: number | undefined;
  timeInReview: number | undefined;
  timeToComplete: number | undefined;
}

const MS_PER_HOUR = 3_600_000;

export const NO_TIMING: Readonly<DerivedTiming> = Object.freeze({
  timeInRework: undefined,
  timeInReview: undefined,
  timeToComplete: undefined,
});

function parseTimestamp(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

/**
 * Hours from `start` to `end`; undefined when either end is missing or the
 * interval runs backwards.
 */
function hoursBetween(start: number | undefined, end: number | undefined): number | undefined {
  if (start === undefined || end === undefined) return undefined;
  const ms = end - start;
  return ms < 0 ? undefined : ms / MS_PER_HOUR;
}

/**
 * Derive time-in-rework, time-in-review and time-to-complete from a label
 * event log.
 *
 * Events are read in the order GitLab returns them. Only the first `add` of
 * each watched label counts; later adds and every `remove` are ignored, so
 * the timestamps answer "when did this MR first enter the state". A review
 * that has not reached rework-done is measured up to `now`.
 */
export function reduceLabelEvents(
  createdAt: string | undefined,
  events: readonly LabelEvent[],
  labels: WatchedLabels,
  now: number
): DerivedTiming {
  if (events.length === 0) {
    return { ...NO_TIMING };
  }

  let reworkAt: number | undefined;
  let inReviewAt: number | undefined;
  let reworkDoneAt: number | undefined;
  // An add whose timestamp does not parse still claims the label's first add
  let reworkSeen = false;
  let inReviewSeen = false;
  let reworkDoneSeen = false;

  for (const event of events) {
    if (event.action !== 'add' || !event.label) continue;
    const at = parseTimestamp(event.createdAt);

    if (event.label === labels.rework && !reworkSeen) {
      reworkSeen = true;
      reworkAt = at;
    } else if (event.label === labels.inReview && !inReviewSeen) {
      inReviewSeen = true;
      inReviewAt = at;
    } else if (event.label === labels.reworkDone && !reworkDoneSeen) {
      reworkDoneSeen = true;
      reworkDoneAt = at;
    }
  }

  return {
    timeInRework: hoursBetween(reworkAt, reworkDoneAt),
    timeInReview: reworkDoneSeen
      ? hoursBetween(inReviewAt, reworkDoneAt)
      : hoursBetween(inReviewAt, now),
    timeToComplete: hoursBetween(parseTimestamp(createdAt), reworkDoneAt),
  };
}
