import type { AggregateSnapshot, MergeRequestRecord, ProjectCounters } from './collector.js';
import type { DerivedTiming } from './timing.js';

/**
 * Prometheus text exposition (format 0.0.4) of an AggregateSnapshot
 */

export const EXPOSITION_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export const TITLE_MAX_LENGTH = 50;

interface MetricFamily {
  name: string;
  help: string;
}

const PROJECT_FAMILIES: ReadonlyArray<MetricFamily & { counter: keyof ProjectCounters }> = [
  { name: 'gitlab_merge_requests_total', help: 'Total merge requests by project', counter: 'total' },
  { name: 'gitlab_rework_mrs', help: 'MRs with rework label', counter: 'rework' },
  { name: 'gitlab_rework_assigned_to_me', help: 'MRs with rework assigned to me', counter: 'reworkAssignedToMe' },
  { name: 'gitlab_in_review_mrs', help: 'MRs in review', counter: 'inReview' },
  { name: 'gitlab_rework_done_mrs', help: 'MRs with rework done', counter: 'reworkDone' },
];

const INFO_FAMILY: MetricFamily = {
  name: 'gitlab_mr_info',
  help: 'MR information with branch labels',
};

const TIMING_FAMILIES: ReadonlyArray<MetricFamily & { timing: keyof DerivedTiming }> = [
  { name: 'gitlab_mr_time_in_rework_hours', help: 'Time spent in rework per MR (hours)', timing: 'timeInRework' },
  { name: 'gitlab_mr_time_in_review_hours', help: 'Time spent in review per MR (hours)', timing: 'timeInReview' },
  { name: 'gitlab_mr_time_to_complete_hours', help: 'Time to complete MR (hours)', timing: 'timeToComplete' },
];

/**
 * Escape a label value: backslash, double quote and line feed
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Cut to TITLE_MAX_LENGTH code points. Done before escaping so an escape
 * sequence is never split.
 */
export function truncateTitle(title: string): string {
  const chars = Array.from(title);
  return chars.length <= TITLE_MAX_LENGTH ? title : chars.slice(0, TITLE_MAX_LENGTH).join('');
}

function formatLabels(labels: ReadonlyArray<readonly [string, string]>): string {
  return labels.map(([key, value]) => `${key}="${escapeLabelValue(value)}"`).join(',');
}

function headerLines(): string[] {
  return [...PROJECT_FAMILIES, INFO_FAMILY, ...TIMING_FAMILIES].flatMap(family => [
    `# HELP ${family.name} ${family.help}`,
    `# TYPE ${family.name} gauge`,
  ]);
}

function mergeRequestLabels(record: MergeRequestRecord): string {
  return formatLabels([
    ['project', record.project],
    ['branch', record.sourceBranch],
    ['target', record.targetBranch],
    ['title', truncateTitle(record.title)],
  ]);
}

/**
 * Render the snapshot. Projects and MRs appear in snapshot order. Every MR
 * gets an info sample; a timing sample is written only when the value is
 * strictly positive, so a missing series means "no data", never zero.
 */
export function renderExposition(snapshot: AggregateSnapshot): string {
  const lines = headerLines();

  for (const [project, counters] of snapshot.projects) {
    const labels = formatLabels([['project', project]]);
    for (const family of PROJECT_FAMILIES) {
      lines.push(`${family.name}{${labels}} ${counters[family.counter]}`);
    }
  }

  for (const record of snapshot.mergeRequests) {
    const labels = mergeRequestLabels(record);
    lines.push(`${INFO_FAMILY.name}{${labels}} 1`);

    for (const family of TIMING_FAMILIES) {
      const value = record.timing[family.timing];
      if (value !== undefined && value > 0) {
        lines.push(`${family.name}{${labels}} ${value.toFixed(2)}`);
      }
    }
  }

  return `${lines.join('\n')}\n`;
}
