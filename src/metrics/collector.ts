import { logger } from '../logging/index.js';
import { unwrapOr } from '../shared/result.js';
import type { GitLabRequestError, GitLabSource } from '../gitlab/client.js';
import type { MergeRequest, Project } from '../gitlab/types.js';
import { DerivedTiming, WatchedLabels, reduceLabelEvents } from './timing.js';

const log = logger.child('Collector');

export interface ProjectCounters {
  total: number;
  rework: number;
  reworkAssignedToMe: number;
  inReview: number;
  reworkDone: number;
}

/**
 * One open MR as exposed on the metrics surface
 */
export interface MergeRequestRecord {
  project: string;
  iid: number;
  title: string;
  webUrl: string;
  createdAt: string | undefined;
  sourceBranch: string;
  targetBranch: string;
  hasRework: boolean;
  hasInReview: boolean;
  hasReworkDone: boolean;
  timing: DerivedTiming;
}

/**
 * An MR carrying the rework label and assigned to the configured identity
 */
export interface ReworkItem {
  title: string;
  url: string;
  project: string;
  createdAt: string | undefined;
}

/**
 * Result of one collection cycle. Built in full, then frozen; never
 * mutated after `collect` returns.
 */
export interface AggregateSnapshot {
  /** Display name to counters, in resolution order */
  projects: ReadonlyMap<string, Readonly<ProjectCounters>>;
  mergeRequests: readonly MergeRequestRecord[];
  reworkAssignedToMe: readonly ReworkItem[];
  collectedAt: number;
}

export interface CollectorConfig {
  source: GitLabSource;
  labels: WatchedLabels;
  /** E-mail or username; the part before `@` is matched against assignee usernames */
  identity: string;
  now?: () => number;
}

export const EMPTY_SNAPSHOT: AggregateSnapshot = Object.freeze({
  projects: new Map<string, Readonly<ProjectCounters>>(),
  mergeRequests: Object.freeze([]),
  reworkAssignedToMe: Object.freeze([]),
  collectedAt: 0,
});

export function emptyCounters(): ProjectCounters {
  return { total: 0, rework: 0, reworkAssignedToMe: 0, inReview: 0, reworkDone: 0 };
}

/**
 * Username part of an identity: `dev@example.com` -> `dev`
 */
export function identityUsername(identity: string): string {
  return identity.split('@')[0].trim();
}

/**
 * Walks the monitored projects and turns their open MRs into counters and
 * per-MR records. A failed GitLab call only blanks the scope it was made
 * for: one project, one MR list or one MR's timings.
 */
export class MetricsCollector {
  private readonly source: GitLabSource;
  private readonly labels: WatchedLabels;
  private readonly username: string;
  private readonly now: () => number;

  constructor(config: CollectorConfig) {
    this.source = config.source;
    this.labels = config.labels;
    this.username = identityUsername(config.identity);
    this.now = config.now ?? Date.now;
  }

  async collect(monitoredNames: readonly string[]): Promise<AggregateSnapshot> {
    log.info('Collecting GitLab metrics', { projects: monitoredNames.length });
    log.time('collect');

    const projects = await this.resolveProjects(monitoredNames);
    const counters = new Map<string, ProjectCounters>();
    const records: MergeRequestRecord[] = [];
    const reworkItems: ReworkItem[] = [];

    for (const project of projects) {
      const projectCounters = counters.get(project.displayName) ?? emptyCounters();
      counters.set(project.displayName, projectCounters);

      const mergeRequests = unwrapOr(
        await this.source.listOpenMergeRequests(project.id),
        [],
        error => this.discard('merge request list', project, error)
      );

      for (const mr of mergeRequests) {
        const record = await this.buildRecord(project, mr);
        records.push(record);

        projectCounters.total += 1;
        if (record.hasRework) {
          projectCounters.rework += 1;
          if (this.isAssignedToMe(mr)) {
            projectCounters.reworkAssignedToMe += 1;
            reworkItems.push({
              title: mr.title,
              url: mr.webUrl,
              project: project.displayName,
              createdAt: mr.createdAt,
            });
          }
        }
        if (record.hasInReview) projectCounters.inReview += 1;
        if (record.hasReworkDone) projectCounters.reworkDone += 1;
      }
    }

    const frozen = new Map<string, Readonly<ProjectCounters>>();
    for (const [name, value] of counters) {
      frozen.set(name, Object.freeze({ ...value }));
    }

    const snapshot: AggregateSnapshot = Object.freeze({
      projects: frozen,
      mergeRequests: Object.freeze(records),
      reworkAssignedToMe: Object.freeze(reworkItems),
      collectedAt: this.now(),
    });

    log.timeEnd('collect', {
      projects: frozen.size,
      mergeRequests: records.length,
      reworkAssignedToMe: reworkItems.length,
    });

    return snapshot;
  }

  /**
   * First search hit whose path or name equals the configured name, in the
   * order GitLab returned them. A project matched by two names is kept once.
   */
  async resolveProjects(monitoredNames: readonly string[]): Promise<Project[]> {
    const resolved: Project[] = [];
    const seen = new Set<number>();

    for (const name of monitoredNames) {
      const candidates = unwrapOr(
        await this.source.searchProjects(name),
        [],
        error => log.warn('Project search failed, skipping', { name, error: error.message })
      );
      const match = candidates.find(p => p.path === name || p.name === name);

      if (!match) {
        log.warn('Project not found or not accessible', { name });
        continue;
      }

      if (seen.has(match.id)) {
        log.debug('Project already resolved by another name', { name, project: match.displayName });
        continue;
      }

      seen.add(match.id);
      resolved.push(match);
      log.info('Project found', { name, project: match.displayName });
    }

    return resolved;
  }

  private async buildRecord(project: Project, mr: MergeRequest): Promise<MergeRequestRecord> {
    const events = unwrapOr(
      await this.source.listLabelEvents(project.id, mr.iid),
      [],
      error => this.discard('label events', project, error, mr.iid)
    );

    return {
      project: project.displayName,
      iid: mr.iid,
      title: mr.title,
      webUrl: mr.webUrl,
      createdAt: mr.createdAt,
      sourceBranch: mr.sourceBranch,
      targetBranch: mr.targetBranch,
      hasRework: mr.labels.includes(this.labels.rework),
      hasInReview: mr.labels.includes(this.labels.inReview),
      hasReworkDone: mr.labels.includes(this.labels.reworkDone),
      timing: reduceLabelEvents(mr.createdAt, events, this.labels, this.now()),
    };
  }

  private isAssignedToMe(mr: MergeRequest): boolean {
    return this.username.length > 0 && mr.assignees.includes(this.username);
  }

  private discard(what: string, project: Project, error: GitLabRequestError, iid?: number): void {
    log.warn(`No ${what}, continuing without it`, {
      project: project.displayName,
      iid,
      error: error.message,
    });
  }
}
