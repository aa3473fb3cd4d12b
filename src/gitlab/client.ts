import { z } from 'zod';
import { logger } from '../logging/index.js';
import { Result, ok, err, toError } from '../shared/result.js';
import {
  LabelEvent,
  MergeRequest,
  Project,
  gitlabLabelEventSchema,
  gitlabMergeRequestSchema,
  gitlabProjectSchema,
  listEnvelopeSchema,
  toLabelEvent,
  toMergeRequest,
  toProject,
} from './types.js';

const log = logger.child('GitLabClient');

export interface GitLabClientConfig {
  baseUrl: string;
  token: string;
  /** Per-call timeout; a timed out call is a failed call */
  timeoutMs: number;
  mergeRequestsPerPage: number;
  fetchFn?: typeof fetch;
}

/**
 * A GitLab call that did not produce usable data: network error, timeout,
 * non-2xx status, unparseable body or a body of the wrong shape.
 */
export class GitLabRequestError extends Error {
  public readonly endpoint: string;
  public readonly status?: number;

  constructor(endpoint: string, message: string, status?: number, options?: { cause?: unknown }) {
    super(`GitLab ${endpoint}: ${message}`, options);
    this.name = 'GitLabRequestError';
    this.endpoint = endpoint;
    this.status = status;
  }
}

/**
 * The subset of GitLab the collector reads. Every method resolves, never
 * rejects; failures come back as `{ ok: false }` and are already logged.
 */
export interface GitLabSource {
  searchProjects(name: string): Promise<Result<Project[], GitLabRequestError>>;
  listOpenMergeRequests(projectId: number): Promise<Result<MergeRequest[], GitLabRequestError>>;
  listLabelEvents(projectId: number, iid: number): Promise<Result<LabelEvent[], GitLabRequestError>>;
}

export class GitLabClient implements GitLabSource {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly config: GitLabClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.fetchFn = config.fetchFn ?? fetch;
  }

  async searchProjects(name: string): Promise<Result<Project[], GitLabRequestError>> {
    const params = new URLSearchParams({ search: name, membership: 'true' });
    const result = await this.getList(`projects?${params}`, gitlabProjectSchema);
    return result.ok ? ok(result.value.map(toProject)) : result;
  }

  async listOpenMergeRequests(projectId: number): Promise<Result<MergeRequest[], GitLabRequestError>> {
    const params = new URLSearchParams({
      state: 'opened',
      per_page: String(this.config.mergeRequestsPerPage),
    });
    const result = await this.getList(`projects/${projectId}/merge_requests?${params}`, gitlabMergeRequestSchema);
    return result.ok ? ok(result.value.map(toMergeRequest)) : result;
  }

  async listLabelEvents(projectId: number, iid: number): Promise<Result<LabelEvent[], GitLabRequestError>> {
    const result = await this.getList(
      `projects/${projectId}/merge_requests/${iid}/resource_label_events`,
      gitlabLabelEventSchema
    );
    return result.ok ? ok(result.value.map(toLabelEvent)) : result;
  }

  /**
   * GET {baseUrl}/api/v4/{endpoint}, decoded and checked against `schema`
   */
  async get<S extends z.ZodTypeAny>(endpoint: string, schema: S): Promise<Result<z.output<S>, GitLabRequestError>> {
    const url = `${this.baseUrl}/api/v4/${endpoint}`;
    let response: Response;

    try {
      response = await this.fetchFn(url, {
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (cause) {
      return this.fail(new GitLabRequestError(endpoint, toError(cause).message, undefined, { cause }));
    }

    if (!response.ok) {
      return this.fail(new GitLabRequestError(endpoint, `${response.status} ${response.statusText}`, response.status));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (cause) {
      return this.fail(new GitLabRequestError(endpoint, 'invalid JSON body', response.status, { cause }));
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return this.fail(new GitLabRequestError(endpoint, `unexpected response shape${where}`, response.status));
    }

    return ok(parsed.data);
  }

  /**
   * GET a JSON array and keep the elements that match `itemSchema`. A body
   * that is not an array fails the call; a malformed element is logged and
   * dropped so the rest of the list still counts.
   */
  async getList<S extends z.ZodTypeAny>(
    endpoint: string,
    itemSchema: S
  ): Promise<Result<z.output<S>[], GitLabRequestError>> {
    const result = await this.get(endpoint, listEnvelopeSchema);
    if (!result.ok) {
      return result;
    }

    const items: z.output<S>[] = [];
    result.value.forEach((raw, index) => {
      const parsed = itemSchema.safeParse(raw);
      if (parsed.success) {
        items.push(parsed.data);
        return;
      }
      const issue = parsed.error.issues[0];
      log.warn('Skipping malformed GitLab list element', {
        endpoint,
        index,
        path: issue ? issue.path.join('.') : '',
        reason: issue ? issue.message : 'invalid',
      });
    });

    return ok(items);
  }

  private fail(error: GitLabRequestError): Result<never, GitLabRequestError> {
    log.error('GitLab request failed', error, { endpoint: error.endpoint, status: error.status });
    return err(error);
  }
}
