import { z } from 'zod';

/**
 * GitLab REST (v4) payloads, validated on the way in. Only the fields the
 * exporter reads are declared; the rest are stripped.
 */

export const gitlabProjectSchema = z.object({
  id: z.number(),
  name: z.string(),
  path: z.string(),
  path_with_namespace: z.string().optional(),
});

const gitlabUserSchema = z.object({
  username: z.string(),
});

export const gitlabMergeRequestSchema = z.object({
  iid: z.number(),
  title: z.string().nullish(),
  created_at: z.string().nullish(),
  source_branch: z.string().nullish(),
  target_branch: z.string().nullish(),
  labels: z.array(z.string()).nullish(),
  assignees: z.array(gitlabUserSchema).nullish(),
  web_url: z.string().nullish(),
});

export const gitlabLabelEventSchema = z.object({
  created_at: z.string(),
  action: z.enum(['add', 'remove']),
  // null once the label itself has been deleted
  label: z.object({ name: z.string() }).nullish(),
});

// Lists are checked element by element; see GitLabClient.getList
export const listEnvelopeSchema = z.array(z.unknown());

export type GitLabProject = z.infer<typeof gitlabProjectSchema>;
export type GitLabMergeRequest = z.infer<typeof gitlabMergeRequestSchema>;
export type GitLabLabelEvent = z.infer<typeof gitlabLabelEventSchema>;

export interface Project {
  id: number;
  name: string;
  path: string;
  /** namespace/path, used as the `project` label */
  displayName: string;
}

export interface MergeRequest {
  iid: number;
  title: string;
  createdAt: string | undefined;
  sourceBranch: string;
  targetBranch: string;
  labels: string[];
  assignees: string[];
  webUrl: string;
}

export type LabelAction = 'add' | 'remove';

export interface LabelEvent {
  createdAt: string;
  action: LabelAction;
  label: string | undefined;
}

export function toProject(raw: GitLabProject): Project {
  return {
    id: raw.id,
    name: raw.name,
    path: raw.path,
    displayName: raw.path_with_namespace ?? 'unknown',
  };
}

export function toMergeRequest(raw: GitLabMergeRequest): MergeRequest {
  return {
    iid: raw.iid,
    title: raw.title ?? '',
    createdAt: raw.created_at ?? undefined,
    sourceBranch: raw.source_branch ?? 'unknown',
    targetBranch: raw.target_branch ?? 'main',
    labels: raw.labels ?? [],
    assignees: (raw.assignees ?? []).map(a => a.username),
    webUrl: raw.web_url ?? '',
  };
}

export function toLabelEvent(raw: GitLabLabelEvent): LabelEvent {
  return {
    createdAt: raw.created_at,
    action: raw.action,
    label: raw.label?.name,
  };
}
