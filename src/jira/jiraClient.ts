import { z } from 'zod';
import { AuthError, MalformedResponseError, TransportError } from '../errors.js';
import { createLogger } from '../logger.js';
import { buildJql, type JqlFilter } from './jqlBuilder.js';

const log = createLogger('Jira');

export const ISSUE_FIELDS = ['summary', 'status', 'assignee', 'project', 'priority', 'labels', 'created', 'updated'];

const namedSchema = z.object({ name: z.string().optional() }).nullish();

const rawIssueSchema = z.object({
  key: z.string().optional(),
  fields: z
    .object({
      summary: z.string().nullish(),
      status: namedSchema,
      assignee: z.object({ displayName: z.string().optional() }).nullish(),
      project: z.object({ key: z.string().optional() }).nullish(),
      priority: namedSchema,
      labels: z.array(z.string()).nullish(),
      created: z.string().nullish(),
      updated: z.string().nullish(),
    })
    .optional(),
});

const searchResponseSchema = z.object({
  issues: z.array(rawIssueSchema).default([]),
  total: z.number().optional(),
});

export const ISSUE_KEY_PATTERN = /^[A-Za-z][A-Za-z0-9_]*-\d+$/;

export type RawJiraIssue = z.infer<typeof rawIssueSchema>;

export interface JiraIssue {
  key: string;
  summary: string;
  status: string;
  assignee: string;
  project: string;
  priority: string;
  labels: string;
  created: string;
  updated: string;
}

export interface JiraClientConfig {
  serverUrl: string;
  username: string;
  apiToken: string;
  defaultProject?: string;
  timeoutMs?: number;
}

export function flattenIssue(raw: RawJiraIssue): JiraIssue {
  const fields = raw.fields ?? {};
  return {
    key: raw.key ?? '',
    summary: fields.summary ?? '',
    status: fields.status?.name ?? 'Unknown',
    assignee: fields.assignee ? fields.assignee.displayName ?? 'Unknown' : 'Unassigned',
    project: fields.project?.key ?? 'Unknown',
    priority: fields.priority?.name ?? 'Unknown',
    labels: (fields.labels ?? []).join(', '),
    created: fields.created ?? '',
    updated: fields.updated ?? '',
  };
}

/** Thin client over the Jira REST v2 search API (basic auth, API token as password). */
export class JiraClient {
  private baseUrl: string;
  private authHeader: string;
  private timeoutMs: number;
  readonly defaultProject: string;

  constructor(config: JiraClientConfig) {
    this.baseUrl = config.serverUrl.replace(/\/+$/, '');
    this.authHeader = `Basic ${Buffer.from(`${config.username}:${config.apiToken}`).toString('base64')}`;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.defaultProject = config.defaultProject ?? '';
  }

  get serverUrl(): string {
    return this.baseUrl;
  }

  /** Falls back to the default project when the filter names none. */
  async searchIssues(filter: JqlFilter = {}, maxResults = 50): Promise<JiraIssue[]> {
    const jql = buildJql({ ...filter, project: filter.project || this.defaultProject || undefined });
    const params = new URLSearchParams({
      jql,
      maxResults: String(maxResults),
      fields: ISSUE_FIELDS.join(','),
    });

    log.debug({ action: 'jira.search.started', jql, maxResults }, 'Searching Jira');
    const body = await this.get(`/rest/api/2/search?${params.toString()}`);

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(`Unexpected Jira search response: ${parsed.error.message}`);
    }

    const issues = parsed.data.issues.map(flattenIssue);
    log.info({ action: 'jira.search.succeeded', count: issues.length }, 'Jira search completed');
    return issues;
  }

  async getIssue(issueKey: string): Promise<JiraIssue | null> {
    if (!ISSUE_KEY_PATTERN.test(issueKey)) {
      throw new Error(`Invalid issue key: ${issueKey}`);
    }
    const params = new URLSearchParams({ fields: ISSUE_FIELDS.join(',') });
    const body = await this.get(`/rest/api/2/issue/${issueKey}?${params.toString()}`, { allowNotFound: true });
    if (body === null) return null;

    const parsed = rawIssueSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(`Unexpected Jira issue response: ${parsed.error.message}`);
    }
    return flattenIssue(parsed.data);
  }

  private async get(path: string, opts: { allowNotFound?: boolean } = {}): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: 'GET',
        headers: {
          Authorization: this.authHeader,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ action: 'jira.request.failed', path, error: message }, 'Jira request failed');
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new TransportError(`Jira request timed out after ${this.timeoutMs}ms`, undefined, { cause: error });
      }
      throw new TransportError(`Could not reach Jira: ${message}`, undefined, { cause: error });
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`Jira rejected the credentials (${response.status})`, response.status);
    }
    if (response.status === 404 && opts.allowNotFound) {
      return null;
    }
    if (!response.ok) {
      throw new TransportError(`Jira HTTP ${response.status}: ${response.statusText}`, response.status);
    }

    try {
      return await response.json();
    } catch {
      throw new MalformedResponseError('Jira response is not valid JSON');
    }
  }
}
