import { ISSUE_KEY_PATTERN, type JiraClient, type JiraIssue } from '../jira/jiraClient.js';
import type { JqlFilter } from '../jira/jqlBuilder.js';
import { createLogger } from '../logger.js';
import type { ToolSpec } from './types.js';

const log = createLogger('JiraTool');

const FILTER_FIELDS = new Map<string, keyof JqlFilter>([
  ['project', 'project'],
  ['status', 'status'],
  ['assignee', 'assignee'],
  ['labels', 'labels'],
  ['label', 'labels'],
  ['priority', 'priority'],
  ['topic', 'topic'],
]);

const FILTER_ORDER: ReadonlyArray<keyof JqlFilter> = ['project', 'status', 'assignee', 'labels', 'priority', 'topic'];

/**
 * Models sometimes pass a description ("all issues", "default project") where
 * a project key belongs. Those are treated as "no project".
 */
export function sanitizeProjectKey(projectKey: string): string | undefined {
  const key = projectKey.trim();
  if (!key) return undefined;

  const lowered = key.toLowerCase();
  if (
    key.length > 20 ||
    key.includes('(') ||
    key.includes(')') ||
    lowered.includes('all issues') ||
    lowered.includes('default') ||
    lowered.includes('without any input')
  ) {
    log.warn({ action: 'jira.project_key.ignored', projectKey: key }, 'Invalid project key - treating as none');
    return undefined;
  }
  return key;
}

export type ParsedIssueFilter = { ok: true; filter: JqlFilter } | { ok: false; error: string };

/**
 * `status=In Progress; priority=High`. Segments without `=` are free text
 * and become the topic.
 */
export function parseIssueFilter(argument: string): ParsedIssueFilter {
  const filter: JqlFilter = {};
  const topicWords: string[] = [];

  for (const segment of argument.split(';')) {
    const part = segment.trim();
    if (!part) continue;

    const eq = part.indexOf('=');
    if (eq === -1) {
      topicWords.push(part);
      continue;
    }

    const name = part.slice(0, eq).trim().toLowerCase();
    const value = part.slice(eq + 1).trim().replace(/^['"]+|['"]+$/g, '');
    const field = FILTER_FIELDS.get(name);
    if (!field) {
      return {
        ok: false,
        error: `Unknown filter field '${name}'. Use status, assignee, labels, priority, topic or project.`,
      };
    }
    if (value) filter[field] = value;
  }

  if (topicWords.length > 0 && !filter.topic) {
    filter.topic = topicWords.join(' ');
  }
  return { ok: true, filter };
}

export function describeFilter(filter: JqlFilter): string {
  const parts = FILTER_ORDER.filter((field) => filter[field]).map((field) => `${field}: ${filter[field]}`);
  return parts.length > 0 ? parts.join(', ') : 'no filters';
}

function formatIssueLine(issue: JiraIssue): string {
  let line = `• ${issue.key}: ${issue.summary} (Status: ${issue.status}, Assignee: ${issue.assignee})`;
  if (issue.priority !== 'Unknown') {
    line += ` [Priority: ${issue.priority}]`;
  }
  return line;
}

function formatIssueList(header: string, issues: JiraIssue[], serverUrl: string): string {
  return [header, '', ...issues.map(formatIssueLine), '', `Connected to Jira: ${serverUrl}`].join('\n');
}

export function createJiraSearchTool(client: JiraClient, maxResults: number): ToolSpec {
  return {
    name: 'jira_search',
    description:
      "Lists recent Jira issues. Pass a project key (e.g. 'PROJ') to filter by project, or nothing to use the default project.",
    parameterName: 'project_key',
    handler: async (argument) => {
      const projectKey = sanitizeProjectKey(argument);
      const issues = await client.searchIssues({ project: projectKey }, maxResults);

      const scope = projectKey
        ? `in project '${projectKey}'`
        : client.defaultProject
          ? `in default project '${client.defaultProject}'`
          : 'from all accessible projects';

      if (issues.length === 0) {
        return `No issues found ${scope}`;
      }
      return formatIssueList(`Found ${issues.length} issues ${scope}:`, issues, client.serverUrl);
    },
  };
}

export function createJiraIssueDetailTool(client: JiraClient): ToolSpec {
  return {
    name: 'jira_issue_detail',
    description: "Shows the details of one Jira issue. Pass the issue key, e.g. 'PROJ-123'.",
    parameterName: 'issue_key',
    handler: async (argument) => {
      const issueKey = argument.trim().toUpperCase();
      if (!ISSUE_KEY_PATTERN.test(issueKey)) {
        return `Invalid issue key '${argument.trim()}'. Expected something like PROJ-123.`;
      }

      const issue = await client.getIssue(issueKey);
      if (!issue) {
        return `Issue ${issueKey} not found`;
      }

      return [
        `Issue Details: ${issue.key}`,
        `Summary: ${issue.summary}`,
        `Status: ${issue.status}`,
        `Assignee: ${issue.assignee}`,
        `Priority: ${issue.priority}`,
        `Project: ${issue.project}`,
        `Labels: ${issue.labels || 'none'}`,
        `Created: ${issue.created}`,
        `Updated: ${issue.updated}`,
      ].join('\n');
    },
  };
}

export function createJiraFilterTool(client: JiraClient, maxResults: number): ToolSpec {
  return {
    name: 'jira_issues_by_filter',
    description:
      "Lists Jira issues matching field=value pairs separated by ';' (fields: status, assignee, labels, priority, topic, project), " +
      "e.g. 'status=In Progress; priority=High'. Plain text searches issue summaries and descriptions.",
    parameterName: 'filter',
    handler: async (argument) => {
      const parsed = parseIssueFilter(argument);
      if (!parsed.ok) {
        return parsed.error;
      }

      const issues = await client.searchIssues(parsed.filter, maxResults);
      const description = describeFilter(parsed.filter);

      if (issues.length === 0) {
        return `No issues found with filters: ${description}`;
      }
      return formatIssueList(`Found ${issues.length} issues with filters: ${description}`, issues, client.serverUrl);
    },
  };
}
