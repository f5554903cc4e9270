import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AuthError, MalformedResponseError, TransportError } from '../src/errors.js';
import { JiraClient, flattenIssue } from '../src/jira/jiraClient.js';
import { buildJql, quoteJqlValue } from '../src/jira/jqlBuilder.js';
import {
  createJiraFilterTool,
  createJiraIssueDetailTool,
  createJiraSearchTool,
  describeFilter,
  parseIssueFilter,
  sanitizeProjectKey,
} from '../src/tools/jiraTools.js';
import { createDefaultRegistry } from '../src/tools/index.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function rawIssue(key: string, overrides: Record<string, unknown> = {}) {
  return {
    key,
    fields: {
      summary: `Summary of ${key}`,
      status: { name: 'In Progress' },
      assignee: { displayName: 'Dana Lee' },
      project: { key: key.split('-')[0] },
      priority: { name: 'High' },
      labels: ['backend', 'api'],
      created: '2026-10-01T10:00:00.000+0000',
      updated: '2026-10-02T10:00:00.000+0000',
      ...overrides,
    },
  };
}

function makeClient(defaultProject?: string) {
  return new JiraClient({
    serverUrl: 'https://jira.example.test/',
    username: 'bot@example.test',
    apiToken: 'test-secret',
    defaultProject,
  });
}

// ─── JQL ─────────────────────────────────────────────────────────────────────

describe('buildJql', () => {
  it('should order by creation date when there is no filter', () => {
    expect(buildJql({})).toBe('ORDER BY created DESC');
  });

  it('should quote and join field clauses', () => {
    expect(buildJql({ project: 'PROJ', status: 'In Progress' })).toBe(
      'project = "PROJ" AND status = "In Progress" ORDER BY created DESC',
    );
  });

  it('should match a topic in summary or description', () => {
    expect(buildJql({ topic: 'login' })).toBe('(summary ~ "login" OR description ~ "login") ORDER BY created DESC');
  });

  it('should skip blank values', () => {
    expect(buildJql({ project: '  ', assignee: 'dana' })).toBe('assignee = "dana" ORDER BY created DESC');
  });

  it('should escape quotes so a value cannot add clauses', () => {
    const jql = buildJql({ project: 'X" OR project = "SECRET' });
    expect(jql).toBe('project = "X\\" OR project = \\"SECRET" ORDER BY created DESC');
  });

  it('should escape backslashes before quotes', () => {
    expect(quoteJqlValue('a\\"b')).toBe('"a\\\\\\"b"');
  });
});

// ─── Issue flattening ────────────────────────────────────────────────────────

describe('flattenIssue', () => {
  it('should flatten the fields used for display', () => {
    expect(flattenIssue(rawIssue('PROJ-1'))).toEqual({
      key: 'PROJ-1',
      summary: 'Summary of PROJ-1',
      status: 'In Progress',
      assignee: 'Dana Lee',
      project: 'PROJ',
      priority: 'High',
      labels: 'backend, api',
      created: '2026-10-01T10:00:00.000+0000',
      updated: '2026-10-02T10:00:00.000+0000',
    });
  });

  it('should fill in missing values', () => {
    const issue = flattenIssue({ key: 'PROJ-2', fields: { assignee: null, priority: null, labels: null } });
    expect(issue.assignee).toBe('Unassigned');
    expect(issue.priority).toBe('Unknown');
    expect(issue.status).toBe('Unknown');
    expect(issue.labels).toBe('');
  });
});

// ─── Client ──────────────────────────────────────────────────────────────────

describe('JiraClient', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should search with basic auth and the encoded JQL', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ issues: [rawIssue('PROJ-1')], total: 1 }));

    const issues = await makeClient().searchIssues({ project: 'PROJ' }, 10);

    expect(issues.map((i) => i.key)).toEqual(['PROJ-1']);
    const [url, init] = fetchMock.mock.calls[0];
    const parsed = new URL(String(url));
    expect(parsed.origin + parsed.pathname).toBe('https://jira.example.test/rest/api/2/search');
    expect(parsed.searchParams.get('jql')).toBe('project = "PROJ" ORDER BY created DESC');
    expect(parsed.searchParams.get('maxResults')).toBe('10');
    expect(parsed.searchParams.get('fields')).toBe('summary,status,assignee,project,priority,labels,created,updated');
    expect(init.headers.Authorization).toBe(
      `Basic ${Buffer.from('bot@example.test:test-secret').toString('base64')}`,
    );
  });

  it('should fall back to the default project', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ issues: [] }));

    await makeClient('OPS').searchIssues();

    const parsed = new URL(String(fetchMock.mock.calls[0][0]));
    expect(parsed.searchParams.get('jql')).toBe('project = "OPS" ORDER BY created DESC');
    expect(parsed.searchParams.get('maxResults')).toBe('50');
  });

  it('should map 401 to AuthError', async () => {
    fetchMock.mockResolvedValue(jsonResponse({}, 401));

    await expect(makeClient().searchIssues()).rejects.toThrow(AuthError);
  });

  it('should map other HTTP errors to TransportError', async () => {
    fetchMock.mockResolvedValue(new Response('boom', { status: 502, statusText: 'Bad Gateway' }));

    await expect(makeClient().searchIssues()).rejects.toThrow('Jira HTTP 502: Bad Gateway');
  });

  it('should map network failures to TransportError', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const error = await makeClient().searchIssues().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('message', 'Could not reach Jira: fetch failed');
  });

  it('should reject a search response of the wrong shape', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ issues: 'none' }));

    await expect(makeClient().searchIssues()).rejects.toThrow(MalformedResponseError);
  });

  it('should fetch a single issue and return null when it does not exist', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(rawIssue('PROJ-7')));
    fetchMock.mockResolvedValueOnce(jsonResponse({ errorMessages: ['Issue does not exist'] }, 404));

    expect((await makeClient().getIssue('PROJ-7'))?.summary).toBe('Summary of PROJ-7');
    expect(await makeClient().getIssue('PROJ-8')).toBeNull();
  });

  it('should refuse malformed issue keys without calling Jira', async () => {
    await expect(makeClient().getIssue('../admin')).rejects.toThrow('Invalid issue key: ../admin');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

// ─── jira_search tool ────────────────────────────────────────────────────────

describe('sanitizeProjectKey', () => {
  it('should keep a plain key', () => {
    expect(sanitizeProjectKey(' PROJ ')).toBe('PROJ');
  });

  it('should drop descriptions passed as keys', () => {
    expect(sanitizeProjectKey('')).toBeUndefined();
    expect(sanitizeProjectKey('all issues')).toBeUndefined();
    expect(sanitizeProjectKey('default project')).toBeUndefined();
    expect(sanitizeProjectKey('list(PROJ)')).toBeUndefined();
    expect(sanitizeProjectKey('A'.repeat(21))).toBeUndefined();
  });
});

describe('jira_search tool', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should list issues for the given project', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        issues: [rawIssue('PROJ-1'), rawIssue('PROJ-2', { assignee: null, priority: null })],
      }),
    );
    const tool = createJiraSearchTool(makeClient(), 50);

    expect(await tool.handler('PROJ')).toBe(
      [
        "Found 2 issues in project 'PROJ':",
        '',
        '• PROJ-1: Summary of PROJ-1 (Status: In Progress, Assignee: Dana Lee) [Priority: High]',
        '• PROJ-2: Summary of PROJ-2 (Status: In Progress, Assignee: Unassigned)',
        '',
        'Connected to Jira: https://jira.example.test',
      ].join('\n'),
    );
  });

  it('should report an empty default-project search', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ issues: [] }));
    const tool = createJiraSearchTool(makeClient('OPS'), 50);

    expect(await tool.handler('all issues')).toBe("No issues found in default project 'OPS'");
  });

  it('should search all projects when there is no key and no default', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ issues: [] }));
    const tool = createJiraSearchTool(makeClient(), 50);

    expect(await tool.handler('')).toBe('No issues found from all accessible projects');
  });

  it('should only be registered when a client is configured', () => {
    expect(createDefaultRegistry().resolve('jira_search')).toBeUndefined();
    expect(createDefaultRegistry({ jiraClient: makeClient() }).resolve('jira_search')?.parameterName).toBe(
      'project_key',
    );
  });

  it('should register the detail and filter tools alongside it', () => {
    const names = createDefaultRegistry({ jiraClient: makeClient() })
      .list()
      .map((t) => t.name);
    expect(names.slice(-3)).toEqual(['jira_search', 'jira_issue_detail', 'jira_issues_by_filter']);
    expect(createDefaultRegistry().resolve('jira_issues_by_filter')).toBeUndefined();
  });
});

// ─── jira_issues_by_filter tool ──────────────────────────────────────────────

describe('parseIssueFilter', () => {
  it('should read field=value pairs', () => {
    expect(parseIssueFilter('status=In Progress; assignee = dana ; priority="High"')).toEqual({
      ok: true,
      filter: { status: 'In Progress', assignee: 'dana', priority: 'High' },
    });
  });

  it('should accept label as an alias of labels', () => {
    expect(parseIssueFilter('label=backend')).toEqual({ ok: true, filter: { labels: 'backend' } });
  });

  it('should treat bare text as the topic', () => {
    expect(parseIssueFilter('login timeout; status=Open')).toEqual({
      ok: true,
      filter: { topic: 'login timeout', status: 'Open' },
    });
  });

  it('should reject unknown fields', () => {
    expect(parseIssueFilter('reporter=dana')).toEqual({
      ok: false,
      error: "Unknown filter field 'reporter'. Use status, assignee, labels, priority, topic or project.",
    });
    expect(parseIssueFilter('constructor=x').ok).toBe(false);
  });

  it('should return an empty filter for an empty argument', () => {
    expect(parseIssueFilter('  ')).toEqual({ ok: true, filter: {} });
  });
});

describe('describeFilter', () => {
  it('should list the set fields in a fixed order', () => {
    expect(describeFilter({ priority: 'High', status: 'Open' })).toBe('status: Open, priority: High');
    expect(describeFilter({})).toBe('no filters');
  });
});

describe('jira_issues_by_filter tool', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should search with every filter clause', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ issues: [rawIssue('PROJ-3')] }));
    const tool = createJiraFilterTool(makeClient(), 20);

    const output = await tool.handler('status=In Progress; assignee=dana; labels=backend; priority=High; topic=login');

    const parsed = new URL(String(fetchMock.mock.calls[0][0]));
    expect(parsed.searchParams.get('jql')).toBe(
      'status = "In Progress" AND assignee = "dana" AND labels = "backend" AND priority = "High" AND ' +
        '(summary ~ "login" OR description ~ "login") ORDER BY created DESC',
    );
    expect(parsed.searchParams.get('maxResults')).toBe('20');
    expect(output).toBe(
      [
        'Found 1 issues with filters: status: In Progress, assignee: dana, labels: backend, priority: High, topic: login',
        '',
        '• PROJ-3: Summary of PROJ-3 (Status: In Progress, Assignee: Dana Lee) [Priority: High]',
        '',
        'Connected to Jira: https://jira.example.test',
      ].join('\n'),
    );
  });

  it('should scope the search to the default project', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ issues: [] }));
    const tool = createJiraFilterTool(makeClient('OPS'), 50);

    expect(await tool.handler('status=Done')).toBe('No issues found with filters: status: Done');
    const parsed = new URL(String(fetchMock.mock.calls[0][0]));
    expect(parsed.searchParams.get('jql')).toBe('project = "OPS" AND status = "Done" ORDER BY created DESC');
  });

  it('should report a bad filter without calling Jira', async () => {
    const tool = createJiraFilterTool(makeClient(), 50);

    expect(await tool.handler('sprint=12')).toBe(
      "Unknown filter field 'sprint'. Use status, assignee, labels, priority, topic or project.",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

// ─── jira_issue_detail tool ──────────────────────────────────────────────────

describe('jira_issue_detail tool', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should show the issue fields', async () => {
    fetchMock.mockResolvedValue(jsonResponse(rawIssue('PROJ-42')));
    const tool = createJiraIssueDetailTool(makeClient());

    expect(await tool.handler(' proj-42 ')).toBe(
      [
        'Issue Details: PROJ-42',
        'Summary: Summary of PROJ-42',
        'Status: In Progress',
        'Assignee: Dana Lee',
        'Priority: High',
        'Project: PROJ',
        'Labels: backend, api',
        'Created: 2026-10-01T10:00:00.000+0000',
        'Updated: 2026-10-02T10:00:00.000+0000',
      ].join('\n'),
    );
    const parsed = new URL(String(fetchMock.mock.calls[0][0]));
    expect(parsed.pathname).toBe('/rest/api/2/issue/PROJ-42');
  });

  it('should show "none" for an issue without labels', async () => {
    fetchMock.mockResolvedValue(jsonResponse(rawIssue('PROJ-5', { labels: [] })));
    const tool = createJiraIssueDetailTool(makeClient());

    expect(await tool.handler('PROJ-5')).toContain('Labels: none');
  });

  it('should report a missing issue', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ errorMessages: ['Issue does not exist'] }, 404));
    const tool = createJiraIssueDetailTool(makeClient());

    expect(await tool.handler('PROJ-404')).toBe('Issue PROJ-404 not found');
  });

  it('should reject a malformed key without calling Jira', async () => {
    const tool = createJiraIssueDetailTool(makeClient());

    expect(await tool.handler('the login bug')).toBe(
      "Invalid issue key 'the login bug'. Expected something like PROJ-123.",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
