export interface JqlFilter {
  project?: string;
  status?: string;
  assignee?: string;
  labels?: string;
  priority?: string;
  /** Free text matched against summary and description. */
  topic?: string;
}

/**
 * Quotes a value as a JQL string literal. Backslashes and double quotes are
 * escaped so user-supplied values can never close the literal and inject
 * further clauses.
 */
export function quoteJqlValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

const FIELD_CLAUSES: ReadonlyArray<readonly [keyof JqlFilter, string]> = [
  ['project', 'project'],
  ['status', 'status'],
  ['assignee', 'assignee'],
  ['labels', 'labels'],
  ['priority', 'priority'],
];

export function buildJql(filter: JqlFilter): string {
  const clauses: string[] = [];

  for (const [key, field] of FIELD_CLAUSES) {
    const value = filter[key]?.trim();
    if (value) {
      clauses.push(`${field} = ${quoteJqlValue(value)}`);
    }
  }

  const topic = filter.topic?.trim();
  if (topic) {
    const quoted = quoteJqlValue(topic);
    clauses.push(`(summary ~ ${quoted} OR description ~ ${quoted})`);
  }

  const orderBy = 'ORDER BY created DESC';
  return clauses.length > 0 ? `${clauses.join(' AND ')} ${orderBy}` : orderBy;
}
