import type { ToolSpec } from './types.js';

export interface ClockOptions {
  now?: () => Date;
  /** IANA zone to format in; defaults to the process zone. */
  timeZone?: string;
}

/** e.g. `Monday, October 19, 2026 at 09:05 AM` */
export function formatDateTime(date: Date, timeZone?: string): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    weekday: 'long',
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
    timeZone,
  });
  const parts = Object.fromEntries(formatter.formatToParts(date).map((p) => [p.type, p.value]));
  return `${parts.weekday}, ${parts.month} ${parts.day}, ${parts.year} at ${parts.hour}:${parts.minute} ${parts.dayPeriod}`;
}

export function createClockTool(options: ClockOptions = {}): ToolSpec {
  const now = options.now ?? (() => new Date());

  return {
    name: 'current_time',
    description: 'Returns the current date and time. Takes no argument.',
    parameterName: 'query',
    // Models pass things like "now" or "today"; whatever arrives is ignored
    handler: () => formatDateTime(now(), options.timeZone),
  };
}
