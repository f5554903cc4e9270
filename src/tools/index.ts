import type { JiraClient } from '../jira/jiraClient.js';
import { calculatorTool } from './calculator.js';
import { createClockTool, type ClockOptions } from './clock.js';
import { helloTool } from './hello.js';
import { infoSearchTool } from './infoSearch.js';
import { createJiraFilterTool, createJiraIssueDetailTool, createJiraSearchTool } from './jiraTools.js';
import { ToolRegistry } from './registry.js';
import { weatherTool } from './weather.js';

export interface DefaultToolDeps {
  jiraClient?: JiraClient;
  jiraMaxResults?: number;
  clock?: ClockOptions;
}

/** Registry with the built-in tools, in the order they are advertised to the model. */
export function createDefaultRegistry(deps: DefaultToolDeps = {}): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(helloTool);
  registry.register(calculatorTool);
  registry.register(weatherTool);
  registry.register(createClockTool(deps.clock));
  registry.register(infoSearchTool);
  if (deps.jiraClient) {
    const maxResults = deps.jiraMaxResults ?? 50;
    registry.register(createJiraSearchTool(deps.jiraClient, maxResults));
    registry.register(createJiraIssueDetailTool(deps.jiraClient));
    registry.register(createJiraFilterTool(deps.jiraClient, maxResults));
  }
  return registry;
}

export { ToolRegistry } from './registry.js';
export type { ToolSpec, ToolInvocation, ToolHandler } from './types.js';
