import { ConfigError } from '../errors.js';

export type AuthScheme = 'keyid' | 'bearer';
export type ToolCallingMode = 'sentinel' | 'native';

const AUTH_SCHEMES: readonly AuthScheme[] = ['keyid', 'bearer'];
const TOOL_CALLING_MODES: readonly ToolCallingMode[] = ['sentinel', 'native'];

function validateAuthScheme(value: string): AuthScheme {
  const match = AUTH_SCHEMES.find((scheme) => scheme === value.toLowerCase());
  if (!match) {
    throw new ConfigError(`LLM_AUTH_SCHEME must be one of: ${AUTH_SCHEMES.join(', ')} (got: ${value})`);
  }
  return match;
}

function validateToolCallingMode(value: string): ToolCallingMode {
  const match = TOOL_CALLING_MODES.find((mode) => mode === value.toLowerCase());
  if (!match) {
    throw new ConfigError(`TOOL_CALLING_MODE must be one of: ${TOOL_CALLING_MODES.join(', ')} (got: ${value})`);
  }
  return match;
}

function parseBoolean(key: string, fallback: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true';
}

function parseNumber(key: string, fallback: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`${key} must be a number (got: ${value})`);
  }
  return parsed;
}

export function loadConfig() {
  return {
    port: parseInt(process.env.PORT || '4010', 10),
    nodeEnv: process.env.NODE_ENV || 'development',

    // LLM endpoint, validated lazily by requireLlmConfig() so the server can
    // still start and report the missing setting on the chat route
    llmApiUrl: process.env.LLM_API_URL || '',
    llmApiKey: process.env.LLM_API_KEY || '',
    llmModel: process.env.LLM_MODEL || 'meta-llama/Meta-Llama-3-70B-Instruct',
    llmAuthScheme: validateAuthScheme(process.env.LLM_AUTH_SCHEME || 'keyid'),
    llmTimeoutMs: parseNumber('LLM_TIMEOUT_MS', 60000),
    maxTokens: parseNumber('MAX_TOKENS', 2048),
    temperature: parseNumber('TEMPERATURE', 0.7),
    verifySsl: parseBoolean('VERIFY_SSL', true),

    // Turn behaviour
    toolCallingMode: validateToolCallingMode(process.env.TOOL_CALLING_MODE || 'sentinel'),
    roundTripToolResult: parseBoolean('ROUND_TRIP_TOOL_RESULT', false),
    historyWindow: parseNumber('HISTORY_WINDOW', 10),

    // Sessions (in-memory when REDIS_URL is unset)
    redisUrl: process.env.REDIS_URL || '',
    sessionTtlSeconds: parseNumber('SESSION_TTL_SECONDS', 3600),

    // Jira (optional; jira_search is only registered when all three are set)
    jiraServerUrl: process.env.JIRA_SERVER_URL || '',
    jiraUsername: process.env.JIRA_USERNAME || '',
    jiraApiToken: process.env.JIRA_API_TOKEN || '',
    jiraProject: process.env.JIRA_PROJECT || '',
    jiraMaxResults: parseNumber('JIRA_MAX_RESULTS', 50),
  };
}

export type Config = ReturnType<typeof loadConfig>;

export function requireLlmConfig(config: Config): void {
  if (!config.llmApiUrl) {
    throw new ConfigError('LLM_API_URL environment variable is required');
  }
  if (!config.llmApiKey) {
    throw new ConfigError('LLM_API_KEY environment variable is required');
  }
}

export function isJiraConfigured(config: Config): boolean {
  return !!config.jiraServerUrl && !!config.jiraUsername && !!config.jiraApiToken;
}
