import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { isJiraConfigured, loadConfig, requireLlmConfig } from '../src/config/index.js';
import { ConfigError } from '../src/errors.js';

const KEYS = [
  'PORT',
  'LLM_API_URL',
  'LLM_API_KEY',
  'LLM_MODEL',
  'LLM_AUTH_SCHEME',
  'LLM_TIMEOUT_MS',
  'MAX_TOKENS',
  'TEMPERATURE',
  'VERIFY_SSL',
  'TOOL_CALLING_MODE',
  'ROUND_TRIP_TOOL_RESULT',
  'HISTORY_WINDOW',
  'REDIS_URL',
  'SESSION_TTL_SECONDS',
  'JIRA_SERVER_URL',
  'JIRA_USERNAME',
  'JIRA_API_TOKEN',
  'JIRA_PROJECT',
  'JIRA_MAX_RESULTS',
];

describe('loadConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
  });

  it('should apply defaults', () => {
    const config = loadConfig();
    expect(config.port).toBe(4010);
    expect(config.llmApiUrl).toBe('');
    expect(config.llmModel).toBe('meta-llama/Meta-Llama-3-70B-Instruct');
    expect(config.llmAuthScheme).toBe('keyid');
    expect(config.llmTimeoutMs).toBe(60000);
    expect(config.maxTokens).toBe(2048);
    expect(config.temperature).toBe(0.7);
    expect(config.verifySsl).toBe(true);
    expect(config.toolCallingMode).toBe('sentinel');
    expect(config.roundTripToolResult).toBe(false);
    expect(config.historyWindow).toBe(10);
    expect(config.redisUrl).toBe('');
    expect(config.sessionTtlSeconds).toBe(3600);
    expect(config.jiraMaxResults).toBe(50);
  });

  it('should read values from the environment', () => {
    process.env.PORT = '8080';
    process.env.LLM_API_URL = 'https://llm.test/v1/chat/completions';
    process.env.LLM_API_KEY = 'test-secret';
    process.env.LLM_AUTH_SCHEME = 'BEARER';
    process.env.VERIFY_SSL = 'false';
    process.env.TOOL_CALLING_MODE = 'native';
    process.env.ROUND_TRIP_TOOL_RESULT = 'true';
    process.env.TEMPERATURE = '0';

    const config = loadConfig();
    expect(config.port).toBe(8080);
    expect(config.llmApiUrl).toBe('https://llm.test/v1/chat/completions');
    expect(config.llmApiKey).toBe('test-secret');
    expect(config.llmAuthScheme).toBe('bearer');
    expect(config.verifySsl).toBe(false);
    expect(config.toolCallingMode).toBe('native');
    expect(config.roundTripToolResult).toBe(true);
    expect(config.temperature).toBe(0);
  });

  it('should reject an unknown auth scheme', () => {
    process.env.LLM_AUTH_SCHEME = 'oauth';
    expect(() => loadConfig()).toThrow(ConfigError);
    expect(() => loadConfig()).toThrow('LLM_AUTH_SCHEME must be one of: keyid, bearer (got: oauth)');
  });

  it('should reject an unknown tool-calling mode', () => {
    process.env.TOOL_CALLING_MODE = 'keywords';
    expect(() => loadConfig()).toThrow('TOOL_CALLING_MODE must be one of: sentinel, native (got: keywords)');
  });

  it('should reject non-numeric numbers', () => {
    process.env.MAX_TOKENS = 'lots';
    expect(() => loadConfig()).toThrow('MAX_TOKENS must be a number (got: lots)');
  });
});

describe('requireLlmConfig', () => {
  it('should require the endpoint and key', () => {
    const base = loadConfig();
    expect(() => requireLlmConfig({ ...base, llmApiUrl: '', llmApiKey: '' })).toThrow(
      'LLM_API_URL environment variable is required',
    );
    expect(() => requireLlmConfig({ ...base, llmApiUrl: 'https://llm.test', llmApiKey: '' })).toThrow(
      'LLM_API_KEY environment variable is required',
    );
    expect(() => requireLlmConfig({ ...base, llmApiUrl: 'https://llm.test', llmApiKey: 'test-secret' })).not.toThrow();
  });
});

describe('isJiraConfigured', () => {
  it('should need the server, username and token', () => {
    const base = loadConfig();
    const jira = { jiraServerUrl: 'https://jira.example.test', jiraUsername: 'bot', jiraApiToken: 'test-secret' };
    expect(isJiraConfigured({ ...base, ...jira })).toBe(true);
    expect(isJiraConfigured({ ...base, ...jira, jiraApiToken: '' })).toBe(false);
  });
});
