import express from 'express';
import swaggerUi from 'swagger-ui-express';
import { createChatRoutes } from './api/chatRoutes.js';
import {
  createInMemorySessionRegistry,
  createRedisSessionRegistry,
  type SessionRegistry,
} from './chat/conversationStore.js';
import { createLazyProvider, type LLMProviderFactory } from './chat/providerFactory.js';
import type { TurnOptions } from './chat/turnProcessor.js';
import type { Config } from './config/index.js';
import { isJiraConfigured, loadConfig } from './config/index.js';
import { ConfigError } from './errors.js';
import { JiraClient } from './jira/jiraClient.js';
import { createLogger } from './logger.js';
import { createRedisClient } from './redis/client.js';
import { buildSwaggerSpec } from './swagger.js';
import { createDefaultRegistry } from './tools/index.js';
import type { ToolRegistry } from './tools/registry.js';

const log = createLogger('Server');

export interface AppOverrides {
  llmProvider?: LLMProviderFactory;
  sessions?: SessionRegistry;
  registry?: ToolRegistry;
}

function createApp(config: Config, overrides: AppOverrides = {}) {
  const app = express();

  const swaggerSpec = buildSwaggerSpec(`http://localhost:${config.port}`);

  const jiraClient = isJiraConfigured(config)
    ? new JiraClient({
        serverUrl: config.jiraServerUrl,
        username: config.jiraUsername,
        apiToken: config.jiraApiToken,
        defaultProject: config.jiraProject,
      })
    : undefined;

  const registry = overrides.registry ?? createDefaultRegistry({ jiraClient, jiraMaxResults: config.jiraMaxResults });

  // Redis keeps transcripts across restarts and instances; in-memory otherwise
  const sessions =
    overrides.sessions ??
    (config.redisUrl
      ? createRedisSessionRegistry(createRedisClient(config.redisUrl), config.sessionTtlSeconds)
      : createInMemorySessionRegistry());

  const llmProvider = overrides.llmProvider ?? createLazyProvider(config);

  const turnOptions: TurnOptions = {
    toolCallingMode: config.toolCallingMode,
    roundTripToolResult: config.roundTripToolResult,
    historyWindow: config.historyWindow,
  };

  app.use(express.json());

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get('/openapi.json', (_req, res) => res.json(swaggerSpec));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: 'toolbound-chat',
      llmConfigured: !!config.llmApiUrl && !!config.llmApiKey,
      toolCallingMode: config.toolCallingMode,
      roundTripToolResult: config.roundTripToolResult,
      sessionStore: config.redisUrl ? 'redis' : 'memory',
      tools: registry.list().map((tool) => tool.name),
    });
  });

  app.use('/api/v1', createChatRoutes({ sessions, registry, llmProvider, turnOptions }));

  return { app, registry, sessions };
}

function startServer() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      log.fatal({ action: 'server.config_invalid', error: error.message }, 'Invalid configuration');
      process.exit(1);
    }
    throw error;
  }

  const { app, registry } = createApp(config);

  if (!config.llmApiUrl || !config.llmApiKey) {
    log.warn({ action: 'server.llm_unconfigured' }, 'LLM_API_URL / LLM_API_KEY not set - chat requests will be refused');
  }

  app.listen(config.port, () => {
    log.info(
      {
        action: 'server.started',
        port: config.port,
        env: config.nodeEnv,
        toolCallingMode: config.toolCallingMode,
        roundTripToolResult: config.roundTripToolResult,
        tools: registry.list().map((tool) => tool.name),
      },
      `toolbound-chat listening on port ${config.port}`,
    );
  });
}

export { createApp, startServer };
export type { Config };

// Only start the server when run directly (not when imported by tests)
const isMainModule = process.argv[1]?.endsWith('index.js') || process.argv[1]?.endsWith('index.ts');
if (isMainModule) {
  startServer();
}
