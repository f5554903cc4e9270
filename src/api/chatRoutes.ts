import { Router, type Request, type Response } from 'express';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { SessionRegistry } from '../chat/conversationStore.js';
import type { LLMProviderFactory } from '../chat/providerFactory.js';
import { processTurn, type TurnOptions } from '../chat/turnProcessor.js';
import { TurnQueue } from '../chat/turnQueue.js';
import { ConfigError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ToolRegistry } from '../tools/registry.js';

const log = createLogger('ChatAPI');

const sessionIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/, 'sessionId may only contain letters, digits, "-" and "_"');

const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  sessionId: sessionIdSchema.optional(),
});

export interface ChatRoutesDeps {
  sessions: SessionRegistry;
  registry: ToolRegistry;
  llmProvider: LLMProviderFactory;
  turnOptions: TurnOptions;
  turnQueue?: TurnQueue;
}

function parseSessionId(req: Request, res: Response): string | null {
  const parsed = sessionIdSchema.safeParse(req.params.sessionId);
  if (!parsed.success) {
    res.status(400).json({ error: 'Invalid sessionId' });
    return null;
  }
  return parsed.data;
}

export function createChatRoutes(deps: ChatRoutesDeps): Router {
  const router = Router();
  // One turn at a time per session
  const turnQueue = deps.turnQueue ?? new TurnQueue();

  router.get('/tools', (_req, res) => {
    res.json({
      tools: deps.registry.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        parameter: tool.parameterName,
        defaultArgument: tool.defaultArgument ?? null,
      })),
    });
  });

  router.post('/chat', async (req, res) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid request body',
        details: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      });
      return;
    }

    const sessionId = parsed.data.sessionId ?? randomUUID();

    try {
      const llmProvider = deps.llmProvider();
      const result = await turnQueue.run(sessionId, () =>
        processTurn(parsed.data.message, deps.sessions.get(sessionId), {
          llmProvider,
          registry: deps.registry,
          options: deps.turnOptions,
          logContext: { sessionId },
        }),
      );

      res.json({
        sessionId,
        status: result.status,
        reply: result.reply,
        toolCall: result.invocation
          ? { name: result.invocation.toolName, argument: result.invocation.rawArgument, output: result.toolOutput }
          : null,
        ...(result.error ? { error: result.error } : {}),
      });
    } catch (error) {
      if (error instanceof ConfigError) {
        res.status(503).json({ error: error.message });
        return;
      }
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      log.error({ action: 'chat.failed', sessionId, error: errorMessage }, 'Chat request failed');
      res.status(500).json({ error: `Chat failed: ${errorMessage}` });
    }
  });

  router.get('/chat/:sessionId', async (req, res) => {
    const sessionId = parseSessionId(req, res);
    if (!sessionId) return;
    try {
      const messages = await deps.sessions.get(sessionId).messages();
      res.json({ sessionId, messages });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      log.error({ action: 'chat.transcript.failed', sessionId, error: errorMessage }, 'Could not read transcript');
      res.status(500).json({ error: `Could not read transcript: ${errorMessage}` });
    }
  });

  router.delete('/chat/:sessionId', async (req, res) => {
    const sessionId = parseSessionId(req, res);
    if (!sessionId) return;
    try {
      await turnQueue.run(sessionId, () => deps.sessions.get(sessionId).clear());
      res.json({ sessionId, cleared: true });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      log.error({ action: 'chat.clear.failed', sessionId, error: errorMessage }, 'Could not clear transcript');
      res.status(500).json({ error: `Could not clear transcript: ${errorMessage}` });
    }
  });

  return router;
}
