import type { ToolCallingMode } from '../config/index.js';
import { isTurnFailure } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolInvocation } from '../tools/types.js';
import type { ConversationStore } from './conversationStore.js';
import type { LLMProvider, LLMResponse, Message } from './llmProvider.js';
import { NATIVE_SYSTEM_PROMPT, assemblePrompt, buildToolResultPrompt } from './systemPrompt.js';
import { fromNativeToolCall, parseToolCall } from './toolCallParser.js';
import { ToolDispatcher } from './toolDispatcher.js';

const log = createLogger('Turn');

export type TurnState =
  | 'RECEIVED_INPUT'
  | 'PROMPT_BUILT'
  | 'LLM_CALLED'
  | 'PARSE_FOUND_TOOL'
  | 'PARSE_NO_TOOL'
  | 'TOOL_EXECUTED'
  | 'RESULT_APPENDED'
  | 'TURN_COMPLETE';

export type TurnStatus = 'completed' | 'failed';

export interface TurnOptions {
  toolCallingMode: ToolCallingMode;
  /** Feed the tool output back to the model for a final answer instead of replying with it verbatim. */
  roundTripToolResult: boolean;
  historyWindow: number;
}

export interface TurnDeps {
  llmProvider: LLMProvider;
  registry: ToolRegistry;
  dispatcher?: ToolDispatcher;
  options: TurnOptions;
  logContext?: Record<string, unknown>;
}

export interface TurnResult {
  status: TurnStatus;
  reply: string;
  states: TurnState[];
  invocation?: ToolInvocation;
  toolOutput?: string;
  error?: { name: string; message: string };
}

export const EMPTY_REPLY = "I'm sorry, I couldn't generate a response.";

export const DEFAULT_TURN_OPTIONS: TurnOptions = {
  toolCallingMode: 'sentinel',
  roundTripToolResult: false,
  historyWindow: 10,
};

function extractInvocation(response: LLMResponse, mode: ToolCallingMode, registry: ToolRegistry): ToolInvocation | null {
  if (mode === 'native') {
    const first = response.toolCalls?.[0];
    return first ? fromNativeToolCall(first, registry) : null;
  }
  return parseToolCall(response.content);
}

/**
 * One conversation turn: user message in, at most one tool run, one assistant
 * message out. Transport, auth and malformed-response failures are written
 * to the transcript and reported as a `failed` turn; the session stays usable.
 * Any other error is also written as an assistant message, then rethrown.
 *
 * Not safe to run concurrently on one store; callers serialize per session
 * (see TurnQueue).
 */
export async function processTurn(userInput: string, store: ConversationStore, deps: TurnDeps): Promise<TurnResult> {
  const { llmProvider, registry, options } = deps;
  const dispatcher = deps.dispatcher ?? new ToolDispatcher(registry);
  const logCtx = deps.logContext ?? {};
  const native = options.toolCallingMode === 'native';

  const states: TurnState[] = ['RECEIVED_INPUT'];
  const history = await store.messages();
  await store.append({ role: 'user', content: userInput });

  const messages = assemblePrompt(registry.list(), history, userInput, {
    historyWindow: options.historyWindow,
    systemPrompt: native ? NATIVE_SYSTEM_PROMPT : undefined,
  });
  states.push('PROMPT_BUILT');

  let invocation: ToolInvocation | undefined;
  let toolOutput: string | undefined;
  let reply: string;
  let status: TurnStatus = 'completed';
  let error: TurnResult['error'];

  try {
    const response = await llmProvider.complete(messages, {
      tools: native ? registry.toLLMTools() : undefined,
      logContext: logCtx,
    });
    states.push('LLM_CALLED');

    const parsed = extractInvocation(response, options.toolCallingMode, registry);
    if (parsed) {
      invocation = parsed;
      states.push('PARSE_FOUND_TOOL');
      toolOutput = await dispatcher.dispatch(parsed, logCtx);
      states.push('TOOL_EXECUTED');

      if (options.roundTripToolResult) {
        const followUp: Message[] = [
          ...messages,
          { role: 'assistant', content: response.content || `TOOL_CALL: ${parsed.toolName}(${parsed.rawArgument})` },
          buildToolResultPrompt(parsed, toolOutput),
        ];
        const final = await llmProvider.complete(followUp, { logContext: { ...logCtx, roundTrip: true } });
        reply = final.content || toolOutput;
      } else {
        reply = toolOutput;
      }
    } else {
      states.push('PARSE_NO_TOOL');
      reply = response.content || EMPTY_REPLY;
    }
  } catch (err) {
    if (!isTurnFailure(err)) {
      // Pair the user message so the next turn's history stays user/assistant
      const message = err instanceof Error ? err.message : String(err);
      await store.append({ role: 'assistant', content: `Error: ${message}` });
      log.error({ action: 'turn.crashed', error: message, ...logCtx }, 'Turn crashed');
      throw err;
    }
    log.warn({ action: 'turn.failed', error: err.message, errorType: err.name, ...logCtx }, 'Turn failed');
    status = 'failed';
    error = { name: err.name, message: err.message };
    reply = `Error: ${err.message}`;
  }

  await store.append({ role: 'assistant', content: reply });
  states.push('RESULT_APPENDED', 'TURN_COMPLETE');
  log.info({ action: 'turn.completed', status, tool: invocation?.toolName, ...logCtx }, 'Turn completed');

  return { status, reply, states, invocation, toolOutput, error };
}
