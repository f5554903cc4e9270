import https from 'node:https';
import OpenAI, { type ClientOptions } from 'openai';
import type { AuthScheme } from '../config/index.js';
import { AuthError, MalformedResponseError, TransportError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ChatOptions, LLMProvider, LLMResponse, LLMTool, LLMToolCall, Message } from './llmProvider.js';

const log = createLogger('LLM');

export interface ChatCompletionClientConfig {
  /** Either the base URL (`.../v1`) or the full `.../chat/completions` URL. */
  apiUrl: string;
  apiKey: string;
  model: string;
  authScheme: AuthScheme;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  verifySsl: boolean;
  /** Test seam: replaces the global fetch used by the SDK. */
  fetch?: ClientOptions['fetch'];
}

function toBaseUrl(apiUrl: string): string {
  return apiUrl.replace(/\/+$/, '').replace(/\/chat\/completions$/, '');
}

function toOpenAIMessage(message: Message): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

function toOpenAITools(tools: LLMTool[]): OpenAI.Chat.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.parameters,
    },
  }));
}

function parseToolArguments(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = raw ? JSON.parse(raw) : {};
  } catch {
    throw new MalformedResponseError(`Tool call arguments are not valid JSON: ${raw}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedResponseError(`Tool call arguments must be a JSON object: ${raw}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Client for an OpenAI-shaped chat-completion endpoint.
 *
 * The `keyid` scheme sends the API key itself in a `KeyId` header, which is
 * what the hosted inference gateway authenticates on. The SDK's own bearer
 * header is sent alongside it.
 */
export class ChatCompletionClient implements LLMProvider {
  name = 'chat-completions';
  private client: OpenAI;
  private config: ChatCompletionClientConfig;

  constructor(config: ChatCompletionClientConfig) {
    this.config = config;

    if (!config.verifySsl) {
      log.warn({ action: 'llm.ssl.disabled', apiUrl: config.apiUrl }, 'SSL verification disabled - use only for development');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: toBaseUrl(config.apiUrl),
      timeout: config.timeoutMs,
      maxRetries: 0,
      defaultHeaders: config.authScheme === 'keyid' ? { KeyId: config.apiKey } : undefined,
      httpAgent: config.verifySsl ? undefined : new https.Agent({ rejectUnauthorized: false }),
      fetch: config.fetch,
    });
  }

  async complete(messages: readonly Message[], options?: ChatOptions): Promise<LLMResponse> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.config.model,
      messages: messages.map(toOpenAIMessage),
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };

    if (options?.tools && options.tools.length > 0) {
      params.tools = toOpenAITools(options.tools);
      params.tool_choice = 'auto';
    }

    const logCtx = options?.logContext ?? {};
    log.debug({ action: 'llm.call.started', model: this.config.model, messageCount: messages.length, ...logCtx }, 'LLM call started');

    let data: OpenAI.Chat.ChatCompletion;
    try {
      data = await this.client.chat.completions.create(params);
    } catch (err: unknown) {
      throw this.toTypedError(err, logCtx);
    }

    const choice = data.choices?.[0];
    if (!choice) {
      throw new MalformedResponseError('No choices in response');
    }
    if (!choice.message) {
      throw new MalformedResponseError('No message in choice');
    }

    const result: LLMResponse = { content: choice.message.content ?? '' };

    const toolCalls = choice.message.tool_calls ?? [];
    if (toolCalls.length > 0) {
      result.toolCalls = toolCalls
        .filter((tc) => tc.type === 'function')
        .map((tc): LLMToolCall => ({
          id: tc.id,
          name: tc.function.name,
          args: parseToolArguments(tc.function.arguments),
        }));
    }

    log.debug({ action: 'llm.call.succeeded', toolCalls: result.toolCalls?.length ?? 0, ...logCtx }, 'LLM call succeeded');
    return result;
  }

  private toTypedError(err: unknown, logCtx: Record<string, unknown>): Error {
    const message = err instanceof Error ? err.message.replace(/\n/g, ' ') : String(err);
    log.warn({ action: 'llm.call.failed', error: message, ...logCtx }, 'LLM call failed');

    if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) {
      return new AuthError(`LLM endpoint rejected the API key (${err.status})`, err.status, { cause: err });
    }
    if (err instanceof OpenAI.APIConnectionTimeoutError) {
      return new TransportError(`LLM request timed out after ${this.config.timeoutMs}ms`, undefined, { cause: err });
    }
    if (err instanceof OpenAI.APIConnectionError) {
      if (/certificate|SSL/i.test(message)) {
        log.error({ action: 'llm.ssl.failed' }, 'SSL certificate error detected. Try VERIFY_SSL=false for development');
      }
      return new TransportError(`Could not reach LLM endpoint: ${message}`, undefined, { cause: err });
    }
    if (err instanceof OpenAI.APIError) {
      return new TransportError(`LLM API error (${err.status}): ${message}`, err.status, { cause: err });
    }
    return new TransportError(`LLM request failed: ${message}`, undefined, { cause: err });
  }
}
