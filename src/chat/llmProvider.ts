export type Role = 'system' | 'user' | 'assistant';

export interface Message {
  readonly role: Role;
  readonly content: string;
}

/** Function definition advertised to endpoints that support native tool calling. */
export interface LLMTool {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, unknown>;
    required: string[];
  };
}

export interface LLMToolCall {
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

export interface LLMResponse {
  content: string;
  toolCalls?: LLMToolCall[];
}

export interface ChatOptions {
  /** Only sent to the endpoint in native tool-calling mode. */
  tools?: LLMTool[];
  logContext?: Record<string, unknown>;
}

export interface LLMProvider {
  name: string;
  complete(messages: readonly Message[], options?: ChatOptions): Promise<LLMResponse>;
}
