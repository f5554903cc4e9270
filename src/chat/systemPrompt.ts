import type { ToolInvocation, ToolSpec } from '../tools/types.js';
import type { Message } from './llmProvider.js';

export const DEFAULT_HISTORY_WINDOW = 10;

export function buildSystemPrompt(tools: readonly ToolSpec[]): string {
  const toolDescriptions = tools.map((tool) => `- ${tool.name}: ${tool.description}`).join('\n');

  return `You are a helpful assistant with access to the following tools:

${toolDescriptions}

If the user's request can be handled by one of these tools, respond with:
TOOL_CALL: tool_name(parameter_value)

For example:
- If user says "Say hello to Alice", respond with: TOOL_CALL: hello_tool(Alice)
- If user says "Hello there", you can respond directly or use: TOOL_CALL: hello_tool(World)

Otherwise, respond naturally to the user's question.
`;
}

/** Prompt for native tool calling: the tools travel as function definitions instead. */
export const NATIVE_SYSTEM_PROMPT =
  'You are a helpful assistant. Use the provided tools when they help answer the user; otherwise respond naturally.';

export interface AssembleOptions {
  historyWindow?: number;
  systemPrompt?: string;
}

/**
 * `[system, ...last N history messages, user]`. Pure: the history array is
 * not touched and system messages found in it are not re-sent.
 */
export function assemblePrompt(
  tools: readonly ToolSpec[],
  history: readonly Message[],
  userInput: string,
  options: AssembleOptions = {},
): Message[] {
  const window = options.historyWindow ?? DEFAULT_HISTORY_WINDOW;
  const recent = window > 0 ? history.filter((m) => m.role !== 'system').slice(-window) : [];

  return [
    { role: 'system', content: options.systemPrompt ?? buildSystemPrompt(tools) },
    ...recent,
    { role: 'user', content: userInput },
  ];
}

/** Follow-up user message for the round trip that turns raw tool output into an answer. */
export function buildToolResultPrompt(invocation: ToolInvocation, toolOutput: string): Message {
  return {
    role: 'user',
    content: `The ${invocation.toolName} tool returned:\n${toolOutput}\n\nUse this result to answer my previous message. Do not call another tool.`,
  };
}
