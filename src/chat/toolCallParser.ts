import type { ToolRegistry } from '../tools/registry.js';
import type { ToolInvocation } from '../tools/types.js';
import type { LLMToolCall } from './llmProvider.js';

export const TOOL_CALL_PATTERN = /TOOL_CALL:\s*(\w+)\((.*?)\)/;

// Note: a reply that merely quotes the instruction (e.g. echoes the example
// line) also matches. There is no escape syntax.
export function parseToolCall(responseText: string): ToolInvocation | null {
  const match = TOOL_CALL_PATTERN.exec(responseText);
  if (!match) return null;

  return {
    toolName: match[1],
    rawArgument: match[2].trim().replace(/^['"]+|['"]+$/g, ''),
  };
}

/**
 * Maps a native function call onto the single-argument invocation shape.
 * The tool's declared parameter is preferred; otherwise the first string argument.
 */
export function fromNativeToolCall(call: LLMToolCall, registry: ToolRegistry): ToolInvocation {
  const spec = registry.resolve(call.name);
  const candidates = [spec ? call.args[spec.parameterName] : undefined, ...Object.values(call.args)];
  const value = candidates.find((v): v is string | number => typeof v === 'string' || typeof v === 'number');

  return {
    toolName: call.name,
    rawArgument: value === undefined ? '' : String(value).trim(),
  };
}
