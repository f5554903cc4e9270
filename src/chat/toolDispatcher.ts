import { ToolExecutionError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolInvocation, ToolSpec } from '../tools/types.js';

const log = createLogger('Dispatcher');

export function resolveArgument(spec: ToolSpec, rawArgument: string): string {
  const argument = rawArgument.trim();
  if (spec.defaultArgument === undefined) return argument;
  if (!argument || argument.toLowerCase() === spec.defaultArgument.toLowerCase()) {
    return spec.defaultArgument;
  }
  return argument;
}

/**
 * Runs one tool invocation. Never rejects: an unknown tool and a failing
 * handler both come back as text for the transcript.
 */
export class ToolDispatcher {
  constructor(private readonly registry: ToolRegistry) {}

  async dispatch(invocation: ToolInvocation, logContext: Record<string, unknown> = {}): Promise<string> {
    const spec = this.registry.resolve(invocation.toolName);
    if (!spec) {
      log.warn({ action: 'tool.unknown', tool: invocation.toolName, ...logContext }, 'Unknown tool requested');
      return `Unknown tool: ${invocation.toolName}`;
    }

    const argument = resolveArgument(spec, invocation.rawArgument);
    log.info({ action: 'tool.dispatched', tool: spec.name, argument, ...logContext }, 'Calling tool');

    try {
      const output = await spec.handler(argument);
      log.debug({ action: 'tool.succeeded', tool: spec.name, ...logContext }, 'Tool returned');
      return output;
    } catch (cause) {
      const error = new ToolExecutionError(spec.name, { cause });
      log.error({ action: 'tool.failed', tool: spec.name, error: error.message, ...logContext }, 'Tool failed');
      return `Sorry, I had trouble using the ${spec.name} tool.`;
    }
  }
}
