import { DuplicateToolError } from '../errors.js';
import type { LLMTool } from '../chat/llmProvider.js';
import type { ToolSpec } from './types.js';

export class ToolRegistry {
  private tools = new Map<string, ToolSpec>();

  /** Throws DuplicateToolError when the name is taken; nothing is overwritten. */
  register(spec: ToolSpec): void {
    if (this.tools.has(spec.name)) {
      throw new DuplicateToolError(spec.name);
    }
    this.tools.set(spec.name, Object.freeze({ ...spec }));
  }

  resolve(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  /** Tools in registration order. */
  list(): ToolSpec[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }

  /** Function definitions for endpoints with native tool calling. */
  toLLMTools(): LLMTool[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: {
          [tool.parameterName]: { type: 'string', description: `Value for ${tool.parameterName}` },
        },
        required: [],
      },
    }));
  }
}
