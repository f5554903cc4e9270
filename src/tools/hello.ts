import { createLogger } from '../logger.js';
import type { ToolSpec } from './types.js';

const log = createLogger('HelloTool');

export function greet(name: string): string {
  log.debug({ action: 'hello.called', name }, 'hello_tool called');
  return `Hello, ${name}! Nice to meet you!`;
}

export const helloTool: ToolSpec = {
  name: 'hello_tool',
  description:
    'A simple greeting tool that says hello to someone. Use this when the user asks for greetings or wants to say hello.',
  parameterName: 'name',
  defaultArgument: 'World',
  handler: greet,
};
