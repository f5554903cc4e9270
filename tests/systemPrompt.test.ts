import { describe, it, expect } from 'vitest';
import type { Message } from '../src/chat/llmProvider.js';
import { assemblePrompt, buildSystemPrompt, buildToolResultPrompt } from '../src/chat/systemPrompt.js';
import { createDefaultRegistry } from '../src/tools/index.js';

const tools = createDefaultRegistry().list();

describe('buildSystemPrompt', () => {
  it('should list every tool as "- name: description"', () => {
    const prompt = buildSystemPrompt(tools);
    for (const tool of tools) {
      expect(prompt).toContain(`- ${tool.name}: ${tool.description}`);
    }
  });

  it('should describe the TOOL_CALL format with examples', () => {
    const prompt = buildSystemPrompt(tools);
    expect(prompt).toContain('TOOL_CALL: tool_name(parameter_value)');
    expect(prompt).toContain('If user says "Say hello to Alice", respond with: TOOL_CALL: hello_tool(Alice)');
    expect(prompt).toContain("Otherwise, respond naturally to the user's question.");
  });

  it('should be identical for identical tool lists', () => {
    expect(buildSystemPrompt(tools)).toBe(buildSystemPrompt(createDefaultRegistry().list()));
  });
});

describe('assemblePrompt', () => {
  it('should produce [system, user] for an empty history', () => {
    const messages = assemblePrompt(tools, [], 'Hello');
    expect(messages).toHaveLength(2);
    expect(messages[0]).toEqual({ role: 'system', content: buildSystemPrompt(tools) });
    expect(messages[1]).toEqual({ role: 'user', content: 'Hello' });
  });

  it('should keep only the most recent history messages', () => {
    const history: Message[] = Array.from({ length: 14 }, (_, i): Message => ({
      role: i % 2 === 0 ? 'user' : 'assistant',
      content: `m${i}`,
    }));

    const messages = assemblePrompt(tools, history, 'latest', { historyWindow: 10 });
    expect(messages).toHaveLength(12);
    expect(messages.slice(1, -1).map((m) => m.content)).toEqual([
      'm4', 'm5', 'm6', 'm7', 'm8', 'm9', 'm10', 'm11', 'm12', 'm13',
    ]);
    expect(messages[11]).toEqual({ role: 'user', content: 'latest' });
  });

  it('should drop system messages found in the history', () => {
    const history: Message[] = [
      { role: 'system', content: 'old prompt' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
    ];
    const messages = assemblePrompt(tools, history, 'again');
    expect(messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messages[0].content).not.toBe('old prompt');
  });

  it('should send no history for a zero window', () => {
    const history: Message[] = [{ role: 'user', content: 'hi' }];
    expect(assemblePrompt(tools, history, 'again', { historyWindow: 0 })).toHaveLength(2);
  });

  it('should not modify the history it is given', () => {
    const history: Message[] = [{ role: 'user', content: 'hi' }];
    assemblePrompt(tools, history, 'again');
    expect(history).toEqual([{ role: 'user', content: 'hi' }]);
  });

  it('should use a custom system prompt when given', () => {
    const messages = assemblePrompt(tools, [], 'Hello', { systemPrompt: 'Be brief.' });
    expect(messages[0]).toEqual({ role: 'system', content: 'Be brief.' });
  });
});

describe('buildToolResultPrompt', () => {
  it('should hand the tool output back as a user message', () => {
    expect(buildToolResultPrompt({ toolName: 'weather', rawArgument: 'Tokyo' }, 'Weather in Tokyo: sunny')).toEqual({
      role: 'user',
      content:
        'The weather tool returned:\nWeather in Tokyo: sunny\n\nUse this result to answer my previous message. Do not call another tool.',
    });
  });
});
