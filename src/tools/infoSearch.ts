import type { ToolSpec } from './types.js';

// Demo knowledge base standing in for a real search backend
const INFO_DB: ReadonlyArray<readonly [string, string]> = [
  ['python', 'Python is a high-level programming language known for simplicity and readability.'],
  ['ai', 'Artificial Intelligence simulates human intelligence in machines.'],
  ['machine learning', 'ML enables computers to learn without explicit programming.'],
  ['typescript', 'TypeScript is a typed superset of JavaScript that compiles to plain JavaScript.'],
  ['hugging face', 'Hugging Face provides ML models and datasets.'],
  ['tools', 'Tools extend LLM capabilities by providing specific functions.'],
  ['chatbot', 'A chatbot is an AI program designed to simulate conversation.'],
];

export const NO_INFO_MESSAGE = 'Limited info available. This is a demo database.';

/** First key contained in the query wins, in table order. */
export function searchInfo(query: string): string {
  const lowered = query.toLowerCase();
  for (const [key, value] of INFO_DB) {
    if (lowered.includes(key)) {
      return value;
    }
  }
  return NO_INFO_MESSAGE;
}

export const infoSearchTool: ToolSpec = {
  name: 'info_search',
  description: 'Searches a small demo knowledge base for general information about a topic.',
  parameterName: 'query',
  handler: searchInfo,
};
