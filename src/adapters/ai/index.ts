import { match } from 'ts-pattern';

import type { AiClientType, CompletionClient, CompletionClientOptions } from '@/core/ai/interfaces';

import { ClaudeClient } from './claude-client';
import { GeminiClient } from './gemini-client';
import { GptClient } from './gpt-client';

export { ClaudeClient } from './claude-client';
export { GeminiClient } from './gemini-client';
export { GptClient } from './gpt-client';
export { DEFAULT_SYSTEM_MESSAGE, HttpCompletionClient } from './http-completion-client';

export function createCompletionClient(
  type: AiClientType,
  options: CompletionClientOptions = {},
): CompletionClient {
  return match(type)
    .with('gpt', () => new GptClient(options))
    .with('claude', () => new ClaudeClient(options))
    .with('gemini', () => new GeminiClient(options))
    .exhaustive();
}
