import { z } from 'zod';

import type { CompletionClientOptions } from '@/core/ai/interfaces';

import { type CompletionRequest, HttpCompletionClient } from './http-completion-client';

const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';

const MessageResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
});

/**
 * Anthropic messages API client
 */
export class ClaudeClient extends HttpCompletionClient {
  readonly type = 'claude';

  constructor(options: CompletionClientOptions = {}) {
    super(options, {
      apiKeyEnvVar: 'ANTHROPIC_API_KEY',
      label: 'Anthropic',
      model: 'claude-3-opus-20240229',
    });
  }

  protected buildRequest(prompt: string, systemMessage: string): CompletionRequest {
    return {
      url: ANTHROPIC_MESSAGES_URL,
      headers: {
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: {
        model: this.model,
        system: systemMessage,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      },
    };
  }

  protected extractText(payload: unknown): string | null {
    const { content } = this.parsePayload(MessageResponseSchema, payload);
    const text = content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
    return text.length > 0 ? text : null;
  }
}
