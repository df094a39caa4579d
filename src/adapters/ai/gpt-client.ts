import { z } from 'zod';

import type { CompletionClientOptions } from '@/core/ai/interfaces';

import { type CompletionRequest, HttpCompletionClient } from './http-completion-client';

const OPENAI_CHAT_COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
    }),
  ),
});

/**
 * OpenAI chat completions client
 */
export class GptClient extends HttpCompletionClient {
  readonly type = 'gpt';

  constructor(options: CompletionClientOptions = {}) {
    super(options, { apiKeyEnvVar: 'OPENAI_API_KEY', label: 'OpenAI', model: 'gpt-4' });
  }

  protected buildRequest(prompt: string, systemMessage: string): CompletionRequest {
    return {
      url: OPENAI_CHAT_COMPLETIONS_URL,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        model: this.model,
        messages: [
          { role: 'system', content: systemMessage },
          { role: 'user', content: prompt },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      },
    };
  }

  protected extractText(payload: unknown): string | null {
    const { choices } = this.parsePayload(ChatCompletionSchema, payload);
    const [first] = choices;
    return first === undefined ? null : first.message.content;
  }
}
