import { z } from 'zod';

import type { CompletionClientOptions } from '@/core/ai/interfaces';

import { type CompletionRequest, HttpCompletionClient } from './http-completion-client';

const GEMINI_API_BASE_URL = 'https://generativelanguage.googleapis.com/v1/models';

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).default([]),
        }),
      }),
    )
    .default([]),
});

/**
 * Google Gemini generateContent client.
 * The v1 endpoint has no system role, so the system message leads the user text.
 */
export class GeminiClient extends HttpCompletionClient {
  readonly type = 'gemini';

  constructor(options: CompletionClientOptions = {}) {
    super(options, { apiKeyEnvVar: 'GEMINI_API_KEY', label: 'Gemini', model: 'gemini-1.5-pro' });
  }

  protected buildRequest(prompt: string, systemMessage: string): CompletionRequest {
    const url = new URL(`${GEMINI_API_BASE_URL}/${encodeURIComponent(this.model)}:generateContent`);
    url.searchParams.set('key', this.apiKey);

    return {
      url: url.toString(),
      headers: {},
      body: {
        contents: [{ role: 'user', parts: [{ text: `${systemMessage}\n\n${prompt}` }] }],
        generationConfig: {
          temperature: this.temperature,
          maxOutputTokens: this.maxTokens,
        },
      },
    };
  }

  protected extractText(payload: unknown): string | null {
    const { candidates } = this.parsePayload(GenerateContentSchema, payload);
    const [first] = candidates;
    if (first === undefined) {
      return null;
    }
    const text = first.content.parts.map((part) => part.text ?? '').join('');
    return text.length > 0 ? text : null;
  }
}
