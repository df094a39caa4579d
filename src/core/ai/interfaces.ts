export const AI_CLIENT_TYPES = ['gpt', 'claude', 'gemini'] as const;

/**
 * Language model vendor tag, selects the {@link CompletionClient} implementation
 */
export type AiClientType = (typeof AI_CLIENT_TYPES)[number];

export type CompletionClientOptions = {
  /** Falls back to the vendor's environment variable */
  apiKey?: string;
  maxTokens?: number;
  model?: string;
  temperature?: number;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
};

/**
 * Prompt in, text out.
 *
 * Implementations throw CompletionError on transport failures, non-2xx
 * responses, malformed payloads and empty results.
 */
export type CompletionClient = {
  getContent(prompt: string, systemMessage?: string): Promise<string>;

  readonly model: string;

  readonly type: AiClientType;
};
