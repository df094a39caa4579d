import { z } from 'zod';

import type { AiClientType, CompletionClient, CompletionClientOptions } from '@/core/ai/interfaces';

import { isSuccessStatus, type JsonResponse, requestJson } from '@/adapters/http/json-request';
import { CompletionError, ConfigurationError, toError, toErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { firstWithContent, hasContent } from '@/validation/guards';

export const DEFAULT_SYSTEM_MESSAGE = 'You are a helpful assistant.';
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 800;

const VendorErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

export type CompletionRequest = {
  body: unknown;
  headers: Record<string, string>;
  url: string;
};

/**
 * Vendor-specific settings a subclass passes to the base constructor
 */
export type VendorDefaults = {
  apiKeyEnvVar: string;
  label: string;
  model: string;
};

/**
 * Shared request/response handling for JSON completion APIs.
 * Subclasses build the vendor payload and pull text out of the response.
 */
export abstract class HttpCompletionClient implements CompletionClient {
  abstract readonly type: AiClientType;

  readonly model: string;
  protected readonly apiKey: string;
  protected readonly temperature: number;
  protected readonly maxTokens: number;
  protected readonly label: string;
  private readonly _timeoutMs: number | undefined;

  constructor(options: CompletionClientOptions, defaults: VendorDefaults) {
    const apiKey = firstWithContent(options.apiKey, process.env[defaults.apiKeyEnvVar]);
    if (apiKey === undefined) {
      throw new ConfigurationError(
        `${defaults.label} API key is required. Pass it explicitly or set ${defaults.apiKeyEnvVar}.`,
      );
    }

    this.apiKey = apiKey;
    this.label = defaults.label;
    this.model = firstWithContent(options.model) ?? defaults.model;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this._timeoutMs = options.timeoutMs;
  }

  async getContent(prompt: string, systemMessage: string = DEFAULT_SYSTEM_MESSAGE): Promise<string> {
    const completionRequest = this.buildRequest(prompt, systemMessage);
    logger.debug(`Sending ${this.label} completion request`, {
      model: this.model,
      promptLength: prompt.length,
    });

    let response: JsonResponse;
    try {
      response = await requestJson(completionRequest.url, {
        method: 'POST',
        headers: completionRequest.headers,
        body: completionRequest.body,
        ...(this._timeoutMs !== undefined && { timeoutMs: this._timeoutMs }),
      });
    } catch (error) {
      throw new CompletionError(
        `${this.label} request failed: ${toErrorMessage(error)}`,
        undefined,
        toError(error),
      );
    }

    if (!isSuccessStatus(response.statusCode)) {
      throw new CompletionError(
        `API request failed with status ${response.statusCode}: ${this._vendorErrorMessage(response)}`,
        response.statusCode,
      );
    }

    const text = this.extractText(response.data);
    if (!hasContent(text)) {
      throw new CompletionError(`${this.label} returned no content`, response.statusCode);
    }

    logger.debug(`${this.label} returned ${text.length} characters`);
    return text;
  }

  protected abstract buildRequest(prompt: string, systemMessage: string): CompletionRequest;

  /**
   * Text of the first completion, or null when the payload carries none.
   * Throws CompletionError for payloads of the wrong shape.
   */
  protected abstract extractText(payload: unknown): string | null;

  protected parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new CompletionError(
        `Unexpected ${this.label} response: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`,
      );
    }
    return parsed.data;
  }

  private _vendorErrorMessage(response: JsonResponse): string {
    const parsed = VendorErrorSchema.safeParse(response.data);
    if (parsed.success) {
      return parsed.data.error.message;
    }
    return hasContent(response.text) ? response.text.trim() : 'Unknown error';
  }
}
