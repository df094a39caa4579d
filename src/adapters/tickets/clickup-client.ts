import { z } from 'zod';

import type { TicketClient, TicketRecord } from '@/core/tickets/interfaces';

import { isSuccessStatus, type JsonResponse, requestJson } from '@/adapters/http/json-request';
import { TicketClientError, toError, toErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

const CLICKUP_API_URL = 'https://api.clickup.com/api/v2';

const ClickUpTaskSchema = z.object({
  id: z.string(),
  name: z.string(),
  text_content: z.string().nullish(),
  description: z.string().nullish(),
  status: z.object({ status: z.string() }).nullish(),
  url: z.string().nullish(),
});

export type ClickUpClientConfig = {
  apiToken: string;
  timeoutMs?: number;
};

/**
 * ClickUp v2 task lookup with a personal API token
 */
export class ClickUpClient implements TicketClient {
  readonly type = 'clickup';

  constructor(private readonly _config: ClickUpClientConfig) {}

  async getTicket(ticketId: string): Promise<TicketRecord | null> {
    let response: JsonResponse;
    try {
      response = await requestJson(`${CLICKUP_API_URL}/task/${encodeURIComponent(ticketId)}`, {
        headers: { Authorization: this._config.apiToken },
        ...(this._config.timeoutMs !== undefined && { timeoutMs: this._config.timeoutMs }),
      });
    } catch (error) {
      throw new TicketClientError(`ClickUp request failed: ${toErrorMessage(error)}`, undefined, toError(error));
    }

    if (response.statusCode === 404) {
      logger.info(`ClickUp task ${ticketId} not found`);
      return null;
    }
    if (!isSuccessStatus(response.statusCode)) {
      throw new TicketClientError(
        `Failed to fetch ClickUp task ${ticketId}: status ${response.statusCode}`,
        response.statusCode,
      );
    }

    const parsed = ClickUpTaskSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new TicketClientError('Unexpected ClickUp response payload', response.statusCode);
    }

    const task = parsed.data;
    return {
      id: task.id,
      title: task.name,
      description: task.text_content ?? task.description ?? '',
      status: task.status?.status ?? '',
      ...(task.url != null && { url: task.url }),
    };
  }
}
