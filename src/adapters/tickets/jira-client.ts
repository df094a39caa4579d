import { z } from 'zod';

import type { TicketClient, TicketRecord } from '@/core/tickets/interfaces';

import { isSuccessStatus, type JsonResponse, requestJson } from '@/adapters/http/json-request';
import { TicketClientError, toError, toErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

const JiraIssueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string(),
    description: z.string().nullish(),
    status: z.object({ name: z.string() }).nullish(),
    assignee: z.object({ displayName: z.string() }).nullish(),
    project: z.object({ key: z.string() }).nullish(),
  }),
});

const JiraSearchSchema = z.object({
  total: z.number().optional(),
  issues: z.array(JiraIssueSchema),
});

type JiraIssue = z.infer<typeof JiraIssueSchema>;

export type JiraClientConfig = {
  apiToken: string;
  /** e.g. https://your-domain.atlassian.net */
  baseUrl: string;
  email: string;
  timeoutMs?: number;
};

/**
 * Jira Cloud REST v2 client using basic auth with an API token
 */
export class JiraClient implements TicketClient {
  readonly type = 'jira';

  private readonly _baseUrl: string;
  private readonly _authorization: string;

  constructor(private readonly _config: JiraClientConfig) {
    this._baseUrl = _config.baseUrl.replace(/\/+$/, '');
    this._authorization = `Basic ${Buffer.from(`${_config.email}:${_config.apiToken}`).toString('base64')}`;
  }

  async getTicket(ticketId: string): Promise<TicketRecord | null> {
    const response = await this._get(`/rest/api/2/issue/${encodeURIComponent(ticketId)}`);

    if (response.statusCode === 404) {
      logger.info(`Jira ticket ${ticketId} not found`);
      return null;
    }
    this._assertSuccess(response, `fetch Jira ticket ${ticketId}`);

    return this._toRecord(this._parse(JiraIssueSchema, response));
  }

  async searchTickets(jql: string, maxResults = 50): Promise<TicketRecord[]> {
    const query = new URLSearchParams({ jql, maxResults: String(maxResults) });
    const response = await this._get(`/rest/api/2/search?${query.toString()}`);
    this._assertSuccess(response, 'search Jira tickets');

    const result = this._parse(JiraSearchSchema, response);
    logger.debug(`Jira search returned ${result.total ?? result.issues.length} results`);
    return result.issues.map((issue) => this._toRecord(issue));
  }

  private async _get(path: string): Promise<JsonResponse> {
    try {
      return await requestJson(`${this._baseUrl}${path}`, {
        headers: { Authorization: this._authorization },
        ...(this._config.timeoutMs !== undefined && { timeoutMs: this._config.timeoutMs }),
      });
    } catch (error) {
      throw new TicketClientError(`Jira request failed: ${toErrorMessage(error)}`, undefined, toError(error));
    }
  }

  private _assertSuccess(response: JsonResponse, action: string): void {
    if (!isSuccessStatus(response.statusCode)) {
      throw new TicketClientError(
        `Failed to ${action}: status ${response.statusCode} ${response.text.trim()}`.trim(),
        response.statusCode,
      );
    }
  }

  private _parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: JsonResponse): T {
    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new TicketClientError('Unexpected Jira response payload', response.statusCode);
    }
    return parsed.data;
  }

  private _toRecord(issue: JiraIssue): TicketRecord {
    const { fields } = issue;
    return {
      id: issue.key,
      title: fields.summary,
      description: fields.description ?? '',
      status: fields.status?.name ?? '',
      url: `${this._baseUrl}/browse/${issue.key}`,
      ...(fields.assignee != null && { assignee: fields.assignee.displayName }),
      ...(fields.project != null && { project: fields.project.key }),
    };
  }
}
