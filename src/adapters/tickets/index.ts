import { match } from 'ts-pattern';

import type { TicketClient, TicketClientOptions, TicketToolType } from '@/core/tickets/interfaces';

import { ConfigurationError } from '@/utils/errors';
import { hasContent } from '@/validation/guards';

import { ClickUpClient } from './clickup-client';
import { JiraClient } from './jira-client';

export { ClickUpClient } from './clickup-client';
export { JiraClient } from './jira-client';

function requireSetting(value: string | undefined, name: string, tool: string): string {
  if (!hasContent(value)) {
    throw new ConfigurationError(`${tool} requires ${name}`);
  }
  return value.trim();
}

export function createTicketClient(type: TicketToolType, options: TicketClientOptions): TicketClient {
  const timeout = options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {};

  return match(type)
    .with(
      'jira',
      () =>
        new JiraClient({
          baseUrl: requireSetting(options.baseUrl, 'a base URL', 'Jira'),
          email: requireSetting(options.username, 'a username', 'Jira'),
          apiToken: requireSetting(options.apiKey, 'an API key', 'Jira'),
          ...timeout,
        }),
    )
    .with(
      'clickup',
      () =>
        new ClickUpClient({
          apiToken: requireSetting(options.apiKey, 'an API key', 'ClickUp'),
          ...timeout,
        }),
    )
    .exhaustive();
}
