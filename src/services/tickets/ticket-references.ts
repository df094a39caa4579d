import type { TicketRecord, TicketToolType } from '@/core/tickets/interfaces';

import { logger } from '@/utils/logger';

/**
 * Ticket reference formats recognized in branch names, tried in order:
 * GitHub issue (`#123`), Jira key (`PROJ-123`), ClickUp (`CU-abc123`), generic (`Task-123`)
 */
export const TICKET_ID_PATTERNS: readonly RegExp[] = [
  /#(\d+)/,
  /([A-Z]+-\d+)/,
  /CU-([a-z0-9]+)/,
  /Task-(\d+)/,
];

/**
 * Ticket fields handed to the prompt templates
 */
export type TicketPromptInfo = {
  description: string;
  id: string;
  status: string;
  title: string;
};

/**
 * First ticket reference in a branch name, as written in the name
 */
export function extractTicketId(branchName: string): string | null {
  for (const pattern of TICKET_ID_PATTERNS) {
    const found = pattern.exec(branchName);
    if (found !== null) {
      logger.info(`Found ticket ID '${found[0]}' in branch '${branchName}'`);
      return found[0];
    }
  }

  logger.warn(`⚠️ No ticket ID found in branch name: ${branchName}`);
  return null;
}

/**
 * Convert a branch-name reference to the ID the ticket tool expects.
 * Null when no tool is configured.
 */
export function formatTicketId(ticketId: string, toolType: TicketToolType | undefined): string | null {
  if (toolType === undefined) {
    return null;
  }

  const trimmed = ticketId.trim();
  if (toolType === 'clickup') {
    return trimmed.replace(/^CU-/, '').replace(/^#/, '');
  }
  return trimmed;
}

export function ticketPromptInfo(ticket: TicketRecord): TicketPromptInfo {
  return {
    id: ticket.id,
    title: ticket.title,
    description: ticket.description,
    status: ticket.status,
  };
}
