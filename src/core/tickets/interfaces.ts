export const TICKET_TOOL_TYPES = ['clickup', 'jira'] as const;

/**
 * Project-management tool tag, selects the {@link TicketClient} implementation
 */
export type TicketToolType = (typeof TICKET_TOOL_TYPES)[number];

/**
 * Ticket fields normalized across tools
 */
export type TicketRecord = {
  assignee?: string;
  description: string;
  id: string;
  project?: string;
  status: string;
  title: string;
  url?: string;
};

export type TicketClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  organizationId?: string;
  projectId?: string;
  timeoutMs?: number;
  username?: string;
};

/**
 * Ticket lookup by ID.
 *
 * Returns null when the ticket does not exist and throws TicketClientError
 * on transport failures and other unexpected responses.
 */
export type TicketClient = {
  getTicket(ticketId: string): Promise<TicketRecord | null>;

  readonly type: TicketToolType;
};
