import type { CommitDetail } from '@/core/vcs/interfaces';
import type { TicketPromptInfo } from '@/services/tickets/ticket-references';

import { logger } from '@/utils/logger';
import { hasContent } from '@/validation/guards';

import { DEFAULT_PROMPT_DIRECTORIES, loadPromptTemplate, PROMPT_NAMES } from './template-loader';

export const PROMPT_VARIABLES = {
  ticketDetails: '{{ task_tickets_details }}',
  commits: '{{ all_commits }}',
  pullRequestTemplate: '{{ pull_request_template }}',
} as const;

const FALLBACK_DESCRIPTION_LIMIT = 200;

export type PromptContext = {
  commits: readonly CommitDetail[];
  pullRequestTemplate: string;
  tickets: readonly TicketPromptInfo[];
};

export type PullRequestPrompts = {
  description: string;
  title: string;
};

export function formatCommitLines(commits: readonly CommitDetail[]): string {
  return commits.map((commit) => `${commit.shortHash}: ${commit.message}`).join('\n');
}

/**
 * Substitute every template variable with its value from the context
 */
export function renderPromptTemplate(template: string, context: PromptContext): string {
  const values: Record<string, string> = {
    [PROMPT_VARIABLES.ticketDetails]: JSON.stringify(context.tickets, null, 2),
    [PROMPT_VARIABLES.commits]: formatCommitLines(context.commits),
    [PROMPT_VARIABLES.pullRequestTemplate]: context.pullRequestTemplate,
  };

  let rendered = template;
  for (const [variable, value] of Object.entries(values)) {
    // Function replacer: `$` sequences in commit messages stay literal
    rendered = rendered.replaceAll(variable, () => value);
  }
  return rendered;
}

/**
 * Render the title and description prompts from their templates.
 * Throws when a template cannot be loaded.
 */
export async function buildPullRequestPrompts(
  context: PromptContext,
  directories: readonly string[] = DEFAULT_PROMPT_DIRECTORIES,
): Promise<PullRequestPrompts> {
  const [titleTemplate, descriptionTemplate] = await Promise.all([
    loadPromptTemplate(PROMPT_NAMES.title, directories),
    loadPromptTemplate(PROMPT_NAMES.description, directories),
  ]);

  const prompts = {
    title: renderPromptTemplate(titleTemplate, context),
    description: renderPromptTemplate(descriptionTemplate, context),
  };
  logger.debug('Rendered pull request prompts', {
    commits: context.commits.length,
    tickets: context.tickets.length,
    titleLength: prompts.title.length,
    descriptionLength: prompts.description.length,
  });
  return prompts;
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

function contextSections(context: PromptContext): string {
  const lines = ['## Commits'];
  context.commits.forEach((commit, index) => {
    lines.push(`${index + 1}. ${commit.shortHash} - ${commit.message}`);
  });
  lines.push('');

  if (context.tickets.length > 0) {
    lines.push('## Related Tickets');
    context.tickets.forEach((ticket, index) => {
      lines.push(`${index + 1}. ${ticket.id}: ${ticket.title}`);
      if (hasContent(ticket.description)) {
        lines.push(`   Description: ${truncate(ticket.description, FALLBACK_DESCRIPTION_LIMIT)}`);
      }
      if (hasContent(ticket.status)) {
        lines.push(`   Status: ${ticket.status}`);
      }
    });
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Built-in prompts for when the templates are unavailable
 */
export function buildFallbackPrompts(context: PromptContext): PullRequestPrompts {
  const sections = contextSections(context);

  let description = `I need you to generate a pull request description based on the following information:\n\n${sections}\n`;
  if (hasContent(context.pullRequestTemplate)) {
    description += `## Pull Request Template\n${context.pullRequestTemplate}\n\n`;
  }

  const title = `I need you to generate a short, single-line pull request title based on the following information. Reply with the title only.\n\n${sections}`;

  return { title, description };
}
