import type { CompletionClient } from '@/core/ai/interfaces';
import type { LabelRules, PullRequest, PullRequestHost } from '@/core/hosting/interfaces';
import type { TicketClient } from '@/core/tickets/interfaces';
import type { BranchSynchronizer, CommitDetail } from '@/core/vcs/interfaces';

import {
  buildFallbackPrompts,
  buildPullRequestPrompts,
  type PromptContext,
  type PullRequestPrompts,
} from '@/services/prompts/prompt-builder';
import { parseBody, parseTitle } from '@/services/prompts/response-parser';
import { DEFAULT_PROMPT_DIRECTORIES, loadPullRequestTemplate } from '@/services/prompts/template-loader';
import {
  extractTicketId,
  formatTicketId,
  type TicketPromptInfo,
  ticketPromptInfo,
} from '@/services/tickets/ticket-references';
import { MergeConflictError } from '@/services/vcs/types';
import { toErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { hasContent } from '@/validation/guards';

export const FALLBACK_BODY = 'Automated pull request.';

export function fallbackTitle(branchName: string): string {
  return `Update ${branchName}`;
}

export type PullRequestWorkflowDependencies = {
  completionClient: CompletionClient;
  host: PullRequestHost;
  synchronizer: BranchSynchronizer;
  /** Without one, ticket details are left out of the prompts */
  ticketClient?: TicketClient;
};

export type PullRequestWorkflowOptions = {
  baseBranch: string;
  draft: boolean;
  labelRules: LabelRules;
  promptDirectories?: readonly string[];
  remote: string;
  repoPath: string;
};

type PullRequestContent = {
  body: string;
  title: string;
};

/**
 * Creates a pull request for a branch: brings the branch up to date with the
 * base, gathers commits and ticket details, drafts title and body with the
 * completion client, then opens and labels the pull request.
 *
 * Steps run strictly one after another; any step that cannot continue logs why
 * and ends the run with null.
 */
export class PullRequestWorkflow {
  constructor(
    private readonly _deps: PullRequestWorkflowDependencies,
    private readonly _options: PullRequestWorkflowOptions,
  ) {}

  async run(branchName?: string): Promise<PullRequest | null> {
    const { synchronizer } = this._deps;
    const { baseBranch, remote } = this._options;

    const branch = branchName ?? (await synchronizer.currentBranch());
    logger.info(`Preparing pull request for ${branch} -> ${baseBranch}`);

    const outdated = await synchronizer.isBranchOutdated(branch, baseBranch, remote);

    if (await this._hasOpenPullRequest(branch)) {
      return null;
    }

    if (outdated && !(await this._syncWithBase(branch))) {
      return null;
    }

    const commits = await synchronizer.branchCommits(branch, baseBranch, remote);
    if (commits.length === 0) {
      logger.warn(`⚠️ No commits on ${branch} that are not on ${baseBranch}, nothing to propose`);
      return null;
    }
    logger.info(`Found ${commits.length} commits on ${branch}`);

    const tickets = await this._ticketDetails(branch);
    const prompts = await this._prompts(commits, tickets);
    const content = await this._draftContent(branch, prompts);

    let pullRequest: PullRequest;
    try {
      pullRequest = await this._deps.host.createPullRequest(
        content.title,
        content.body,
        baseBranch,
        branch,
        this._options.draft,
      );
    } catch (error) {
      logger.error(`Failed to create pull request for ${branch}`, { error: toErrorMessage(error) });
      return null;
    }

    await this._applyLabels(pullRequest);
    return pullRequest;
  }

  private async _hasOpenPullRequest(branch: string): Promise<boolean> {
    try {
      const existing = await this._deps.host.getPullRequestByBranch(branch);
      if (existing !== null) {
        logger.info(`Pull request #${existing.number} is already open for ${branch}: ${existing.htmlUrl}`);
        return true;
      }
      return false;
    } catch (error) {
      logger.warn(`⚠️ Could not look up open pull requests for ${branch}, continuing`, {
        error: toErrorMessage(error),
      });
      return false;
    }
  }

  /**
   * @returns false when the branch could not be brought up to date
   */
  private async _syncWithBase(branch: string): Promise<boolean> {
    const { synchronizer } = this._deps;
    const { baseBranch, remote } = this._options;

    logger.info(`${branch} is behind ${remote}/${baseBranch}, merging`);
    let merged: boolean;
    try {
      merged = await synchronizer.fetchAndMergeRemoteBranch(branch, baseBranch, remote);
    } catch (error) {
      if (error instanceof MergeConflictError) {
        logger.error(`${error.message}. Resolve the conflicts and run again.`, {
          conflictedFiles: error.conflictedFiles,
        });
      } else {
        logger.error(`Failed to update ${branch} from ${remote}/${baseBranch}`, { error });
      }
      return false;
    }

    if (!merged) {
      return true;
    }

    try {
      await synchronizer.pushBranchToRemote(branch, remote);
      return true;
    } catch (error) {
      logger.error(`Failed to push the updated ${branch}`, { error });
      return false;
    }
  }

  private async _ticketDetails(branch: string): Promise<TicketPromptInfo[]> {
    const client = this._deps.ticketClient;
    if (client === undefined) {
      logger.debug('No ticket tool configured, skipping ticket details');
      return [];
    }

    const reference = extractTicketId(branch);
    if (reference === null) {
      return [];
    }
    const ticketId = formatTicketId(reference, client.type);
    if (ticketId === null) {
      return [];
    }

    try {
      const ticket = await client.getTicket(ticketId);
      if (ticket === null) {
        logger.warn(`⚠️ No ${client.type} ticket found with ID ${ticketId}`);
        return [];
      }
      logger.info(`Fetched ticket ${ticket.id}: ${ticket.title}`);
      return [ticketPromptInfo(ticket)];
    } catch (error) {
      logger.error(`Failed to fetch ticket ${ticketId}`, { error });
      return [];
    }
  }

  private async _prompts(
    commits: readonly CommitDetail[],
    tickets: readonly TicketPromptInfo[],
  ): Promise<PullRequestPrompts> {
    let pullRequestTemplate = '';
    try {
      pullRequestTemplate = await loadPullRequestTemplate(this._options.repoPath);
    } catch (error) {
      logger.warn('⚠️ Could not read the pull request template', { error: toErrorMessage(error) });
    }

    const context: PromptContext = { commits, tickets, pullRequestTemplate };
    try {
      return await buildPullRequestPrompts(
        context,
        this._options.promptDirectories ?? DEFAULT_PROMPT_DIRECTORIES,
      );
    } catch (error) {
      logger.warn('⚠️ Prompt templates unavailable, using built-in prompts', {
        error: toErrorMessage(error),
      });
      return buildFallbackPrompts(context);
    }
  }

  private async _draftContent(
    branch: string,
    prompts: PullRequestPrompts,
  ): Promise<PullRequestContent> {
    const client = this._deps.completionClient;

    let titleResponse: string;
    let bodyResponse: string;
    try {
      titleResponse = await client.getContent(prompts.title);
      bodyResponse = await client.getContent(prompts.description);
    } catch (error) {
      logger.error(`${client.type} completion failed, using a generic title and body`, {
        error: toErrorMessage(error),
      });
      return { title: fallbackTitle(branch), body: FALLBACK_BODY };
    }

    const title = parseTitle(titleResponse);
    const body = parseBody(bodyResponse);
    return {
      title: hasContent(title) ? title : fallbackTitle(branch),
      body: hasContent(body) ? body : FALLBACK_BODY,
    };
  }

  private async _applyLabels(pullRequest: PullRequest): Promise<void> {
    if (Object.keys(this._options.labelRules).length === 0) {
      return;
    }
    try {
      await this._deps.host.addLabelsToPullRequest(pullRequest, this._options.labelRules);
    } catch (error) {
      logger.warn(`⚠️ Could not label pull request #${pullRequest.number}`, {
        error: toErrorMessage(error),
      });
    }
  }
}
