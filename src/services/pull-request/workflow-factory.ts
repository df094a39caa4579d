import type { TicketClient } from '@/core/tickets/interfaces';
import type { Settings } from '@/services/config/types';

import { createCompletionClient } from '@/adapters/ai';
import { GitHubHost } from '@/adapters/hosting/github-host';
import { createTicketClient } from '@/adapters/tickets';
import { createBranchSyncService } from '@/services/vcs/branch-sync-service';
import { ConfigurationError } from '@/utils/errors';
import { hasContent } from '@/validation/guards';

import { PullRequestWorkflow } from './pull-request-workflow';

function createOptionalTicketClient(settings: Settings): TicketClient | undefined {
  const { type, ...options } = settings.projectManagementTool;
  if (type === undefined) {
    return undefined;
  }
  return createTicketClient(type, { ...options, timeoutMs: settings.timeouts.httpMs });
}

/**
 * Wire the production collaborators for a workflow run
 */
export function createPullRequestWorkflow(settings: Settings): PullRequestWorkflow {
  const { github, ai, git, timeouts } = settings;

  if (!hasContent(github.token)) {
    throw new ConfigurationError(
      'A GitHub token is required. Pass --github-token or set GITHUB_TOKEN.',
    );
  }
  if (!hasContent(github.repo)) {
    throw new ConfigurationError(
      'A GitHub repository is required. Pass --github-repo or set GITHUB_REPOSITORY.',
    );
  }

  const host = new GitHubHost({ token: github.token, repo: github.repo, timeoutMs: timeouts.httpMs });
  const completionClient = createCompletionClient(ai.clientType, {
    ...(ai.apiKey !== undefined && { apiKey: ai.apiKey }),
    ...(ai.model !== undefined && { model: ai.model }),
    ...(ai.temperature !== undefined && { temperature: ai.temperature }),
    ...(ai.maxTokens !== undefined && { maxTokens: ai.maxTokens }),
    timeoutMs: timeouts.httpMs,
  });
  const ticketClient = createOptionalTicketClient(settings);

  const synchronizer = createBranchSyncService(git.repoPath, {
    abortOnConflict: settings.sync.abortOnConflict,
    isCiEnvironment: settings.ci.isCiEnvironment,
    ...(settings.ci.refEnvValue !== undefined && { ciRefEnvValue: settings.ci.refEnvValue }),
    gitTimeoutMs: timeouts.gitMs,
  });

  return new PullRequestWorkflow(
    {
      synchronizer,
      host,
      completionClient,
      ...(ticketClient !== undefined && { ticketClient }),
    },
    {
      repoPath: git.repoPath,
      baseBranch: git.baseBranch,
      remote: git.remote,
      draft: github.draft,
      labelRules: github.labels,
    },
  );
}
