import { Octokit } from '@octokit/rest';

import type { LabelRules, PullRequest, PullRequestHost } from '@/core/hosting/interfaces';

import { DEFAULT_HTTP_TIMEOUT_MS } from '@/adapters/http/json-request';
import { ConfigurationError, HostingError, toError, toErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { hasContent, isRecord } from '@/validation/guards';

import { labelsForFiles } from './label-rules';

export type GitHubHostConfig = {
  /** `owner/name` */
  repo: string;
  timeoutMs?: number;
  token: string;
};

/**
 * Fields shared by the pulls.list and pulls.create payloads
 */
type PullRequestPayload = {
  base: { ref: string };
  body: string | null;
  draft?: boolean;
  head: { ref: string };
  html_url: string;
  number: number;
  title: string;
};

function toPullRequest(payload: PullRequestPayload): PullRequest {
  return {
    number: payload.number,
    title: payload.title,
    body: payload.body ?? '',
    htmlUrl: payload.html_url,
    headRef: payload.head.ref,
    baseRef: payload.base.ref,
    draft: payload.draft ?? false,
  };
}

/**
 * fetch that gives up after `timeoutMs`, honoring any signal Octokit passes
 */
function createTimeoutFetch(timeoutMs: number): typeof fetch {
  return async (input, init) => {
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = init?.signal != null ? AbortSignal.any([init.signal, timeout]) : timeout;
    return fetch(input, { ...init, signal });
  };
}

export function parseRepoSlug(slug: string): { owner: string; repo: string } {
  const parts = slug.trim().split('/');
  const [owner, repo] = parts;
  if (parts.length !== 2 || !hasContent(owner) || !hasContent(repo)) {
    throw new ConfigurationError(`GitHub repository must look like 'owner/name', got '${slug}'`);
  }
  return { owner, repo };
}

/**
 * GitHub pull requests through the REST API
 */
export class GitHubHost implements PullRequestHost {
  private readonly _octokit: Octokit;
  private readonly _owner: string;
  private readonly _repo: string;

  constructor(config: GitHubHostConfig) {
    if (!hasContent(config.token)) {
      throw new ConfigurationError('A GitHub token is required');
    }
    const { owner, repo } = parseRepoSlug(config.repo);
    this._owner = owner;
    this._repo = repo;
    this._octokit = new Octokit({
      auth: config.token,
      userAgent: 'pr-creator',
      request: { fetch: createTimeoutFetch(config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS) },
    });
  }

  async getPullRequestByBranch(branchName: string): Promise<PullRequest | null> {
    const { data } = await this._call(`find pull request for '${branchName}'`, async () =>
      this._octokit.pulls.list({
        owner: this._owner,
        repo: this._repo,
        state: 'open',
        head: `${this._owner}:${branchName}`,
        per_page: 100,
      }),
    );

    const existing = data.find((pull) => pull.head.ref === branchName);
    if (existing === undefined) {
      logger.debug(`No open pull request for ${branchName}`);
      return null;
    }
    logger.info(`Found open pull request #${existing.number} for ${branchName}`);
    return toPullRequest(existing);
  }

  async createPullRequest(
    title: string,
    body: string,
    baseBranch: string,
    headBranch: string,
    draft = false,
  ): Promise<PullRequest> {
    const { data } = await this._call(`create pull request ${headBranch} -> ${baseBranch}`, async () =>
      this._octokit.pulls.create({
        owner: this._owner,
        repo: this._repo,
        title,
        body,
        base: baseBranch,
        head: headBranch,
        draft,
      }),
    );

    logger.info(`✅ Created pull request #${data.number}: ${data.html_url}`);
    return toPullRequest(data);
  }

  async addLabelsToPullRequest(pullRequest: PullRequest, rules: LabelRules): Promise<string[]> {
    const files = await this._call(`list files of pull request #${pullRequest.number}`, async () =>
      this._octokit.paginate(this._octokit.pulls.listFiles, {
        owner: this._owner,
        repo: this._repo,
        pull_number: pullRequest.number,
        per_page: 100,
      }),
    );

    const labels = labelsForFiles(
      files.map((file) => file.filename),
      rules,
    );
    if (labels.length === 0) {
      logger.debug(`No label rules matched pull request #${pullRequest.number}`);
      return [];
    }

    await this._call(`label pull request #${pullRequest.number}`, async () =>
      this._octokit.issues.addLabels({
        owner: this._owner,
        repo: this._repo,
        issue_number: pullRequest.number,
        labels,
      }),
    );
    logger.info(`Added labels to #${pullRequest.number}: ${labels.join(', ')}`);
    return labels;
  }

  /**
   * Run an API call, turning Octokit request errors into HostingError
   */
  private async _call<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      const status = isRecord(error) && typeof error.status === 'number' ? error.status : undefined;
      throw new HostingError(
        `Failed to ${action}: ${toErrorMessage(error)}`,
        status,
        toError(error),
      );
    }
  }
}
