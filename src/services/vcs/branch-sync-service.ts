import type {
  BranchSynchronizer,
  CommitDetail,
  MergeErrorClassifier,
} from '@/core/vcs/interfaces';

import { GitWrapper } from '@/adapters/vcs/git-wrapper';
import { toError, toErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { hasContent } from '@/validation/guards';

import { isMergeConflictError } from './conflict-classifier';
import {
  type BranchSyncOptions,
  BranchNotFoundError,
  DetachedHeadError,
  MergeConflictError,
  PushRejectedError,
  RemoteBranchNotFoundError,
  RemoteNotFoundError,
} from './types';

export const DEFAULT_REMOTE = 'origin';
export const DEFAULT_BASE_BRANCH = 'main';

/**
 * How a local tip relates to a remote tip, judged by their merge-base
 */
export type TipRelation = 'unrelated' | 'in-sync' | 'ahead' | 'behind' | 'diverged';

export function compareTips(mergeBase: string | null, localTip: string, remoteTip: string): TipRelation {
  if (mergeBase === null) {
    return 'unrelated';
  }
  if (localTip === remoteTip) {
    return 'in-sync';
  }
  if (mergeBase === remoteTip) {
    return 'ahead';
  }
  if (mergeBase === localTip) {
    return 'behind';
  }
  return 'diverged';
}

function localRef(branch: string): string {
  return `refs/heads/${branch}`;
}

function remoteTrackingRef(remote: string, branch: string): string {
  return `refs/remotes/${remote}/${branch}`;
}

/**
 * Keeps a local branch in step with a branch on a remote.
 *
 * Every remote comparison fetches first, so results reflect the remote at
 * the moment of the call.
 */
export class BranchSyncService implements BranchSynchronizer {
  private readonly _classifyMergeError: MergeErrorClassifier;

  constructor(
    private readonly _git: GitWrapper,
    private readonly _options: BranchSyncOptions = {},
  ) {
    this._classifyMergeError = _options.classifyMergeError ?? isMergeConflictError;
  }

  async currentBranch(): Promise<string> {
    const branch = await this._git.getCurrentBranch();
    if (branch !== null) {
      return branch;
    }

    const ciRef = this._options.ciRefEnvValue;
    if (this._options.isCiEnvironment === true && hasContent(ciRef)) {
      const name = ciRef.trim().replace(/^refs\/heads\//, '');
      logger.debug('HEAD is detached, using CI branch reference', { branch: name });
      return name;
    }

    throw new DetachedHeadError();
  }

  async branchHeadDetails(branchName?: string): Promise<CommitDetail> {
    const branch = branchName ?? (await this.currentBranch());
    await this._requireLocalBranch(branch);
    return this._git.commitDetails(localRef(branch));
  }

  async remoteBranchHeadDetails(
    branchName: string,
    remoteName: string = DEFAULT_REMOTE,
  ): Promise<CommitDetail> {
    await this._fetch(remoteName);

    const hash = await this._git.resolveCommit(remoteTrackingRef(remoteName, branchName));
    if (hash === null) {
      throw new RemoteBranchNotFoundError(remoteName, branchName);
    }
    return this._git.commitDetails(hash);
  }

  async isBranchOutdated(
    branchName?: string,
    baseBranch: string = DEFAULT_BASE_BRANCH,
    remoteName: string = DEFAULT_REMOTE,
  ): Promise<boolean> {
    try {
      const local = await this.branchHeadDetails(branchName);
      const remote = await this.remoteBranchHeadDetails(baseBranch, remoteName);
      const mergeBase = await this._git.mergeBase(local.hash, remote.hash);
      const relation = compareTips(mergeBase, local.hash, remote.hash);

      logger.debug('Compared branch with remote base', {
        branch: branchName ?? null,
        base: `${remoteName}/${baseBranch}`,
        relation,
      });
      return relation === 'unrelated' || relation === 'behind';
    } catch (error) {
      logger.warn(`⚠️ Could not compare branch with ${remoteName}/${baseBranch}, assuming outdated`, {
        error: toErrorMessage(error),
      });
      return true;
    }
  }

  /**
   * Mutates the working tree: checks out `branchName` when it is not current,
   * then fast-forwards or merges `<remoteName>/<remoteBranch>` into it.
   */
  async fetchAndMergeRemoteBranch(
    branchName?: string,
    remoteBranch?: string,
    remoteName: string = DEFAULT_REMOTE,
  ): Promise<boolean> {
    const branch = branchName ?? (await this.currentBranch());
    const target = remoteBranch ?? branch;

    const checkedOut = await this._git.getCurrentBranch();
    if (checkedOut !== branch) {
      logger.info(`Checking out ${branch}`, { previous: checkedOut });
      await this._git.checkout(branch);
    }

    await this._fetch(remoteName);

    const remoteRef = remoteTrackingRef(remoteName, target);
    const displayRef = `${remoteName}/${target}`;
    const remoteTip = await this._git.resolveCommit(remoteRef);
    if (remoteTip === null) {
      throw new RemoteBranchNotFoundError(remoteName, target);
    }
    const localTip = await this._git.resolveCommit(localRef(branch));
    if (localTip === null) {
      throw new BranchNotFoundError(branch, await this._git.localBranches());
    }

    const relation = compareTips(await this._git.mergeBase(localTip, remoteTip), localTip, remoteTip);
    if (relation === 'in-sync' || relation === 'ahead') {
      logger.info(`✅ ${branch} already contains ${displayRef}`);
      return false;
    }

    if (relation === 'behind') {
      try {
        await this._git.merge(remoteRef, ['--ff-only']);
        logger.info(`✅ Fast-forwarded ${branch} to ${displayRef}`);
        return true;
      } catch (error) {
        logger.debug('Fast-forward refused, falling back to a merge', {
          error: toErrorMessage(error),
        });
      }
    }

    try {
      await this._git.merge(remoteRef, ['--no-edit']);
      logger.info(`✅ Merged ${displayRef} into ${branch}`);
      return true;
    } catch (error) {
      if (!this._classifyMergeError(error)) {
        throw error;
      }

      const conflictedFiles = await this._conflictedFiles();
      if (this._options.abortOnConflict === true) {
        logger.info('Aborting conflicted merge');
        await this._git.abortMerge();
      }
      throw new MergeConflictError(branch, displayRef, conflictedFiles, toError(error));
    }
  }

  async pushBranchToRemote(
    branchName?: string,
    remoteName: string = DEFAULT_REMOTE,
    force = false,
  ): Promise<boolean> {
    const branch = branchName ?? (await this.currentBranch());
    await this._requireLocalBranch(branch);
    await this._requireRemote(remoteName);

    try {
      await this._git.push(remoteName, branch, force);
      logger.info(`✅ Pushed ${branch} to ${remoteName}${force ? ' (forced)' : ''}`);
      return true;
    } catch (error) {
      const message = toErrorMessage(error);
      if (!force && /rejected/i.test(message) && /non-fast-forward|fetch first/i.test(message)) {
        throw new PushRejectedError(branch, remoteName, toError(error));
      }
      throw error;
    }
  }

  async branchCommits(
    branchName?: string,
    baseBranch: string = DEFAULT_BASE_BRANCH,
    remoteName: string = DEFAULT_REMOTE,
  ): Promise<CommitDetail[]> {
    const branch = branchName ?? (await this.currentBranch());

    const head = await this._resolveFirst([
      branch,
      localRef(branch),
      `${remoteName}/${branch}`,
      remoteTrackingRef(remoteName, branch),
    ]);
    if (head === null) {
      throw new BranchNotFoundError(branch, await this._git.localBranches());
    }

    const base = await this._resolveFirst([
      remoteTrackingRef(remoteName, baseBranch),
      localRef(baseBranch),
    ]);
    if (base === null) {
      logger.warn(`⚠️ Base branch ${baseBranch} not found, listing all commits of ${branch}`);
    }

    const commits = await this._git.commitsBetween(base, head);
    logger.debug(`Found ${commits.length} commits on ${branch} not on ${baseBranch}`);
    return commits;
  }

  private async _requireLocalBranch(branch: string): Promise<void> {
    const branches = await this._git.localBranches();
    if (!branches.includes(branch)) {
      throw new BranchNotFoundError(branch, branches);
    }
  }

  private async _requireRemote(remote: string): Promise<void> {
    const remotes = await this._git.remoteNames();
    if (!remotes.includes(remote)) {
      throw new RemoteNotFoundError(remote);
    }
  }

  private async _fetch(remote: string): Promise<void> {
    await this._requireRemote(remote);
    logger.debug(`Fetching ${remote}`);
    await this._git.fetch(remote);
  }

  private async _resolveFirst(candidates: readonly string[]): Promise<string | null> {
    for (const candidate of candidates) {
      const hash = await this._git.resolveCommit(candidate);
      if (hash !== null) {
        return hash;
      }
    }
    return null;
  }

  private async _conflictedFiles(): Promise<string[]> {
    try {
      const status = await this._git.status();
      return status.conflicted;
    } catch (error) {
      logger.warn('⚠️ Could not list conflicted files', { error: toErrorMessage(error) });
      return [];
    }
  }
}

export function createBranchSyncService(
  repoPath: string,
  options: BranchSyncOptions = {},
): BranchSyncService {
  const git = new GitWrapper(
    repoPath,
    options.gitTimeoutMs !== undefined ? { timeoutMs: options.gitTimeoutMs } : {},
  );
  return new BranchSyncService(git, options);
}
