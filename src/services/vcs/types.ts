import type { MergeErrorClassifier } from '@/core/vcs/interfaces';

import { PrCreatorError } from '@/utils/errors';

/**
 * Options for {@link BranchSyncService}
 */
export type BranchSyncOptions = {
  /**
   * Run `git merge --abort` before raising a MergeConflictError.
   * When false the working tree is left mid-merge with conflict markers.
   *
   * @default false
   */
  abortOnConflict?: boolean;

  /**
   * Ref name reported by the CI runner, used when HEAD is detached
   */
  ciRefEnvValue?: string;

  /**
   * Decides whether a merge failure is a content conflict
   *
   * @default isMergeConflictError
   */
  classifyMergeError?: MergeErrorClassifier;

  /**
   * Block timeout for each git process, in milliseconds
   */
  gitTimeoutMs?: number;

  /**
   * Whether the process runs in CI, enabling the detached-HEAD fallback
   *
   * @default false
   */
  isCiEnvironment?: boolean;
};

/**
 * Base class for branch synchronization errors
 */
export class GitSyncError extends PrCreatorError {
  public override readonly name: string = 'GitSyncError';
}

export class DetachedHeadError extends GitSyncError {
  public override readonly name = 'DetachedHeadError';

  constructor() {
    super('HEAD is detached and no CI branch reference is available');
  }
}

export class BranchNotFoundError extends GitSyncError {
  public override readonly name = 'BranchNotFoundError';

  constructor(
    public readonly branch: string,
    public readonly availableBranches: readonly string[],
  ) {
    super(
      `Branch '${branch}' not found. Available branches: ${
        availableBranches.length > 0 ? availableBranches.join(', ') : '(none)'
      }`,
    );
  }
}

export class RemoteNotFoundError extends GitSyncError {
  public override readonly name = 'RemoteNotFoundError';

  constructor(public readonly remote: string) {
    super(`Remote '${remote}' not found`);
  }
}

export class RemoteBranchNotFoundError extends GitSyncError {
  public override readonly name = 'RemoteBranchNotFoundError';

  constructor(
    public readonly remote: string,
    public readonly branch: string,
  ) {
    super(`Remote branch '${remote}/${branch}' not found`);
  }
}

/**
 * A merge stopped because both sides changed the same content.
 * The caller decides whether to abort; the workflow treats it as "cannot proceed".
 */
export class MergeConflictError extends GitSyncError {
  public override readonly name = 'MergeConflictError';

  constructor(
    public readonly branch: string,
    public readonly remoteRef: string,
    public readonly conflictedFiles: readonly string[],
    cause?: Error,
  ) {
    super(`Merge conflicts detected between ${branch} and ${remoteRef}`, cause);
  }
}

export class PushRejectedError extends GitSyncError {
  public override readonly name = 'PushRejectedError';

  constructor(
    public readonly branch: string,
    public readonly remote: string,
    cause?: Error,
  ) {
    super(
      `Push rejected: ${remote} has changes to '${branch}' you don't have locally. ` +
        'Push with force to override, or fetch and merge first.',
      cause,
    );
  }
}
