/**
 * Name and email pair recorded on a commit
 */
export type GitIdentity = {
  email: string;
  name: string;
};

/**
 * Snapshot of a commit, built fresh on every query
 */
export type CommitDetail = {
  author: GitIdentity;
  authoredDate: Date;
  committedDate: Date;
  committer: GitIdentity;
  hash: string;
  /** Trimmed full commit message */
  message: string;
  shortHash: string;
};

/**
 * Branch synchronization against a remote.
 *
 * Read operations fetch from the remote but never touch the working tree.
 * `fetchAndMergeRemoteBranch` is the one stateful operation: it may check out
 * `branchName` and leaves the result of the merge in the index and working tree.
 */
export type BranchSynchronizer = {
  /**
   * Commits on the branch that are not on the base branch, newest first
   */
  branchCommits(branchName?: string, baseBranch?: string, remoteName?: string): Promise<CommitDetail[]>;

  branchHeadDetails(branchName?: string): Promise<CommitDetail>;

  currentBranch(): Promise<string>;

  /**
   * Check out `branchName` if needed, fetch, then fast-forward or merge the
   * remote branch into it.
   *
   * @returns true when the branch moved, false when it was already current
   * @throws MergeConflictError when the merge stops on conflicts
   */
  fetchAndMergeRemoteBranch(
    branchName?: string,
    remoteBranch?: string,
    remoteName?: string,
  ): Promise<boolean>;

  /**
   * True when the local branch is strictly behind the remote base branch.
   * Never throws: lookup failures count as outdated.
   */
  isBranchOutdated(branchName?: string, baseBranch?: string, remoteName?: string): Promise<boolean>;

  pushBranchToRemote(branchName?: string, remoteName?: string, force?: boolean): Promise<boolean>;

  remoteBranchHeadDetails(branchName: string, remoteName?: string): Promise<CommitDetail>;
};

/**
 * Decides whether a failed merge stopped on conflicts or on something else
 */
export type MergeErrorClassifier = (error: unknown) => boolean;
