export type PullRequest = {
  baseRef: string;
  body: string;
  draft: boolean;
  headRef: string;
  htmlUrl: string;
  number: number;
  title: string;
};

/**
 * File pattern to labels, e.g. `{ "docs/*": ["documentation"], "*.ts": ["typescript"] }`
 */
export type LabelRules = Record<string, readonly string[]>;

/**
 * Pull request operations on the hosting service
 */
export type PullRequestHost = {
  /**
   * Apply the labels whose patterns match the PR's changed files
   *
   * @returns labels that were added, sorted
   */
  addLabelsToPullRequest(pullRequest: PullRequest, rules: LabelRules): Promise<string[]>;

  createPullRequest(
    title: string,
    body: string,
    baseBranch: string,
    headBranch: string,
    draft?: boolean,
  ): Promise<PullRequest>;

  /**
   * Open pull request whose head is `branchName`, if any
   */
  getPullRequestByBranch(branchName: string): Promise<PullRequest | null>;
};
