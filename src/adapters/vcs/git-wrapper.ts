import { simpleGit, type SimpleGit } from 'simple-git';

import type { CommitDetail } from '@/core/vcs/interfaces';

import { hasContent } from '@/validation/guards';

export type GitStatus = {
  conflicted: string[];
  current: string | null;
  detached: boolean;
  isClean: boolean;
  modified: string[];
};

export type GitWrapperOptions = {
  /** Kill a git process that blocks longer than this, in milliseconds */
  timeoutMs?: number;
};

const FIELD_SEPARATOR = '\u001F';
const RECORD_SEPARATOR = '\u001E';

// hash, author, committer, dates, raw body
const COMMIT_FORMAT = `--format=${['%H', '%an', '%ae', '%cn', '%ce', '%aI', '%cI', '%B'].join('%x1f')}%x1e`;

const SHORT_HASH_LENGTH = 7;

/**
 * GitWrapper provides a typed interface for git operations using simple-git
 * with fallback to raw commands for plumbing (merge-base, ref lookups, log parsing)
 */
export class GitWrapper {
  private readonly gitClient: SimpleGit;

  constructor(workdir: string, options: GitWrapperOptions = {}) {
    this.gitClient = simpleGit({
      baseDir: workdir,
      ...(options.timeoutMs !== undefined && { timeout: { block: options.timeoutMs } }),
    });
  }

  /**
   * Name of the checked-out branch, or null when HEAD is detached
   */
  async getCurrentBranch(): Promise<string | null> {
    const ref = (await this.gitClient.revparse(['--abbrev-ref', 'HEAD'])).trim();
    return ref === 'HEAD' || ref.length === 0 ? null : ref;
  }

  /**
   * Short names of all local branches
   */
  async localBranches(): Promise<string[]> {
    const output = await this.gitClient.raw([
      'for-each-ref',
      '--format=%(refname:short)',
      'refs/heads',
    ]);
    return this._splitLines(output);
  }

  async remoteNames(): Promise<string[]> {
    const remotes = await this.gitClient.getRemotes();
    return remotes.map((remote) => remote.name);
  }

  /**
   * Fetch a remote, pruning tracking refs for branches deleted upstream
   */
  async fetch(remote: string): Promise<void> {
    await this.gitClient.fetch(remote, { '--prune': null });
  }

  /**
   * Resolve a ref to a commit hash, or null when it does not exist
   */
  async resolveCommit(ref: string): Promise<string | null> {
    const hash = (
      await this.gitClient.raw(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`])
    ).trim();
    return hasContent(hash) ? hash : null;
  }

  /**
   * Nearest common ancestor of two commits, or null when histories are unrelated
   */
  async mergeBase(first: string, second: string): Promise<string | null> {
    const hash = (await this.gitClient.raw(['merge-base', first, second])).trim();
    return hasContent(hash) ? hash : null;
  }

  async commitDetails(ref: string): Promise<CommitDetail> {
    const output = await this.gitClient.raw(['log', '-1', COMMIT_FORMAT, ref, '--']);
    const [detail] = this._parseCommits(output);
    if (detail === undefined) {
      throw new Error(`No commit found for '${ref}'`);
    }
    return detail;
  }

  /**
   * Commits reachable from `head` but not from `exclude`, newest first
   */
  async commitsBetween(exclude: string | null, head: string): Promise<CommitDetail[]> {
    const range = exclude === null ? head : `${exclude}..${head}`;
    const output = await this.gitClient.raw(['log', COMMIT_FORMAT, range, '--']);
    return this._parseCommits(output);
  }

  async checkout(branch: string): Promise<void> {
    await this.gitClient.checkout(branch);
  }

  /**
   * Run `git merge` through simple-git so that conflicts surface as
   * a rejected `GitResponseError<MergeResult>`
   */
  async merge(ref: string, options: string[] = []): Promise<void> {
    await this.gitClient.merge([...options, ref]);
  }

  async abortMerge(): Promise<void> {
    await this.gitClient.raw(['merge', '--abort']);
  }

  async push(remote: string, branch: string, force = false): Promise<void> {
    await this.gitClient.push(remote, `${branch}:${branch}`, force ? ['--force'] : []);
  }

  async status(): Promise<GitStatus> {
    const status = await this.gitClient.status();
    return {
      conflicted: status.conflicted,
      current: status.current,
      detached: status.detached,
      isClean: status.isClean(),
      modified: status.modified,
    };
  }

  private _splitLines(output: string): string[] {
    return output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /**
   * Parse `git log` output written with {@link COMMIT_FORMAT}
   */
  private _parseCommits(output: string): CommitDetail[] {
    const commits: CommitDetail[] = [];

    for (const record of output.split(RECORD_SEPARATOR)) {
      const trimmed = record.replace(/^\n+/, '');
      if (trimmed.length === 0) {
        continue;
      }

      const [hash, authorName, authorEmail, committerName, committerEmail, authored, committed, ...body] =
        trimmed.split(FIELD_SEPARATOR);
      if (
        hash === undefined ||
        authorName === undefined ||
        authorEmail === undefined ||
        committerName === undefined ||
        committerEmail === undefined ||
        authored === undefined ||
        committed === undefined
      ) {
        continue;
      }

      commits.push({
        hash,
        shortHash: hash.slice(0, SHORT_HASH_LENGTH),
        author: { name: authorName, email: authorEmail },
        committer: { name: committerName, email: committerEmail },
        message: body.join(FIELD_SEPARATOR).trim(),
        authoredDate: new Date(authored),
        committedDate: new Date(committed),
      });
    }

    return commits;
  }
}
