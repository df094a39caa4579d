import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { GitTestEnvironment } from '@test/helpers/git-test-environment';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { logger } from '@/utils/logger';

import { type BranchSyncService, createBranchSyncService } from '../branch-sync-service';
import {
  BranchNotFoundError,
  DetachedHeadError,
  MergeConflictError,
  PushRejectedError,
  RemoteBranchNotFoundError,
  RemoteNotFoundError,
} from '../types';

describe('BranchSyncService integration', () => {
  let env: GitTestEnvironment;
  let service: BranchSyncService;
  let initialCommit: string;

  beforeEach(async () => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    env = new GitTestEnvironment('branch-sync');
    await env.setup();
    initialCommit = await env.headOf(env.local);
    service = createBranchSyncService(env.localPath);
  });

  afterEach(() => {
    env.cleanup();
    vi.restoreAllMocks();
  });

  async function pushUpstreamMain(file: string, content: string, message: string): Promise<string> {
    const hash = await env.commitFile('upstream', file, content, message);
    await env.upstream.push('origin', 'main');
    return hash;
  }

  describe('currentBranch', () => {
    it('should return the checked-out branch', async () => {
      await expect(service.currentBranch()).resolves.toBe('main');
    });

    it('should throw DetachedHeadError outside CI', async () => {
      await env.local.checkout(['--detach']);

      await expect(service.currentBranch()).rejects.toBeInstanceOf(DetachedHeadError);
    });

    it('should fall back to the CI branch reference when detached in CI', async () => {
      await env.local.checkout(['--detach']);
      const ciService = createBranchSyncService(env.localPath, {
        isCiEnvironment: true,
        ciRefEnvValue: 'refs/heads/feature/ci-run',
      });

      await expect(ciService.currentBranch()).resolves.toBe('feature/ci-run');
    });
  });

  describe('branchHeadDetails', () => {
    it('should describe the tip commit of a local branch', async () => {
      const details = await service.branchHeadDetails('main');

      expect(details.hash).toBe(initialCommit);
      expect(details.shortHash).toBe(initialCommit.slice(0, 7));
      expect(details.author).toEqual({ name: 'Test User', email: 'test@example.com' });
      expect(details.committer).toEqual({ name: 'Test User', email: 'test@example.com' });
      expect(details.message).toBe('Initial commit');
      expect(details.committedDate).toBeInstanceOf(Date);
    });

    it('should list available branches when the branch is missing', async () => {
      await expect(service.branchHeadDetails('nope')).rejects.toThrow(
        "Branch 'nope' not found. Available branches: main",
      );
    });
  });

  describe('remoteBranchHeadDetails', () => {
    it('should fetch before reading the remote tip', async () => {
      const pushed = await pushUpstreamMain('main.txt', 'main\n', 'Advance main');

      const details = await service.remoteBranchHeadDetails('main');

      expect(details.hash).toBe(pushed);
      expect(details.message).toBe('Advance main');
    });

    it('should throw RemoteNotFoundError for an unknown remote', async () => {
      await expect(service.remoteBranchHeadDetails('main', 'mirror')).rejects.toBeInstanceOf(
        RemoteNotFoundError,
      );
    });

    it('should throw RemoteBranchNotFoundError after the branch is deleted upstream', async () => {
      await env.upstream.checkoutLocalBranch('temp');
      await env.commitFile('upstream', 'temp.txt', 'temp\n', 'Temporary work');
      await env.upstream.push('origin', 'temp');
      await expect(service.remoteBranchHeadDetails('temp')).resolves.toMatchObject({
        message: 'Temporary work',
      });

      await env.upstream.push(['origin', '--delete', 'temp']);

      await expect(service.remoteBranchHeadDetails('temp')).rejects.toBeInstanceOf(
        RemoteBranchNotFoundError,
      );
    });
  });

  describe('isBranchOutdated and fetchAndMergeRemoteBranch', () => {
    it('should report an in-sync branch as current and skip the merge', async () => {
      await expect(service.isBranchOutdated('main', 'main')).resolves.toBe(false);
      await expect(service.fetchAndMergeRemoteBranch('main', 'main')).resolves.toBe(false);
      expect(await env.headOf(env.local)).toBe(initialCommit);
    });

    it('should fast-forward a branch that is strictly behind', async () => {
      await env.local.checkoutLocalBranch('feature');
      await env.local.checkout('main');
      const remoteTip = await pushUpstreamMain('main.txt', 'main\n', 'Advance main');

      await expect(service.isBranchOutdated('feature', 'main')).resolves.toBe(true);
      await expect(service.fetchAndMergeRemoteBranch('feature', 'main')).resolves.toBe(true);

      expect(await service.currentBranch()).toBe('feature');
      expect(await env.headOf(env.local, 'refs/heads/feature')).toBe(remoteTip);
    });

    it('should follow the diverged-then-reset scenario', async () => {
      await env.local.checkoutLocalBranch('feature');
      await env.commitFile('local', 'feature.txt', 'feature\n', 'Add feature file');
      await env.local.push('origin', 'feature');
      const mainTip = await pushUpstreamMain('main.txt', 'main\n', 'Advance main');

      // merge-base(C, B) = A, which is neither tip
      await expect(service.isBranchOutdated('feature', 'main')).resolves.toBe(false);

      await env.local.reset(['--hard', initialCommit]);

      await expect(service.isBranchOutdated('feature', 'main')).resolves.toBe(true);
      await expect(service.fetchAndMergeRemoteBranch('feature', 'main')).resolves.toBe(true);
      expect(await env.headOf(env.local, 'refs/heads/feature')).toBe(mainTip);
    });

    it('should report a branch ahead of the base as current', async () => {
      await env.local.checkoutLocalBranch('feature');
      await env.commitFile('local', 'feature.txt', 'feature\n', 'Add feature file');

      await expect(service.isBranchOutdated('feature', 'main')).resolves.toBe(false);
      await expect(service.fetchAndMergeRemoteBranch('feature', 'main')).resolves.toBe(false);
    });

    it('should treat branches without shared history as outdated', async () => {
      await env.local.checkout(['--orphan', 'orphan']);
      await env.commitFile('local', 'orphan.txt', 'orphan\n', 'Unrelated root');

      await expect(service.isBranchOutdated('orphan', 'main')).resolves.toBe(true);
    });

    it('should treat lookup failures as outdated', async () => {
      await expect(service.isBranchOutdated('missing-branch', 'main')).resolves.toBe(true);
    });

    it('should create a merge commit for non-overlapping divergence', async () => {
      await env.local.checkoutLocalBranch('feature');
      await env.commitFile('local', 'feature.txt', 'feature\n', 'Add feature file');
      await pushUpstreamMain('main.txt', 'main\n', 'Advance main');

      await expect(service.fetchAndMergeRemoteBranch('feature', 'main')).resolves.toBe(true);

      const parents = (await env.local.raw(['rev-list', '--parents', '-n', '1', 'HEAD']))
        .trim()
        .split(' ');
      expect(parents).toHaveLength(3);
    });
  });

  describe('merge conflicts', () => {
    beforeEach(async () => {
      await pushUpstreamMain('conflict.txt', 'original line\n', 'Add conflict file');
      await env.local.pull();
      await env.local.checkoutLocalBranch('feature');
      await env.commitFile('local', 'conflict.txt', 'feature line\n', 'Change line on feature');
      await pushUpstreamMain('conflict.txt', 'main line\n', 'Change line on main');
    });

    it('should raise MergeConflictError and leave the merge in progress', async () => {
      await expect(service.fetchAndMergeRemoteBranch('feature', 'main')).rejects.toMatchObject({
        name: 'MergeConflictError',
        branch: 'feature',
        remoteRef: 'origin/main',
        conflictedFiles: ['conflict.txt'],
      });

      const content = readFileSync(join(env.localPath, 'conflict.txt'), 'utf8');
      expect(content).toContain('<<<<<<<');
      const status = await env.local.status();
      expect(status.conflicted).toEqual(['conflict.txt']);
    });

    it('should abort the merge when abortOnConflict is set', async () => {
      const featureTip = await env.headOf(env.local);
      const aborting = createBranchSyncService(env.localPath, { abortOnConflict: true });

      await expect(aborting.fetchAndMergeRemoteBranch('feature', 'main')).rejects.toBeInstanceOf(
        MergeConflictError,
      );

      const status = await env.local.status();
      expect(status.isClean()).toBe(true);
      expect(await env.headOf(env.local)).toBe(featureTip);
      expect(readFileSync(join(env.localPath, 'conflict.txt'), 'utf8')).toBe('feature line\n');
    });
  });

  describe('pushBranchToRemote', () => {
    it('should push a new branch', async () => {
      await env.local.checkoutLocalBranch('feature');
      const tip = await env.commitFile('local', 'feature.txt', 'feature\n', 'Add feature file');

      await expect(service.pushBranchToRemote('feature')).resolves.toBe(true);

      const remoteTip = (await env.local.raw(['ls-remote', 'origin', 'refs/heads/feature'])).split(
        '\t',
      )[0];
      expect(remoteTip).toBe(tip);
    });

    it('should throw BranchNotFoundError for an unknown branch', async () => {
      await expect(service.pushBranchToRemote('ghost')).rejects.toBeInstanceOf(BranchNotFoundError);
    });

    it('should reject a non-fast-forward push unless forced', async () => {
      await env.local.checkoutLocalBranch('feature');
      await env.commitFile('local', 'feature.txt', 'one\n', 'First feature commit');
      await env.local.push('origin', 'feature');

      await env.upstream.fetch('origin');
      await env.upstream.checkout(['-b', 'feature', 'origin/feature']);
      await env.commitFile('upstream', 'other.txt', 'other\n', 'Someone else pushed');
      await env.upstream.push('origin', 'feature');

      await env.commitFile('local', 'feature.txt', 'two\n', 'Second feature commit');

      await expect(service.pushBranchToRemote('feature')).rejects.toBeInstanceOf(PushRejectedError);
      await expect(service.pushBranchToRemote('feature', 'origin', true)).resolves.toBe(true);
    });
  });

  describe('branchCommits', () => {
    it('should list commits not on the base branch, newest first', async () => {
      await env.local.checkoutLocalBranch('feature');
      await env.commitFile('local', 'a.txt', 'a\n', 'First change');
      await env.commitFile('local', 'b.txt', 'b\n', 'Second change');
      await pushUpstreamMain('main.txt', 'main\n', 'Advance main');
      await env.local.fetch('origin');

      const commits = await service.branchCommits('feature', 'main');

      expect(commits.map((commit) => commit.message)).toEqual(['Second change', 'First change']);
    });

    it('should resolve a branch that only exists on the remote', async () => {
      await env.upstream.checkoutLocalBranch('remote-only');
      await env.commitFile('upstream', 'r.txt', 'r\n', 'Remote only change');
      await env.upstream.push('origin', 'remote-only');
      await env.local.fetch('origin');

      const commits = await service.branchCommits('remote-only', 'main');

      expect(commits.map((commit) => commit.message)).toEqual(['Remote only change']);
    });

    it('should throw BranchNotFoundError when no ref matches', async () => {
      await expect(service.branchCommits('ghost', 'main')).rejects.toBeInstanceOf(
        BranchNotFoundError,
      );
    });
  });
});
