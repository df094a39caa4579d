import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { PullRequest } from '@/core/hosting/interfaces';

import { createDefaultDependencies } from '@/commands/command-factory';
import { SettingsSchema } from '@/services/config/types';
import { ConfigurationError } from '@/utils/errors';
import { Logger } from '@/utils/logger';

import { CreateCommand, toSettingsOverrides } from '../create-command';

const pullRequest: PullRequest = {
  number: 9,
  title: 'Add login form',
  body: 'Body',
  htmlUrl: 'https://github.com/acme/widgets/pull/9',
  headRef: 'feature/login',
  baseRef: 'main',
  draft: false,
};

describe('toSettingsOverrides', () => {
  it('should map flags onto settings sections', () => {
    expect(
      toSettingsOverrides({
        repoPath: '/work/widgets',
        baseBranch: 'develop',
        githubToken: 'test-token',
        aiClientType: 'gemini',
        pmToolType: 'clickup',
        draft: true,
        httpTimeout: 5000,
        verbose: false,
        silent: false,
      }),
    ).toEqual({
      git: { repoPath: '/work/widgets', baseBranch: 'develop' },
      github: { token: 'test-token', draft: true },
      ai: { clientType: 'gemini' },
      projectManagementTool: { type: 'clickup' },
      sync: {},
      timeouts: { httpMs: 5000 },
    });
  });
});

describe('CreateCommand', () => {
  const settings = SettingsSchema.parse({ git: { repoPath: '/work/widgets', branchName: 'feature/login' } });

  let logger: {
    debug: ReturnType<typeof vi.fn>;
    error: ReturnType<typeof vi.fn>;
    info: ReturnType<typeof vi.fn>;
    raw: ReturnType<typeof vi.fn>;
    warn: ReturnType<typeof vi.fn>;
  };
  let load: ReturnType<typeof vi.fn>;
  let run: ReturnType<typeof vi.fn>;
  let createWorkflow: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    logger = { debug: vi.fn(), error: vi.fn(), info: vi.fn(), raw: vi.fn(), warn: vi.fn() };
    load = vi.fn().mockResolvedValue(settings);
    run = vi.fn().mockResolvedValue(pullRequest);
    createWorkflow = vi.fn().mockReturnValue({ run });
  });

  function createCommand(): CreateCommand {
    return new CreateCommand(
      createDefaultDependencies(
        { logger, cwd: '/work', env: {} },
        { settingsLoader: { load }, createWorkflow },
      ),
    );
  }

  it('should run the workflow for the configured branch and print the URL', async () => {
    const exitCode = await createCommand().execute({
      config: '/etc/pr.yaml',
      draft: true,
      verbose: false,
      silent: false,
    });

    expect(exitCode).toBe(0);
    expect(load).toHaveBeenCalledWith(
      expect.objectContaining({ github: { token: undefined, repo: undefined, draft: true } }),
      '/etc/pr.yaml',
    );
    expect(createWorkflow).toHaveBeenCalledWith(settings);
    expect(run).toHaveBeenCalledWith('feature/login');
    expect(logger.raw).toHaveBeenCalledWith('https://github.com/acme/widgets/pull/9');
  });

  it('should print only the URL when the logger is silent', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const silentLogger = new Logger({ silent: true });
    const command = new CreateCommand(
      createDefaultDependencies(
        { logger: silentLogger, cwd: '/work', env: {} },
        { settingsLoader: { load }, createWorkflow },
      ),
    );

    await expect(command.execute({ verbose: false, silent: true })).resolves.toBe(0);

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(consoleLogSpy).toHaveBeenCalledWith('https://github.com/acme/widgets/pull/9');
    expect(consoleErrorSpy).not.toHaveBeenCalled();
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should succeed when no pull request was needed', async () => {
    run.mockResolvedValue(null);

    await expect(createCommand().execute({ verbose: false, silent: false })).resolves.toBe(0);
    expect(logger.info).toHaveBeenCalledWith('No pull request was created');
    expect(logger.raw).not.toHaveBeenCalled();
  });

  it('should exit with 1 on configuration errors', async () => {
    createWorkflow.mockImplementation(() => {
      throw new ConfigurationError('A GitHub token is required');
    });

    await expect(createCommand().execute({ verbose: false, silent: false })).resolves.toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringContaining('Configuration error: A GitHub token is required'),
    );
    expect(run).not.toHaveBeenCalled();
  });

  it('should exit with 1 and log unexpected errors', async () => {
    const failure = new Error('HEAD is detached');
    run.mockRejectedValue(failure);

    await expect(createCommand().execute({ verbose: false, silent: false })).resolves.toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringContaining('Create command failed: HEAD is detached'),
      { error: failure },
    );
  });
});
