import chalk from 'chalk';

import type { Settings, SettingsOverrides } from '@/services/config/types';
import type { CreateCommandOptions } from '@/types/cli';

import {
  BaseCommand,
  type CommandDependencies,
  type SettingsLoader,
  type WorkflowRunner,
} from '@/commands/types';
import { SettingsService } from '@/services/config/settings-service';
import { createPullRequestWorkflow } from '@/services/pull-request/workflow-factory';
import { ConfigurationError, toErrorMessage } from '@/utils/errors';

/**
 * Map command-line flags onto the settings layers
 */
export function toSettingsOverrides(options: CreateCommandOptions): SettingsOverrides {
  return {
    git: {
      repoPath: options.repoPath,
      baseBranch: options.baseBranch,
      branchName: options.branchName,
    },
    github: {
      token: options.githubToken,
      repo: options.githubRepo,
      draft: options.draft,
    },
    ai: {
      clientType: options.aiClientType,
      apiKey: options.aiApiKey,
    },
    projectManagementTool: {
      type: options.pmToolType,
      apiKey: options.pmToolApiKey,
    },
    sync: {
      abortOnConflict: options.abortOnConflict,
    },
    timeouts: {
      httpMs: options.httpTimeout,
      gitMs: options.gitTimeout,
    },
  };
}

/**
 * Create a pull request for the current (or given) branch
 */
export class CreateCommand extends BaseCommand<CreateCommandOptions> {
  private readonly _settingsLoader: SettingsLoader;
  private readonly _createWorkflow: (settings: Settings) => WorkflowRunner;

  constructor(dependencies: CommandDependencies) {
    super('create', 'Draft and open a pull request for a branch', dependencies);
    this._settingsLoader =
      dependencies.services?.settingsLoader ??
      new SettingsService(dependencies.context.env, dependencies.context.cwd);
    this._createWorkflow = dependencies.services?.createWorkflow ?? createPullRequestWorkflow;
  }

  async execute(options: CreateCommandOptions): Promise<number> {
    try {
      const settings = await this._settingsLoader.load(toSettingsOverrides(options), options.config);
      const workflow = this._createWorkflow(settings);

      const pullRequest = await workflow.run(settings.git.branchName);
      if (pullRequest === null) {
        this.logger.info('No pull request was created');
        return 0;
      }

      this.logger.info(chalk.green(`✅ Pull request #${pullRequest.number}: ${pullRequest.title}`));
      this.logger.raw(pullRequest.htmlUrl);
      return 0;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error(chalk.red(`❌ Configuration error: ${error.message}`));
        return 1;
      }
      this.logger.error(chalk.red(`❌ Create command failed: ${toErrorMessage(error)}`), { error });
      return 1;
    }
  }
}
