import type { PullRequest } from '@/core/hosting/interfaces';
import type { Settings, SettingsOverrides } from '@/services/config/types';
import type { Logger } from '@/utils/logger';

/**
 * Base command interface that all commands must implement
 */
export type Command<TOptions = unknown> = {
  /**
   * Command description for help text
   */
  readonly description: string;

  /**
   * Execute the command with given options
   * Returns exit code (0 for success, non-zero for failure)
   */
  execute(options: TOptions): Promise<number> | number;

  /**
   * Command name for identification
   */
  readonly name: string;
};

/**
 * Command context with shared dependencies
 */
export type CommandContext = {
  /** Current working directory */
  cwd: string;
  /** Environment variables */
  env: NodeJS.ProcessEnv;
  logger: Pick<Logger, 'debug' | 'error' | 'info' | 'raw' | 'warn'>;
};

export type SettingsLoader = {
  load(overrides?: SettingsOverrides, configPath?: string): Promise<Settings>;
};

export type WorkflowRunner = {
  run(branchName?: string): Promise<PullRequest | null>;
};

/**
 * Optional service overrides for commands (primarily for testing)
 */
export type CommandServiceOverrides = {
  createWorkflow?: (settings: Settings) => WorkflowRunner;
  settingsLoader?: SettingsLoader;
};

/**
 * Command dependencies for dependency injection
 */
export type CommandDependencies = {
  context: CommandContext;
  services?: CommandServiceOverrides;
};

/**
 * Abstract base class for commands
 */
export abstract class BaseCommand<TOptions = unknown> implements Command<TOptions> {
  constructor(
    public readonly name: string,
    public readonly description: string,
    protected readonly dependencies: CommandDependencies,
  ) {}

  abstract execute(options: TOptions): Promise<number> | number;

  protected get logger(): CommandContext['logger'] {
    return this.dependencies.context.logger;
  }

  protected get context(): CommandContext {
    return this.dependencies.context;
  }
}
