import { Command, CommanderError, Option } from 'commander';

import { createDefaultDependencies } from './commands/command-factory';
import { CreateCommand } from './commands/create/create-command';
import { AI_CLIENT_TYPES } from './core/ai/interfaces';
import { TICKET_TOOL_TYPES } from './core/tickets/interfaces';
import { validateCreateArgs } from './types/cli';
import { toErrorMessage } from './utils/errors';
import { logger } from './utils/logger';

function addCommonOptions(command: Command): Command {
  return command
    .option('-v, --verbose', 'Verbose output')
    .option('--silent', 'Only print the pull request URL');
}

/**
 * Build the program; `onExitCode` receives the exit code of the command that ran
 */
export function createProgram(onExitCode: (exitCode: number) => void): Command {
  const program = new Command();

  program
    .name('pr-creator')
    .description('Draft and open pull requests from branch commits and ticket details')
    .version('0.1.0')
    .exitOverride();

  addCommonOptions(
    program
      .command('create', { isDefault: true })
      .description('Bring the branch up to date, draft a title and body with AI, open the pull request')
      .option('--repo-path <path>', 'Path to the git repository (default: current directory)')
      .option('--base-branch <branch>', 'Branch the pull request targets (default: main)')
      .option('--branch-name <branch>', 'Branch to open the pull request from (default: current)')
      .option('--github-token <token>', 'GitHub token (default: GITHUB_TOKEN or GH_TOKEN)')
      .option('--github-repo <owner/name>', 'GitHub repository (default: GITHUB_REPOSITORY)')
      .addOption(
        new Option('--ai-client-type <type>', 'Language model vendor').choices(AI_CLIENT_TYPES),
      )
      .option('--ai-api-key <key>', 'API key for the language model vendor')
      .addOption(
        new Option('--pm-tool-type <type>', 'Project management tool').choices(TICKET_TOOL_TYPES),
      )
      .option('--pm-tool-api-key <key>', 'API key for the project management tool')
      .option('--config <file>', 'Config file (default: <repo>/.github/pr-creator.yaml)')
      .option('--draft', 'Open the pull request as a draft')
      .option('--abort-on-conflict', 'Abort the merge instead of leaving conflict markers')
      .option('--http-timeout <ms>', 'Timeout for HTTP requests in milliseconds')
      .option('--git-timeout <ms>', 'Timeout for each git command in milliseconds'),
  ).action(async (options: unknown) => {
    const validatedOptions = validateCreateArgs(options);
    logger.configure({ verbose: validatedOptions.verbose, silent: validatedOptions.silent });

    const command = new CreateCommand(createDefaultDependencies());
    onExitCode(await command.execute(validatedOptions));
  });

  return program;
}

export async function run(argv: readonly string[]): Promise<number> {
  let exitCode = 0;
  const program = createProgram((code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help, version and usage errors are already printed by commander
      return error.exitCode;
    }
    logger.error(`Error: ${toErrorMessage(error)}`);
    return 1;
  }
}
