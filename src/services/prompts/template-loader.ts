import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { hasErrorCode, PrCreatorError, toError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export const PROMPT_NAMES = {
  title: 'summarize-as-clear-title',
  description: 'summarize-change-content',
} as const;

export type PromptName = (typeof PROMPT_NAMES)[keyof typeof PROMPT_NAMES];

/**
 * Where templates live: beside the sources in development, beside the bundle once built
 */
export const DEFAULT_PROMPT_DIRECTORIES: readonly string[] = [
  fileURLToPath(new URL('../../resources/prompts/', import.meta.url)),
  fileURLToPath(new URL('prompts/', import.meta.url)),
];

export class PromptTemplateNotFoundError extends PrCreatorError {
  public override readonly name = 'PromptTemplateNotFoundError';

  constructor(
    public readonly promptName: string,
    public readonly searched: readonly string[],
  ) {
    super(`Prompt template '${promptName}' not found in: ${searched.join(', ')}`);
  }
}

/**
 * Read `<name>.prompt` from the first directory that has it
 */
export async function loadPromptTemplate(
  name: PromptName,
  directories: readonly string[] = DEFAULT_PROMPT_DIRECTORIES,
): Promise<string> {
  for (const directory of directories) {
    const file = path.join(directory, `${name}.prompt`);
    try {
      const content = await fs.readFile(file, 'utf8');
      logger.debug(`Loaded prompt template ${name}`, { file, length: content.length });
      return content;
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw new PrCreatorError(`Failed to read prompt template ${file}`, toError(error));
      }
    }
  }
  throw new PromptTemplateNotFoundError(name, directories);
}

/**
 * Contents of `.github/PULL_REQUEST_TEMPLATE.md`, or an empty string when the repo has none
 */
export async function loadPullRequestTemplate(repoPath: string): Promise<string> {
  const file = path.join(repoPath, '.github', 'PULL_REQUEST_TEMPLATE.md');
  try {
    const content = await fs.readFile(file, 'utf8');
    logger.info(`Found pull request template at ${file}`);
    return content;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      logger.debug(`No pull request template at ${file}`);
      return '';
    }
    throw new PrCreatorError(`Failed to read pull request template ${file}`, toError(error));
  }
}
