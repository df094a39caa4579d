import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { logger } from '@/utils/logger';

import {
  loadPromptTemplate,
  loadPullRequestTemplate,
  PROMPT_NAMES,
  PromptTemplateNotFoundError,
} from '../template-loader';

describe('template loader', () => {
  let workDir: string;

  beforeEach(async () => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pr-creator-prompts-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('loadPromptTemplate', () => {
    it('should load the shipped templates by default', async () => {
      const title = await loadPromptTemplate(PROMPT_NAMES.title);
      const description = await loadPromptTemplate(PROMPT_NAMES.description);

      expect(title).toContain('{{ all_commits }}');
      expect(description).toContain('{{ pull_request_template }}');
    });

    it('should take the first directory that has the template', async () => {
      const first = path.join(workDir, 'first');
      const second = path.join(workDir, 'second');
      await fs.mkdir(first);
      await fs.mkdir(second);
      await fs.writeFile(path.join(second, 'summarize-as-clear-title.prompt'), 'second copy');

      await expect(loadPromptTemplate(PROMPT_NAMES.title, [first, second])).resolves.toBe(
        'second copy',
      );
    });

    it('should report every searched directory when none has it', async () => {
      const error: unknown = await loadPromptTemplate(PROMPT_NAMES.description, [workDir]).catch(
        (caught: unknown) => caught,
      );

      expect(error).toBeInstanceOf(PromptTemplateNotFoundError);
      expect(error).toMatchObject({
        message: `Prompt template 'summarize-change-content' not found in: ${workDir}`,
      });
    });
  });

  describe('loadPullRequestTemplate', () => {
    it('should read the repository pull request template', async () => {
      await fs.mkdir(path.join(workDir, '.github'));
      await fs.writeFile(
        path.join(workDir, '.github', 'PULL_REQUEST_TEMPLATE.md'),
        '## Target\n\n## Changes\n',
      );

      await expect(loadPullRequestTemplate(workDir)).resolves.toBe('## Target\n\n## Changes\n');
    });

    it('should return an empty string when the repository has none', async () => {
      await expect(loadPullRequestTemplate(workDir)).resolves.toBe('');
    });
  });
});
