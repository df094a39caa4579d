import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import YAML from 'yaml';

import { ConfigurationError, hasErrorCode, toError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { firstWithContent, isRecord } from '@/validation/guards';

import {
  type ConfigFile,
  ConfigFileError,
  ConfigFileSchema,
  describeZodError,
  type Settings,
  type SettingsOverrides,
  SettingsSchema,
} from './types';

export const ENV_PREFIX = 'PR_CREATOR_';
export const DEFAULT_CONFIG_FILE = path.join('.github', 'pr-creator.yaml');

type Layer = Record<string, unknown>;

/**
 * Deep-merge settings layers; later layers win and undefined never overrides
 */
export function mergeLayers(...layers: Layer[]): Layer {
  const merged: Layer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) {
        continue;
      }
      const existing = merged[key];
      merged[key] = isRecord(value) ? mergeLayers(isRecord(existing) ? existing : {}, value) : value;
    }
  }
  return merged;
}

/**
 * CI runner detection, kept out of the git layer so it can be injected
 */
export function detectCi(env: NodeJS.ProcessEnv): Layer {
  return {
    isCiEnvironment: env.CI === 'true' || env.GITHUB_ACTIONS === 'true',
    refEnvValue: firstWithContent(env.GITHUB_HEAD_REF, env.GITHUB_REF_NAME),
  };
}

export function environmentLayer(env: NodeJS.ProcessEnv): Layer {
  const read = (name: string): string | undefined => firstWithContent(env[`${ENV_PREFIX}${name}`]);

  return {
    git: {
      repoPath: read('GIT_REPO_PATH'),
      baseBranch: read('GIT_BASE_BRANCH'),
      branchName: read('GIT_BRANCH_NAME'),
      remote: read('GIT_REMOTE'),
    },
    github: {
      token: firstWithContent(read('GITHUB_TOKEN'), env.GITHUB_TOKEN, env.GH_TOKEN),
      repo: firstWithContent(read('GITHUB_REPO'), env.GITHUB_REPOSITORY),
    },
    ai: {
      clientType: read('AI_CLIENT_TYPE'),
      apiKey: read('AI_API_KEY'),
      model: read('AI_MODEL'),
    },
    projectManagementTool: {
      type: read('PM_TOOL_TYPE'),
      apiKey: read('PM_TOOL_API_KEY'),
      baseUrl: read('PM_TOOL_BASE_URL'),
      username: read('PM_TOOL_USERNAME'),
      organizationId: read('PM_TOOL_ORGANIZATION_ID'),
      projectId: read('PM_TOOL_PROJECT_ID'),
    },
    timeouts: {
      httpMs: read('HTTP_TIMEOUT_MS'),
      gitMs: read('GIT_TIMEOUT_MS'),
    },
    ci: detectCi(env),
  };
}

export function fileLayer(file: ConfigFile): Layer {
  return {
    git: {
      repoPath: file.git?.repo_path,
      baseBranch: file.git?.base_branch,
      branchName: file.git?.branch_name,
      remote: file.git?.remote,
    },
    github: {
      repo: file.github?.repo,
      draft: file.github?.draft,
      labels: file.github?.labels,
    },
    ai: {
      clientType: file.ai?.client_type,
      model: file.ai?.model,
      temperature: file.ai?.temperature,
      maxTokens: file.ai?.max_tokens,
    },
    projectManagementTool: {
      type: file.project_management_tool?.type,
      apiKey: file.project_management_tool?.api_key,
      baseUrl: file.project_management_tool?.base_url,
      username: file.project_management_tool?.username,
      organizationId: file.project_management_tool?.organization_id,
      projectId: file.project_management_tool?.project_id,
    },
    sync: {
      abortOnConflict: file.sync?.abort_on_conflict,
    },
    timeouts: {
      httpMs: file.timeouts?.http_ms,
      gitMs: file.timeouts?.git_ms,
    },
  };
}

/**
 * Loads settings with priority: CLI > environment > config file > defaults
 */
export class SettingsService {
  constructor(
    private readonly _env: NodeJS.ProcessEnv = process.env,
    private readonly _cwd: string = process.cwd(),
  ) {}

  async load(overrides: SettingsOverrides = {}, configPath?: string): Promise<Settings> {
    const env = environmentLayer(this._env);

    const repoPath = path.resolve(
      this._cwd,
      firstWithContent(overrides.git?.repoPath, this._env[`${ENV_PREFIX}GIT_REPO_PATH`]) ?? '.',
    );
    const explicitFile = configPath !== undefined;
    const filePath =
      configPath !== undefined
        ? path.resolve(this._cwd, configPath)
        : path.join(repoPath, DEFAULT_CONFIG_FILE);

    const file = await this._loadConfigFile(filePath, explicitFile);

    const merged = mergeLayers(
      file !== null ? fileLayer(file) : {},
      env,
      overrides,
    );
    const parsed = SettingsSchema.safeParse(merged);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid settings: ${describeZodError(parsed.error)}`);
    }

    const settings: Settings = {
      ...parsed.data,
      git: { ...parsed.data.git, repoPath: path.resolve(this._cwd, parsed.data.git.repoPath) },
    };
    logger.debug('Settings loaded', {
      configFile: file !== null ? filePath : null,
      repoPath: settings.git.repoPath,
      baseBranch: settings.git.baseBranch,
      aiClientType: settings.ai.clientType,
      ticketTool: settings.projectManagementTool.type ?? null,
      ci: settings.ci.isCiEnvironment,
    });
    return settings;
  }

  /**
   * Missing default file means no file layer; a missing explicit file is an error
   */
  private async _loadConfigFile(filePath: string, required: boolean): Promise<ConfigFile | null> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') && !required) {
        logger.debug('No config file found, using defaults', { filePath });
        return null;
      }
      throw new ConfigFileError(filePath, toError(error));
    }

    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (error) {
      throw new ConfigFileError(filePath, toError(error));
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigFileError(filePath, new Error(describeZodError(parsed.error)));
    }
    return parsed.data ?? {};
  }
}
