import { z } from 'zod';

import { DEFAULT_HTTP_TIMEOUT_MS } from '@/adapters/http/json-request';
import { AI_CLIENT_TYPES } from '@/core/ai/interfaces';
import { TICKET_TOOL_TYPES } from '@/core/tickets/interfaces';
import { ConfigurationError } from '@/utils/errors';

export const DEFAULT_GIT_TIMEOUT_MS = 120_000;

const optionalText = z.string().trim().min(1).optional();
const timeout = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/**
 * Resolved settings after all layers are merged
 */
export const SettingsSchema = z.object({
  git: z
    .object({
      repoPath: z.string().trim().min(1).default('.'),
      baseBranch: z.string().trim().min(1).default('main'),
      branchName: optionalText,
      remote: z.string().trim().min(1).default('origin'),
    })
    .default({}),
  github: z
    .object({
      token: optionalText,
      repo: optionalText,
      draft: z.boolean().default(false),
      labels: z.record(z.array(z.string().min(1))).default({}),
    })
    .default({}),
  ai: z
    .object({
      clientType: z.enum(AI_CLIENT_TYPES).default('gpt'),
      apiKey: optionalText,
      model: optionalText,
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
    })
    .default({}),
  projectManagementTool: z
    .object({
      type: z.enum(TICKET_TOOL_TYPES).optional(),
      apiKey: optionalText,
      baseUrl: optionalText,
      username: optionalText,
      organizationId: optionalText,
      projectId: optionalText,
    })
    .default({}),
  sync: z
    .object({
      abortOnConflict: z.boolean().default(false),
    })
    .default({}),
  timeouts: z
    .object({
      httpMs: timeout(DEFAULT_HTTP_TIMEOUT_MS),
      gitMs: timeout(DEFAULT_GIT_TIMEOUT_MS),
    })
    .default({}),
  ci: z
    .object({
      isCiEnvironment: z.boolean().default(false),
      refEnvValue: optionalText,
    })
    .default({}),
});

export type Settings = z.output<typeof SettingsSchema>;

/**
 * Values from the command line; anything left undefined falls through to lower layers
 */
export type SettingsOverrides = {
  [Section in keyof Settings]?: Partial<Settings[Section]>;
};

/**
 * `.github/pr-creator.yaml`
 */
export const ConfigFileSchema = z
  .object({
    git: z
      .object({
        repo_path: z.string().optional(),
        base_branch: z.string().optional(),
        branch_name: z.string().optional(),
        remote: z.string().optional(),
      })
      .optional(),
    github: z
      .object({
        repo: z.string().optional(),
        draft: z.boolean().optional(),
        labels: z.record(z.array(z.string())).optional(),
      })
      .optional(),
    ai: z
      .object({
        client_type: z.string().optional(),
        model: z.string().optional(),
        temperature: z.number().optional(),
        max_tokens: z.number().optional(),
      })
      .optional(),
    project_management_tool: z
      .object({
        type: z.string().optional(),
        api_key: z.string().optional(),
        base_url: z.string().optional(),
        username: z.string().optional(),
        organization_id: z.string().optional(),
        project_id: z.string().optional(),
      })
      .optional(),
    sync: z.object({ abort_on_conflict: z.boolean().optional() }).optional(),
    timeouts: z
      .object({
        http_ms: z.number().optional(),
        git_ms: z.number().optional(),
      })
      .optional(),
  })
  .nullable();

export type ConfigFile = NonNullable<z.infer<typeof ConfigFileSchema>>;

/**
 * Config file exists but could not be read or parsed
 */
export class ConfigFileError extends ConfigurationError {
  public override readonly name = 'ConfigFileError';

  constructor(
    public readonly configPath: string,
    cause: Error,
  ) {
    super(`Failed to load config file ${configPath}: ${cause.message}`, cause);
  }
}

/**
 * One-line summary of the first zod issue, e.g. `ai.clientType: Invalid enum value...`
 */
export function describeZodError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) {
    return error.message;
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
