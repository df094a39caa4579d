import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';

import { z, ZodError } from 'zod';

import { AI_CLIENT_TYPES } from '@/core/ai/interfaces';
import { TICKET_TOOL_TYPES } from '@/core/tickets/interfaces';

const milliseconds = z.coerce.number().int().positive().optional();

// Create command options schema
export const CreateCommandOptionsSchema = z
  .object({
    repoPath: z.string().min(1, 'Repository path cannot be empty').optional(),
    baseBranch: z.string().min(1).optional(),
    branchName: z.string().min(1).optional(),
    githubToken: z.string().optional(),
    githubRepo: z.string().optional(),
    aiClientType: z.enum(AI_CLIENT_TYPES).optional(),
    aiApiKey: z.string().optional(),
    pmToolType: z.enum(TICKET_TOOL_TYPES).optional(),
    pmToolApiKey: z.string().optional(),
    config: z.string().min(1).optional(),
    draft: z.boolean().optional(),
    abortOnConflict: z.boolean().optional(),
    httpTimeout: milliseconds,
    gitTimeout: milliseconds,
    verbose: z.boolean().default(false),
    silent: z.boolean().default(false),
  })
  .refine(
    (data) => {
      // Validate repository path exists and is a directory
      if (data.repoPath === undefined) {
        return true; // Falls back to environment, config or cwd
      }

      const resolvedPath = resolve(data.repoPath);
      if (!existsSync(resolvedPath)) {
        return false;
      }

      try {
        return statSync(resolvedPath).isDirectory();
      } catch {
        return false;
      }
    },
    {
      message:
        'Repository path does not exist or is not accessible. Please provide a valid directory path.',
      path: ['repoPath'],
    },
  )
  .transform((data) => {
    if (data.repoPath !== undefined) {
      return { ...data, repoPath: resolve(data.repoPath) };
    }
    return data;
  });
export type CreateCommandOptions = z.infer<typeof CreateCommandOptionsSchema>;

export function validateCreateArgs(raw: unknown): CreateCommandOptions {
  try {
    return CreateCommandOptionsSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const detail =
        issue === undefined
          ? error.message
          : `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`;
      throw new TypeError(`Invalid create options: ${detail}`);
    }
    throw error;
  }
}
