/**
 * Default wiring for commands
 */

import { logger } from '@/utils/logger';

import type { CommandContext, CommandDependencies, CommandServiceOverrides } from './types';

/**
 * Default command dependencies factory
 */
export function createDefaultDependencies(
  overrides?: Partial<CommandContext>,
  serviceOverrides?: CommandServiceOverrides,
): CommandDependencies {
  return {
    context: {
      logger: overrides?.logger ?? logger,
      cwd: overrides?.cwd ?? process.cwd(),
      env: overrides?.env ?? process.env,
    },
    ...(serviceOverrides !== undefined ? { services: serviceOverrides } : {}),
  };
}
