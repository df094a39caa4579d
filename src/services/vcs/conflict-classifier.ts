import { GitResponseError } from 'simple-git';

import type { MergeErrorClassifier } from '@/core/vcs/interfaces';

import { toErrorMessage } from '@/utils/errors';
import { isRecord } from '@/validation/guards';

const CONFLICT_PATTERNS: readonly RegExp[] = [/CONFLICT/i, /Automatic merge failed/i];

/**
 * Default merge error classifier.
 *
 * simple-git rejects conflicted merges with a `GitResponseError` carrying the
 * parsed merge summary; anything else is matched on git's conflict wording.
 */
export const isMergeConflictError: MergeErrorClassifier = (error) => {
  if (error instanceof GitResponseError) {
    const summary: unknown = error.git;
    if (isRecord(summary) && Array.isArray(summary.conflicts) && summary.conflicts.length > 0) {
      return true;
    }
  }

  const message = toErrorMessage(error);
  return CONFLICT_PATTERNS.some((pattern) => pattern.test(message));
};
