import type { LabelRules } from '@/core/hosting/interfaces';

/**
 * Match a path against a label pattern:
 * `dir/*` is a prefix match, `*.ext` a suffix match, anything else exact
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  if (pattern.endsWith('*')) {
    return filePath.startsWith(pattern.slice(0, -1));
  }
  if (pattern.startsWith('*')) {
    return filePath.endsWith(pattern.slice(1));
  }
  return filePath === pattern;
}

/**
 * Labels for a set of changed files, deduplicated and sorted
 */
export function labelsForFiles(files: readonly string[], rules: LabelRules): string[] {
  const labels = new Set<string>();
  for (const file of files) {
    for (const [pattern, patternLabels] of Object.entries(rules)) {
      if (matchesPattern(file, pattern)) {
        for (const label of patternLabels) {
          labels.add(label);
        }
      }
    }
  }
  return [...labels].sort();
}
