import { describe, expect, it } from 'vitest';

import { labelsForFiles, matchesPattern } from '../label-rules';

describe('matchesPattern', () => {
  it.each([
    ['docs/guide.md', 'docs/*', true],
    ['src/docs/guide.md', 'docs/*', false],
    ['src/index.ts', '*.ts', true],
    ['src/index.tsx', '*.ts', false],
    ['package.json', 'package.json', true],
    ['web/package.json', 'package.json', false],
  ])('%s against %s is %s', (file, pattern, expected) => {
    expect(matchesPattern(file, pattern)).toBe(expected);
  });
});

describe('labelsForFiles', () => {
  const rules = {
    'docs/*': ['documentation'],
    '*.ts': ['typescript', 'code'],
    '*.test.ts': ['tests', 'code'],
  };

  it('should collect every matching label once, sorted', () => {
    expect(labelsForFiles(['docs/intro.md', 'src/a.ts', 'src/a.test.ts'], rules)).toEqual([
      'code',
      'documentation',
      'tests',
      'typescript',
    ]);
  });

  it('should return nothing when no rule matches', () => {
    expect(labelsForFiles(['README.md'], rules)).toEqual([]);
    expect(labelsForFiles([], rules)).toEqual([]);
  });
});
