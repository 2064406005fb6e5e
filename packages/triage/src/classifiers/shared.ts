// packages/triage/src/classifiers/shared.ts

const TEST_DIRS = new Set(['test', 'tests', '__tests__', 'spec', 'specs', 'fixture', 'fixtures', 'mocks', '__mocks__']);

/** Path looks like test code: a test directory or a test_* / *_test / *.test.* / *.spec.* file. */
export function isTestPath(filePath: string): boolean {
  const parts = filePath.toLowerCase().split('/');
  const base = parts[parts.length - 1] ?? '';
  if (parts.slice(0, -1).some((dir) => TEST_DIRS.has(dir))) return true;
  return /^test_/.test(base) || /_test\.[a-z]+$/.test(base) || /\.(test|spec)\.[a-z]+$/.test(base);
}

export function firstMatch(haystack: string, needles: readonly string[]): string | undefined {
  return needles.find((needle) => haystack.includes(needle));
}

export function firstPattern(haystack: string, patterns: readonly RegExp[]): RegExp | undefined {
  return patterns.find((p) => p.test(haystack));
}

/** `algo` as a whole token: hashlib.md5( and createHash('md5') match, "describe" does not match des. */
export function hasToken(haystack: string, token: string): boolean {
  const escaped = token.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^a-z0-9])${escaped}([^a-z0-9]|$)`).test(haystack);
}
