// packages/engines/src/filters.ts
import fg from 'fast-glob';
import type { UnifiedFinding } from '@vulntriage/core';

export interface PathFilter {
  include: string[];
  exclude: string[];
}

/**
 * Files under `scanRoot` selected by the include globs (everything when
 * empty) minus the exclude globs, as scan-root relative POSIX paths.
 */
export async function resolveFilteredFiles(scanRoot: string, filter: PathFilter): Promise<Set<string>> {
  const entries = await fg(filter.include.length ? filter.include : ['**/*'], {
    cwd: scanRoot,
    ignore: filter.exclude,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
  });
  return new Set(entries);
}

/**
 * Tools that cannot take globs natively still honor them here. Findings
 * outside the scan root (absolute paths) are dropped when filters are set.
 */
export async function applyPathFilter(
  findings: UnifiedFinding[],
  scanRoot: string,
  filter: PathFilter
): Promise<UnifiedFinding[]> {
  if (!filter.include.length && !filter.exclude.length) return findings;
  const allowed = await resolveFilteredFiles(scanRoot, filter);
  return findings.filter((f) => allowed.has(f.location.filePath));
}
