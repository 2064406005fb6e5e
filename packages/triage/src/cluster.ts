// packages/triage/src/cluster.ts
import { stableHash } from '@vulntriage/core';
import type { Cluster, ClusterStrategy, TriagedFinding } from './types.js';

export interface ClusterOptions {
  minFileClusterSize: number;
  minPatternClusterSize: number;
}

export function clusterId(strategy: ClusterStrategy, category: string, key: string): string {
  return `cluster-${strategy}-${stableHash(`${strategy}|${category}|${key}`)}`;
}

function groupInto(
  out: Cluster[],
  strategy: ClusterStrategy,
  items: readonly TriagedFinding[],
  keyOf: (item: TriagedFinding) => string | undefined,
  minSize: number
): void {
  const groups = new Map<string, { category: string; key: string; members: string[] }>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === undefined) continue;
    const { category, fingerprint } = item.finding;
    const id = `${category}\u0000${key}`;
    const group = groups.get(id);
    if (group) group.members.push(fingerprint);
    else groups.set(id, { category, key, members: [fingerprint] });
  }

  for (const { category, key, members } of groups.values()) {
    if (members.length < Math.max(1, minSize)) continue;
    out.push({ id: clusterId(strategy, category, key), strategy, category, key, members: [...members].sort() });
  }
}

function compareClusters(a: Cluster, b: Cluster): number {
  return a.strategy.localeCompare(b.strategy) || a.category.localeCompare(b.category) || a.key.localeCompare(b.key);
}

/**
 * Post-pass over the whole triaged set. Each finding lands in at most one
 * cluster per strategy. Existing cluster links are recomputed, so running
 * this twice gives the same result.
 */
export function clusterFindings(
  items: readonly TriagedFinding[],
  opts: ClusterOptions
): { findings: TriagedFinding[]; clusters: Cluster[] } {
  const clusters: Cluster[] = [];
  groupInto(clusters, 'category-file', items, (item) => item.finding.location.filePath, opts.minFileClusterSize);
  groupInto(clusters, 'category-pattern', items, (item) => item.pattern, opts.minPatternClusterSize);
  clusters.sort(compareClusters);

  const fileOf = new Map<string, string>();
  const patternOf = new Map<string, string>();
  for (const cluster of clusters) {
    const target = cluster.strategy === 'category-file' ? fileOf : patternOf;
    for (const member of cluster.members) target.set(member, cluster.id);
  }

  const findings = items.map((item) => {
    const file = fileOf.get(item.finding.fingerprint);
    const pattern = patternOf.get(item.finding.fingerprint);
    return {
      ...item,
      clusters: { ...(file ? { file } : {}), ...(pattern ? { pattern } : {}) },
    };
  });
  return { findings, clusters };
}
