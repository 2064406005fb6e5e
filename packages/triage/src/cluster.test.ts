import { describe, expect, test } from 'vitest';
import { clusterFindings, clusterId } from './cluster.js';
import type { TriagedFinding } from './types.js';

function item(fingerprint: string, filePath: string, category: string, pattern?: string): TriagedFinding {
  return {
    finding: {
      fingerprint,
      category,
      location: { filePath, startLine: 1, endLine: 1 },
      severity: 'high',
      confidence: 'medium',
      sources: [],
      rawMessage: 'flagged',
      references: [],
    },
    classification: { verdict: 'needs_review', confidence: 0.5, classifier: 'default', reasoning: 'test' },
    risk: { impact: 5, exploitability: 5, detectionTime: 30, score: 25 / 30 },
    clusters: {},
    ...(pattern ? { pattern } : {}),
    explanation: { summary: 's', what: 'w', whyItMatters: 'y', howToFix: 'f' },
  };
}

const ITEMS = [
  item('fp-c', 'app/db.py', 'CWE-89', 'cursor.execute'),
  item('fp-a', 'app/db.py', 'CWE-89', 'cursor.execute'),
  item('fp-b', 'app/other.py', 'CWE-89', 'cursor.execute'),
  item('fp-d', 'app/db.py', 'CWE-798'),
];

describe('clusterFindings', () => {
  test('groups by category and file, and by category and pattern', () => {
    const { clusters } = clusterFindings(ITEMS, { minFileClusterSize: 2, minPatternClusterSize: 2 });

    expect(clusters).toEqual([
      {
        id: clusterId('category-file', 'CWE-89', 'app/db.py'),
        strategy: 'category-file',
        category: 'CWE-89',
        key: 'app/db.py',
        members: ['fp-a', 'fp-c'],
      },
      {
        id: clusterId('category-pattern', 'CWE-89', 'cursor.execute'),
        strategy: 'category-pattern',
        category: 'CWE-89',
        key: 'cursor.execute',
        members: ['fp-a', 'fp-b', 'fp-c'],
      },
    ]);
  });

  test('links each finding to its clusters', () => {
    const { findings, clusters } = clusterFindings(ITEMS, { minFileClusterSize: 2, minPatternClusterSize: 2 });
    const [fileCluster, patternCluster] = clusters;

    expect(findings.map((f) => [f.finding.fingerprint, f.clusters])).toEqual([
      ['fp-c', { file: fileCluster.id, pattern: patternCluster.id }],
      ['fp-a', { file: fileCluster.id, pattern: patternCluster.id }],
      ['fp-b', { pattern: patternCluster.id }],
      ['fp-d', {}],
    ]);
  });

  test('minimum sizes drop small groups', () => {
    const { clusters } = clusterFindings(ITEMS, { minFileClusterSize: 3, minPatternClusterSize: 4 });
    expect(clusters).toEqual([]);
  });

  test('size one keeps singleton groups', () => {
    const { clusters } = clusterFindings(ITEMS, { minFileClusterSize: 1, minPatternClusterSize: 1 });
    expect(clusters.map((c) => `${c.strategy}:${c.category}:${c.key}`)).toEqual([
      'category-file:CWE-798:app/db.py',
      'category-file:CWE-89:app/db.py',
      'category-file:CWE-89:app/other.py',
      'category-pattern:CWE-89:cursor.execute',
    ]);
  });

  test('running twice gives the same result', () => {
    const opts = { minFileClusterSize: 2, minPatternClusterSize: 2 };
    const once = clusterFindings(ITEMS, opts);
    const twice = clusterFindings(once.findings, opts);
    expect(twice).toEqual(once);
  });

  test('does not mutate its input', () => {
    clusterFindings(ITEMS, { minFileClusterSize: 1, minPatternClusterSize: 1 });
    expect(ITEMS.every((i) => Object.keys(i.clusters).length === 0)).toBe(true);
  });

  test('cluster ids are stable and strategy specific', () => {
    expect(clusterId('category-file', 'CWE-89', 'a.py')).toBe(clusterId('category-file', 'CWE-89', 'a.py'));
    expect(clusterId('category-file', 'CWE-89', 'a.py')).not.toBe(clusterId('category-pattern', 'CWE-89', 'a.py'));
    expect(clusterId('category-file', 'CWE-89', 'a.py')).toMatch(/^cluster-category-file-[0-9a-f]{16}$/);
  });
});
