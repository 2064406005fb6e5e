// packages/triage/src/index.ts
import type { TriagedFinding, Verdict } from './types.js';

export * from './types.js';
export * from './classifiers/index.js';
export * from './risk.js';
export * from './pattern.js';
export * from './cluster.js';
export * from './explain.js';
export * from './engine.js';

export function countByVerdict(findings: readonly TriagedFinding[]): Record<Verdict, number> {
  const out: Record<Verdict, number> = { true_positive: 0, false_positive: 0, needs_review: 0 };
  for (const item of findings) out[item.classification.verdict] += 1;
  return out;
}
