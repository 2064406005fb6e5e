// packages/triage/src/types.ts
import type { UnifiedFinding } from '@vulntriage/core';

export type Verdict = 'true_positive' | 'false_positive' | 'needs_review';

export const VERDICTS: readonly Verdict[] = ['true_positive', 'false_positive', 'needs_review'];

export interface Classification {
  verdict: Verdict;
  /** 0..1 */
  confidence: number;
  /** Id of the classifier that produced the verdict. */
  classifier: string;
  reasoning: string;
}

export interface RiskScore {
  impact: number;
  exploitability: number;
  /** Days. */
  detectionTime: number;
  score: number;
}

export type ClusterStrategy = 'category-file' | 'category-pattern';

export interface Cluster {
  id: string;
  strategy: ClusterStrategy;
  category: string;
  /** File path for category-file, helper name for category-pattern. */
  key: string;
  /** Sorted fingerprints. */
  members: string[];
}

export interface Explanation {
  summary: string;
  what: string;
  whyItMatters: string;
  howToExploit?: string;
  howToFix: string;
}

export interface TriagedFinding {
  finding: UnifiedFinding;
  classification: Classification;
  risk: RiskScore;
  clusters: { file?: string; pattern?: string };
  /** Helper called at the finding line, when one was detected. */
  pattern?: string;
  explanation: Explanation;
}

export interface TriageResult {
  /** Risk score descending, then fingerprint. */
  findings: TriagedFinding[];
  clusters: Cluster[];
}
