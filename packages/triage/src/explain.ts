// packages/triage/src/explain.ts
import { defaultCweCatalog, guidanceFor, UNKNOWN_CATEGORY, type CweCatalog, type UnifiedFinding } from '@vulntriage/core';
import type { Classification, Explanation, Verdict } from './types.js';

const VERDICT_LABEL: Record<Verdict, string> = {
  true_positive: 'likely exploitable',
  false_positive: 'likely a false positive',
  needs_review: 'needs review',
};

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, Math.max(0, maxLength));
  return `${text.slice(0, maxLength - 3)}...`;
}

export function explain(
  finding: UnifiedFinding,
  classification: Classification,
  maxLength: number,
  catalog: CweCatalog = defaultCweCatalog()
): Explanation {
  const guidance = guidanceFor(finding.category, catalog);
  const { filePath, startLine } = finding.location;
  const label = finding.category === UNKNOWN_CATEGORY ? guidance.name : `${guidance.name} (${finding.category})`;

  const explanation: Explanation = {
    summary: truncate(`${label} at ${filePath}:${startLine}, ${VERDICT_LABEL[classification.verdict]}.`, maxLength),
    what: truncate(finding.rawMessage, maxLength),
    whyItMatters: truncate(guidance.impact, maxLength),
    howToFix: truncate(guidance.fix, maxLength),
  };
  if (classification.verdict === 'true_positive' && guidance.exploit) {
    explanation.howToExploit = truncate(guidance.exploit, maxLength);
  }
  return explanation;
}
