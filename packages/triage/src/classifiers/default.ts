// packages/triage/src/classifiers/default.ts
import { SEVERITY_RANK } from '@vulntriage/core';
import { isTestPath } from './shared.js';
import { verdict, type FindingClassifier } from './types.js';

/** Handles every category. Uses severity, path and tool agreement only. */
export const defaultClassifier: FindingClassifier = {
  id: 'default',
  classify({ finding }) {
    const { severity } = finding;

    if (isTestPath(finding.location.filePath)) {
      return verdict(this.id, 'false_positive', 0.6, 'Finding is in test code.');
    }

    const tools = new Set(finding.sources.map((s) => s.tool));
    if (tools.size >= 2 && SEVERITY_RANK[severity] >= SEVERITY_RANK.high) {
      return verdict(this.id, 'true_positive', 0.7, `${severity} severity, reported by ${tools.size} tools: ${[...tools].join(', ')}.`);
    }

    if (severity === 'critical' || severity === 'high') {
      return verdict(this.id, 'needs_review', 0.6, `${severity} severity finding needs review.`);
    }
    if (severity === 'low' || severity === 'info') {
      return verdict(this.id, 'needs_review', 0.4, `${severity} severity finding, often noise, needs confirmation.`);
    }
    return verdict(this.id, 'needs_review', 0.5, 'Medium severity finding needs review.');
  },
};
