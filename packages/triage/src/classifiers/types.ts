// packages/triage/src/classifiers/types.ts
import type { UnifiedFinding } from '@vulntriage/core';
import type { Classification, Verdict } from '../types.js';

export interface ClassifierInput {
  finding: UnifiedFinding;
  /** Snippet text, empty when the finding has none. */
  code: string;
  /** Weakness family from the CWE catalog, when the category is known. */
  family?: string;
}

export interface FindingClassifier {
  readonly id: string;
  classify(input: ClassifierInput): Classification;
}

/** First route whose predicate matches wins. */
export interface ClassifierRoute {
  matches(input: ClassifierInput): boolean;
  classifier: FindingClassifier;
}

export function verdict(classifier: string, v: Verdict, confidence: number, reasoning: string): Classification {
  return { verdict: v, confidence, classifier, reasoning };
}
