// packages/triage/src/classifiers/secrets.ts
import { isTestPath } from './shared.js';
import { verdict, type FindingClassifier } from './types.js';

const DUMMY_VALUES: readonly RegExp[] = [
  /^x{3,}$/,
  /^test/,
  /^demo/,
  /^example/,
  /^placeholder/,
  /^dummy/,
  /^fake/,
  /^changeme/,
  /^password123?$/,
  /^admin$/,
  /^secret$/,
  /^\*+$/,
  /^your[-_]/,
  /^<.*>$/,
  /^\$\{.*\}$/,
  /^redacted$/,
];

/** Bits per character. */
export const ENTROPY_THRESHOLD = 3.5;

const NAME = String.raw`(?:key|secret|token|password|passwd|pwd|pass|api[_-]?key|access[_-]?key|auth[_-]?token|credentials?)`;

const VALUE_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`\b${NAME}\b\s*[=:]\s*["']([^"']+)["']`, 'i'),
  new RegExp(String.raw`["']${NAME}["']\s*:\s*["']([^"']+)["']`, 'i'),
  /["']([^"']{8,})["']/,
];

export function extractSecretValue(code: string): string | undefined {
  for (const pattern of VALUE_PATTERNS) {
    const m = pattern.exec(code);
    if (m?.[1]) return m[1];
  }
  return undefined;
}

/** Shannon entropy. */
export function shannonEntropy(value: string): number {
  if (!value) return 0;
  const counts = new Map<string, number>();
  for (const ch of value) counts.set(ch, (counts.get(ch) ?? 0) + 1);
  const length = [...value].length;
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export const hardcodedSecretClassifier: FindingClassifier = {
  id: 'hardcoded-secret',
  classify({ finding, code }) {
    const value = extractSecretValue(code);
    if (!value) {
      return verdict(this.id, 'needs_review', 0.5, 'Could not extract the secret value from the code.');
    }

    const lower = value.toLowerCase();
    const dummy = DUMMY_VALUES.find((p) => p.test(lower));
    if (dummy) {
      return verdict(this.id, 'false_positive', 0.85, `Value matches a placeholder pattern (${dummy.source}).`);
    }

    const entropy = shannonEntropy(value);
    if (entropy < ENTROPY_THRESHOLD) {
      return verdict(this.id, 'false_positive', 0.7, `Low entropy (${entropy.toFixed(2)} bits/char), unlikely to be a real secret.`);
    }

    const filePath = finding.location.filePath.toLowerCase();
    if (isTestPath(filePath) || /mock|fixture|example/.test(filePath)) {
      return verdict(this.id, 'false_positive', 0.8, 'Secret is in test or example code.');
    }

    return verdict(this.id, 'true_positive', 0.8, `High entropy (${entropy.toFixed(2)} bits/char) value in production code.`);
  },
};
