// packages/triage/src/classifiers/index.ts
import { errorMessage, noopLogger, type Logger } from '@vulntriage/core';
import type { Classification } from '../types.js';
import { defaultClassifier } from './default.js';
import { commandInjectionClassifier, sqlInjectionClassifier } from './injection.js';
import { pathTraversalClassifier } from './pathTraversal.js';
import { hardcodedSecretClassifier } from './secrets.js';
import type { ClassifierInput, ClassifierRoute, FindingClassifier } from './types.js';
import { weakCryptoClassifier } from './weakCrypto.js';
import { xssClassifier } from './xss.js';

export * from './types.js';
export { defaultClassifier } from './default.js';
export { commandInjectionClassifier, sqlInjectionClassifier } from './injection.js';
export { pathTraversalClassifier } from './pathTraversal.js';
export { ENTROPY_THRESHOLD, extractSecretValue, hardcodedSecretClassifier, shannonEntropy } from './secrets.js';
export { weakCryptoClassifier } from './weakCrypto.js';
export { xssClassifier } from './xss.js';
export { isTestPath } from './shared.js';

function byFamily(family: string, classifier: FindingClassifier): ClassifierRoute {
  return { matches: (input) => input.family === family, classifier };
}

/** Specialized classifiers by weakness family, default last. */
export const DEFAULT_ROUTES: readonly ClassifierRoute[] = [
  byFamily('sql-injection', sqlInjectionClassifier),
  byFamily('command-injection', commandInjectionClassifier),
  byFamily('xss', xssClassifier),
  byFamily('path-traversal', pathTraversalClassifier),
  byFamily('hardcoded-secret', hardcodedSecretClassifier),
  byFamily('weak-crypto', weakCryptoClassifier),
  { matches: () => true, classifier: defaultClassifier },
];

/**
 * First matching route wins. A classifier that throws is replaced by the
 * default classifier for that finding.
 */
export function classify(
  input: ClassifierInput,
  routes: readonly ClassifierRoute[] = DEFAULT_ROUTES,
  logger: Logger = noopLogger
): Classification {
  const route = routes.find((r) => r.matches(input));
  const classifier = route?.classifier ?? defaultClassifier;
  try {
    return classifier.classify(input);
  } catch (error) {
    logger.warn(`classifier ${classifier.id} failed on ${input.finding.fingerprint}, using default: ${errorMessage(error)}`);
    return defaultClassifier.classify(input);
  }
}
