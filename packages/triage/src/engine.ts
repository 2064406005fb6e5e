// packages/triage/src/engine.ts
import {
  defaultCweCatalog,
  noopLogger,
  weaknessFamily,
  type CweCatalog,
  type Logger,
  type TriageConfig,
  type UnifiedFinding,
} from '@vulntriage/core';
import { DEFAULT_ROUTES, classify, type ClassifierRoute } from './classifiers/index.js';
import { clusterFindings } from './cluster.js';
import { explain } from './explain.js';
import { PatternDetector, type SourceReader } from './pattern.js';
import { defaultRiskTable, loadRiskTable, scoreRisk, type RiskTable } from './risk.js';
import type { TriagedFinding, TriageResult } from './types.js';

export interface TriageDeps {
  logger?: Logger;
  routes?: readonly ClassifierRoute[];
  /** Wins over config.riskTablePath. */
  riskTable?: RiskTable;
  catalog?: CweCatalog;
  /** Enables AST pattern detection and whole-line context. */
  readSource?: SourceReader;
  /**
   * Code the classifiers judge, in place of the stored snippet. Undefined
   * means the code could not be recovered, which the reasoning then notes.
   */
  codeFor?: (finding: UnifiedFinding) => string | undefined;
}

const NO_CODE_NOTE = 'Source code was not available for review.';

export function compareTriaged(a: TriagedFinding, b: TriagedFinding): number {
  return b.risk.score - a.risk.score || a.finding.fingerprint.localeCompare(b.finding.fingerprint);
}

/**
 * Classify, score and explain every finding, then cluster the whole set.
 * Findings are referenced, never copied or mutated.
 */
export function triage(findings: readonly UnifiedFinding[], config: TriageConfig, deps: TriageDeps = {}): TriageResult {
  const logger = deps.logger ?? noopLogger;
  const catalog = deps.catalog ?? defaultCweCatalog();
  const routes = deps.routes ?? DEFAULT_ROUTES;
  const riskTable = deps.riskTable ?? (config.riskTablePath ? loadRiskTable(config.riskTablePath) : defaultRiskTable());
  const patterns = new PatternDetector(deps.readSource, logger);

  const triaged = findings.map((finding): TriagedFinding => {
    const code = deps.codeFor ? deps.codeFor(finding) : finding.snippet ?? '';
    const classified = classify(
      { finding, code: code ?? '', family: weaknessFamily(finding.category, catalog) },
      routes,
      logger
    );
    const classification =
      code === undefined ? { ...classified, reasoning: `${classified.reasoning} ${NO_CODE_NOTE}` } : classified;
    const pattern = patterns.detect(finding);
    return {
      finding,
      classification,
      risk: scoreRisk(finding, riskTable),
      clusters: {},
      ...(pattern ? { pattern } : {}),
      explanation: explain(finding, classification, config.explanationMaxLength, catalog),
    };
  });

  const clustered = clusterFindings(triaged, config);
  logger.debug('triage complete', { findings: triaged.length, clusters: clustered.clusters.length });
  return { findings: clustered.findings.sort(compareTriaged), clusters: clustered.clusters };
}
