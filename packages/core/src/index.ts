// packages/core/src/index.ts
import type { AdapterExecutionMeta, ScanConfig, ScanStatus, Severity, UnifiedFinding } from './model.js';

export * from './model.js';
export * from './errors.js';
export * from './logger.js';
export * from './json.js';
export * from './cwe.js';
export * from './normalize.js';
export * from './merge.js';

/**
 * Adapters shipped with the engines package, in their default run order.
 */
export const AVAILABLE_ADAPTERS = ['semgrep', 'bandit', 'gitleaks'] as const;
export type AdapterName = (typeof AVAILABLE_ADAPTERS)[number];

export const DEFAULT_ADAPTERS: readonly AdapterName[] = ['semgrep', 'bandit', 'gitleaks'];

export function isAdapterName(v: string): v is AdapterName {
  return (AVAILABLE_ADAPTERS as readonly string[]).includes(v);
}

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  adapters: [...DEFAULT_ADAPTERS],
  timeoutSec: 300,
  maxConcurrency: 4,
  include: [],
  exclude: [],
  severityFloor: 'info',
  lineTolerance: 2,
  allowDownload: true,
  verifyDownloads: 'strict',
  redact: false,
  adapterOptions: {},
  triage: {
    minFileClusterSize: 2,
    minPatternClusterSize: 2,
    explanationMaxLength: 500,
  },
};

/**
 * Derive scan completion from adapter meta.
 * - COMPLETED: at least one adapter ok AND none failed/timeout
 * - PARTIAL: at least one ok AND some failed/timeout
 * - FAILED: no adapter ok AND at least one failed/timeout
 *
 * All skipped (or nothing configured) counts as COMPLETED.
 */
export function deriveScanStatus(engines?: readonly AdapterExecutionMeta[]): ScanStatus {
  const list = engines ?? [];
  const ok = list.some((e) => e.status === 'ok');
  const bad = list.some((e) => e.status === 'failed' || e.status === 'timeout');

  if (ok && bad) return 'PARTIAL';
  if (!ok && bad) return 'FAILED';
  return 'COMPLETED';
}

export interface FindingSummary {
  totalFindings: number;
  bySeverity: Record<Severity, number>;
  byAdapter: Record<string, number>;
  scanStatus: ScanStatus;
}

export function summarize(
  findings: readonly UnifiedFinding[],
  engines: readonly AdapterExecutionMeta[] = []
): FindingSummary {
  const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const finding of findings) bySeverity[finding.severity] += 1;

  return {
    totalFindings: findings.length,
    bySeverity,
    byAdapter: Object.fromEntries(
      engines.map((entry) => [
        entry.adapter,
        findings.filter((finding) => finding.sources.some((source) => source.tool === entry.adapter)).length,
      ])
    ),
    scanStatus: deriveScanStatus(engines),
  };
}
