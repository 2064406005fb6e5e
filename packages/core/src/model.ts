// packages/core/src/model.ts
import crypto from 'node:crypto';

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info';
export type Confidence = 'high' | 'medium' | 'low';

export const SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info'];
export const CONFIDENCES: readonly Confidence[] = ['high', 'medium', 'low'];

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 5,
  high: 4,
  medium: 3,
  low: 2,
  info: 1,
};

export const CONFIDENCE_RANK: Record<Confidence, number> = {
  high: 3,
  medium: 2,
  low: 1,
};

export function isSeverity(v: unknown): v is Severity {
  return typeof v === 'string' && (SEVERITIES as readonly string[]).includes(v);
}

export function isConfidence(v: unknown): v is Confidence {
  return typeof v === 'string' && (CONFIDENCES as readonly string[]).includes(v);
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

export function maxConfidence(a: Confidence, b: Confidence): Confidence {
  return CONFIDENCE_RANK[a] >= CONFIDENCE_RANK[b] ? a : b;
}

export function atLeastSeverity(value: Severity, floor: Severity): boolean {
  return SEVERITY_RANK[value] >= SEVERITY_RANK[floor];
}

/**
 * Scanner-native output before normalization. Adapters build these and hand
 * them to the orchestrator; nothing keeps them after normalization.
 */
export interface RawFinding {
  readonly tool: string;
  readonly ruleId: string;
  readonly message: string;
  /** Absolute, or relative to the scan root. */
  readonly filePath: string;
  readonly line: number;
  readonly endLine?: number;
  readonly column?: number;
  /** Tool vocabulary: ERROR, WARNING, HIGH, ... */
  readonly severity: string;
  readonly snippet?: string;
  readonly cwe?: readonly string[];
  readonly confidence?: string;
  readonly references?: readonly string[];
}

export interface SourceRef {
  tool: string;
  ruleId: string;
  severity: Severity;
  confidence: Confidence;
  line: number;
  message: string;
}

export interface FindingLocation {
  filePath: string;
  startLine: number;
  endLine: number;
  column?: number;
}

export interface UnifiedFinding {
  fingerprint: string;
  category: string;
  location: FindingLocation;
  severity: Severity;
  confidence: Confidence;
  sources: SourceRef[];
  rawMessage: string;
  snippet?: string;
  references: string[];
}

export type VerifyDownloadsMode = 'off' | 'warn' | 'strict';

export interface TriageConfig {
  minFileClusterSize: number;
  minPatternClusterSize: number;
  explanationMaxLength: number;
  /** Replaces the bundled risk table. */
  riskTablePath?: string;
}

export interface ScanConfig {
  adapters: string[];
  timeoutSec: number;
  /** Wall-clock budget for the whole run. Unset means the sum of adapter timeouts bounds it. */
  runTimeoutSec?: number;
  maxConcurrency: number;
  include: string[];
  exclude: string[];
  severityFloor: Severity;
  lineTolerance: number;
  cacheDir?: string;
  allowDownload: boolean;
  verifyDownloads: VerifyDownloadsMode;
  redact: boolean;
  snapshotPath?: string;
  adapterOptions: Record<string, Record<string, unknown>>;
  triage: TriageConfig;
}

export type AdapterStatus = 'ok' | 'skipped' | 'failed' | 'timeout';

export interface AdapterExecutionMeta {
  adapter: string;
  displayName: string;
  version?: string;
  status: AdapterStatus;
  durationMs: number;
  findingCount: number;
  errorMessage?: string;
  installHint?: string;
  warnings: string[];
}

/**
 * COMPLETED: every adapter that could run finished.
 * PARTIAL: some finished, some failed or timed out.
 * FAILED: nothing finished and at least one adapter failed.
 */
export type ScanStatus = 'COMPLETED' | 'PARTIAL' | 'FAILED';

export function stableHash(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex').slice(0, 16);
}

export function toPosixPath(p: string): string {
  return String(p || '').replace(/\\/g, '/');
}

export function compareSources(a: SourceRef, b: SourceRef): number {
  const tool = a.tool.localeCompare(b.tool);
  if (tool !== 0) return tool;
  return a.ruleId.localeCompare(b.ruleId);
}

export function sortFindingsDeterministically(findings: readonly UnifiedFinding[]): UnifiedFinding[] {
  return [...findings].sort((a, b) => {
    const sev = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
    if (sev !== 0) return sev;

    const file = a.location.filePath.localeCompare(b.location.filePath);
    if (file !== 0) return file;

    const line = a.location.startLine - b.location.startLine;
    if (line !== 0) return line;

    return a.fingerprint.localeCompare(b.fingerprint);
  });
}
