// packages/pipeline/src/report.ts
import path from 'node:path';
import {
  readFileLines,
  summarize,
  type AdapterExecutionMeta,
  type FindingSummary,
  type ScanStatus,
  type Severity,
} from '@vulntriage/core';
import { countByVerdict, type Cluster, type SourceReader, type TriagedFinding, type Verdict } from '@vulntriage/triage';

export interface ScanMeta {
  /** Absolute, posix separators. */
  target: string;
  scanRoot: string;
  generatedAt: string;
  durationMs: number;
  adapters: string[];
  severityFloor: Severity;
  scanStatus: ScanStatus;
  redacted: boolean;
  engines: AdapterExecutionMeta[];
}

export interface ScanSummary extends FindingSummary {
  byVerdict: Record<Verdict, number>;
  clusters: number;
}

export interface ScanReport {
  meta: ScanMeta;
  summary: ScanSummary;
  /** Risk score descending. */
  findings: TriagedFinding[];
  clusters: Cluster[];
}

export function summarizeReport(
  findings: readonly TriagedFinding[],
  clusters: readonly Cluster[],
  engines: readonly AdapterExecutionMeta[]
): ScanSummary {
  return {
    ...summarize(
      findings.map((f) => f.finding),
      engines
    ),
    byVerdict: countByVerdict(findings),
    clusters: clusters.length,
  };
}

/** Whole-file reader for triage pattern detection, cached per path. */
export function createSourceReader(scanRoot: string): SourceReader {
  const cache = new Map<string, string | undefined>();
  return (filePath) => {
    if (!cache.has(filePath)) {
      const abs = path.isAbsolute(filePath) ? filePath : path.join(scanRoot, filePath);
      cache.set(filePath, readFileLines(abs)?.join('\n'));
    }
    return cache.get(filePath);
  };
}

/** True positives, by reference, in report order. */
export function selectForFix(findings: readonly TriagedFinding[]): TriagedFinding[] {
  return findings.filter((f) => f.classification.verdict === 'true_positive');
}
