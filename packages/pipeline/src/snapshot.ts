// packages/pipeline/src/snapshot.ts
import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigurationError,
  CONFIDENCES,
  SEVERITIES,
  asRecord,
  errorMessage,
  isRecord,
  snippetFromLines,
  stableHash,
  type AdapterExecutionMeta,
  type AdapterStatus,
  type SourceRef,
  type TriageConfig,
  type UnifiedFinding,
} from '@vulntriage/core';
import {
  VERDICTS,
  triage,
  type Classification,
  type Cluster,
  type ClusterStrategy,
  type Explanation,
  type RiskScore,
  type SourceReader,
  type TriageDeps,
  type TriagedFinding,
} from '@vulntriage/triage';
import { createSourceReader, summarizeReport, type ScanMeta, type ScanReport } from './report.js';

export const SNAPSHOT_SCHEMA_VERSION = 1;

export interface ScanSnapshot {
  schemaVersion: typeof SNAPSHOT_SCHEMA_VERSION;
  savedAt: string;
  redacted: boolean;
  report: ScanReport;
}

export interface SnapshotDiff {
  /** In current only. */
  introduced: TriagedFinding[];
  /** In previous only. */
  resolved: TriagedFinding[];
  /** In both; the current entry. */
  persisting: TriagedFinding[];
}

const ADAPTER_STATUSES: readonly AdapterStatus[] = ['ok', 'skipped', 'failed', 'timeout'];
const SCAN_STATUSES = ['COMPLETED', 'PARTIAL', 'FAILED'] as const;
const STRATEGIES: readonly ClusterStrategy[] = ['category-file', 'category-pattern'];

const REDACTED_SNIPPET = /^\[redacted sha256:[0-9a-f]{16}\]$/;

export function redactSnippet(snippet: string): string {
  return `[redacted sha256:${stableHash(snippet)}]`;
}

export function isRedactedSnippet(snippet: string | undefined): boolean {
  return snippet !== undefined && REDACTED_SNIPPET.test(snippet);
}

/**
 * Classifier evidence for stored findings. Redacted snippets are read back
 * from the source at the finding location.
 */
function evidenceReader(readSource: SourceReader, redacted: boolean): (finding: UnifiedFinding) => string | undefined {
  return (finding) => {
    if (!redacted && !isRedactedSnippet(finding.snippet)) return finding.snippet ?? '';
    const source = readSource(finding.location.filePath);
    if (source === undefined) return undefined;
    const { startLine, endLine } = finding.location;
    return snippetFromLines(source.split(/\r?\n/), startLine, endLine) ?? '';
  };
}

/** Copy of the report with every snippet replaced by its hash. */
export function redactReport(report: ScanReport): ScanReport {
  return {
    ...report,
    meta: { ...report.meta, redacted: true },
    findings: report.findings.map((item) =>
      item.finding.snippet === undefined
        ? item
        : { ...item, finding: { ...item.finding, snippet: redactSnippet(item.finding.snippet) } }
    ),
  };
}

/**
 * Written to a temp file beside the target and renamed into place, so a
 * reader never sees a partial snapshot.
 */
export function writeSnapshot(
  filePath: string,
  report: ScanReport,
  opts: { redact?: boolean; now?: () => Date } = {}
): ScanSnapshot {
  const redacted = opts.redact ?? false;
  const snapshot: ScanSnapshot = {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    savedAt: (opts.now ?? (() => new Date()))().toISOString(),
    redacted,
    report: redacted ? redactReport(report) : report,
  };

  const target = path.resolve(filePath);
  const tmp = `${target}.${process.pid}-${crypto.randomBytes(4).toString('hex')}.tmp`;
  fs.mkdirSync(path.dirname(target), { recursive: true });
  try {
    fs.writeFileSync(tmp, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
    fs.renameSync(tmp, target);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw error;
  }
  return snapshot;
}

export function readSnapshot(filePath: string): ScanSnapshot {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read snapshot ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return parseSnapshot(data, filePath);
}

export function parseSnapshot(data: unknown, source = 'snapshot'): ScanSnapshot {
  const root = asRecord(data);
  if (root.schemaVersion !== SNAPSHOT_SCHEMA_VERSION) {
    throw new ConfigurationError(
      `Unsupported snapshot schema version ${JSON.stringify(root.schemaVersion)} in ${source} (expected ${SNAPSHOT_SCHEMA_VERSION})`
    );
  }
  const r = new FieldReader(source);
  return {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    savedAt: r.string(root, 'savedAt'),
    redacted: r.boolean(root, 'redacted'),
    report: r.report(r.record(root, 'report')),
  };
}

/**
 * Re-runs triage on the stored findings. Fingerprints and finding objects are
 * kept; classification, risk, clusters and explanations are recomputed.
 * Sources are read from meta.scanRoot unless `deps.readSource` is given.
 */
export function retriage(snapshot: ScanSnapshot, config: TriageConfig, deps: TriageDeps = {}): ScanReport {
  const { meta } = snapshot.report;
  const readSource = deps.readSource ?? createSourceReader(meta.scanRoot);
  const result = triage(
    snapshot.report.findings.map((item) => item.finding),
    config,
    { ...deps, readSource, codeFor: deps.codeFor ?? evidenceReader(readSource, snapshot.redacted) }
  );
  return {
    meta,
    summary: summarizeReport(result.findings, result.clusters, meta.engines),
    findings: result.findings,
    clusters: result.clusters,
  };
}

export function compareSnapshots(previous: ScanSnapshot, current: ScanSnapshot): SnapshotDiff {
  const before = new Set(previous.report.findings.map((f) => f.finding.fingerprint));
  const after = new Set(current.report.findings.map((f) => f.finding.fingerprint));
  return {
    introduced: current.report.findings.filter((f) => !before.has(f.finding.fingerprint)),
    resolved: previous.report.findings.filter((f) => !after.has(f.finding.fingerprint)),
    persisting: current.report.findings.filter((f) => before.has(f.finding.fingerprint)),
  };
}

/** Narrows parsed JSON field by field; every failure names the field path. */
class FieldReader {
  constructor(private readonly origin: string) {}

  private fail(where: string, expected: string): never {
    throw new ConfigurationError(`Malformed snapshot ${this.origin}: ${where} must be ${expected}`);
  }

  record(rec: Record<string, unknown>, key: string, where = key): Record<string, unknown> {
    const value = rec[key];
    return isRecord(value) ? value : this.fail(where, 'an object');
  }

  string(rec: Record<string, unknown>, key: string, where = key): string {
    const value = rec[key];
    return typeof value === 'string' ? value : this.fail(where, 'a string');
  }

  optionalString(rec: Record<string, unknown>, key: string, where = key): string | undefined {
    return rec[key] === undefined ? undefined : this.string(rec, key, where);
  }

  number(rec: Record<string, unknown>, key: string, where = key): number {
    const value = rec[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : this.fail(where, 'a finite number');
  }

  boolean(rec: Record<string, unknown>, key: string, where = key): boolean {
    const value = rec[key];
    return typeof value === 'boolean' ? value : this.fail(where, 'a boolean');
  }

  oneOf<T extends string>(rec: Record<string, unknown>, key: string, allowed: readonly T[], where = key): T {
    const value = rec[key];
    return allowed.find((a) => a === value) ?? this.fail(where, `one of ${allowed.join(', ')}`);
  }

  list<T>(rec: Record<string, unknown>, key: string, where: string, parse: (item: unknown, where: string) => T): T[] {
    const value = rec[key];
    if (!Array.isArray(value)) return this.fail(where, 'an array');
    return value.map((item, i) => parse(item, `${where}[${i}]`));
  }

  strings(rec: Record<string, unknown>, key: string, where = key): string[] {
    return this.list(rec, key, where, (item, at) => (typeof item === 'string' ? item : this.fail(at, 'a string')));
  }

  private object(item: unknown, where: string): Record<string, unknown> {
    return isRecord(item) ? item : this.fail(where, 'an object');
  }

  report(rec: Record<string, unknown>): ScanReport {
    const meta = this.meta(this.record(rec, 'meta', 'report.meta'));
    const findings = this.list(rec, 'findings', 'report.findings', (item, at) => this.triaged(this.object(item, at), at));
    const clusters = this.list(rec, 'clusters', 'report.clusters', (item, at) => this.cluster(this.object(item, at), at));
    return { meta, summary: summarizeReport(findings, clusters, meta.engines), findings, clusters };
  }

  private meta(rec: Record<string, unknown>): ScanMeta {
    const w = 'report.meta';
    return {
      target: this.string(rec, 'target', `${w}.target`),
      scanRoot: this.string(rec, 'scanRoot', `${w}.scanRoot`),
      generatedAt: this.string(rec, 'generatedAt', `${w}.generatedAt`),
      durationMs: this.number(rec, 'durationMs', `${w}.durationMs`),
      adapters: this.strings(rec, 'adapters', `${w}.adapters`),
      severityFloor: this.oneOf(rec, 'severityFloor', SEVERITIES, `${w}.severityFloor`),
      scanStatus: this.oneOf(rec, 'scanStatus', SCAN_STATUSES, `${w}.scanStatus`),
      redacted: this.boolean(rec, 'redacted', `${w}.redacted`),
      engines: this.list(rec, 'engines', `${w}.engines`, (item, at) => this.engine(this.object(item, at), at)),
    };
  }

  private engine(rec: Record<string, unknown>, w: string): AdapterExecutionMeta {
    const version = this.optionalString(rec, 'version', `${w}.version`);
    const failure = this.optionalString(rec, 'errorMessage', `${w}.errorMessage`);
    const installHint = this.optionalString(rec, 'installHint', `${w}.installHint`);
    return {
      adapter: this.string(rec, 'adapter', `${w}.adapter`),
      displayName: this.string(rec, 'displayName', `${w}.displayName`),
      ...(version !== undefined ? { version } : {}),
      status: this.oneOf(rec, 'status', ADAPTER_STATUSES, `${w}.status`),
      durationMs: this.number(rec, 'durationMs', `${w}.durationMs`),
      findingCount: this.number(rec, 'findingCount', `${w}.findingCount`),
      ...(failure !== undefined ? { errorMessage: failure } : {}),
      ...(installHint !== undefined ? { installHint } : {}),
      warnings: this.strings(rec, 'warnings', `${w}.warnings`),
    };
  }

  private sourceRef(rec: Record<string, unknown>, w: string): SourceRef {
    return {
      tool: this.string(rec, 'tool', `${w}.tool`),
      ruleId: this.string(rec, 'ruleId', `${w}.ruleId`),
      severity: this.oneOf(rec, 'severity', SEVERITIES, `${w}.severity`),
      confidence: this.oneOf(rec, 'confidence', CONFIDENCES, `${w}.confidence`),
      line: this.number(rec, 'line', `${w}.line`),
      message: this.string(rec, 'message', `${w}.message`),
    };
  }

  private finding(rec: Record<string, unknown>, w: string): UnifiedFinding {
    const loc = this.record(rec, 'location', `${w}.location`);
    const column = loc.column === undefined ? undefined : this.number(loc, 'column', `${w}.location.column`);
    const snippet = this.optionalString(rec, 'snippet', `${w}.snippet`);
    return {
      fingerprint: this.string(rec, 'fingerprint', `${w}.fingerprint`),
      category: this.string(rec, 'category', `${w}.category`),
      location: {
        filePath: this.string(loc, 'filePath', `${w}.location.filePath`),
        startLine: this.number(loc, 'startLine', `${w}.location.startLine`),
        endLine: this.number(loc, 'endLine', `${w}.location.endLine`),
        ...(column !== undefined ? { column } : {}),
      },
      severity: this.oneOf(rec, 'severity', SEVERITIES, `${w}.severity`),
      confidence: this.oneOf(rec, 'confidence', CONFIDENCES, `${w}.confidence`),
      sources: this.list(rec, 'sources', `${w}.sources`, (item, at) => this.sourceRef(this.object(item, at), at)),
      rawMessage: this.string(rec, 'rawMessage', `${w}.rawMessage`),
      ...(snippet !== undefined ? { snippet } : {}),
      references: this.strings(rec, 'references', `${w}.references`),
    };
  }

  private classification(rec: Record<string, unknown>, w: string): Classification {
    return {
      verdict: this.oneOf(rec, 'verdict', VERDICTS, `${w}.verdict`),
      confidence: this.number(rec, 'confidence', `${w}.confidence`),
      classifier: this.string(rec, 'classifier', `${w}.classifier`),
      reasoning: this.string(rec, 'reasoning', `${w}.reasoning`),
    };
  }

  private risk(rec: Record<string, unknown>, w: string): RiskScore {
    return {
      impact: this.number(rec, 'impact', `${w}.impact`),
      exploitability: this.number(rec, 'exploitability', `${w}.exploitability`),
      detectionTime: this.number(rec, 'detectionTime', `${w}.detectionTime`),
      score: this.number(rec, 'score', `${w}.score`),
    };
  }

  private explanation(rec: Record<string, unknown>, w: string): Explanation {
    const howToExploit = this.optionalString(rec, 'howToExploit', `${w}.howToExploit`);
    return {
      summary: this.string(rec, 'summary', `${w}.summary`),
      what: this.string(rec, 'what', `${w}.what`),
      whyItMatters: this.string(rec, 'whyItMatters', `${w}.whyItMatters`),
      ...(howToExploit !== undefined ? { howToExploit } : {}),
      howToFix: this.string(rec, 'howToFix', `${w}.howToFix`),
    };
  }

  private triaged(rec: Record<string, unknown>, w: string): TriagedFinding {
    const links = this.record(rec, 'clusters', `${w}.clusters`);
    const file = this.optionalString(links, 'file', `${w}.clusters.file`);
    const patternLink = this.optionalString(links, 'pattern', `${w}.clusters.pattern`);
    const pattern = this.optionalString(rec, 'pattern', `${w}.pattern`);
    return {
      finding: this.finding(this.record(rec, 'finding', `${w}.finding`), `${w}.finding`),
      classification: this.classification(this.record(rec, 'classification', `${w}.classification`), `${w}.classification`),
      risk: this.risk(this.record(rec, 'risk', `${w}.risk`), `${w}.risk`),
      clusters: { ...(file !== undefined ? { file } : {}), ...(patternLink !== undefined ? { pattern: patternLink } : {}) },
      ...(pattern !== undefined ? { pattern } : {}),
      explanation: this.explanation(this.record(rec, 'explanation', `${w}.explanation`), `${w}.explanation`),
    };
  }

  private cluster(rec: Record<string, unknown>, w: string): Cluster {
    return {
      id: this.string(rec, 'id', `${w}.id`),
      strategy: this.oneOf(rec, 'strategy', STRATEGIES, `${w}.strategy`),
      category: this.string(rec, 'category', `${w}.category`),
      key: this.string(rec, 'key', `${w}.key`),
      members: this.strings(rec, 'members', `${w}.members`),
    };
  }
}
