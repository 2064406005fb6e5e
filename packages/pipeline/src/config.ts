// packages/pipeline/src/config.ts
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import {
  ConfigurationError,
  DEFAULT_SCAN_CONFIG,
  errorMessage,
  isRecord,
  isSeverity,
  type ScanConfig,
  type Severity,
  type TriageConfig,
  type VerifyDownloadsMode,
} from '@vulntriage/core';

export const CONFIG_FILE_NAME = 'vulntriage.yml';

const VERIFY_MODES: readonly VerifyDownloadsMode[] = ['off', 'warn', 'strict'];

const SCAN_KEYS = new Set<string>([
  'adapters',
  'timeoutSec',
  'runTimeoutSec',
  'maxConcurrency',
  'include',
  'exclude',
  'severityFloor',
  'lineTolerance',
  'cacheDir',
  'allowDownload',
  'verifyDownloads',
  'redact',
  'snapshotPath',
  'adapterOptions',
  'triage',
]);

const TRIAGE_KEYS = new Set<string>(['minFileClusterSize', 'minPatternClusterSize', 'explanationMaxLength', 'riskTablePath']);

function stringList(value: unknown, key: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return [value];
  if (Array.isArray(value) && value.every((entry) => typeof entry === 'string')) return value;
  throw new ConfigurationError(`${key} must be a string or a list of strings`);
}

/** Comma/whitespace separated string or a list; lowercased and deduped. */
export function parseListOpt(value: unknown, defaults: readonly string[], key: string): string[] {
  const entries = stringList(value, key);
  if (!entries) return [...defaults];
  const parsed = entries
    .flatMap((entry) => entry.split(/[\s,]+/))
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean);
  return [...new Set(parsed)];
}

/** Glob patterns are taken verbatim: a string is one pattern. */
export function parseGlobListOpt(value: unknown, defaults: readonly string[], key: string): string[] {
  const entries = stringList(value, key);
  if (!entries) return [...defaults];
  return [...new Set(entries.map((entry) => entry.trim()).filter(Boolean))];
}

export function parseBooleanOpt(value: unknown, defaultValue: boolean, key: string): boolean {
  if (value === undefined || value === null) return defaultValue;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  }
  throw new ConfigurationError(`${key} must be a boolean, got ${JSON.stringify(value)}`);
}

export function parseNumberOpt(
  value: unknown,
  defaultValue: number,
  key: string,
  opts: { integer?: boolean; min?: number; exclusiveMin?: boolean } = {}
): number {
  if (value === undefined || value === null) return defaultValue;
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  const min = opts.min ?? 0;
  const belowMin = opts.exclusiveMin ? n <= min : n < min;
  if (!Number.isFinite(n) || belowMin || (opts.integer && !Number.isInteger(n))) {
    const kind = opts.integer ? 'an integer' : 'a number';
    const bound = opts.exclusiveMin ? `> ${min}` : `>= ${min}`;
    throw new ConfigurationError(`${key} must be ${kind} ${bound}, got ${JSON.stringify(value)}`);
  }
  return n;
}

function parseOptionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ConfigurationError(`${key} must be a string`);
  return value.trim() || undefined;
}

function parseSeverity(value: unknown, defaultValue: Severity): Severity {
  if (value === undefined || value === null) return defaultValue;
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : value;
  if (!isSeverity(normalized)) {
    throw new ConfigurationError(`severityFloor must be one of critical, high, medium, low, info; got ${JSON.stringify(value)}`);
  }
  return normalized;
}

function parseVerifyMode(value: unknown, defaultValue: VerifyDownloadsMode): VerifyDownloadsMode {
  if (value === undefined || value === null) return defaultValue;
  const mode = VERIFY_MODES.find((m) => typeof value === 'string' && m === value.trim().toLowerCase());
  if (!mode) throw new ConfigurationError(`verifyDownloads must be one of ${VERIFY_MODES.join(', ')}; got ${JSON.stringify(value)}`);
  return mode;
}

function parseAdapterOptions(value: unknown): Record<string, Record<string, unknown>> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigurationError('adapterOptions must be a mapping of adapter name to options');
  const out: Record<string, Record<string, unknown>> = {};
  for (const [adapter, options] of Object.entries(value)) {
    if (options === null) continue;
    if (!isRecord(options)) throw new ConfigurationError(`adapterOptions.${adapter} must be a mapping`);
    out[adapter.toLowerCase()] = { ...options };
  }
  return out;
}

function rejectUnknownKeys(raw: Record<string, unknown>, known: ReadonlySet<string>, where: string): void {
  const unknown = Object.keys(raw).filter((key) => !known.has(key));
  if (unknown.length) {
    throw new ConfigurationError(`Unknown ${where} key${unknown.length > 1 ? 's' : ''}: ${unknown.join(', ')}`);
  }
}

function resolveTriage(value: unknown): TriageConfig {
  const defaults = DEFAULT_SCAN_CONFIG.triage;
  if (value === undefined || value === null) return { ...defaults };
  if (!isRecord(value)) throw new ConfigurationError('triage must be a mapping');
  rejectUnknownKeys(value, TRIAGE_KEYS, 'triage');

  const riskTablePath = parseOptionalString(value.riskTablePath, 'triage.riskTablePath');
  return {
    minFileClusterSize: parseNumberOpt(value.minFileClusterSize, defaults.minFileClusterSize, 'triage.minFileClusterSize', {
      integer: true,
      min: 1,
    }),
    minPatternClusterSize: parseNumberOpt(
      value.minPatternClusterSize,
      defaults.minPatternClusterSize,
      'triage.minPatternClusterSize',
      { integer: true, min: 1 }
    ),
    explanationMaxLength: parseNumberOpt(value.explanationMaxLength, defaults.explanationMaxLength, 'triage.explanationMaxLength', {
      integer: true,
      min: 1,
    }),
    ...(riskTablePath ? { riskTablePath } : {}),
  };
}

/**
 * Validates a raw config object (parsed YAML or hand-built) and fills in
 * defaults. Adapter names are checked against the registry by the
 * orchestrator, not here, so custom adapters can be configured.
 */
export function resolveConfig(raw: unknown = {}): ScanConfig {
  if (raw === null || raw === undefined) raw = {};
  if (!isRecord(raw)) throw new ConfigurationError('Config must be a mapping');
  rejectUnknownKeys(raw, SCAN_KEYS, 'config');
  const d = DEFAULT_SCAN_CONFIG;

  const adapters = parseListOpt(raw.adapters, d.adapters, 'adapters');
  if (!adapters.length) throw new ConfigurationError('adapters must name at least one adapter');

  const runTimeoutSec =
    raw.runTimeoutSec === undefined || raw.runTimeoutSec === null
      ? undefined
      : parseNumberOpt(raw.runTimeoutSec, 0, 'runTimeoutSec', { min: 0, exclusiveMin: true });
  const cacheDir = parseOptionalString(raw.cacheDir, 'cacheDir');
  const snapshotPath = parseOptionalString(raw.snapshotPath, 'snapshotPath');

  return {
    adapters,
    timeoutSec: parseNumberOpt(raw.timeoutSec, d.timeoutSec, 'timeoutSec', { min: 0, exclusiveMin: true }),
    ...(runTimeoutSec !== undefined ? { runTimeoutSec } : {}),
    maxConcurrency: parseNumberOpt(raw.maxConcurrency, d.maxConcurrency, 'maxConcurrency', { integer: true, min: 1 }),
    include: parseGlobListOpt(raw.include, d.include, 'include'),
    exclude: parseGlobListOpt(raw.exclude, d.exclude, 'exclude'),
    severityFloor: parseSeverity(raw.severityFloor, d.severityFloor),
    lineTolerance: parseNumberOpt(raw.lineTolerance, d.lineTolerance, 'lineTolerance', { integer: true, min: 0 }),
    ...(cacheDir ? { cacheDir } : {}),
    allowDownload: parseBooleanOpt(raw.allowDownload, d.allowDownload, 'allowDownload'),
    verifyDownloads: parseVerifyMode(raw.verifyDownloads, d.verifyDownloads),
    redact: parseBooleanOpt(raw.redact, d.redact, 'redact'),
    ...(snapshotPath ? { snapshotPath } : {}),
    adapterOptions: parseAdapterOptions(raw.adapterOptions),
    triage: resolveTriage(raw.triage),
  };
}

function resolveRelative(config: ScanConfig, baseDir: string): ScanConfig {
  const abs = (p: string) => (path.isAbsolute(p) ? p : path.resolve(baseDir, p));
  const { riskTablePath } = config.triage;
  return {
    ...config,
    ...(config.cacheDir ? { cacheDir: abs(config.cacheDir) } : {}),
    ...(config.snapshotPath ? { snapshotPath: abs(config.snapshotPath) } : {}),
    triage: { ...config.triage, ...(riskTablePath ? { riskTablePath: abs(riskTablePath) } : {}) },
  };
}

/**
 * Reads `configPath`, or vulntriage.yml in `cwd` when it exists, and merges
 * it over the defaults. Relative paths in the file resolve against the
 * file's directory. An explicit path that does not exist is an error.
 */
export function loadConfig(configPath?: string, cwd = process.cwd()): ScanConfig {
  const candidate = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(candidate)) {
    if (configPath) throw new ConfigurationError(`Config file not found: ${candidate}`);
    return resolveConfig({});
  }

  let data: unknown;
  try {
    data = YAML.parse(fs.readFileSync(candidate, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${candidate}: ${errorMessage(error)}`, { cause: error });
  }
  return resolveRelative(resolveConfig(data ?? {}), path.dirname(candidate));
}
