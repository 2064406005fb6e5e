// packages/triage/src/risk.ts
import fs from 'node:fs';
import {
  ConfigurationError,
  SEVERITIES,
  asRecord,
  errorMessage,
  isRecord,
  type Severity,
  type UnifiedFinding,
} from '@vulntriage/core';
import type { RiskScore } from './types.js';

/**
 * Raptor-style risk table: score = impact × exploitability / detection time.
 * Impact is keyed by severity; exploitability by category with a severity
 * fallback; detection time (days) by category with a default and a floor.
 */
export interface RiskTable {
  impact: Record<Severity, number>;
  exploitability: { bySeverity: Record<Severity, number>; byCategory: Record<string, number> };
  detectionTime: { defaultDays: number; floorDays: number; byCategory: Record<string, number> };
}

const BUNDLED_TABLE = new URL('../data/risk-table.json', import.meta.url);

const SCALE_MIN = 1;
const SCALE_MAX = 10;

function clamp(n: number): number {
  return Math.min(SCALE_MAX, Math.max(SCALE_MIN, n));
}

function positive(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`Risk table ${where} must be a positive number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function bySeverity(value: unknown, where: string): Record<Severity, number> {
  const rec = asRecord(value);
  const out: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const severity of SEVERITIES) out[severity] = positive(rec[severity], `${where}.${severity}`);
  return out;
}

function byCategory(value: unknown, where: string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, n] of Object.entries(asRecord(value))) out[key] = positive(n, `${where}.${key}`);
  return out;
}

export function parseRiskTable(data: unknown): RiskTable {
  if (!isRecord(data)) throw new ConfigurationError('Risk table must be a JSON object');
  const exploitability = asRecord(data.exploitability);
  const detection = asRecord(data.detectionTime);

  return {
    impact: bySeverity(data.impact, 'impact'),
    exploitability: {
      bySeverity: bySeverity(exploitability.bySeverity, 'exploitability.bySeverity'),
      byCategory: byCategory(exploitability.byCategory, 'exploitability.byCategory'),
    },
    detectionTime: {
      defaultDays: positive(detection.defaultDays, 'detectionTime.defaultDays'),
      floorDays: positive(detection.floorDays, 'detectionTime.floorDays'),
      byCategory: byCategory(detection.byCategory, 'detectionTime.byCategory'),
    },
  };
}

export function loadRiskTable(file: string | URL = BUNDLED_TABLE): RiskTable {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read risk table ${String(file)}: ${errorMessage(error)}`, { cause: error });
  }
  return parseRiskTable(data);
}

let bundled: RiskTable | undefined;

export function defaultRiskTable(): RiskTable {
  bundled ??= loadRiskTable();
  return bundled;
}

/** Always finite and positive. Independent of the verdict. */
export function scoreRisk(finding: Pick<UnifiedFinding, 'severity' | 'category'>, table: RiskTable = defaultRiskTable()): RiskScore {
  const impact = clamp(table.impact[finding.severity]);
  const exploitability = clamp(
    table.exploitability.byCategory[finding.category] ?? table.exploitability.bySeverity[finding.severity]
  );
  const detectionTime = table.detectionTime.byCategory[finding.category] ?? table.detectionTime.defaultDays;

  return {
    impact,
    exploitability,
    detectionTime,
    score: (impact * exploitability) / Math.max(detectionTime, table.detectionTime.floorDays),
  };
}
