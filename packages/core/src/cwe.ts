// packages/core/src/cwe.ts
import fs from 'node:fs';
import { ConfigurationError, errorMessage } from './errors.js';
import { asArray, asRecord, asString, asStringList, isRecord } from './json.js';

export const UNKNOWN_CATEGORY = 'CWE-UNKNOWN';

export interface CweGuidance {
  name: string;
  impact: string;
  exploit: string;
  fix: string;
}

export interface CweEntry extends CweGuidance {
  id: string;
  /** Coarse grouping used for classifier routing, e.g. sql-injection. */
  family: string;
  keywords: string[];
}

export interface CweCatalog {
  fallback: CweGuidance;
  entries: CweEntry[];
  byId: Map<string, CweEntry>;
}

const BUNDLED_CATALOG = new URL('../data/cwe-catalog.json', import.meta.url);

export function normalizeKeywordText(s: string): string {
  return String(s || '')
    .toLowerCase()
    .replace(/[_./-]+/g, ' ')
    .replace(/[^a-z0-9\s]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Accepts 89, "89", "CWE-89", "cwe-89: Improper Neutralization ..." */
export function normalizeCweId(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) return `CWE-${value}`;
  if (typeof value !== 'string') return undefined;
  const v = value.trim();
  const prefixed = /cwe[-_ ]?(\d+)/i.exec(v);
  if (prefixed) return `CWE-${Number(prefixed[1])}`;
  if (/^\d+$/.test(v) && Number(v) > 0) return `CWE-${Number(v)}`;
  return undefined;
}

function parseGuidance(value: unknown, where: string): CweGuidance {
  const rec = asRecord(value);
  const guidance = {
    name: asString(rec.name),
    impact: asString(rec.impact),
    exploit: asString(rec.exploit),
    fix: asString(rec.fix),
  };
  if (!guidance.name || !guidance.impact || !guidance.fix) {
    throw new ConfigurationError(`CWE catalog entry ${where} needs name, impact and fix`);
  }
  return guidance;
}

export function parseCweCatalog(data: unknown): CweCatalog {
  if (!isRecord(data)) throw new ConfigurationError('CWE catalog must be a JSON object');

  const entries: CweEntry[] = [];
  const byId = new Map<string, CweEntry>();
  for (const raw of asArray(data.entries)) {
    const rec = asRecord(raw);
    const id = normalizeCweId(rec.id);
    if (!id) throw new ConfigurationError(`CWE catalog entry has an invalid id: ${JSON.stringify(rec.id)}`);
    const entry: CweEntry = {
      id,
      family: asString(rec.family, 'other'),
      keywords: asStringList(rec.keywords).map(normalizeKeywordText).filter(Boolean),
      ...parseGuidance(rec, id),
    };
    entries.push(entry);
    byId.set(id, entry);
  }

  return { fallback: parseGuidance(data.default, 'default'), entries, byId };
}

export function loadCweCatalog(file: string | URL = BUNDLED_CATALOG): CweCatalog {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read CWE catalog ${String(file)}: ${errorMessage(error)}`, { cause: error });
  }
  const data: unknown = JSON.parse(text);
  return parseCweCatalog(data);
}

let bundled: CweCatalog | undefined;

export function defaultCweCatalog(): CweCatalog {
  bundled ??= loadCweCatalog();
  return bundled;
}

export function lookupCwe(category: string, catalog: CweCatalog = defaultCweCatalog()): CweEntry | undefined {
  return catalog.byId.get(category);
}

export function weaknessFamily(category: string, catalog: CweCatalog = defaultCweCatalog()): string | undefined {
  return lookupCwe(category, catalog)?.family;
}

export function guidanceFor(category: string, catalog: CweCatalog = defaultCweCatalog()): CweGuidance {
  return lookupCwe(category, catalog) ?? catalog.fallback;
}

/**
 * Picks a category from tool hints first, then from keywords in the rule id
 * and message. Hints that the catalog knows win over unknown ones.
 */
export function inferCategory(
  hints: readonly string[] | undefined,
  text: string,
  catalog: CweCatalog = defaultCweCatalog()
): string {
  const ids = (hints ?? []).map(normalizeCweId).filter((id): id is string => Boolean(id));
  const known = ids.find((id) => catalog.byId.has(id));
  if (known) return known;
  if (ids.length) return ids[0];

  const haystack = ` ${normalizeKeywordText(text)} `;
  for (const entry of catalog.entries) {
    if (entry.keywords.some((kw) => haystack.includes(` ${kw} `))) return entry.id;
  }
  return UNKNOWN_CATEGORY;
}
