// packages/core/src/normalize.ts
import fs from 'node:fs';
import path from 'node:path';
import { inferCategory, type CweCatalog } from './cwe.js';
import {
  stableHash,
  toPosixPath,
  type Confidence,
  type RawFinding,
  type Severity,
  type UnifiedFinding,
} from './model.js';

export const DEFAULT_LINE_TOLERANCE = 2;
const MAX_SNIPPET_LINES = 5;
const MAX_READ_BYTES = 2 * 1024 * 1024;

export type LineReader = (absPath: string) => string[] | undefined;

export interface NormalizeOptions {
  scanRoot: string;
  /** Findings from different tools, of one category in one file, this many lines apart describe the same defect. */
  lineTolerance?: number;
  catalog?: CweCatalog;
  readLines?: LineReader;
}

export function normalizeSeverity(input: string | undefined, fallback: Severity = 'medium'): Severity {
  const key = String(input || '').trim().toLowerCase();
  if (key === 'critical' || key === 'blocker') return 'critical';
  if (key === 'high' || key === 'error' || key === 'severe') return 'high';
  if (key === 'medium' || key === 'moderate' || key === 'warning' || key === 'warn') return 'medium';
  if (key === 'low' || key === 'minor') return 'low';
  if (key === 'info' || key === 'informational' || key === 'note') return 'info';
  return fallback;
}

export function normalizeConfidence(input: string | undefined, fallback: Confidence = 'medium'): Confidence {
  const key = String(input || '').trim().toLowerCase();
  if (key === 'high' || key === 'certain') return 'high';
  if (key === 'medium' || key === 'moderate') return 'medium';
  if (key === 'low' || key === 'undefined') return 'low';
  return fallback;
}

/**
 * Scan-root relative POSIX path when the file is inside the root, absolute
 * POSIX path otherwise.
 */
export function normalizePathForFinding(filePath: string, scanRoot: string): string {
  const v = String(filePath || '').trim();
  if (!v) return '';

  const rootNorm = path.normalize(path.resolve(scanRoot));
  const absNorm = path.normalize(path.isAbsolute(v) ? v : path.resolve(rootNorm, v));
  const rel = path.relative(rootNorm, absNorm);

  if (rel && !rel.startsWith('..') && !path.isAbsolute(rel)) return toPosixPath(rel);
  if (!rel) return toPosixPath(path.basename(absNorm));
  return toPosixPath(absNorm);
}

export function normalizeSignalText(input: string): string {
  return String(input ?? '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
    .slice(0, 500);
}

export function findingFingerprint(filePath: string, category: string, anchor: string): string {
  return stableHash(`${toPosixPath(filePath)}|${category}|${anchor}`);
}

export const readFileLines: LineReader = (absPath) => {
  try {
    const stat = fs.statSync(absPath);
    if (!stat.isFile() || stat.size > MAX_READ_BYTES) return undefined;
    return fs.readFileSync(absPath, 'utf8').split(/\r?\n/);
  } catch {
    // unreadable or vanished: callers fall back to the tool snippet
    return undefined;
  }
};

interface Prepared {
  index: number;
  raw: RawFinding;
  filePath: string;
  category: string;
  line: number;
  anchor: string;
}

function comparePrepared(a: Prepared, b: Prepared): number {
  const line = a.line - b.line;
  if (line !== 0) return line;
  const tool = a.raw.tool.localeCompare(b.raw.tool);
  if (tool !== 0) return tool;
  const rule = a.raw.ruleId.localeCompare(b.raw.ruleId);
  if (rule !== 0) return rule;
  return a.anchor.localeCompare(b.anchor);
}

/**
 * Normalized text of the finding's own line. Repeats of the same text in one
 * file are numbered by how often it occurs above, which depends on the file
 * alone.
 */
function ownAnchor(line: number, snippet: string | undefined, normalizedLines: string[] | undefined): string {
  const text = normalizedLines?.[line - 1] ?? '';
  if (text) {
    let earlier = 0;
    for (let i = 0; i < line - 1; i++) if (normalizedLines?.[i] === text) earlier += 1;
    return earlier ? `${text}#${earlier}` : text;
  }
  return normalizeSignalText(snippet ?? '') || `line:${line}`;
}

interface MatchRoot {
  item: Prepared;
  tools: Set<string>;
}

/**
 * Cross-tool matching inside one (file, category) bucket. Findings are visited
 * in line order; one within the tolerance of an earlier root from another tool
 * takes the nearest such root's anchor. Roots keep their own anchor and take
 * at most one finding per tool, so matching is never transitive and separate
 * defects reported by one tool stay apart.
 */
function matchAnchors(items: readonly Prepared[], tolerance: number): Map<number, string> {
  const roots: MatchRoot[] = [];
  const anchors = new Map<number, string>();
  for (const item of [...items].sort(comparePrepared)) {
    let best: MatchRoot | undefined;
    for (const root of roots) {
      if (root.tools.has(item.raw.tool)) continue;
      const distance = Math.abs(item.line - root.item.line);
      if (distance > tolerance) continue;
      if (!best || distance < Math.abs(item.line - best.item.line)) best = root;
    }
    if (best) {
      best.tools.add(item.raw.tool);
      anchors.set(item.index, best.item.anchor);
    } else {
      roots.push({ item, tools: new Set([item.raw.tool]) });
      anchors.set(item.index, item.anchor);
    }
  }
  return anchors;
}

export function snippetFromLines(lines: readonly string[] | undefined, start: number, end: number): string | undefined {
  if (!lines) return undefined;
  const last = Math.min(end, start + MAX_SNIPPET_LINES - 1, lines.length);
  const text = lines.slice(start - 1, last).join('\n').trim();
  return text || undefined;
}

/**
 * RawFinding -> UnifiedFinding, one output per input, input order kept.
 *
 * A fingerprint is (path, category, anchor), where the anchor is the
 * normalized content of the finding's own line (the tool snippet when the
 * file cannot be read). A finding from a second tool that lands within
 * `lineTolerance` of another tool's finding takes that finding's anchor, so
 * tools that disagree by a line or two still produce one fingerprint.
 */
export function normalizeFindings(raw: readonly RawFinding[], opts: NormalizeOptions): UnifiedFinding[] {
  const tolerance = Math.max(0, opts.lineTolerance ?? DEFAULT_LINE_TOLERANCE);
  const readLines = opts.readLines ?? readFileLines;
  const scanRoot = path.resolve(opts.scanRoot);

  const linesCache = new Map<string, string[] | undefined>();
  const linesFor = (filePath: string): string[] | undefined => {
    if (!linesCache.has(filePath)) {
      const abs = path.isAbsolute(filePath) ? filePath : path.join(scanRoot, filePath);
      linesCache.set(filePath, readLines(abs));
    }
    return linesCache.get(filePath);
  };

  const normalizedLines = new Map<string, string[] | undefined>();
  const normalizedLinesFor = (filePath: string): string[] | undefined => {
    if (!normalizedLines.has(filePath)) normalizedLines.set(filePath, linesFor(filePath)?.map(normalizeSignalText));
    return normalizedLines.get(filePath);
  };

  const prepared: Prepared[] = raw.map((r, index) => {
    const filePath = normalizePathForFinding(r.filePath, scanRoot);
    const line = Math.max(1, Math.trunc(Number(r.line)) || 1);
    return {
      index,
      raw: r,
      filePath,
      category: inferCategory(r.cwe, `${r.ruleId} ${r.message}`, opts.catalog),
      line,
      anchor: ownAnchor(line, r.snippet, normalizedLinesFor(filePath)),
    };
  });

  const byKey = new Map<string, Prepared[]>();
  for (const p of prepared) {
    const key = `${p.filePath}\u0000${p.category}`;
    const arr = byKey.get(key);
    if (arr) arr.push(p);
    else byKey.set(key, [p]);
  }

  const fingerprints = new Array<string>(prepared.length);
  for (const items of byKey.values()) {
    const { filePath, category } = items[0];
    for (const [index, anchor] of matchAnchors(items, tolerance)) {
      fingerprints[index] = findingFingerprint(filePath, category, anchor);
    }
  }

  return prepared.map((p) => {
    const r = p.raw;
    const endLine = Math.max(p.line, Math.trunc(Number(r.endLine)) || p.line);
    const severity = normalizeSeverity(r.severity);
    const confidence = normalizeConfidence(r.confidence);
    const message = String(r.message || r.ruleId).trim();
    const snippet = snippetFromLines(linesFor(p.filePath), p.line, endLine) ?? (r.snippet?.trim() || undefined);

    const finding: UnifiedFinding = {
      fingerprint: fingerprints[p.index],
      category: p.category,
      location: {
        filePath: p.filePath,
        startLine: p.line,
        endLine,
        ...(typeof r.column === 'number' && r.column > 0 ? { column: r.column } : {}),
      },
      severity,
      confidence,
      sources: [{ tool: r.tool, ruleId: r.ruleId, severity, confidence, line: p.line, message }],
      rawMessage: message,
      references: [...new Set((r.references ?? []).map((ref) => ref.trim()).filter(Boolean))].sort((a, b) =>
        a.localeCompare(b)
      ),
    };
    if (snippet) finding.snippet = snippet;
    return finding;
  });
}
