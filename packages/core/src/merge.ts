// packages/core/src/merge.ts
import {
  CONFIDENCE_RANK,
  SEVERITY_RANK,
  compareSources,
  maxConfidence,
  maxSeverity,
  sortFindingsDeterministically,
  type SourceRef,
  type UnifiedFinding,
} from './model.js';

function sourceRank(s: Pick<SourceRef, 'confidence' | 'severity'>): number {
  return CONFIDENCE_RANK[s.confidence] * 10 + SEVERITY_RANK[s.severity];
}

/** Rank of the source that owns the current location: the best one, first seen on ties. */
function bestRank(sources: readonly SourceRef[]): number {
  return sources.reduce((best, s) => Math.max(best, sourceRank(s)), 0);
}

function pickMessage(a: string, b: string): string {
  if (a.length !== b.length) return a.length > b.length ? a : b;
  return a.localeCompare(b) <= 0 ? a : b;
}

function unionSources(a: readonly SourceRef[], b: readonly SourceRef[]): SourceRef[] {
  const byKey = new Map<string, SourceRef>();
  for (const s of [...a, ...b]) {
    const key = `${s.tool}\u0000${s.ruleId}`;
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, { ...s });
      continue;
    }
    const better =
      sourceRank(s) > sourceRank(existing) ||
      (sourceRank(s) === sourceRank(existing) && (s.line < existing.line || (s.line === existing.line && s.message < existing.message)));
    if (better) byKey.set(key, { ...s });
  }
  return [...byKey.values()].sort(compareSources);
}

/**
 * Folds `incoming` into `existing` (same fingerprint). Sources, severity,
 * confidence, message and references combine commutatively. The location
 * moves only when the incoming source outranks the current owner by
 * (confidence, severity).
 */
export function mergeFinding(existing: UnifiedFinding, incoming: UnifiedFinding): UnifiedFinding {
  if (existing.fingerprint !== incoming.fingerprint) {
    throw new Error(`cannot merge ${incoming.fingerprint} into ${existing.fingerprint}`);
  }

  const sources = unionSources(existing.sources, incoming.sources);
  const takeIncoming = bestRank(incoming.sources) > bestRank(existing.sources);

  let confidence = maxConfidence(existing.confidence, incoming.confidence);
  const tools = new Set(sources.map((s) => s.tool));
  // corroborated by a second tool
  if (tools.size >= 2 && confidence === 'medium') confidence = 'high';

  const merged: UnifiedFinding = {
    fingerprint: existing.fingerprint,
    category: existing.category,
    location: { ...(takeIncoming ? incoming.location : existing.location) },
    severity: maxSeverity(existing.severity, incoming.severity),
    confidence,
    sources,
    rawMessage: pickMessage(existing.rawMessage, incoming.rawMessage),
    references: [...new Set([...existing.references, ...incoming.references])].sort((a, b) => a.localeCompare(b)),
  };
  const snippet = takeIncoming ? incoming.snippet ?? existing.snippet : existing.snippet ?? incoming.snippet;
  if (snippet) merged.snippet = snippet;
  return merged;
}

/**
 * Dedup by fingerprint. The result never holds two findings with the same
 * fingerprint, and is sorted deterministically.
 */
export function mergeFindings(findings: Iterable<UnifiedFinding>): UnifiedFinding[] {
  const map = new Map<string, UnifiedFinding>();
  for (const f of findings) {
    const existing = map.get(f.fingerprint);
    map.set(f.fingerprint, existing ? mergeFinding(existing, f) : f);
  }
  return sortFindingsDeterministically([...map.values()]);
}
