import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, test } from 'vitest';
import { inferCategory, normalizeCweId } from './cwe.js';
import { mergeFindings } from './merge.js';
import type { RawFinding } from './model.js';
import { normalizeFindings, normalizePathForFinding, normalizeSeverity } from './normalize.js';

const SQL_LINE = '    cursor.execute("SELECT * FROM users WHERE id = " + user_id)';

function mkRepo(lines: string[]): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vulntriage-normalize-'));
  fs.writeFileSync(path.join(dir, 'app.py'), lines.join('\n'));
  return dir;
}

function appWithSqlAt(line: number): string[] {
  const lines = Array.from({ length: 60 }, (_, i) => `x_${i} = ${i}`);
  lines[line - 1] = SQL_LINE;
  return lines;
}

function raw(overrides: Partial<RawFinding> & Pick<RawFinding, 'tool' | 'ruleId' | 'line'>): RawFinding {
  return {
    message: 'SQL injection',
    filePath: 'app.py',
    severity: 'medium',
    cwe: ['CWE-89'],
    ...overrides,
  };
}

describe('severity and category mapping', () => {
  test('tool severities map onto the normalized scale', () => {
    expect(normalizeSeverity('ERROR')).toBe('high');
    expect(normalizeSeverity('WARNING')).toBe('medium');
    expect(normalizeSeverity('INFO')).toBe('info');
    expect(normalizeSeverity('Critical')).toBe('critical');
    expect(normalizeSeverity('whatever')).toBe('medium');
  });

  test('CWE ids are read from numbers and prefixed strings', () => {
    expect(normalizeCweId(89)).toBe('CWE-89');
    expect(normalizeCweId('CWE-89: Improper Neutralization of Special Elements')).toBe('CWE-89');
    expect(normalizeCweId('79')).toBe('CWE-79');
    expect(normalizeCweId('n/a')).toBeUndefined();
  });

  test('known hints win, then unknown hints, then keywords', () => {
    expect(inferCategory(['CWE-9999', 'CWE-89: Improper Neutralization'], '')).toBe('CWE-89');
    expect(inferCategory(['CWE-9999'], 'sql injection')).toBe('CWE-9999');
    expect(inferCategory([], 'generic-api-key Detected a Generic API Key')).toBe('CWE-798');
    expect(inferCategory(undefined, 'python.lang.security.audit.formatted-sql-query')).toBe('CWE-89');
    expect(inferCategory([], 'nothing to see here')).toBe('CWE-UNKNOWN');
  });

  test('paths inside the scan root become relative posix paths', () => {
    expect(normalizePathForFinding('/repo/src/app.py', '/repo')).toBe('src/app.py');
    expect(normalizePathForFinding('src/app.py', '/repo')).toBe('src/app.py');
    expect(normalizePathForFinding('/elsewhere/app.py', '/repo')).toBe('/elsewhere/app.py');
  });
});

describe('fingerprint stability', () => {
  test('two scanners one line apart share a fingerprint and merge into one finding', () => {
    const root = mkRepo(appWithSqlAt(42));
    const normalized = normalizeFindings(
      [
        raw({ tool: 'scanner-a', ruleId: 'sqli-001', line: 42, severity: 'ERROR' }),
        raw({ tool: 'scanner-b', ruleId: 'python-sql-injection', line: 43, severity: 'medium' }),
      ],
      { scanRoot: root }
    );
    expect(normalized[0].fingerprint).toBe(normalized[1].fingerprint);

    const merged = mergeFindings(normalized);
    expect(merged).toHaveLength(1);
    expect(merged[0].severity).toBe('high');
    expect(merged[0].sources.map((s) => [s.tool, s.ruleId])).toEqual([
      ['scanner-a', 'sqli-001'],
      ['scanner-b', 'python-sql-injection'],
    ]);
    expect(merged[0].location.startLine).toBe(42);
    expect(merged[0].snippet).toBe(SQL_LINE.trim());
  });

  test('a line shift in the file does not change the fingerprint', () => {
    const before = normalizeFindings([raw({ tool: 'scanner-a', ruleId: 'sqli-001', line: 42 })], {
      scanRoot: mkRepo(appWithSqlAt(42)),
    });
    const after = normalizeFindings([raw({ tool: 'scanner-b', ruleId: 'other-rule', line: 45 })], {
      scanRoot: mkRepo(appWithSqlAt(45)),
    });
    expect(after[0].fingerprint).toBe(before[0].fingerprint);
  });

  test('every offset within the tolerance collapses onto one fingerprint', () => {
    const root = mkRepo(appWithSqlAt(42));
    for (const offset of [0, 1, 2]) {
      const out = normalizeFindings(
        [
          raw({ tool: 'scanner-a', ruleId: 'a', line: 42 }),
          raw({ tool: 'scanner-b', ruleId: 'b', line: 42 + offset }),
        ],
        { scanRoot: root }
      );
      expect(new Set(out.map((f) => f.fingerprint)).size).toBe(1);
    }
  });

  test('findings far apart stay separate', () => {
    const root = mkRepo(appWithSqlAt(42));
    const out = normalizeFindings(
      [raw({ tool: 'scanner-a', ruleId: 'a', line: 10 }), raw({ tool: 'scanner-a', ruleId: 'a', line: 42 })],
      { scanRoot: root }
    );
    expect(out[0].fingerprint).not.toBe(out[1].fingerprint);
  });

  test('identical code on distant lines gets distinct fingerprints', () => {
    const lines = Array.from({ length: 40 }, (_, i) => `y_${i} = ${i}`);
    lines[4] = 'eval(payload)';
    lines[29] = 'eval(payload)';
    const root = mkRepo(lines);
    const out = normalizeFindings(
      [
        raw({ tool: 't', ruleId: 'eval', line: 5, cwe: ['CWE-94'] }),
        raw({ tool: 't', ruleId: 'eval', line: 30, cwe: ['CWE-94'] }),
      ],
      { scanRoot: root }
    );
    expect(out[0].fingerprint).not.toBe(out[1].fingerprint);
  });

  test('one rule reporting nearby statements keeps each defect', () => {
    const lines = Array.from({ length: 12 }, (_, i) => `z_${i} = ${i}`);
    lines[2] = 'cursor.execute("SELECT * FROM users WHERE id = " + uid)';
    lines[4] = 'cursor.execute("DELETE FROM carts WHERE id = " + cid)';
    lines[6] = 'cursor.execute("UPDATE orders SET paid = 1 WHERE id = " + oid)';
    lines[8] = 'cursor.execute("SELECT * FROM logs WHERE day = " + day)';
    const root = mkRepo(lines);

    const merged = mergeFindings(
      normalizeFindings(
        [3, 5, 7, 9].map((line) => raw({ tool: 'semgrep', ruleId: 'sqli', line })),
        { scanRoot: root }
      )
    );

    expect(merged).toHaveLength(4);
    expect(merged.map((f) => f.location.startLine)).toEqual([3, 5, 7, 9]);
    expect(merged.every((f) => f.sources.length === 1)).toBe(true);
  });

  test('a second tool joins only the nearest defect', () => {
    const lines = Array.from({ length: 12 }, (_, i) => `z_${i} = ${i}`);
    lines[2] = 'cursor.execute("SELECT * FROM users WHERE id = " + uid)';
    lines[4] = 'cursor.execute("DELETE FROM carts WHERE id = " + cid)';
    const root = mkRepo(lines);

    const merged = mergeFindings(
      normalizeFindings(
        [
          raw({ tool: 'scanner-a', ruleId: 'a', line: 3 }),
          raw({ tool: 'scanner-a', ruleId: 'a', line: 5 }),
          raw({ tool: 'scanner-b', ruleId: 'b', line: 4 }),
        ],
        { scanRoot: root }
      )
    );

    expect(merged.map((f) => [f.location.startLine, f.sources.map((s) => s.tool)])).toEqual([
      [3, ['scanner-a', 'scanner-b']],
      [5, ['scanner-a']],
    ]);
  });

  test('a fingerprint does not depend on neighbouring findings', () => {
    const lines = Array.from({ length: 12 }, (_, i) => `z_${i} = ${i}`);
    lines[2] = 'cursor.execute("SELECT * FROM users WHERE id = " + uid)';
    lines[4] = 'cursor.execute("DELETE FROM carts WHERE id = " + cid)';
    const root = mkRepo(lines);

    const [alone] = normalizeFindings([raw({ tool: 'semgrep', ruleId: 'sqli', line: 5 })], { scanRoot: root });
    const withNeighbour = normalizeFindings(
      [raw({ tool: 'semgrep', ruleId: 'sqli', line: 3 }), raw({ tool: 'semgrep', ruleId: 'sqli', line: 5 })],
      { scanRoot: root }
    );

    expect(withNeighbour[1].fingerprint).toBe(alone.fingerprint);
    expect(withNeighbour[0].fingerprint).not.toBe(alone.fingerprint);
  });

  test('falls back to the tool snippet when the file cannot be read', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'vulntriage-missing-'));
    const out = normalizeFindings(
      [
        raw({ tool: 'a', ruleId: 'cmd', filePath: 'gone.py', line: 3, snippet: 'os.system(cmd)', cwe: ['CWE-78'] }),
        raw({ tool: 'b', ruleId: 'cmd', filePath: 'gone.py', line: 4, snippet: 'os.system( cmd )', cwe: ['CWE-78'] }),
      ],
      { scanRoot: root }
    );
    expect(out[0].fingerprint).toBe(out[1].fingerprint);
    expect(out[0].snippet).toBe('os.system(cmd)');
  });
});
