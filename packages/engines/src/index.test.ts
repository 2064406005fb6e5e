import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, test } from 'vitest';
import { AdapterParseError, ConfigurationError, type RawFinding } from '@vulntriage/core';
import { orchestrate, type OrchestratorConfig, type ScannerAdapter } from './index.js';

const SQL_LINE = 'cursor.execute("SELECT * FROM users WHERE id = " + user_id)';

const baseConfig: OrchestratorConfig = {
  adapters: [],
  timeoutSec: 2,
  maxConcurrency: 4,
  include: [],
  exclude: [],
  severityFloor: 'info',
  lineTolerance: 2,
};

function mkRepo(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vulntriage-orchestrate-'));
  for (const [rel, content] of Object.entries(files)) {
    fs.mkdirSync(path.dirname(path.join(dir, rel)), { recursive: true });
    fs.writeFileSync(path.join(dir, rel), content);
  }
  return dir;
}

function sqlApp(): string {
  const lines = Array.from({ length: 50 }, (_, i) => `x_${i} = ${i}`);
  lines[41] = SQL_LINE;
  return lines.join('\n');
}

function sqlFinding(tool: string, line: number, overrides: Partial<RawFinding> = {}): RawFinding {
  return {
    tool,
    ruleId: `${tool}.sqli`,
    message: 'SQL injection via string concatenation',
    filePath: 'app.py',
    line,
    severity: 'high',
    cwe: ['CWE-89'],
    ...overrides,
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function stub(name: string, scan: () => Promise<RawFinding[]>, available = true): ScannerAdapter {
  return {
    name,
    displayName: name.toUpperCase(),
    installInstructions: () => `install ${name}`,
    async version() { return '1.0'; },
    async isAvailable() { return available; },
    scan,
  };
}

describe('orchestrate', () => {
  test('continues when adapters fail or time out and records statuses', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    const adapters = [
      stub('stub-a', async () => [sqlFinding('stub-a', 42)]),
      stub('stub-b', async () => { throw new Error('stub fail'); }),
      stub('stub-timeout', () => new Promise<RawFinding[]>(() => undefined)),
    ];

    const result = await orchestrate(
      repo,
      adapters,
      { ...baseConfig, timeoutSec: 0.05, adapters: ['stub-a', 'stub-b', 'stub-timeout'] }
    );

    expect(result.findings).toHaveLength(1);
    expect(result.engines.map((e) => e.status)).toEqual(['ok', 'failed', 'timeout']);
    expect(result.engines[1].errorMessage).toBe('stub fail');
    expect(result.engines[2].errorMessage).toBe('timeout');
    expect(result.succeeded.map((e) => e.adapter)).toEqual(['stub-a']);
    expect(result.failed.map((e) => e.adapter)).toEqual(['stub-b', 'stub-timeout']);
  });

  test('merges overlapping findings from two tools into one', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    const adapters = [
      stub('stub-a', async () => [sqlFinding('stub-a', 42)]),
      stub('stub-b', async () => [sqlFinding('stub-b', 43, { severity: 'critical' })]),
    ];

    const result = await orchestrate(repo, adapters, { ...baseConfig, adapters: ['stub-a', 'stub-b'] });

    expect(result.findings).toHaveLength(1);
    const [finding] = result.findings;
    expect(finding.category).toBe('CWE-89');
    expect(finding.severity).toBe('critical');
    expect(finding.location.filePath).toBe('app.py');
    expect(finding.sources.map((s) => s.tool)).toEqual(['stub-a', 'stub-b']);
    expect(result.engines.map((e) => e.findingCount)).toEqual([1, 1]);
  });

  test('output does not depend on completion order', async () => {
    const repo = mkRepo({ 'app.py': sqlApp(), 'util.py': 'import hashlib\nh = hashlib.md5(data)\n' });
    const a = stub('stub-a', async () => {
      await delay(30);
      return [sqlFinding('stub-a', 42), sqlFinding('stub-a', 2, { filePath: 'util.py', cwe: ['CWE-327'], severity: 'medium' })];
    });
    const b = stub('stub-b', async () => {
      await delay(5);
      return [sqlFinding('stub-b', 43, { message: 'a longer message about SQL injection here' })];
    });

    const first = await orchestrate(repo, [a, b], { ...baseConfig, adapters: ['stub-a', 'stub-b'] });
    // serial run: stub-a now completes first
    const second = await orchestrate(repo, [b, a], { ...baseConfig, adapters: ['stub-a', 'stub-b'], maxConcurrency: 1 });

    expect(second.findings).toEqual(first.findings);
    expect(first.findings).toHaveLength(2);
  });

  test('never runs more adapters at once than maxConcurrency', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    let active = 0;
    let peak = 0;
    const names = ['a1', 'a2', 'a3', 'a4'];
    const adapters = names.map((name) =>
      stub(name, async () => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(20);
        active -= 1;
        return [];
      })
    );

    const result = await orchestrate(repo, adapters, { ...baseConfig, adapters: names, maxConcurrency: 2 });
    expect(peak).toBe(2);
    expect(result.engines.map((e) => e.adapter)).toEqual(names);
  });

  test('unavailable adapters are skipped with an install hint', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    const missing: ScannerAdapter = {
      ...stub('missing', async () => [], false),
      unavailableReason: () => 'missing not found (checked: PATH)',
    };

    const result = await orchestrate(repo, [missing], { ...baseConfig, adapters: ['missing'] });
    expect(result.engines[0]).toMatchObject({
      status: 'skipped',
      errorMessage: 'Not installed. missing not found (checked: PATH)',
      installHint: 'install missing',
    });
    expect(result.skipped).toHaveLength(1);
    expect(result.failed).toHaveLength(0);
  });

  test('parse errors count as zero findings with a warning', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    const garbled = stub('stub-a', async () => { throw new AdapterParseError('stub-a', 'bad json'); });

    const result = await orchestrate(repo, [garbled], { ...baseConfig, adapters: ['stub-a'] });
    expect(result.engines[0].status).toBe('ok');
    expect(result.engines[0].findingCount).toBe(0);
    expect(result.engines[0].warnings).toEqual(['stub-a output could not be parsed: bad json']);
  });

  test('run budget marks running and unstarted adapters as timed out', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    const hang = () => new Promise<RawFinding[]>(() => undefined);
    const adapters = [stub('slow-1', hang), stub('slow-2', hang)];

    const result = await orchestrate(repo, adapters, {
      ...baseConfig,
      adapters: ['slow-1', 'slow-2'],
      timeoutSec: 10,
      runTimeoutSec: 0.05,
      maxConcurrency: 1,
    });

    expect(result.engines.map((e) => [e.status, e.errorMessage])).toEqual([
      ['timeout', 'run budget exhausted'],
      ['timeout', 'run budget exhausted'],
    ]);
    expect(result.engines[1].durationMs).toBe(0);
  });

  test('applies the severity floor after merging', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    const adapter = stub('stub-a', async () => [
      sqlFinding('stub-a', 42),
      sqlFinding('stub-a', 10, { ruleId: 'debug', cwe: ['CWE-489'], severity: 'low', message: 'debug enabled' }),
    ]);

    const result = await orchestrate(repo, [adapter], { ...baseConfig, adapters: ['stub-a'], severityFloor: 'medium' });
    expect(result.findings.map((f) => f.category)).toEqual(['CWE-89']);
  });

  test('include and exclude globs filter findings by path', async () => {
    const repo = mkRepo({ 'src/app.py': sqlApp(), 'tests/test_app.py': sqlApp() });
    const adapter = stub('stub-a', async () => [
      sqlFinding('stub-a', 42, { filePath: 'src/app.py' }),
      sqlFinding('stub-a', 42, { filePath: 'tests/test_app.py' }),
    ]);

    const result = await orchestrate(repo, [adapter], { ...baseConfig, adapters: ['stub-a'], exclude: ['tests/**'] });
    expect(result.findings.map((f) => f.location.filePath)).toEqual(['src/app.py']);
  });

  test('invalid configuration is rejected before any adapter runs', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    let calls = 0;
    const adapter = stub('stub-a', async () => {
      calls += 1;
      return [];
    });

    await expect(orchestrate(repo, [adapter], { ...baseConfig, adapters: ['nope'] })).rejects.toThrow(
      'Unknown adapter "nope" (known: stub-a)'
    );
    await expect(orchestrate(path.join(repo, 'missing'), [adapter], { ...baseConfig, adapters: ['stub-a'] })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(orchestrate(repo, [adapter], { ...baseConfig, adapters: ['stub-a'], timeoutSec: 0 })).rejects.toThrow(
      /timeoutSec/
    );
    await expect(orchestrate(repo, [adapter], { ...baseConfig, adapters: ['stub-a'], maxConcurrency: 0 })).rejects.toThrow(
      /maxConcurrency/
    );
    expect(calls).toBe(0);
  });

  test('a single file target resolves paths against its directory', async () => {
    const repo = mkRepo({ 'app.py': sqlApp() });
    const adapter = stub('stub-a', async () => [sqlFinding('stub-a', 42, { filePath: path.join(repo, 'app.py') })]);

    const result = await orchestrate(path.join(repo, 'app.py'), [adapter], { ...baseConfig, adapters: ['stub-a'] });
    expect(result.findings[0].location.filePath).toBe('app.py');
    expect(result.findings[0].snippet).toBe(SQL_LINE);
  });
});
