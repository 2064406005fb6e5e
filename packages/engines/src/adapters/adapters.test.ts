import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, test } from 'vitest';
import { AdapterParseError, noopLogger } from '@vulntriage/core';
import { ToolDiscovery } from '../discovery.js';
import { createDefaultAdapters } from '../index.js';
import { parseBanditOutput } from './bandit.js';
import { GitleaksAdapter, parseGitleaksReport } from './gitleaks.js';
import { SemgrepAdapter, parseSemgrepOutput } from './semgrep.js';

const semgrepPayload = {
  results: [
    {
      check_id: 'python.lang.security.audit.formatted-sql-query',
      path: 'app.py',
      start: { line: 42, col: 5 },
      end: { line: 43, col: 60 },
      extra: {
        message: 'Detected possible formatted SQL query.',
        severity: 'ERROR',
        lines: '    cursor.execute(query)  ',
        metadata: {
          cwe: ['CWE-89: Improper Neutralization of Special Elements used in an SQL Command'],
          confidence: 'HIGH',
          references: ['https://owasp.org/Top10/A03_2021-Injection'],
        },
      },
    },
    {
      check_id: 'generic.secrets.gitleaks.generic-api-key',
      path: 'config.py',
      start: { line: 3, col: 1 },
      end: { line: 3, col: 20 },
      extra: { message: 'API key', severity: 'WARNING', lines: 'requires login', metadata: {} },
    },
  ],
  errors: [],
};

const banditPayload = {
  results: [
    {
      code: '11 def run(cmd):\n12     subprocess.call(cmd, shell=True)\n13 \n',
      col_offset: 4,
      filename: './app/run.py',
      issue_confidence: 'HIGH',
      issue_cwe: { id: 78, link: 'https://cwe.mitre.org/data/definitions/78.html' },
      issue_severity: 'HIGH',
      issue_text: 'subprocess call with shell=True identified, security issue.',
      line_number: 12,
      line_range: [12],
      more_info: 'https://bandit.readthedocs.io/en/1.7.10/plugins/b602_subprocess_popen_with_shell_equals_true.html',
      test_id: 'B602',
      test_name: 'subprocess_popen_with_shell_equals_true',
    },
  ],
};

function fakeTool(dir: string, name: string, body: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, `#!/bin/sh\n${body}\n`);
  fs.chmodSync(file, 0o755);
  return file;
}

describe('semgrep output', () => {
  test('maps results onto raw findings', () => {
    const [first, second] = parseSemgrepOutput(JSON.stringify(semgrepPayload));
    expect(first).toEqual({
      tool: 'semgrep',
      ruleId: 'python.lang.security.audit.formatted-sql-query',
      message: 'Detected possible formatted SQL query.',
      filePath: 'app.py',
      line: 42,
      endLine: 43,
      column: 5,
      severity: 'ERROR',
      snippet: 'cursor.execute(query)',
      cwe: ['CWE-89: Improper Neutralization of Special Elements used in an SQL Command'],
      confidence: 'HIGH',
      references: ['https://owasp.org/Top10/A03_2021-Injection'],
    });
    expect(second.snippet).toBeUndefined();
    expect(second.cwe).toEqual([]);
  });

  test('malformed output raises a parse error', () => {
    expect(() => parseSemgrepOutput('not json')).toThrow(AdapterParseError);
    expect(() => parseSemgrepOutput('{"errors": []}')).toThrow('semgrep output could not be parsed: missing "results" array');
  });
});

describe('bandit output', () => {
  test('maps results onto raw findings', () => {
    const [finding] = parseBanditOutput(JSON.stringify(banditPayload));
    expect(finding).toMatchObject({
      tool: 'bandit',
      ruleId: 'B602:subprocess_popen_with_shell_equals_true',
      filePath: './app/run.py',
      line: 12,
      endLine: 12,
      column: 5,
      severity: 'HIGH',
      confidence: 'HIGH',
      snippet: 'subprocess.call(cmd, shell=True)',
      cwe: ['78'],
    });
    expect(finding.references).toEqual([
      'https://bandit.readthedocs.io/en/1.7.10/plugins/b602_subprocess_popen_with_shell_equals_true.html',
      'https://cwe.mitre.org/data/definitions/78.html',
    ]);
  });

  test('missing results array raises a parse error', () => {
    expect(() => parseBanditOutput('[]')).toThrow(AdapterParseError);
  });
});

describe('gitleaks report', () => {
  test('maps leaks onto high severity secret findings', () => {
    const report = [
      {
        Description: 'Generic API Key',
        StartLine: 3,
        EndLine: 3,
        StartColumn: 11,
        Match: 'API_KEY = "REDACTED"',
        File: 'config.py',
        RuleID: 'generic-api-key',
      },
    ];
    expect(parseGitleaksReport(JSON.stringify(report))).toEqual([
      {
        tool: 'gitleaks',
        ruleId: 'generic-api-key',
        message: 'Generic API Key',
        filePath: 'config.py',
        line: 3,
        endLine: 3,
        column: 11,
        severity: 'high',
        confidence: 'high',
        snippet: 'API_KEY = "REDACTED"',
        cwe: ['CWE-798'],
      },
    ]);
  });

  test('an empty report means no leaks; a non-array is a parse error', () => {
    expect(parseGitleaksReport('')).toEqual([]);
    expect(() => parseGitleaksReport('{}')).toThrow('gitleaks output could not be parsed: report is not a JSON array');
  });
});

describe('adapter execution', () => {
  test('unavailable tools report where discovery looked', async () => {
    const discovery = new ToolDiscovery(undefined, { env: { PATH: '' }, platform: 'linux' });
    const adapter = new GitleaksAdapter(discovery);

    expect(await adapter.isAvailable()).toBe(false);
    expect(adapter.unavailableReason()).toBe('gitleaks not found (checked: PATH, cache: none configured)');
    expect(await adapter.version()).toBeUndefined();
  });

  test('default adapters cover every shipped scanner', () => {
    const discovery = new ToolDiscovery(undefined, { env: { PATH: '' } });
    expect(createDefaultAdapters(discovery).map((a) => a.name)).toEqual(['semgrep', 'bandit', 'gitleaks']);
  });

  const posixOnly = process.platform === 'win32' ? test.skip : test;

  posixOnly('semgrep runs with json output, configs and globs', async () => {
    const binDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vulntriage-fake-bin-'));
    const argsFile = path.join(binDir, 'args.txt');
    const outputFile = path.join(binDir, 'out.json');
    fs.writeFileSync(outputFile, JSON.stringify(semgrepPayload));
    fakeTool(
      binDir,
      'semgrep',
      [
        'if [ "$1" = "--version" ]; then echo 1.80.0; exit 0; fi',
        `printf '%s\\n' "$@" > '${argsFile}'`,
        `cat '${outputFile}'`,
      ].join('\n')
    );
    const repo = fs.mkdtempSync(path.join(os.tmpdir(), 'vulntriage-fake-repo-'));

    const adapter = new SemgrepAdapter(new ToolDiscovery(undefined, { env: { PATH: binDir }, platform: 'linux' }));
    expect(await adapter.isAvailable()).toBe(true);
    expect(await adapter.version()).toBe('1.80.0');

    const findings = await adapter.scan({
      scanPath: repo,
      include: ['**/*.py'],
      exclude: [],
      signal: new AbortController().signal,
      logger: noopLogger,
      options: { config: ['p/python'] },
    });

    expect(findings).toHaveLength(2);
    expect(fs.readFileSync(argsFile, 'utf8').trim().split('\n')).toEqual([
      '--json',
      '--quiet',
      '--metrics',
      'off',
      '--config',
      'p/python',
      '--include',
      '**/*.py',
      repo,
    ]);
  });

  posixOnly('a crashing scanner surfaces its exit code', async () => {
    const binDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vulntriage-fake-bin-'));
    fakeTool(binDir, 'semgrep', 'echo "fatal: bad config" >&2\nexit 7');
    const repo = fs.mkdtempSync(path.join(os.tmpdir(), 'vulntriage-fake-repo-'));

    const adapter = new SemgrepAdapter(new ToolDiscovery(undefined, { env: { PATH: binDir }, platform: 'linux' }));
    await expect(
      adapter.scan({ scanPath: repo, include: [], exclude: [], signal: new AbortController().signal, logger: noopLogger, options: {} })
    ).rejects.toThrow('semgrep exited with code 7: fatal: bad config');
  });
});
