// packages/engines/src/adapters/semgrep.ts
import fs from 'node:fs';
import path from 'node:path';
import {
  AdapterParseError,
  asArray,
  asNumber,
  asRecord,
  asString,
  asStringList,
  errorMessage,
  isRecord,
  type RawFinding,
} from '@vulntriage/core';
import type { ToolDiscovery } from '../discovery.js';
import { execFileAllowFailure } from '../exec.js';
import { ToolBinding } from './toolBinding.js';
import type { ScanContext, ScannerAdapter } from './types.js';

function semgrepConfigs(options: Record<string, unknown>): string[] {
  const configs = asStringList(options.config);
  return configs.length ? configs : ['auto'];
}

function cweHints(value: unknown): string[] {
  if (typeof value === 'number') return [String(value)];
  return asStringList(value);
}

/**
 * Semgrep --json output -> RawFinding[]. Throws AdapterParseError when the
 * payload is not the expected shape.
 */
export function parseSemgrepOutput(stdout: string): RawFinding[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new AdapterParseError('semgrep', errorMessage(error), { cause: error });
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.results)) {
    throw new AdapterParseError('semgrep', 'missing "results" array');
  }

  return asArray(parsed.results).map((item) => {
    const result = asRecord(item);
    const extra = asRecord(result.extra);
    const metadata = asRecord(extra.metadata);
    const start = asRecord(result.start);
    const end = asRecord(result.end);

    const lines = asString(extra.lines).trim();
    const line = asNumber(start.line, 1);

    return {
      tool: 'semgrep',
      ruleId: asString(result.check_id, 'semgrep.rule'),
      message: asString(extra.message, 'Semgrep finding'),
      filePath: asString(result.path, 'unknown'),
      line,
      endLine: asNumber(end.line, line),
      column: asNumber(start.col, 0) || undefined,
      severity: asString(extra.severity, 'INFO'),
      // semgrep prints this placeholder for rules from the registry when logged out
      snippet: lines && lines !== 'requires login' ? lines : undefined,
      cwe: cweHints(metadata.cwe),
      confidence: asString(metadata.confidence) || undefined,
      references: [...asStringList(metadata.references), ...asStringList(metadata.source)],
    };
  });
}

export class SemgrepAdapter implements ScannerAdapter {
  readonly name = 'semgrep';
  readonly displayName = 'Semgrep';
  private readonly binding: ToolBinding;

  constructor(discovery: ToolDiscovery) {
    this.binding = new ToolBinding(discovery, 'semgrep');
  }

  version() {
    return this.binding.version();
  }

  async isAvailable(signal?: AbortSignal) {
    return Boolean(await this.binding.resolve(signal));
  }

  unavailableReason() {
    return this.binding.unavailableReason();
  }

  installInstructions() {
    return 'Install semgrep with `pip install semgrep` (or `brew install semgrep`), or allow downloads so it can be installed into the tool cache.';
  }

  async scan(ctx: ScanContext): Promise<RawFinding[]> {
    const tool = await this.binding.require(ctx.signal);

    const args = ['--json', '--quiet', '--metrics', 'off'];
    for (const config of semgrepConfigs(ctx.options)) args.push('--config', config);
    for (const glob of ctx.include) args.push('--include', glob);
    for (const glob of ctx.exclude) args.push('--exclude', glob);
    args.push(...asStringList(ctx.options.extraArgs), ctx.scanPath);

    const cwd = fs.statSync(ctx.scanPath).isDirectory() ? ctx.scanPath : path.dirname(ctx.scanPath);
    ctx.logger.debug('running semgrep', { bin: tool.path, args });

    const run = await execFileAllowFailure(tool.path, args, {
      cwd,
      signal: ctx.signal,
      env: { ...process.env, SEMGREP_SEND_METRICS: 'off', PYTHONUTF8: '1', PYTHONIOENCODING: 'utf-8' },
    });

    // 0 = clean, 1 = findings with --error; anything higher is a semgrep failure
    if (run.code >= 2) {
      throw new Error(`semgrep exited with code ${run.code}: ${String(run.stderr || run.stdout).trim().slice(0, 500)}`);
    }
    return parseSemgrepOutput(run.stdout);
  }
}
