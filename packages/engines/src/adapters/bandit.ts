// packages/engines/src/adapters/bandit.ts
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

/** Bandit prefixes every code line with its line number. */
function codeLine(code: string, line: number): string | undefined {
  let fallback: string | undefined;
  for (const raw of code.split(/\r?\n/)) {
    const m = /^(\d+)\s?(.*)$/.exec(raw);
    if (!m) continue;
    if (Number(m[1]) === line) return m[2].trim() || undefined;
    fallback ??= m[2].trim() || undefined;
  }
  return fallback;
}

export function parseBanditOutput(stdout: string): RawFinding[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new AdapterParseError('bandit', errorMessage(error), { cause: error });
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.results)) {
    throw new AdapterParseError('bandit', 'missing "results" array');
  }

  return asArray(parsed.results).map((item) => {
    const result = asRecord(item);
    const cwe = asRecord(result.issue_cwe);
    const line = asNumber(result.line_number, 1);
    const range = asArray(result.line_range).map((n) => asNumber(n, line));
    const testId = asString(result.test_id, 'bandit');
    const testName = asString(result.test_name);

    return {
      tool: 'bandit',
      ruleId: testName ? `${testId}:${testName}` : testId,
      message: asString(result.issue_text, 'Bandit finding'),
      filePath: asString(result.filename, 'unknown'),
      line,
      endLine: range.length ? Math.max(...range) : line,
      column: asNumber(result.col_offset, -1) + 1 || undefined,
      severity: asString(result.issue_severity, 'MEDIUM'),
      confidence: asString(result.issue_confidence) || undefined,
      snippet: codeLine(asString(result.code), line),
      cwe: cwe.id === undefined ? [] : [asString(cwe.id)],
      references: asStringList([result.more_info, cwe.link]),
    };
  });
}

export class BanditAdapter implements ScannerAdapter {
  readonly name = 'bandit';
  readonly displayName = 'Bandit';
  private readonly binding: ToolBinding;

  constructor(discovery: ToolDiscovery) {
    this.binding = new ToolBinding(discovery, 'bandit');
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
    return 'Install bandit with `pip install bandit` in the project virtualenv, or allow downloads so it can be installed into the tool cache.';
  }

  async scan(ctx: ScanContext): Promise<RawFinding[]> {
    const tool = await this.binding.require(ctx.signal);

    const args = ['-r', ctx.scanPath, '-f', 'json', '-q'];
    if (ctx.exclude.length) args.push('-x', ctx.exclude.join(','));
    const configFile = asString(ctx.options.configFile);
    if (configFile) args.push('-c', configFile);
    args.push(...asStringList(ctx.options.extraArgs));

    ctx.logger.debug('running bandit', { bin: tool.path, args });
    const run = await execFileAllowFailure(tool.path, args, { signal: ctx.signal });

    // bandit exits 1 when it found issues
    if (run.code > 1) {
      throw new Error(`bandit exited with code ${run.code}: ${String(run.stderr || run.stdout).trim().slice(0, 500)}`);
    }
    return parseBanditOutput(run.stdout);
  }
}
