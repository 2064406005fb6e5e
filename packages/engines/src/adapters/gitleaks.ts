// packages/engines/src/adapters/gitleaks.ts
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  AdapterParseError,
  asArray,
  asNumber,
  asRecord,
  asString,
  asStringList,
  errorMessage,
  type RawFinding,
} from '@vulntriage/core';
import type { ToolDiscovery } from '../discovery.js';
import { execFileAllowFailure } from '../exec.js';
import { ToolBinding } from './toolBinding.js';
import type { ScanContext, ScannerAdapter } from './types.js';

export function parseGitleaksReport(text: string): RawFinding[] {
  if (!text.trim()) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new AdapterParseError('gitleaks', errorMessage(error), { cause: error });
  }
  if (!Array.isArray(parsed)) throw new AdapterParseError('gitleaks', 'report is not a JSON array');

  return asArray(parsed).map((entry) => {
    const item = asRecord(entry);
    const line = asNumber(item.StartLine ?? item.startLine, 1);
    const description = asString(item.Description ?? item.description, 'Potential secret detected');
    return {
      tool: 'gitleaks',
      ruleId: asString(item.RuleID ?? item.rule, 'gitleaks.secret'),
      message: description,
      filePath: asString(item.File ?? item.file, 'unknown'),
      line,
      endLine: asNumber(item.EndLine ?? item.endLine, line),
      column: asNumber(item.StartColumn, 0) || undefined,
      severity: 'high',
      confidence: 'high',
      snippet: asString(item.Match) || undefined,
      cwe: ['CWE-798'],
    };
  });
}

export class GitleaksAdapter implements ScannerAdapter {
  readonly name = 'gitleaks';
  readonly displayName = 'Gitleaks';
  private readonly binding: ToolBinding;

  constructor(discovery: ToolDiscovery) {
    this.binding = new ToolBinding(discovery, 'gitleaks', ['version']);
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
    return 'Install gitleaks from https://github.com/gitleaks/gitleaks/releases (or `brew install gitleaks`), or allow downloads so it can be installed into the tool cache.';
  }

  async scan(ctx: ScanContext): Promise<RawFinding[]> {
    const tool = await this.binding.require(ctx.signal);
    const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'vulntriage-gitleaks-'));
    const reportPath = path.join(workDir, 'report.json');

    try {
      const args = [
        'detect',
        '--no-git',
        '--no-banner',
        '--source',
        ctx.scanPath,
        '--redact',
        '--report-format',
        'json',
        '--report-path',
        reportPath,
        '--exit-code',
        '0',
      ];
      const configPath = asString(ctx.options.configPath);
      if (configPath) args.push('--config', configPath);
      args.push(...asStringList(ctx.options.extraArgs));

      ctx.logger.debug('running gitleaks', { bin: tool.path, args });
      const run = await execFileAllowFailure(tool.path, args, { signal: ctx.signal });
      if (run.code !== 0) {
        throw new Error(`gitleaks exited with code ${run.code}: ${String(run.stderr || run.stdout).trim().slice(0, 500)}`);
      }
      if (!fs.existsSync(reportPath)) return [];
      return parseGitleaksReport(await fs.promises.readFile(reportPath, 'utf8'));
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }
}
