// packages/engines/src/orchestrator.ts
import fs from 'node:fs';
import path from 'node:path';
import {
  AdapterParseError,
  AdapterTimeoutError,
  ConfigurationError,
  atLeastSeverity,
  errorMessage,
  isSeverity,
  mergeFindings,
  noopLogger,
  normalizeFindings,
  sortFindingsDeterministically,
  type AdapterExecutionMeta,
  type CweCatalog,
  type LineReader,
  type Logger,
  type RawFinding,
  type ScanConfig,
  type UnifiedFinding,
} from '@vulntriage/core';
import type { ScannerAdapter } from './adapters/types.js';
import { applyPathFilter } from './filters.js';

export type OrchestratorConfig = Pick<
  ScanConfig,
  'adapters' | 'timeoutSec' | 'maxConcurrency' | 'include' | 'exclude' | 'severityFloor' | 'lineTolerance'
> &
  Partial<Pick<ScanConfig, 'runTimeoutSec' | 'adapterOptions'>>;

export interface OrchestratorDeps {
  logger?: Logger;
  catalog?: CweCatalog;
  readLines?: LineReader;
}

export interface OrchestrationResult {
  /** Deduplicated, floor-filtered, deterministically sorted. */
  findings: UnifiedFinding[];
  /** One entry per configured adapter, in configured order. */
  engines: AdapterExecutionMeta[];
  succeeded: AdapterExecutionMeta[];
  skipped: AdapterExecutionMeta[];
  failed: AdapterExecutionMeta[];
}

const RUN_BUDGET_EXHAUSTED = 'run budget exhausted';

class RunBudgetExceeded extends Error {
  constructor() {
    super(RUN_BUDGET_EXHAUSTED);
    this.name = 'RunBudgetExceeded';
  }
}

interface Slot {
  meta: AdapterExecutionMeta;
  findings: RawFinding[];
}

/** Rejects as soon as `signal` aborts, even if `promise` never settles. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function isPositive(n: unknown): n is number {
  return typeof n === 'number' && Number.isFinite(n) && n > 0;
}

/**
 * Fatal checks, all before any adapter starts.
 */
export function validateOrchestration(
  targetPath: string,
  registry: readonly ScannerAdapter[],
  config: OrchestratorConfig
): ScannerAdapter[] {
  if (!targetPath || !fs.existsSync(targetPath)) {
    throw new ConfigurationError(`Scan target does not exist: ${targetPath || '(empty)'}`);
  }
  if (!isSeverity(config.severityFloor)) {
    throw new ConfigurationError(`Invalid severity floor "${String(config.severityFloor)}" (expected critical|high|medium|low|info)`);
  }
  if (!isPositive(config.timeoutSec)) {
    throw new ConfigurationError(`timeoutSec must be a positive number, got ${String(config.timeoutSec)}`);
  }
  if (config.runTimeoutSec !== undefined && !isPositive(config.runTimeoutSec)) {
    throw new ConfigurationError(`runTimeoutSec must be a positive number, got ${String(config.runTimeoutSec)}`);
  }
  if (!Number.isInteger(config.maxConcurrency) || config.maxConcurrency < 1) {
    throw new ConfigurationError(`maxConcurrency must be an integer >= 1, got ${String(config.maxConcurrency)}`);
  }

  const byName = new Map(registry.map((adapter) => [adapter.name, adapter]));
  const selected: ScannerAdapter[] = [];
  for (const name of new Set(config.adapters)) {
    const adapter = byName.get(name);
    if (!adapter) {
      throw new ConfigurationError(`Unknown adapter "${name}" (known: ${[...byName.keys()].join(', ') || 'none'})`);
    }
    selected.push(adapter);
  }
  return selected;
}

/** The target itself for a directory, its parent for a single file. */
export function scanRootFor(targetPath: string): string {
  const abs = path.resolve(targetPath);
  return fs.statSync(abs).isDirectory() ? abs : path.dirname(abs);
}

/**
 * Runs the configured adapters against `targetPath` in a bounded worker
 * pool and merges their findings by fingerprint.
 *
 * Per-adapter failures never abort the run: unavailable tools are skipped,
 * timeouts and crashes are recorded, parse errors count as zero findings
 * with a warning. Only ConfigurationError escapes, and only before work
 * begins. Results are folded in configured adapter order after every worker
 * has returned, so completion order does not affect the output.
 */
export async function orchestrate(
  targetPath: string,
  registry: readonly ScannerAdapter[],
  config: OrchestratorConfig,
  deps: OrchestratorDeps = {}
): Promise<OrchestrationResult> {
  const logger = deps.logger ?? noopLogger;
  const selected = validateOrchestration(targetPath, registry, config);
  const scanPath = path.resolve(targetPath);
  const scanRoot = scanRootFor(scanPath);

  const runController = new AbortController();
  const runTimer = config.runTimeoutSec
    ? setTimeout(() => runController.abort(new RunBudgetExceeded()), config.runTimeoutSec * 1000)
    : undefined;

  const slots: Slot[] = new Array(selected.length);
  const queue = selected.map((_, index) => index);
  const workerCount = Math.min(selected.length, config.maxConcurrency);

  const runAdapter = async (adapter: ScannerAdapter): Promise<Slot> => {
    const start = Date.now();
    const base = { adapter: adapter.name, displayName: adapter.displayName, warnings: [] as string[] };
    const controller = new AbortController();
    const onRunAbort = () => controller.abort(runController.signal.reason);
    runController.signal.addEventListener('abort', onRunAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new AdapterTimeoutError(adapter.name, config.timeoutSec)),
      config.timeoutSec * 1000
    );
    let version: string | undefined;

    try {
      const available = await raceAbort(adapter.isAvailable(controller.signal), controller.signal);
      if (!available) {
        const reason = adapter.unavailableReason?.();
        logger.info(`${adapter.name} skipped: not installed`);
        return {
          findings: [],
          meta: {
            ...base,
            status: 'skipped',
            durationMs: Date.now() - start,
            findingCount: 0,
            errorMessage: reason ? `Not installed. ${reason}` : 'Not installed.',
            installHint: adapter.installInstructions(),
          },
        };
      }

      version = await raceAbort(adapter.version(), controller.signal).catch((error: unknown) => {
        if (controller.signal.aborted) throw error;
        logger.debug(`${adapter.name} version lookup failed`, { error: errorMessage(error) });
        return undefined;
      });

      const raw = await raceAbort(
        adapter.scan({
          scanPath,
          include: [...config.include],
          exclude: [...config.exclude],
          signal: controller.signal,
          logger,
          options: config.adapterOptions?.[adapter.name] ?? {},
        }),
        controller.signal
      );

      logger.debug(`${adapter.name} finished`, { findings: raw.length });
      return {
        findings: raw,
        meta: { ...base, version, status: 'ok', durationMs: Date.now() - start, findingCount: raw.length },
      };
    } catch (error) {
      const durationMs = Date.now() - start;

      if (controller.signal.aborted) {
        const budget = controller.signal.reason instanceof RunBudgetExceeded;
        logger.warn(`${adapter.name} ${budget ? 'aborted: run budget exhausted' : `timed out after ${config.timeoutSec}s`}`);
        return {
          findings: [],
          meta: {
            ...base,
            version,
            status: 'timeout',
            durationMs,
            findingCount: 0,
            errorMessage: budget ? RUN_BUDGET_EXHAUSTED : 'timeout',
          },
        };
      }

      if (error instanceof AdapterParseError) {
        logger.warn(error.message);
        return {
          findings: [],
          meta: { ...base, version, status: 'ok', durationMs, findingCount: 0, warnings: [error.message] },
        };
      }

      const msg = errorMessage(error);
      logger.warn(`${adapter.name} failed: ${msg}`);
      return {
        findings: [],
        meta: { ...base, version, status: 'failed', durationMs, findingCount: 0, errorMessage: msg },
      };
    } finally {
      clearTimeout(timer);
      runController.signal.removeEventListener('abort', onRunAbort);
    }
  };

  const workers = new Array(workerCount).fill(0).map(async () => {
    while (queue.length > 0) {
      const index = queue.shift();
      if (index === undefined) break;
      const adapter = selected[index];

      if (runController.signal.aborted) {
        slots[index] = {
          findings: [],
          meta: {
            adapter: adapter.name,
            displayName: adapter.displayName,
            status: 'timeout',
            durationMs: 0,
            findingCount: 0,
            errorMessage: RUN_BUDGET_EXHAUSTED,
            warnings: [],
          },
        };
        continue;
      }
      slots[index] = await runAdapter(adapter);
    }
  });

  try {
    await Promise.all(workers);
  } finally {
    if (runTimer) clearTimeout(runTimer);
  }

  // barrier passed: normalize and fold in configured order
  const raw = slots.flatMap((slot) => slot.findings);
  const normalized = normalizeFindings(raw, {
    scanRoot,
    lineTolerance: config.lineTolerance,
    catalog: deps.catalog,
    readLines: deps.readLines,
  });
  const filtered = await applyPathFilter(normalized, scanRoot, { include: config.include, exclude: config.exclude });
  const merged = mergeFindings(filtered).filter((f) => atLeastSeverity(f.severity, config.severityFloor));

  const engines = slots.map((slot) => slot.meta);
  return {
    findings: sortFindingsDeterministically(merged),
    engines,
    succeeded: engines.filter((e) => e.status === 'ok'),
    skipped: engines.filter((e) => e.status === 'skipped'),
    failed: engines.filter((e) => e.status === 'failed' || e.status === 'timeout'),
  };
}
