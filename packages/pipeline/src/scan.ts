// packages/pipeline/src/scan.ts
import fs from 'node:fs';
import path from 'node:path';
import { createConsoleLogger, toPosixPath, type CweCatalog, type Logger, type ScanConfig } from '@vulntriage/core';
import {
  ToolCache,
  ToolDiscovery,
  createDefaultAdapters,
  orchestrate,
  scanRootFor,
  type FetchLike,
  type ScannerAdapter,
} from '@vulntriage/engines';
import { triage, type ClassifierRoute, type RiskTable } from '@vulntriage/triage';
import { createSourceReader, summarizeReport, type ScanReport } from './report.js';
import { writeSnapshot } from './snapshot.js';

export interface ScanDeps {
  logger?: Logger;
  /** Replaces the shipped adapters. */
  adapters?: readonly ScannerAdapter[];
  discovery?: ToolDiscovery;
  cache?: ToolCache;
  /** Used by the tool cache for downloads. */
  fetch?: FetchLike;
  catalog?: CweCatalog;
  routes?: readonly ClassifierRoute[];
  riskTable?: RiskTable;
  now?: () => Date;
}

function defaultAdapters(target: string, config: ScanConfig, deps: ScanDeps, logger: Logger): readonly ScannerAdapter[] {
  if (deps.adapters) return deps.adapters;
  if (deps.discovery) return createDefaultAdapters(deps.discovery);

  const cache =
    deps.cache ??
    new ToolCache({
      ...(config.cacheDir ? { root: config.cacheDir } : {}),
      allowDownload: config.allowDownload,
      verifyMode: config.verifyDownloads,
      ...(deps.fetch ? { fetch: deps.fetch } : {}),
      logger,
    });
  // a missing target is reported by the orchestrator
  const projectRoot = fs.existsSync(target) ? scanRootFor(target) : path.resolve(target);
  return createDefaultAdapters(new ToolDiscovery(cache, { projectRoot, logger }));
}

/**
 * Orchestrate every configured adapter, then triage what survives the
 * severity floor. Writes a snapshot when the config names one.
 */
export async function runScan(target: string, config: ScanConfig, deps: ScanDeps = {}): Promise<ScanReport> {
  const logger = deps.logger ?? createConsoleLogger();
  const now = deps.now ?? (() => new Date());
  const startedAt = now();

  const adapters = defaultAdapters(target, config, deps, logger);
  const orchestration = await orchestrate(target, adapters, config, {
    logger,
    ...(deps.catalog ? { catalog: deps.catalog } : {}),
  });
  const scanRoot = scanRootFor(target);

  const triaged = triage(orchestration.findings, config.triage, {
    logger,
    readSource: createSourceReader(scanRoot),
    ...(deps.catalog ? { catalog: deps.catalog } : {}),
    ...(deps.routes ? { routes: deps.routes } : {}),
    ...(deps.riskTable ? { riskTable: deps.riskTable } : {}),
  });

  const summary = summarizeReport(triaged.findings, triaged.clusters, orchestration.engines);
  const report: ScanReport = {
    meta: {
      target: toPosixPath(path.resolve(target)),
      scanRoot: toPosixPath(scanRoot),
      generatedAt: startedAt.toISOString(),
      durationMs: Math.max(0, now().getTime() - startedAt.getTime()),
      adapters: orchestration.engines.map((e) => e.adapter),
      severityFloor: config.severityFloor,
      scanStatus: summary.scanStatus,
      redacted: config.redact,
      engines: orchestration.engines,
    },
    summary,
    findings: triaged.findings,
    clusters: triaged.clusters,
  };

  logger.info(
    `scan ${summary.scanStatus.toLowerCase()}: ${summary.totalFindings} findings, ` +
      `${summary.byVerdict.true_positive} likely exploitable, ${triaged.clusters.length} clusters`
  );

  if (config.snapshotPath) {
    writeSnapshot(config.snapshotPath, report, { redact: config.redact, now });
    logger.debug('snapshot written', { path: config.snapshotPath });
  }
  return report;
}
