// packages/engines/src/index.ts
import { BanditAdapter } from './adapters/bandit.js';
import { GitleaksAdapter } from './adapters/gitleaks.js';
import { SemgrepAdapter } from './adapters/semgrep.js';
import type { ScannerAdapter } from './adapters/types.js';
import type { ToolDiscovery } from './discovery.js';

export * from './adapters/types.js';
export { ToolBinding } from './adapters/toolBinding.js';
export { SemgrepAdapter, parseSemgrepOutput } from './adapters/semgrep.js';
export { BanditAdapter, parseBanditOutput } from './adapters/bandit.js';
export { GitleaksAdapter, parseGitleaksReport } from './adapters/gitleaks.js';
export * from './cache.js';
export * from './discovery.js';
export * from './exec.js';
export * from './filters.js';
export * from './orchestrator.js';
export * from './toolManifest.js';

/** Every shipped adapter, sharing one discovery chain. */
export function createDefaultAdapters(discovery: ToolDiscovery): ScannerAdapter[] {
  return [new SemgrepAdapter(discovery), new BanditAdapter(discovery), new GitleaksAdapter(discovery)];
}
