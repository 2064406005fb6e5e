// packages/engines/src/adapters/types.ts
import type { Logger, RawFinding } from '@vulntriage/core';

export interface ScanContext {
  /** Absolute path of the scan target (directory or single file). */
  scanPath: string;
  include: string[];
  exclude: string[];
  /** Aborted on per-adapter timeout or when the run budget runs out. */
  signal: AbortSignal;
  logger: Logger;
  /** adapterOptions[adapter.name] from the scan config. */
  options: Record<string, unknown>;
}

export interface ScannerAdapter {
  readonly name: string;
  readonly displayName: string;
  version(): Promise<string | undefined>;
  /** Delegates to discovery; memoized per adapter instance. */
  isAvailable(signal?: AbortSignal): Promise<boolean>;
  /** Why the last availability check failed, when it did. */
  unavailableReason?(): string | undefined;
  scan(ctx: ScanContext): Promise<RawFinding[]>;
  installInstructions(): string;
}
