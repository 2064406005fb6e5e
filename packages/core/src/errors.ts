// packages/core/src/errors.ts

/**
 * Discovery exhausted every strategy. Non-fatal: the orchestrator records the
 * adapter as skipped.
 */
export class ToolUnavailableError extends Error {
  readonly tool: string;
  readonly checked: string[];
  readonly detail?: string;

  constructor(tool: string, checked: string[], detail?: string) {
    const where = checked.length ? checked.join(', ') : 'no locations';
    super(`${tool} not found (checked: ${where})${detail ? `. ${detail}` : ''}`);
    this.name = 'ToolUnavailableError';
    this.tool = tool;
    this.checked = [...checked];
    this.detail = detail;
  }
}

export class AdapterTimeoutError extends Error {
  readonly adapter: string;
  readonly timeoutSec: number;

  constructor(adapter: string, timeoutSec: number) {
    super(`${adapter} timed out after ${timeoutSec}s`);
    this.name = 'AdapterTimeoutError';
    this.adapter = adapter;
    this.timeoutSec = timeoutSec;
  }
}

export class AdapterParseError extends Error {
  readonly adapter: string;

  constructor(adapter: string, message: string, options?: { cause?: unknown }) {
    super(`${adapter} output could not be parsed: ${message}`, options);
    this.name = 'AdapterParseError';
    this.adapter = adapter;
  }
}

/** Fatal. Raised before any adapter starts. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error ?? '');
}
