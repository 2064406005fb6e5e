// packages/core/src/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.VULNTRIAGE_DEBUG === '1' || String(env.DEBUG || '').toLowerCase().includes('vulntriage');
}

function formatLine(prefix: string, message: string, meta?: Record<string, unknown>): string {
  return meta && Object.keys(meta).length ? `${prefix} ${message} ${JSON.stringify(meta)}` : `${prefix} ${message}`;
}

/**
 * Writes to stderr so stdout stays free for machine-readable output.
 * Debug lines only appear when VULNTRIAGE_DEBUG=1 or DEBUG mentions vulntriage.
 */
export function createConsoleLogger(opts: { scope?: string; debug?: boolean } = {}): Logger {
  const tag = opts.scope ? `[vulntriage:${opts.scope}]` : '[vulntriage]';
  const debugOn = opts.debug ?? isDebugEnabled();

  return {
    debug: (message, meta) => {
      if (!debugOn) return;
      console.error(formatLine(tag, message, meta));
    },
    info: (message, meta) => console.error(formatLine(tag, message, meta)),
    warn: (message, meta) => console.warn(formatLine(`${tag} WARNING:`, message, meta)),
    error: (message, meta) => console.error(formatLine(`${tag} ERROR:`, message, meta)),
  };
}
