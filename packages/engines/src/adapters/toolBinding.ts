// packages/engines/src/adapters/toolBinding.ts
import { ToolUnavailableError, errorMessage, noopLogger, type Logger } from '@vulntriage/core';
import type { ToolDiscovery, ToolHandle } from '../discovery.js';
import { execFileAllowFailure } from '../exec.js';

/**
 * One adapter's view of its executable: discovery runs once per instance and
 * both outcomes (found / ToolUnavailable) are remembered. Other errors, such
 * as an abort mid-download, are not cached.
 */
export class ToolBinding {
  private handle?: ToolHandle;
  private reason?: string;
  private pending?: Promise<ToolHandle | undefined>;
  private versionText?: Promise<string | undefined>;

  constructor(
    private readonly discovery: ToolDiscovery,
    readonly tool: string,
    private readonly versionArgs: string[] = ['--version'],
    private readonly logger: Logger = noopLogger
  ) {}

  resolve(signal?: AbortSignal): Promise<ToolHandle | undefined> {
    if (this.handle) return Promise.resolve(this.handle);
    if (this.reason !== undefined) return Promise.resolve(undefined);

    this.pending ??= this.discovery
      .locate(this.tool, { signal })
      .then(
        (handle) => {
          this.handle = handle;
          return handle;
        },
        (error: unknown) => {
          if (!(error instanceof ToolUnavailableError)) throw error;
          this.reason = error.message;
          return undefined;
        }
      )
      .finally(() => {
        this.pending = undefined;
      });
    return this.pending;
  }

  unavailableReason(): string | undefined {
    return this.reason;
  }

  async require(signal?: AbortSignal): Promise<ToolHandle> {
    const handle = await this.resolve(signal);
    if (!handle) throw new ToolUnavailableError(this.tool, [], this.reason);
    return handle;
  }

  version(): Promise<string | undefined> {
    this.versionText ??= (async () => {
      const handle = await this.resolve();
      if (!handle) return undefined;
      if (handle.version) return handle.version;
      try {
        const { stdout, stderr } = await execFileAllowFailure(handle.path, this.versionArgs, { timeout: 15_000 });
        const first = `${stdout}\n${stderr}`
          .split(/\r?\n/)
          .map((x) => x.trim())
          .find(Boolean);
        return first || 'unknown';
      } catch (error) {
        this.logger.debug(`${this.tool} version probe failed`, { error: errorMessage(error) });
        return 'unknown';
      }
    })();
    return this.versionText;
  }
}
