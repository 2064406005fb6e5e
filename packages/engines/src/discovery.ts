// packages/engines/src/discovery.ts
import fs from 'node:fs';
import path from 'node:path';
import { ToolUnavailableError, errorMessage, noopLogger, type Logger } from '@vulntriage/core';
import type { ToolCache } from './cache.js';

export type DiscoveryStrategy = 'path' | 'project' | 'cache';

export interface ToolHandle {
  name: string;
  path: string;
  strategy: DiscoveryStrategy;
  version?: string;
}

export interface ToolDiscoveryOptions {
  /** Root of the scanned project; its virtualenvs and node_modules/.bin are searched. */
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
  platform?: string;
  logger?: Logger;
}

export interface LocateOptions {
  signal?: AbortSignal;
  /** Executable name when it differs from the tool name. */
  binaryName?: string;
}

const PROJECT_VENV_DIRS = ['.venv', 'venv', 'env'];

async function isExecutableFile(p: string, platform: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(p);
    if (!stat.isFile()) return false;
    if (platform !== 'win32') await fs.promises.access(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Fallback chain: system PATH, then project-local installs, then the tool
 * cache (which may download). The first hit wins. Only the cache strategy
 * writes anything.
 */
export class ToolDiscovery {
  private readonly projectRoot?: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: string;
  private readonly logger: Logger;

  constructor(
    private readonly cache: ToolCache | undefined,
    opts: ToolDiscoveryOptions = {}
  ) {
    this.projectRoot = opts.projectRoot ? path.resolve(opts.projectRoot) : undefined;
    this.env = opts.env ?? process.env;
    this.platform = opts.platform ?? process.platform;
    this.logger = opts.logger ?? noopLogger;
  }

  private candidateNames(name: string): string[] {
    if (this.platform !== 'win32') return [name];
    if (path.extname(name)) return [name];
    const exts = String(this.env.PATHEXT || '.EXE;.CMD;.BAT;.COM')
      .split(';')
      .map((e) => e.trim().toLowerCase())
      .filter(Boolean);
    return [name, ...exts.map((ext) => `${name}${ext}`)];
  }

  async findOnPath(name: string): Promise<string | undefined> {
    const sep = this.platform === 'win32' ? ';' : ':';
    const dirs = String(this.env.PATH || this.env.Path || '')
      .split(sep)
      .map((d) => d.trim())
      .filter(Boolean);
    for (const dir of dirs) {
      for (const candidate of this.candidateNames(name)) {
        const full = path.join(dir, candidate);
        if (await isExecutableFile(full, this.platform)) return full;
      }
    }
    return undefined;
  }

  projectCandidates(name: string): string[] {
    if (!this.projectRoot) return [];
    const root = this.projectRoot;
    const binDir = this.platform === 'win32' ? 'Scripts' : 'bin';
    const dirs = [
      ...PROJECT_VENV_DIRS.map((venv) => path.join(root, venv, binDir)),
      path.join(root, 'node_modules', '.bin'),
    ];
    return dirs.flatMap((dir) => this.candidateNames(name).map((candidate) => path.join(dir, candidate)));
  }

  async locate(tool: string, opts: LocateOptions = {}): Promise<ToolHandle> {
    const binaryName = opts.binaryName ?? tool;
    const checked: string[] = [];

    checked.push('PATH');
    const onPath = await this.findOnPath(binaryName);
    if (onPath) {
      this.logger.debug(`discovered ${tool} on PATH`, { path: onPath });
      return { name: tool, path: onPath, strategy: 'path' };
    }

    for (const candidate of this.projectCandidates(binaryName)) {
      checked.push(candidate);
      if (await isExecutableFile(candidate, this.platform)) {
        this.logger.debug(`discovered ${tool} in project`, { path: candidate });
        return { name: tool, path: candidate, strategy: 'project' };
      }
    }

    if (!this.cache) {
      checked.push('cache: none configured');
      throw new ToolUnavailableError(tool, checked);
    }

    checked.push(this.cache.describe(tool));
    opts.signal?.throwIfAborted();
    try {
      const cached = await this.cache.ensure(tool, opts.signal);
      this.logger.debug(`discovered ${tool} in cache`, { path: cached });
      return { name: tool, path: cached, strategy: 'cache', version: this.cache.entry(tool)?.version };
    } catch (error) {
      if (opts.signal?.aborted) throw error;
      const detail = error instanceof ToolUnavailableError ? error.detail : errorMessage(error);
      throw new ToolUnavailableError(tool, checked, detail);
    }
  }
}
