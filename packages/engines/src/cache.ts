// packages/engines/src/cache.ts
import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ToolUnavailableError,
  errorMessage,
  isRecord,
  asString,
  noopLogger,
  type Logger,
  type VerifyDownloadsMode,
} from '@vulntriage/core';
import { execFilePromise } from './exec.js';
import {
  TOOL_MANIFEST,
  executableName,
  resolveToolArtifact,
  type ToolArtifact,
  type ToolEntry,
  type ToolManifest,
} from './toolManifest.js';

export type FetchResponseLike = {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
};

export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal; headers?: Record<string, string> }
) => Promise<FetchResponseLike>;

/** Runs a command for venv/pip installs; injectable so tests never spawn Python. */
export type CommandRunner = (file: string, args: string[], opts: { signal?: AbortSignal }) => Promise<unknown>;

export interface ToolCacheOptions {
  /** Defaults to $VULNTRIAGE_TOOLS_DIR, then ~/.vulntriage/tools. */
  root?: string;
  allowDownload?: boolean;
  verifyMode?: VerifyDownloadsMode;
  manifest?: ToolManifest;
  fetch?: FetchLike;
  runCommand?: CommandRunner;
  platform?: string;
  arch?: string;
  logger?: Logger;
}

export interface CachedToolRecord {
  version: string;
  binaryPath: string;
  sha256: string;
  installedAt: string;
}

export function getToolsDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env.VULNTRIAGE_TOOLS_DIR || path.join(os.homedir(), '.vulntriage', 'tools'));
}

export function sha256File(filePath: string): string {
  return crypto.createHash('sha256').update(fs.readFileSync(filePath)).digest('hex');
}

function verificationError(tool: string, reason: string): Error {
  return new Error(`[${tool}] download verification failed: ${reason}`);
}

function handleVerificationFailure(mode: VerifyDownloadsMode, tool: string, reason: string, logger: Logger): boolean {
  if (mode === 'off') return true;
  if (mode === 'warn') {
    logger.warn(`${tool} verification issue: ${reason}`);
    return true;
  }
  throw verificationError(tool, reason);
}

export function verifyFileWithMode(args: {
  mode: VerifyDownloadsMode;
  tool: string;
  filePath: string;
  expectedSha256?: string;
  logger?: Logger;
}): boolean {
  const logger = args.logger ?? noopLogger;
  if (args.mode === 'off') return true;
  if (!args.expectedSha256) {
    return handleVerificationFailure(args.mode, args.tool, `missing checksum entry for ${path.basename(args.filePath)}`, logger);
  }
  const actual = sha256File(args.filePath);
  if (actual !== args.expectedSha256) {
    return handleVerificationFailure(
      args.mode,
      args.tool,
      `checksum mismatch for ${path.basename(args.filePath)} (expected ${args.expectedSha256}, got ${actual})`,
      logger
    );
  }
  return true;
}

function findFileRecursive(root: string, matcher: (name: string) => boolean): string | undefined {
  if (!fs.existsSync(root)) return undefined;
  const stack = [root];
  while (stack.length) {
    const cur = stack.pop();
    if (cur === undefined) break;
    for (const entry of fs.readdirSync(cur, { withFileTypes: true })) {
      const full = path.join(cur, entry.name);
      if (entry.isDirectory()) stack.push(full);
      else if (matcher(entry.name)) return full;
    }
  }
  return undefined;
}

function tempSuffix(): string {
  return `${process.pid}-${crypto.randomBytes(4).toString('hex')}`;
}

function isAlreadyThere(error: unknown): boolean {
  const code = isRecord(error) ? error.code : undefined;
  return code === 'EEXIST' || code === 'ENOTEMPTY' || code === 'EPERM';
}

/**
 * Versioned tool cache outside the scanned project: bin/<tool>/<version>/.
 *
 * Downloads, unpacked binaries and manifest.json land in a temp path first and
 * are moved into place with a rename. Venv installs are only recorded in
 * manifest.json once pip has finished, and `existing` trusts nothing that is
 * not recorded. Within one process, concurrent installs of the same
 * tool@version share one promise.
 */
export class ToolCache {
  readonly root: string;
  readonly allowDownload: boolean;
  readonly verifyMode: VerifyDownloadsMode;
  private readonly manifest: ToolManifest;
  private readonly fetchFn: FetchLike;
  private readonly runCommand: CommandRunner;
  private readonly platform: string;
  private readonly arch: string;
  private readonly logger: Logger;
  private readonly inflight = new Map<string, Promise<string>>();

  constructor(opts: ToolCacheOptions = {}) {
    this.root = path.resolve(opts.root ?? getToolsDir());
    this.allowDownload = opts.allowDownload ?? true;
    this.verifyMode = opts.verifyMode ?? 'strict';
    this.manifest = opts.manifest ?? TOOL_MANIFEST;
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.runCommand = opts.runCommand ?? ((file, args, o) => execFilePromise(file, args, { signal: o.signal }));
    this.platform = opts.platform ?? process.platform;
    this.arch = opts.arch ?? process.arch;
    this.logger = opts.logger ?? noopLogger;
  }

  entry(tool: string): ToolEntry | undefined {
    return this.manifest[tool];
  }

  binaryDir(tool: string, version: string): string {
    return path.join(this.root, 'bin', tool, version);
  }

  venvDir(tool: string, version: string): string {
    return path.join(this.root, 'venvs', tool, version);
  }

  private manifestPath(): string {
    return path.join(this.root, 'manifest.json');
  }

  readRecords(): Record<string, CachedToolRecord> {
    const file = this.manifestPath();
    if (!fs.existsSync(file)) return {};
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (error) {
      this.logger.warn(`ignoring unreadable tool cache manifest ${file}: ${errorMessage(error)}`);
      return {};
    }
    const out: Record<string, CachedToolRecord> = {};
    if (!isRecord(data)) return out;
    for (const [key, value] of Object.entries(data)) {
      if (!isRecord(value)) continue;
      out[key] = {
        version: asString(value.version),
        binaryPath: asString(value.binaryPath),
        sha256: asString(value.sha256),
        installedAt: asString(value.installedAt),
      };
    }
    return out;
  }

  private writeRecord(key: string, record: CachedToolRecord): void {
    const data = { ...this.readRecords(), [key]: record };
    const file = this.manifestPath();
    const tmp = `${file}.${tempSuffix()}.tmp`;
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2));
    fs.renameSync(tmp, file);
  }

  /**
   * Locations strategy 3 would use for `tool`, for NotFound reporting.
   */
  describe(tool: string): string {
    const entry = this.entry(tool);
    if (!entry) return `cache: no manifest entry for ${tool}`;
    return `cache:${path.join(this.binaryDir(tool, entry.version), executableName(entry.binaryName ?? tool, this.platform))}`;
  }

  /**
   * A previously installed binary, re-verified against the checksum recorded
   * at install time. Read-only.
   */
  existing(tool: string): string | undefined {
    const entry = this.entry(tool);
    if (!entry) return undefined;
    const key = `${tool}@${entry.version}`;
    const record = this.readRecords()[key];
    if (!record || !record.binaryPath || !fs.existsSync(record.binaryPath)) return undefined;
    verifyFileWithMode({
      mode: this.verifyMode,
      tool,
      filePath: record.binaryPath,
      expectedSha256: record.sha256 || undefined,
      logger: this.logger,
    });
    return record.binaryPath;
  }

  /** Existing binary, else download (strategy 3). Rejects with ToolUnavailableError when that is not possible. */
  async ensure(tool: string, signal?: AbortSignal): Promise<string> {
    const entry = this.entry(tool);
    if (!entry) throw new ToolUnavailableError(tool, [this.describe(tool)]);

    const have = this.existing(tool);
    if (have) return have;

    if (!this.allowDownload) {
      throw new ToolUnavailableError(tool, [this.describe(tool)], 'Downloads are disabled.');
    }

    const key = `${tool}@${entry.version}`;
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const job = this.install(entry, signal).finally(() => this.inflight.delete(key));
    this.inflight.set(key, job);
    return job;
  }

  private async install(entry: ToolEntry, signal?: AbortSignal): Promise<string> {
    const artifact = resolveToolArtifact(entry, this.platform, this.arch);
    this.logger.info(`installing ${entry.name}@${entry.version} into ${this.root}`);

    let binaryPath: string;
    if (artifact && artifact.archiveType !== 'whl') {
      binaryPath = await this.installArchive(entry, artifact, signal);
    } else if (artifact || entry.pipPackage) {
      binaryPath = await this.installIntoVenv(entry, artifact, signal);
    } else {
      throw new ToolUnavailableError(
        entry.name,
        [this.describe(entry.name)],
        `No ${entry.name} artifact configured for ${this.platform}/${this.arch}`
      );
    }

    this.writeRecord(`${entry.name}@${entry.version}`, {
      version: entry.version,
      binaryPath,
      sha256: sha256File(binaryPath),
      installedAt: new Date().toISOString(),
    });
    return binaryPath;
  }

  private async download(artifact: ToolArtifact, dest: string, signal?: AbortSignal): Promise<void> {
    const res = await this.fetchFn(artifact.url, { signal, headers: { 'User-Agent': 'vulntriage' } });
    if (!res.ok) throw new Error(`Failed download ${artifact.url}: ${res.status}`);
    await fs.promises.mkdir(path.dirname(dest), { recursive: true });
    await fs.promises.writeFile(dest, Buffer.from(await res.arrayBuffer()));
  }

  private async fetchVerified(entry: ToolEntry, artifact: ToolArtifact, signal?: AbortSignal): Promise<string> {
    const dir = path.join(this.root, 'downloads', entry.name, entry.version);
    const archiveName = path.basename(new URL(artifact.url).pathname) || `${entry.name}-${entry.version}`;
    const finalPath = path.join(dir, archiveName);
    if (fs.existsSync(finalPath)) {
      verifyFileWithMode({ mode: this.verifyMode, tool: entry.name, filePath: finalPath, expectedSha256: artifact.sha256, logger: this.logger });
      return finalPath;
    }

    const tmp = path.join(dir, `.${archiveName}.${tempSuffix()}.part`);
    try {
      await this.download(artifact, tmp, signal);
      verifyFileWithMode({ mode: this.verifyMode, tool: entry.name, filePath: tmp, expectedSha256: artifact.sha256, logger: this.logger });
      fs.renameSync(tmp, finalPath);
    } finally {
      fs.rmSync(tmp, { force: true });
    }
    return finalPath;
  }

  private async installArchive(entry: ToolEntry, artifact: ToolArtifact, signal?: AbortSignal): Promise<string> {
    const archivePath = await this.fetchVerified(entry, artifact, signal);
    const staging = path.join(this.root, 'tmp', `${entry.name}-${tempSuffix()}`);
    const extractDir = path.join(staging, 'extract');
    const stagedBinDir = path.join(staging, 'bin');
    fs.mkdirSync(extractDir, { recursive: true });
    fs.mkdirSync(stagedBinDir, { recursive: true });

    try {
      if (artifact.archiveType === 'zip') {
        if (this.platform === 'win32') {
          await execFilePromise(
            'powershell.exe',
            ['-NoProfile', '-Command', `Expand-Archive -Path "${archivePath}" -DestinationPath "${extractDir}" -Force`],
            { signal }
          );
        } else {
          await execFilePromise('unzip', ['-o', archivePath, '-d', extractDir], { signal });
        }
      } else if (artifact.archiveType === 'tar.gz') {
        await execFilePromise(this.platform === 'win32' ? 'tar.exe' : 'tar', ['-xzf', archivePath, '-C', extractDir], { signal });
      } else {
        fs.copyFileSync(archivePath, path.join(extractDir, artifact.binaryName));
      }

      const discovered = findFileRecursive(extractDir, (name) => name.toLowerCase() === artifact.binaryName.toLowerCase());
      if (!discovered) throw new Error(`Downloaded ${entry.name} archive did not contain expected binary ${artifact.binaryName}`);

      const staged = path.join(stagedBinDir, artifact.binaryName);
      fs.copyFileSync(discovered, staged);
      if (this.platform !== 'win32') fs.chmodSync(staged, 0o755);

      const target = this.binaryDir(entry.name, entry.version);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      try {
        fs.renameSync(stagedBinDir, target);
      } catch (error) {
        // another writer finished first; keep theirs
        if (!isAlreadyThere(error) || !fs.existsSync(path.join(target, artifact.binaryName))) throw error;
      }
      return path.join(target, artifact.binaryName);
    } finally {
      fs.rmSync(staging, { recursive: true, force: true });
    }
  }

  private async installIntoVenv(entry: ToolEntry, artifact: ToolArtifact | undefined, signal?: AbortSignal): Promise<string> {
    const python = await this.resolvePython(signal);
    const venvDir = this.venvDir(entry.name, entry.version);
    const binDir = this.platform === 'win32' ? path.join(venvDir, 'Scripts') : path.join(venvDir, 'bin');
    const pythonExe = this.platform === 'win32' ? path.join(binDir, 'python.exe') : path.join(binDir, 'python');

    const spec = artifact ? await this.fetchVerified(entry, artifact, signal) : entry.pipPackage;
    if (!spec) throw new Error(`No install source for ${entry.name}`);

    await this.runCommand(python, ['-m', 'venv', venvDir], { signal });
    await this.runCommand(pythonExe, ['-m', 'pip', 'install', '--upgrade', 'pip', 'setuptools', 'wheel'], { signal });
    await this.runCommand(pythonExe, ['-m', 'pip', 'install', '--upgrade', spec], { signal });

    const bin = path.join(binDir, executableName(entry.binaryName ?? entry.name, this.platform));
    if (!fs.existsSync(bin)) throw new Error(`${entry.name} install completed but executable was not found in venv.`);
    if (this.platform !== 'win32') fs.chmodSync(bin, 0o755);
    return bin;
  }

  private async resolvePython(signal?: AbortSignal): Promise<string> {
    const candidates = this.platform === 'win32' ? ['py', 'python', 'python3'] : ['python3', 'python'];
    const failures: string[] = [];
    for (const candidate of candidates) {
      try {
        await this.runCommand(candidate, ['--version'], { signal });
        return candidate;
      } catch (error) {
        failures.push(`${candidate}: ${errorMessage(error)}`);
      }
    }
    throw new Error(`Python is required to install Python-based tools (${failures.join('; ')})`);
  }
}
