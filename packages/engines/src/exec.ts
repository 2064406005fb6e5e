// packages/engines/src/exec.ts
import { execFile, type ExecFileOptions } from 'node:child_process';

export type ExecResult = { stdout: string; stderr: string; code: number };

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

export function execFilePromise(
  file: string,
  args: string[],
  options: ExecFileOptions = {}
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    execFile(file, args, { maxBuffer: DEFAULT_MAX_BUFFER, ...options }, (error, stdout, stderr) => {
      if (error) {
        reject(error);
        return;
      }
      resolve({ stdout: String(stdout ?? ''), stderr: String(stderr ?? '') });
    });
  });
}

/**
 * Resolves with the exit code instead of rejecting on a non-zero exit.
 * Still rejects when the process was aborted through `options.signal`, so a
 * killed scanner's truncated output is never handed to a parser.
 */
export function execFileAllowFailure(file: string, args: string[], options: ExecFileOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    execFile(file, args, { maxBuffer: DEFAULT_MAX_BUFFER, ...options }, (error, stdout, stderr) => {
      if (options.signal?.aborted) {
        reject(error ?? new Error(`${file} aborted`));
        return;
      }
      // error.code is a string for spawn failures (ENOENT); do not coerce to 0
      const rawCode: unknown = error?.code;
      const code = typeof rawCode === 'number' ? rawCode : error ? 1 : 0;

      resolve({
        stdout: String(stdout ?? ''),
        stderr: String(stderr ?? ''),
        code: Number.isFinite(code) ? code : 1,
      });
    });
  });
}
