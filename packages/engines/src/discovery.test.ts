import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createHash } from 'node:crypto';
import { describe, expect, test } from 'vitest';
import { ToolUnavailableError } from '@vulntriage/core';
import { ToolCache, type FetchLike } from './cache.js';
import { ToolDiscovery } from './discovery.js';

const BINARY = '#!/bin/sh\necho faketool\n';

function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

function executable(file: string): string {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, BINARY);
  fs.chmodSync(file, 0o755);
  return file;
}

const fetch: FetchLike = async () => ({
  ok: true,
  status: 200,
  async arrayBuffer() {
    const bytes = Buffer.from(BINARY);
    const out = new ArrayBuffer(bytes.length);
    new Uint8Array(out).set(bytes);
    return out;
  },
});

function cacheAt(root: string, allowDownload = true): ToolCache {
  return new ToolCache({
    root,
    allowDownload,
    fetch,
    platform: 'linux',
    arch: 'x64',
    manifest: {
      faketool: {
        name: 'faketool',
        version: '1.0.0',
        artifacts: [
          {
            platform: 'linux',
            arch: 'x64',
            url: 'https://downloads.example.test/faketool',
            sha256: createHash('sha256').update(BINARY).digest('hex'),
            archiveType: 'binary',
            binaryName: 'faketool',
          },
        ],
      },
    },
  });
}

const posixOnly = process.platform === 'win32' ? describe.skip : describe;

posixOnly('tool discovery', () => {
  test('PATH wins over the project and the cache', async () => {
    const binDir = tmpDir('vulntriage-path-');
    const onPath = executable(path.join(binDir, 'faketool'));
    const project = tmpDir('vulntriage-project-');
    executable(path.join(project, '.venv', 'bin', 'faketool'));

    const discovery = new ToolDiscovery(cacheAt(tmpDir('vulntriage-cache-')), {
      projectRoot: project,
      env: { PATH: binDir },
      platform: 'linux',
    });
    expect(await discovery.locate('faketool')).toEqual({ name: 'faketool', path: onPath, strategy: 'path' });
  });

  test('falls back to project-local virtualenvs', async () => {
    const project = tmpDir('vulntriage-project-');
    const local = executable(path.join(project, 'venv', 'bin', 'faketool'));

    const discovery = new ToolDiscovery(undefined, { projectRoot: project, env: { PATH: '' }, platform: 'linux' });
    expect(await discovery.locate('faketool')).toEqual({ name: 'faketool', path: local, strategy: 'project' });
  });

  test('non-executable files on PATH are ignored', async () => {
    const binDir = tmpDir('vulntriage-path-');
    fs.writeFileSync(path.join(binDir, 'faketool'), 'not a program');
    fs.chmodSync(path.join(binDir, 'faketool'), 0o644);
    const discovery = new ToolDiscovery(undefined, { env: { PATH: binDir }, platform: 'linux' });

    expect(await discovery.findOnPath('faketool')).toBeUndefined();
  });

  test('downloads into the cache as a last resort', async () => {
    const root = tmpDir('vulntriage-cache-');
    const discovery = new ToolDiscovery(cacheAt(root), { env: { PATH: '' }, platform: 'linux' });

    expect(await discovery.locate('faketool')).toEqual({
      name: 'faketool',
      path: path.join(root, 'bin', 'faketool', '1.0.0', 'faketool'),
      strategy: 'cache',
      version: '1.0.0',
    });
  });

  test('names every location checked when nothing is found', async () => {
    const project = tmpDir('vulntriage-project-');
    const discovery = new ToolDiscovery(undefined, { projectRoot: project, env: { PATH: '' }, platform: 'linux' });

    const error = await discovery.locate('faketool').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ToolUnavailableError);
    expect(error).toMatchObject({
      tool: 'faketool',
      checked: [
        'PATH',
        path.join(project, '.venv', 'bin', 'faketool'),
        path.join(project, 'venv', 'bin', 'faketool'),
        path.join(project, 'env', 'bin', 'faketool'),
        path.join(project, 'node_modules', '.bin', 'faketool'),
        'cache: none configured',
      ],
    });
  });

  test('a cache that may not download reports why', async () => {
    const root = tmpDir('vulntriage-cache-');
    const discovery = new ToolDiscovery(cacheAt(root, false), { env: { PATH: '' }, platform: 'linux' });

    await expect(discovery.locate('faketool')).rejects.toThrow(
      `faketool not found (checked: PATH, cache:${path.join(root, 'bin', 'faketool', '1.0.0', 'faketool')}). Downloads are disabled.`
    );
  });
});
