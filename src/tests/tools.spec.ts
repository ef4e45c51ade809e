import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { containerCommand, runCommand } from '../tools/cli/exec.js';
import { authHeaders, downloadResource, fetchResource } from '../tools/http/request.js';
import { ConfigurationError, ResourceError } from '../errors/index.js';

describe('runCommand', () => {
  it('captures stdout of a successful command', async () => {
    const res = await runCommand('echo hi', { shell: 'sh' });
    expect(res).toEqual({ ok: true, command: 'echo hi', stdout: 'hi\n', stderr: '', exitCode: 0 });
  });

  it('reports the exit code and stderr of a failing command', async () => {
    const res = await runCommand('echo oops >&2; exit 3', { shell: 'sh' });
    expect(res.ok).toBe(false);
    expect(res.exitCode).toBe(3);
    expect(res.stderr).toBe('oops\n');
  });

  it('refuses an empty command', async () => {
    expect(await runCommand('   ')).toEqual({ ok: false, command: '   ', stdout: '', stderr: 'command is required', exitCode: 'EINVAL' });
  });

  it('runs in the given directory', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'exec-'));
    writeFileSync(join(dir, 'marker.txt'), 'here');
    const res = await runCommand('cat marker.txt', { shell: 'sh', cwd: dir });
    expect(res.stdout).toBe('here');
  });

  it('builds a docker invocation for container isolation', () => {
    expect(containerCommand(`echo 'hi'`, 'ubuntu:22.04', 'bash')).toBe(`docker run --rm 'ubuntu:22.04' bash -c 'echo '\\''hi'\\'''`);
  });
});

describe('authHeaders', () => {
  it('prefers a bearer token', () => {
    expect(authHeaders({ token: 'test-token', username: 'u', password: 'p' })).toEqual({ authorization: 'Bearer test-token' });
  });

  it('falls back to basic auth and merges extra headers', () => {
    const basic = Buffer.from('deploy:test-secret').toString('base64');
    expect(authHeaders({ username: 'deploy', password: 'test-secret', headers: { 'x-trace': '1' } })).toEqual({
      authorization: `Basic ${basic}`,
      'x-trace': '1'
    });
    expect(authHeaders()).toEqual({});
  });
});

describe('fetchResource', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reads local files relative to the base directory', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'fetch-'));
    writeFileSync(join(dir, 'vault.yaml'), 'k: v\n');
    expect(await fetchResource('vault.yaml', { baseDir: dir })).toBe('k: v\n');
    await expect(fetchResource('absent.yaml', { baseDir: dir })).rejects.toBeInstanceOf(ResourceError);
  });

  it('rejects git locations', async () => {
    await expect(fetchResource('git@example.test:org/repo.git')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('fetches http locations with auth headers', async () => {
    const fetchMock = vi.fn(async () => new Response('echo remote', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    expect(await fetchResource('https://scripts.example.test/run.sh', { auth: { token: 'test-token' } })).toBe('echo remote');
    expect(fetchMock).toHaveBeenCalledWith('https://scripts.example.test/run.sh', expect.objectContaining({
      method: 'GET',
      headers: { authorization: 'Bearer test-token' }
    }));
  });

  it('turns an http error status into a resource error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 404 })));
    await expect(fetchResource('https://scripts.example.test/missing.sh')).rejects.toThrow('HTTP 404');
  });

  it('downloads remote files to the target and resolves local ones in place', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('echo remote', { status: 200 })));
    const dir = mkdtempSync(join(tmpdir(), 'download-'));
    const target = join(dir, 'nested', 'run.sh');
    expect(await downloadResource('https://scripts.example.test/run.sh', target)).toBe(target);
    expect(readFileSync(target, 'utf-8')).toBe('echo remote');
    expect(await downloadResource('local.sh', join(dir, 'ignored.sh'), { baseDir: dir })).toBe(join(dir, 'local.sh'));
  });
});
