/**
 * Tests for the lifecycle commands against a recording backend
 */

import { describe, test, expect, vi, beforeEach } from 'vitest';
import prompts from 'prompts';
import { deploy } from '../deploy.js';
import { install } from '../install.js';
import { build } from '../build.js';
import { start } from '../start.js';
import { restart } from '../restart.js';
import { status } from '../status.js';
import { clean } from '../clean.js';
import { logs } from '../logs.js';
import { health } from '../health.js';
import { runHealthCheck } from '../../utils/health.js';
import { testContext } from '../../__tests__/helpers.js';
import type { Backend, DeployMode } from '../../types.js';

vi.mock('prompts');
vi.mock('../../utils/health.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../utils/health.js')>();
  return { ...actual, runHealthCheck: vi.fn() };
});

/** Backend whose operations only record that they ran */
function recordingBackend(mode: DeployMode, calls: string[]): Backend {
  const record = (name: string) => async () => {
    calls.push(name);
  };
  const backend: Backend = {
    mode,
    start: vi.fn(record('start')),
    stop: vi.fn(record('stop')),
    status: vi.fn(async () => {
      calls.push('status');
      return true;
    }),
    clean: vi.fn(record('clean')),
    logs: vi.fn(record('logs')),
  };
  if (mode === 'uvicorn') {
    backend.install = vi.fn(record('install'));
  } else {
    backend.build = vi.fn(record('build'));
  }
  return backend;
}

describe('Lifecycle commands', () => {
  const ctx = testContext('/srv/app');
  let calls: string[];

  beforeEach(() => {
    vi.clearAllMocks();
    calls = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  describe('deploy', () => {
    test('installs, starts and health checks in uvicorn mode', async () => {
      await deploy(ctx, recordingBackend('uvicorn', calls));

      expect(calls).toEqual(['install', 'start']);
      expect(runHealthCheck).toHaveBeenCalledWith(ctx);
      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining('API docs'),
        'http://127.0.0.1:8000/docs'
      );
    });

    test('only starts in container modes', async () => {
      await deploy({ ...ctx, mode: 'docker' }, recordingBackend('docker', calls));

      expect(calls).toEqual(['start']);
    });

    test('skips the health check on request', async () => {
      await deploy(ctx, recordingBackend('uvicorn', calls), { skipHealth: true });

      expect(runHealthCheck).not.toHaveBeenCalled();
    });

    test('does not start when install fails', async () => {
      const backend = recordingBackend('uvicorn', calls);
      backend.install = vi.fn(async () => {
        throw new Error('pip failed');
      });

      await expect(deploy(ctx, backend)).rejects.toThrow('pip failed');
      expect(calls).toEqual([]);
    });
  });

  test('start starts and health checks', async () => {
    await start(ctx, recordingBackend('docker', calls));

    expect(calls).toEqual(['start']);
    expect(runHealthCheck).toHaveBeenCalledTimes(1);
  });

  test('restart stops before starting', async () => {
    await restart(ctx, recordingBackend('docker-compose', calls));

    expect(calls).toEqual(['stop', 'start']);
    expect(runHealthCheck).toHaveBeenCalledTimes(1);
  });

  test('install warns outside uvicorn mode', async () => {
    await install(recordingBackend('docker', calls));

    expect(calls).toEqual([]);
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('Only uvicorn mode supports install')
    );
  });

  test('build runs in container modes and warns in uvicorn mode', async () => {
    await build(recordingBackend('docker', calls));
    await build(recordingBackend('uvicorn', calls));

    expect(calls).toEqual(['build']);
  });

  test('status passes the backend result through', async () => {
    const backend = recordingBackend('uvicorn', calls);
    vi.mocked(backend.status).mockResolvedValue(false);

    expect(await status(backend)).toBe(false);
  });

  describe('clean', () => {
    test('asks for confirmation and stops when declined', async () => {
      vi.mocked(prompts).mockResolvedValue({ confirmed: false });

      await clean(recordingBackend('docker', calls));

      expect(prompts).toHaveBeenCalledTimes(1);
      expect(calls).toEqual([]);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Cancelled'));
    });

    test('cleans once confirmed', async () => {
      vi.mocked(prompts).mockResolvedValue({ confirmed: true });

      await clean(recordingBackend('docker', calls));

      expect(calls).toEqual(['clean']);
    });

    test('--yes skips the prompt', async () => {
      await clean(recordingBackend('uvicorn', calls), { yes: true });

      expect(prompts).not.toHaveBeenCalled();
      expect(calls).toEqual(['clean']);
    });
  });

  test('logs rethrows failures other than Ctrl+C', async () => {
    const backend = recordingBackend('docker', calls);
    vi.mocked(backend.logs).mockRejectedValue(new Error('No such container: fastapi-app'));

    await expect(logs(backend, { tail: '100' })).rejects.toThrow('No such container: fastapi-app');
  });

  test('health probes the requested path without a grace period', async () => {
    await health(ctx, { path: '/ready', timeout: 5 });

    expect(runHealthCheck).toHaveBeenCalledWith(ctx, {
      path: '/ready',
      initialDelayMs: 0,
      timeoutMs: 5000,
    });
  });
});
