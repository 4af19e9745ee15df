import { describe, test, expect, beforeEach, vi } from 'vitest';
import { createContainerBackend } from '../container.js';
import { FakeShell, testContext } from '../../__tests__/helpers.js';
import type { DeployContext } from '../../types.js';

const DIR = '/srv/app';
const FILTER = 'name=^fastapi-app$';

describe('docker backend', () => {
  let ctx: DeployContext;
  let shell: FakeShell;

  beforeEach(() => {
    ctx = testContext(DIR, { mode: 'docker', port: 8001 });
    shell = new FakeShell(['docker']);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  describe('start', () => {
    test('builds a missing image and runs a new container', async () => {
      await createContainerBackend(ctx, shell).start();

      expect(shell.lines()).toEqual([
        'docker images -q fastapi-app:latest',
        'docker build -t fastapi-app:latest .',
        `docker ps -a -q -f ${FILTER}`,
        'docker run -d --name fastapi-app -p 8001:8001 --restart unless-stopped fastapi-app:latest',
        `docker ps -q -f ${FILTER}`,
      ]);
    });

    test('replaces a running container and passes the parsed env file variables', async () => {
      ctx = testContext(DIR, {
        mode: 'docker',
        port: 8001,
        envFileLoaded: true,
        envFile: '/srv/app/.env',
        env: { DEBUG: 'true', SECRET_KEY: 'test-secret' },
      });
      shell
        .on('docker images -q fastapi-app:latest', { stdout: 'f1e2d3c4b5a6\n' })
        .on(`docker ps -a -q -f ${FILTER}`, { stdout: '0a1b2c3d4e5f\n' })
        .on(`docker ps -q -f ${FILTER}`, { stdout: '0a1b2c3d4e5f\n' });

      await createContainerBackend(ctx, shell).start();

      expect(shell.lines()).toEqual([
        'docker images -q fastapi-app:latest',
        `docker ps -a -q -f ${FILTER}`,
        `docker ps -q -f ${FILTER}`,
        'docker stop fastapi-app',
        'docker rm fastapi-app',
        'docker run -d --name fastapi-app -p 8001:8001 --restart unless-stopped -e DEBUG=true -e SECRET_KEY=test-secret fastapi-app:latest',
        `docker ps -q -f ${FILTER}`,
      ]);
    });

    test('runs every command in the app directory with the env file variables', async () => {
      ctx = testContext(DIR, { mode: 'docker', env: { DEBUG: 'false' } });

      await createContainerBackend(ctx, shell).start();

      expect(shell.calls[0].options).toEqual({ cwd: DIR, env: { DEBUG: 'false' } });
    });
  });

  test('uses podman when docker is missing', async () => {
    shell = new FakeShell(['podman']);

    await createContainerBackend(ctx, shell).stop();

    expect(shell.lines()).toEqual([`podman ps -a -q -f ${FILTER}`]);
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining("Command 'docker' not found, using podman instead")
    );
  });

  test('fails when no container runtime is installed', async () => {
    await expect(createContainerBackend(ctx, new FakeShell()).start()).rejects.toThrow(
      "Command 'docker' not found, please install it first"
    );
  });

  describe('stop', () => {
    test('removes a stopped container without stopping it', async () => {
      shell.on(`docker ps -a -q -f ${FILTER}`, { stdout: '0a1b2c3d4e5f\n' });

      await createContainerBackend(ctx, shell).stop();

      expect(shell.lines()).toEqual([
        `docker ps -a -q -f ${FILTER}`,
        `docker ps -q -f ${FILTER}`,
        'docker rm fastapi-app',
      ]);
    });

    test('warns when there is no container', async () => {
      await createContainerBackend(ctx, shell).stop();

      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining('Container fastapi-app is not running')
      );
    });
  });

  describe('status', () => {
    test('is running when ps reports the container', async () => {
      shell.on(`docker ps -q -f ${FILTER}`, { stdout: '0a1b2c3d4e5f\n' });

      expect(await createContainerBackend(ctx, shell).status()).toBe(true);
      expect(shell.calls[1]).toEqual({
        line: `docker ps -f ${FILTER}`,
        options: { cwd: DIR, env: {}, stdio: 'inherit' },
      });
    });

    test('is not running when ps prints nothing', async () => {
      expect(await createContainerBackend(ctx, shell).status()).toBe(false);
    });
  });

  test('clean removes the image', async () => {
    shell.on('docker images -q fastapi-app:latest', { stdout: 'f1e2d3c4b5a6\n' });

    await createContainerBackend(ctx, shell).clean();

    expect(shell.lines()).toEqual([
      `docker ps -a -q -f ${FILTER}`,
      'docker images -q fastapi-app:latest',
      'docker rmi fastapi-app:latest',
    ]);
  });

  test('logs follows the container output', async () => {
    shell.on(`docker ps -a -q -f ${FILTER}`, { stdout: '0a1b2c3d4e5f\n' });

    await createContainerBackend(ctx, shell).logs({ tail: '20', follow: true });

    expect(shell.lines()[1]).toBe('docker logs --tail 20 --follow fastapi-app');
  });
});
