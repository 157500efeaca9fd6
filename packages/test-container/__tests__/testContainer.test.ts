import { EventEmitter } from 'node:events';

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { loadTestContainerConfig } from '../src/lib/config';
import type { ContainerVariant } from '../src/lib/containerVariant';
import {
  ContainerLaunchError,
  ContainerStateError,
  ImageNotFoundError,
  ReadinessTimeoutError,
  UnexpectedContainerExitError,
} from '../src/lib/errors';
import { ContainerFaultChannel } from '../src/lib/faultChannel';
import { ShutdownGuard } from '../src/lib/shutdownGuard';
import { TestContainer, withTestContainer, type TestContainerOptions } from '../src/lib/testContainer';
import { FakeEngine, LOCAL_ENVIRONMENT, captureLogger, redisVariant, type CapturedLog } from './fakes';

class FakeProcess extends EventEmitter {
  readonly pid = 1;
  kill = vi.fn(() => true);
}

const FIRST_ID = '0001deadbeefcafebabe';

describe('TestContainer', () => {
  let engine: FakeEngine;
  let guard: ShutdownGuard;
  let faults: ContainerFaultChannel;
  let exitTarget: { exitCode?: number | string };
  let logs: CapturedLog[];
  let options: (extra?: Partial<TestContainerOptions>) => TestContainerOptions;

  beforeEach(() => {
    engine = new FakeEngine();
    const captured = captureLogger();
    logs = captured.logs;
    guard = new ShutdownGuard(new FakeProcess(), captured.logger);
    exitTarget = {};
    faults = new ContainerFaultChannel({ logger: captured.logger, exitCodeTarget: exitTarget });
    options = (extra = {}) => ({
      config: loadTestContainerConfig({}),
      logger: captured.logger,
      faults,
      shutdownGuard: guard,
      hostEnvironment: LOCAL_ENVIRONMENT,
      engineFactory: () => engine,
      ...extra,
    });
  });

  describe('start', () => {
    it('pulls, creates and starts the container and registers a shutdown hook', async () => {
      const container = new TestContainer(redisVariant(), options());

      await container.start();

      expect(container.state).toBe('Running');
      expect(container.containerId).toBe(FIRST_ID);
      expect(container.containerName).toBe('fake_0001');
      expect(container.hostAddress).toBe('127.0.0.1');
      expect(engine.pullImage).toHaveBeenCalledWith('redis:latest');
      expect(engine.createContainer).toHaveBeenCalledWith({
        Env: ['MODE=test'],
        Image: 'redis:latest',
        HostConfig: { PublishAllPorts: true },
      });
      expect(engine.startContainer).toHaveBeenCalledWith(FIRST_ID);
      expect(engine.waitContainer).toHaveBeenCalledWith(FIRST_ID);
      expect(guard.size).toBe(1);
    });

    it('skips the pull when the image is already present', async () => {
      engine.images.add('redis:latest');
      const container = new TestContainer(redisVariant(), options());

      await container.start();

      expect(engine.pullImage).not.toHaveBeenCalled();
      expect(container.state).toBe('Running');
    });

    it('rejects a second start', async () => {
      const container = new TestContainer(redisVariant(), options());
      await container.start();

      await expect(container.start()).rejects.toBeInstanceOf(ContainerStateError);
      expect(engine.createContainer).toHaveBeenCalledTimes(1);
    });

    it('passes host address, runtime info and readiness budget to a custom readiness check', async () => {
      const waitUntilReady = vi.fn(async () => {});
      const container = new TestContainer(redisVariant({ waitUntilReady }), options());

      await container.start();

      expect(waitUntilReady).toHaveBeenCalledWith({
        hostAddress: '127.0.0.1',
        info: expect.objectContaining({ id: FIRST_ID, name: 'fake_0001' }),
        options: { intervalMs: 100, maxAttempts: 6000 },
      });
    });

    it('wraps a readiness timeout and reports no fault', async () => {
      const variant = redisVariant({ livenessCheckPort: () => 49153 });
      const connect = vi.fn(async () => {
        throw new Error('connect ECONNREFUSED');
      });
      const container = new TestContainer(
        variant,
        options({ readiness: { connect, sleep: async () => {}, maxAttempts: 3 } }),
      );

      const err = await container.start().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ContainerLaunchError);
      expect((err as ContainerLaunchError).cause).toBeInstanceOf(ReadinessTimeoutError);
      expect((err as ContainerLaunchError).containerId).toBe(FIRST_ID);
      expect(connect).toHaveBeenCalledTimes(3);
      expect(connect).toHaveBeenCalledWith('127.0.0.1', 49153, expect.any(Number));
      expect(container.state).toBe('Failed');
      expect(guard.size).toBe(0);
      expect(faults.faultCount).toBe(0);

      await container.stop();

      expect(engine.removeContainer).toHaveBeenCalledWith(FIRST_ID, { force: true });
      expect(engine.containers.size).toBe(0);
      expect(container.state).toBe('Failed');
    });

    it('passes through a launch error that already names the created container', async () => {
      engine.startContainer.mockRejectedValueOnce(new Error('port is already allocated'));
      const container = new TestContainer(redisVariant(), options());

      const err = await container.start().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ContainerLaunchError);
      expect((err as ContainerLaunchError).message).toBe(
        "Could not create/start container for image 'redis:latest': port is already allocated",
      );
      expect((err as ContainerLaunchError).containerId).toBe(FIRST_ID);
      expect(container.containerId).toBe(FIRST_ID);

      await container.stop();

      expect(engine.containers.has(FIRST_ID)).toBe(false);
    });

    it('wraps an image that cannot be found and never creates a container', async () => {
      engine.pullEvents = [{ error: 'manifest for redis:latest not found' }];
      const container = new TestContainer(redisVariant(), options());

      const err = await container.start().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ContainerLaunchError);
      expect((err as ContainerLaunchError).cause).toBeInstanceOf(ImageNotFoundError);
      expect(engine.createContainer).not.toHaveBeenCalled();
      expect(container.containerId).toBeUndefined();

      await container.stop();

      expect(engine.killContainer).not.toHaveBeenCalled();
      expect(engine.removeContainer).not.toHaveBeenCalled();
    });

    it('wraps a host environment that cannot be resolved', async () => {
      const engineFactory = vi.fn(() => engine);
      const cause = new Error('boot2docker up failed');
      const container = new TestContainer(
        redisVariant(),
        options({
          hostEnvironment: undefined,
          engineFactory,
          resolveHost: async () => {
            throw cause;
          },
        }),
      );

      const err = await container.start().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ContainerLaunchError);
      expect((err as ContainerLaunchError).message).toBe('Could not create/start container: boot2docker up failed');
      expect((err as ContainerLaunchError).cause).toBe(cause);
      expect(engineFactory).not.toHaveBeenCalled();
      expect(container.state).toBe('Failed');
    });
  });

  describe('tags', () => {
    it('uses the tag option over the default', async () => {
      const container = new TestContainer(redisVariant(), options({ tag: '7' }));

      await container.start();

      expect(engine.pullImage).toHaveBeenCalledWith('redis:7');
    });

    it('keeps a tag carried by the image name and falls back to latest for an empty tag', () => {
      expect(new TestContainer(redisVariant({ imageName: 'redis:6.2' }), options()).imageReference.toString()).toBe(
        'redis:6.2',
      );
      expect(new TestContainer(redisVariant(), options({ tag: '' })).imageReference.toString()).toBe('redis:latest');
    });

    it('allows changing the tag only before start', async () => {
      const container = new TestContainer(redisVariant(), options({ tag: '7' }));
      container.setTag(null);
      expect(container.imageReference.toString()).toBe('redis:latest');

      await container.start();

      expect(() => container.setTag('8')).toThrow(ContainerStateError);
    });
  });

  describe('stop', () => {
    it('kills and removes the container exactly once however often it is called', async () => {
      const container = new TestContainer(redisVariant(), options());
      await container.start();

      await Promise.all([container.stop(), container.stop()]);
      await container.stop();
      await container.terminationSettled;

      expect(engine.killContainer).toHaveBeenCalledTimes(1);
      expect(engine.removeContainer).toHaveBeenCalledTimes(1);
      expect(engine.removeContainer).toHaveBeenCalledWith(FIRST_ID, { force: true });
      expect(container.state).toBe('Stopped');
      expect(container.normalTermination).toBe(true);
      expect(guard.size).toBe(0);
      expect(faults.faultCount).toBe(0);
    });

    it('logs and swallows engine errors', async () => {
      const container = new TestContainer(redisVariant(), options());
      await container.start();
      engine.killContainer.mockRejectedValueOnce(new Error('kill failed'));
      engine.removeContainer.mockRejectedValueOnce(new Error('remove failed'));

      await expect(container.stop()).resolves.toBeUndefined();

      expect(container.state).toBe('Stopped');
      const messages = logs.filter((l) => l.level === 'debug').map((l) => l.record.message);
      expect(messages).toContain(
        `Error encountered killing container (ID: ${FIRST_ID}) - it may not have been started, or may already be stopped: kill failed`,
      );
      expect(messages).toContain(
        `Error encountered removing container (ID: ${FIRST_ID}) - it may already be removed: remove failed`,
      );
    });

    it('moves a never-started container to Stopped without touching the engine', async () => {
      const container = new TestContainer(redisVariant(), options());

      await container.stop();

      expect(container.state).toBe('Stopped');
      expect(engine.killContainer).not.toHaveBeenCalled();
      await expect(container.start()).rejects.toBeInstanceOf(ContainerStateError);
    });

    it('waits for an in-flight start and then tears the container down', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const waitUntilReady = vi.fn(() => gate);
      const container = new TestContainer(redisVariant({ waitUntilReady }), options());

      const starting = container.start();
      await vi.waitFor(() => expect(waitUntilReady).toHaveBeenCalled());
      const stopping = container.stop();

      expect(container.normalTermination).toBe(true);
      expect(engine.killContainer).not.toHaveBeenCalled();

      release();
      await starting;
      await stopping;

      expect(engine.killContainer).toHaveBeenCalledTimes(1);
      expect(engine.removeContainer).toHaveBeenCalledTimes(1);
      expect(container.state).toBe('Stopped');
      expect(guard.size).toBe(0);
      expect(faults.faultCount).toBe(0);
    });

    it('runs from the shutdown hook when the process goes away first', async () => {
      const container = new TestContainer(redisVariant(), options());
      await container.start();

      await guard.runAll('beforeExit');

      expect(engine.removeContainer).toHaveBeenCalledWith(FIRST_ID, { force: true });
      expect(container.state).toBe('Stopped');
      expect(guard.size).toBe(0);
    });
  });

  describe('unexpected exit', () => {
    it('reports exactly one fault and marks the container crashed', async () => {
      const onFault = vi.fn();
      faults.onFault(onFault);
      const container = new TestContainer(redisVariant(), options());
      await container.start();

      engine.crash(FIRST_ID, 3);
      await container.terminationSettled;

      expect(container.state).toBe('Crashed');
      expect(onFault).toHaveBeenCalledTimes(1);
      const error = onFault.mock.calls[0][0];
      expect(error).toBeInstanceOf(UnexpectedContainerExitError);
      expect(error.exitCode).toBe(3);
      expect(error.containerId).toBe(FIRST_ID);
      expect(exitTarget.exitCode).toBeUndefined();
      expect(guard.size).toBe(1);

      await container.stop();

      expect(engine.containers.size).toBe(0);
      expect(container.state).toBe('Crashed');
      expect(faults.faultCount).toBe(1);
    });

    it('fails the run under the fail-run policy', async () => {
      const container = new TestContainer(
        redisVariant(),
        options({ config: loadTestContainerConfig({ TEST_CONTAINER_FAULT_POLICY: 'fail-run' }) }),
      );
      await container.start();

      engine.crash(FIRST_ID, 1);
      await container.terminationSettled;

      expect(exitTarget.exitCode).toBe(1);
    });
  });

  describe('withTestContainer', () => {
    it('returns the callback result and stops afterwards', async () => {
      const container = new TestContainer(redisVariant(), options());

      const result = await withTestContainer(container, (c) => c.containerId);

      expect(result).toBe(FIRST_ID);
      expect(container.state).toBe('Stopped');
    });

    it('stops the container when the callback throws', async () => {
      const container = new TestContainer(redisVariant(), options());

      await expect(
        withTestContainer(container, () => {
          throw new Error('assertion failed');
        }),
      ).rejects.toThrow('assertion failed');

      expect(engine.removeContainer).toHaveBeenCalledTimes(1);
      expect(container.state).toBe('Stopped');
    });
  });
});

describe('ContainerVariant contract', () => {
  it('lets a variant adjust the host config before create', async () => {
    const engine = new FakeEngine();
    const { logger } = captureLogger();
    const variant: ContainerVariant = {
      ...redisVariant(),
      containerConfig: () => ({ Env: ['MODE=test'], HostConfig: { Memory: 64 * 1024 * 1024 } }),
      customizeHostConfig: (hostConfig) => ({ ...hostConfig, Privileged: false }),
    };
    const container = new TestContainer(variant, {
      config: loadTestContainerConfig({}),
      logger,
      faults: new ContainerFaultChannel({ logger, exitCodeTarget: {} }),
      shutdownGuard: new ShutdownGuard(new FakeProcess(), logger),
      hostEnvironment: LOCAL_ENVIRONMENT,
      engineFactory: () => engine,
    });

    await container.start();
    await container.stop();

    expect(engine.createContainer).toHaveBeenCalledWith({
      Env: ['MODE=test'],
      Image: 'redis:latest',
      HostConfig: { PublishAllPorts: true, Memory: 67108864, Privileged: false },
    });
  });
});
