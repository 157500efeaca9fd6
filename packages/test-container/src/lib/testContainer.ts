import { loadDotenv, loadTestContainerConfig, type TestContainerConfig } from './config';
import type { ContainerEnginePort, ContainerRuntimeInfo } from './containerEngine.port';
import { ContainerLauncher } from './containerLauncher';
import type { ContainerVariant } from './containerVariant';
import { DockerEngineClient } from './dockerEngine.client';
import {
  ContainerLaunchError,
  ContainerStateError,
  errorMessage,
  type UnexpectedContainerExitError,
} from './errors';
import { containerFaults, type ContainerFaultChannel } from './faultChannel';
import { defaultHostEnvironmentContext, resolveHostEnvironment, type HostEnvironment } from './hostEnvironment';
import { ImageReference } from './imageReference';
import { ImageResolver } from './imageResolver';
import { LoggerService } from './logger.service';
import { waitForListeningPort, type ReadinessOptions } from './readinessProbe';
import { shutdownGuard as defaultShutdownGuard, type ShutdownGuard } from './shutdownGuard';
import { TerminationWatcher } from './terminationWatcher';

export type ContainerState = 'Created' | 'Starting' | 'Running' | 'Stopped' | 'Crashed' | 'Failed';

const TRANSITIONS: Record<ContainerState, readonly ContainerState[]> = {
  Created: ['Starting', 'Stopped'],
  Starting: ['Running', 'Failed'],
  Running: ['Stopped', 'Crashed'],
  Stopped: [],
  Crashed: [],
  Failed: [],
};

export type EngineFactory = (environment: HostEnvironment, logger: LoggerService) => ContainerEnginePort;

export type TestContainerOptions = {
  /** Image tag; `null` or empty means `latest`. Overrides a tag in the variant's image name. */
  tag?: string | null;
  config?: TestContainerConfig;
  logger?: LoggerService;
  faults?: ContainerFaultChannel;
  shutdownGuard?: ShutdownGuard;
  /** Skips host resolution when the environment is already known. */
  hostEnvironment?: HostEnvironment;
  resolveHost?: (config: TestContainerConfig) => Promise<HostEnvironment>;
  engineFactory?: EngineFactory;
  readiness?: ReadinessOptions;
};

const defaultEngineFactory: EngineFactory = (environment, logger) =>
  new DockerEngineClient(environment.connection, logger);

function defaultConfig(): TestContainerConfig {
  loadDotenv();
  return loadTestContainerConfig();
}

/**
 * One throwaway container backing a test: `start` pulls, creates, starts and waits for it;
 * `stop` kills and removes it. An instance runs at most once.
 *
 * After a successful start a background watcher reports an exit that `stop` did not cause to
 * the fault channel, and a shutdown hook stops the container if the process exits first.
 * If `start` fails after the container was created, call `stop` to release it.
 *
 * The hook runs on `beforeExit`, SIGINT and SIGTERM. A process ended by an explicit
 * `process.exit()` skips it and leaves the container behind; call `stop` before exiting.
 */
export class TestContainer {
  private readonly config: TestContainerConfig;
  private readonly logger: LoggerService;
  private readonly faults: ContainerFaultChannel;
  private readonly guard: ShutdownGuard;
  private image: ImageReference;
  private currentState: ContainerState = 'Created';
  private normalTerminationFlag = false;
  private id?: string;
  private name?: string;
  private environment?: HostEnvironment;
  private engine?: ContainerEnginePort;
  private watcher?: TerminationWatcher;
  private unregisterShutdown?: () => void;
  private startPromise?: Promise<void>;
  private stopPromise?: Promise<void>;

  constructor(
    readonly variant: ContainerVariant,
    private readonly options: TestContainerOptions = {},
  ) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? new LoggerService({ level: this.config.logLevel });
    this.faults = options.faults ?? containerFaults;
    this.guard = options.shutdownGuard ?? defaultShutdownGuard;
    const parsed = ImageReference.parse(variant.imageName);
    this.image = options.tag === undefined ? parsed : parsed.withTag(options.tag);
  }

  get state(): ContainerState {
    return this.currentState;
  }

  get containerId(): string | undefined {
    return this.id;
  }

  get containerName(): string | undefined {
    return this.name;
  }

  get hostAddress(): string | undefined {
    return this.environment?.hostAddress;
  }

  get hostEnvironment(): HostEnvironment | undefined {
    return this.environment;
  }

  get imageReference(): ImageReference {
    return this.image;
  }

  get normalTermination(): boolean {
    return this.normalTerminationFlag;
  }

  /** Settles once the termination watcher has handled the container's exit. */
  get terminationSettled(): Promise<void> {
    return this.watcher?.settled ?? Promise.resolve();
  }

  setTag(tag: string | null | undefined): void {
    if (this.currentState !== 'Created' || this.startPromise) {
      throw new ContainerStateError('Tag can only be changed before start');
    }
    this.image = this.image.withTag(tag);
  }

  start(): Promise<void> {
    if (this.startPromise || this.currentState !== 'Created') {
      return Promise.reject(
        new ContainerStateError(`Container can only be started once (state=${this.currentState})`),
      );
    }
    this.startPromise = this.runStart();
    return this.startPromise;
  }

  /** Kills and removes the container. Never throws; repeated and concurrent calls share one run. */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      // must be visible before the kill below makes the watcher's wait return
      this.normalTerminationFlag = true;
      this.stopPromise = this.runStop();
    }
    return this.stopPromise;
  }

  private async runStart(): Promise<void> {
    const image = this.image.toString();
    this.transition('Starting');
    this.logger.debug(`Start for container (${image})`);

    let containerId: string;
    try {
      const environment = await this.resolveEnvironment();
      this.environment = environment;
      const engine = (this.options.engineFactory ?? defaultEngineFactory)(environment, this.logger);
      this.engine = engine;

      await new ImageResolver(engine, this.logger).ensureImagePresent(this.image);

      const launched = await new ContainerLauncher(engine, this.logger).launch({
        image: this.image,
        variant: this.variant,
        onCreated: (id) => {
          this.id = id;
        },
      });
      containerId = launched.containerId;
      this.name = launched.info.name;

      await this.waitUntilReady(environment.hostAddress, launched.info);
      this.logger.info('Container started', { containerId, name: this.name, image });
    } catch (e: unknown) {
      this.transition('Failed');
      this.logger.error('Could not start container', { image, containerId: this.id, error: e });
      if (e instanceof ContainerLaunchError) throw e;
      throw new ContainerLaunchError(`Could not create/start container: ${errorMessage(e)}`, e, this.id);
    }

    this.transition('Running');
    if (this.normalTerminationFlag) {
      // stop() arrived mid-start and tears down once this settles
      return;
    }

    const engine = this.engine;
    if (!engine) return;
    this.watcher = new TerminationWatcher({
      engine,
      containerId,
      isNormalTermination: () => this.normalTerminationFlag,
      onUnexpectedExit: (error) => this.handleUnexpectedExit(error),
      logger: this.logger,
    });
    this.watcher.start();

    this.unregisterShutdown = this.guard.register(`container ${containerId.substring(0, 12)}`, () => {
      this.logger.debug(`Hit shutdown hook for container ${containerId}`);
      return this.stop();
    });
  }

  private async runStop(): Promise<void> {
    this.logger.debug(`Stop for container (${this.image.toString()})`);
    this.unregisterShutdown?.();
    this.unregisterShutdown = undefined;

    if (this.startPromise) {
      await Promise.allSettled([this.startPromise]);
    }
    if (this.currentState === 'Created') this.transition('Stopped');

    const { id, engine } = this;
    if (id && engine) {
      this.logger.info(`Stopping container: ${id}`);
      try {
        await engine.killContainer(id);
      } catch (e: unknown) {
        this.logger.debug(
          `Error encountered killing container (ID: ${id}) - it may not have been started, or may already be stopped: ${errorMessage(e)}`,
        );
      }
      try {
        await engine.removeContainer(id, { force: true });
      } catch (e: unknown) {
        this.logger.debug(
          `Error encountered removing container (ID: ${id}) - it may already be removed: ${errorMessage(e)}`,
        );
      }
    }

    if (this.currentState === 'Running') this.transition('Stopped');
  }

  private async resolveEnvironment(): Promise<HostEnvironment> {
    if (this.options.hostEnvironment) return this.options.hostEnvironment;
    if (this.options.resolveHost) return this.options.resolveHost(this.config);
    return resolveHostEnvironment(defaultHostEnvironmentContext(this.config));
  }

  private async waitUntilReady(hostAddress: string, info: ContainerRuntimeInfo): Promise<void> {
    const options: ReadinessOptions = {
      intervalMs: this.config.readinessIntervalMs,
      maxAttempts: this.config.readinessMaxAttempts,
      ...this.options.readiness,
    };
    if (this.variant.waitUntilReady) {
      await this.variant.waitUntilReady({ hostAddress, info, options });
      return;
    }
    await waitForListeningPort(hostAddress, this.variant.livenessCheckPort?.(info), options);
  }

  private handleUnexpectedExit(error: UnexpectedContainerExitError): void {
    // the shutdown hook stays registered so the exited container is still removed
    if (this.currentState === 'Running') this.transition('Crashed');
    this.faults.report(error, this.config.faultPolicy);
  }

  private transition(next: ContainerState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new ContainerStateError(`Illegal container state transition ${this.currentState} -> ${next}`);
    }
    this.logger.debug(`Container state ${this.currentState} -> ${next}`, { containerId: this.id });
    this.currentState = next;
  }
}

/** Starts the container, runs `fn`, and stops the container however `fn` ends. */
export async function withTestContainer<T>(
  container: TestContainer,
  fn: (container: TestContainer) => T | Promise<T>,
): Promise<T> {
  try {
    await container.start();
    return await fn(container);
  } finally {
    await container.stop();
  }
}
