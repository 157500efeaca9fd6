import type { ContainerCreateOptions, HostConfig } from 'dockerode';

import type { ContainerRuntimeInfo } from './containerEngine.port';
import type { ReadinessOptions } from './readinessProbe';

export type ReadinessContext = {
  hostAddress: string;
  info: ContainerRuntimeInfo;
  options: ReadinessOptions;
};

/**
 * What a concrete container contributes to the lifecycle. The orchestrator calls these at fixed
 * points; everything else (pull, create, start, watch, stop) stays in the core.
 */
export interface ContainerVariant {
  /** Image repository without tag, e.g. `redis` or `localhost:5000/app`. May carry a tag. */
  readonly imageName: string;

  /** Creation options apart from `Image`, which the core sets. */
  containerConfig(): Omit<ContainerCreateOptions, 'Image'>;

  /** Adjusts the host config after the defaults (publish all ports) are built, before create. */
  customizeHostConfig?(hostConfig: HostConfig): HostConfig;

  /** Called once the container has started and its runtime info (name, mapped ports) is known. */
  containerIsStarting?(info: ContainerRuntimeInfo): void | Promise<void>;

  /** Host port to probe for readiness; `undefined` opts out of the check. */
  livenessCheckPort?(info: ContainerRuntimeInfo): number | undefined;

  /**
   * Replaces the port probe. Must resolve once ready or reject with a timeout within the
   * attempt budget in `context.options`.
   */
  waitUntilReady?(context: ReadinessContext): Promise<void>;
}

/** First host port bound to `containerPort` (`"6379"` or `"6379/tcp"`), if any. */
export function mappedPort(info: ContainerRuntimeInfo, containerPort: string | number): number | undefined {
  const key = String(containerPort).includes('/') ? String(containerPort) : `${containerPort}/tcp`;
  return info.ports[key]?.[0]?.hostPort;
}
