import type { ContainerCreateOptions, HostConfig } from 'dockerode';

import type { ContainerEnginePort, ContainerRuntimeInfo } from './containerEngine.port';
import type { ContainerVariant } from './containerVariant';
import { ContainerLaunchError, errorMessage } from './errors';
import type { ImageReference } from './imageReference';
import type { LoggerService } from './logger.service';

export type LaunchRequest = {
  image: ImageReference;
  variant: ContainerVariant;
  /** Invoked as soon as the engine assigns an id, before start is attempted. */
  onCreated?: (containerId: string) => void;
};

export type LaunchResult = {
  containerId: string;
  info: ContainerRuntimeInfo;
};

export function buildCreateOptions(image: ImageReference, variant: ContainerVariant): ContainerCreateOptions {
  const { HostConfig: variantHostConfig, ...config } = variant.containerConfig();
  const defaults: HostConfig = { PublishAllPorts: true, ...(variantHostConfig ?? {}) };
  const hostConfig = variant.customizeHostConfig ? variant.customizeHostConfig(defaults) : defaults;
  return { ...config, Image: image.toString(), HostConfig: hostConfig };
}

/**
 * Creates and starts one container, then hands its runtime info to the variant.
 *
 * A container that was created but failed to start is not removed here. The id has already
 * been passed to `onCreated`, and releasing it is up to the caller's `stop`; if `stop` is never
 * reached the container leaks.
 */
export class ContainerLauncher {
  constructor(
    private readonly engine: ContainerEnginePort,
    private readonly logger: LoggerService,
  ) {}

  async launch(request: LaunchRequest): Promise<LaunchResult> {
    const image = request.image.toString();
    let containerId: string | undefined;
    try {
      const createOptions = buildCreateOptions(request.image, request.variant);

      this.logger.info(`Creating container for image: ${image}`);
      containerId = await this.engine.createContainer(createOptions);
      request.onCreated?.(containerId);

      await this.engine.startContainer(containerId);
      this.logger.info(`Starting container with ID: ${containerId}`);

      const info = await this.engine.inspectContainer(containerId);
      await request.variant.containerIsStarting?.(info);
      return { containerId, info };
    } catch (e: unknown) {
      throw new ContainerLaunchError(
        `Could not create/start container for image '${image}': ${errorMessage(e)}`,
        e,
        containerId,
      );
    }
  }
}
