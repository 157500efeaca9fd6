import { Readable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';

import Docker, { type ContainerCreateOptions, type DockerOptions } from 'dockerode';
import { z } from 'zod';

import type {
  ContainerEnginePort,
  ContainerExit,
  ContainerRuntimeInfo,
  ImageSummary,
  PortBinding,
  PullProgressEvent,
} from './containerEngine.port';
import { errorMessage } from './errors';
import type { EngineConnection } from './hostEnvironment';
import { createJsonLinesParser } from './jsonLines.parser';
import type { LoggerService } from './logger.service';

const pullProgressEventSchema = z
  .object({
    status: z.string().optional(),
    id: z.string().optional(),
    progress: z.string().optional(),
    error: z.string().optional(),
    errorDetail: z
      .object({ message: z.string().optional(), code: z.number().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const DEFAULT_WAIT_POLL_INTERVAL_MS = 250;

export type DockerEngineClientOptions = {
  waitPollIntervalMs?: number;
  /** Pause between exit polls. The default timer does not keep the process alive. */
  sleep?: (ms: number) => Promise<void>;
};

const unrefSleep = (ms: number): Promise<void> => delay(ms, undefined, { ref: false });

const statusCodeOf = (e: unknown): number | undefined =>
  typeof e === 'object' && e && 'statusCode' in e && typeof e.statusCode === 'number' ? e.statusCode : undefined;

export function dockerOptionsFor(connection: EngineConnection): DockerOptions {
  if (connection.kind === 'socket') {
    return { socketPath: connection.socketPath };
  }
  return {
    protocol: connection.protocol,
    host: connection.host,
    port: connection.port,
    ...(connection.tls ? { ca: connection.tls.ca, cert: connection.tls.cert, key: connection.tls.key } : {}),
  };
}

/**
 * ContainerEnginePort backed by dockerode. Container ids are shortened to 12 characters in logs.
 *
 * `waitContainer` polls inspect rather than holding the engine's blocking wait request open; that
 * request keeps a referenced socket for the container's whole life, so the process would never
 * reach `beforeExit` while a container runs.
 */
export class DockerEngineClient implements ContainerEnginePort {
  private readonly docker: Docker;
  private readonly waitPollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    connection: EngineConnection,
    private readonly logger: LoggerService,
    options: DockerEngineClientOptions = {},
  ) {
    this.docker = new Docker(dockerOptionsFor(connection));
    this.waitPollIntervalMs = options.waitPollIntervalMs ?? DEFAULT_WAIT_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? unrefSleep;
  }

  async listImages(repository: string): Promise<ImageSummary[]> {
    const images = await this.docker.listImages({ filters: { reference: [repository] } });
    return images.map((image) => ({ id: image.Id, repoTags: image.RepoTags ?? [] }));
  }

  async *pullImage(image: string): AsyncGenerator<PullProgressEvent> {
    let stream: NodeJS.ReadableStream;
    try {
      stream = await this.docker.pull(image);
    } catch (e: unknown) {
      // unknown repositories and auth failures are refused before any progress is streamed
      const code = statusCodeOf(e);
      this.logger.debug(`Pull of ${image} rejected`, { statusCode: code, error: e });
      yield { error: errorMessage(e), errorDetail: { message: errorMessage(e), code } };
      return;
    }
    const pending: PullProgressEvent[] = [];
    const parser = createJsonLinesParser(
      (value) => {
        const parsed = pullProgressEventSchema.safeParse(value);
        if (parsed.success) pending.push(parsed.data);
        else this.logger.debug('Ignoring malformed pull progress event', { image, issues: parsed.error.issues });
      },
      { onError: (payload, error) => this.logger.debug('Unparseable pull progress line', { image, payload, error }) },
    );

    try {
      for await (const chunk of stream) {
        parser.handleChunk(chunk);
        let next = pending.shift();
        while (next) {
          yield next;
          next = pending.shift();
        }
      }
      parser.flush();
      yield* pending.splice(0);
    } finally {
      if (stream instanceof Readable && !stream.destroyed) stream.destroy();
    }
  }

  async createContainer(options: ContainerCreateOptions): Promise<string> {
    const container = await this.docker.createContainer(options);
    return container.id;
  }

  async startContainer(containerId: string): Promise<void> {
    await this.docker.getContainer(containerId).start();
  }

  async inspectContainer(containerId: string): Promise<ContainerRuntimeInfo> {
    const info = await this.docker.getContainer(containerId).inspect();
    const ports: Record<string, PortBinding[]> = {};
    for (const [key, bindings] of Object.entries(info.NetworkSettings?.Ports ?? {})) {
      ports[key] = (bindings ?? [])
        .map((b) => ({ hostIp: b.HostIp, hostPort: Number(b.HostPort) }))
        .filter((b) => Number.isInteger(b.hostPort) && b.hostPort > 0);
    }
    return {
      id: info.Id,
      name: info.Name.replace(/^\//, ''),
      running: info.State?.Running === true,
      exitCode: info.State?.Running ? undefined : info.State?.ExitCode,
      ports,
    };
  }

  async waitContainer(containerId: string): Promise<ContainerExit> {
    while (true) {
      const info = await this.inspectContainer(containerId);
      if (!info.running) {
        if (info.exitCode === undefined) {
          throw new Error(`Container ${containerId.substring(0, 12)} stopped without an exit code`);
        }
        return { statusCode: info.exitCode };
      }
      await this.sleep(this.waitPollIntervalMs);
    }
  }

  async killContainer(containerId: string): Promise<void> {
    try {
      await this.docker.getContainer(containerId).kill();
    } catch (e: unknown) {
      // 409: the container is not running
      if (statusCodeOf(e) === 409) {
        this.logger.debug(`Container not running cid=${containerId.substring(0, 12)}`);
        return;
      }
      throw e;
    }
  }

  async removeContainer(containerId: string, options: { force: boolean }): Promise<void> {
    this.logger.debug(`Removing container cid=${containerId.substring(0, 12)} force=${options.force}`);
    try {
      await this.docker.getContainer(containerId).remove({ force: options.force });
    } catch (e: unknown) {
      if (statusCodeOf(e) === 404) {
        this.logger.debug(`Container already removed cid=${containerId.substring(0, 12)}`);
        return;
      }
      throw e;
    }
  }
}
