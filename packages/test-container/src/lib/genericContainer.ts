import type { ContainerCreateOptions, HostConfig } from 'dockerode';

import type { ContainerRuntimeInfo } from './containerEngine.port';
import { mappedPort, type ContainerVariant } from './containerVariant';

export type GenericContainerOptions = {
  image: string;
  cmd?: string[];
  entrypoint?: string[];
  env?: Record<string, string> | string[];
  /** Container ports to expose, e.g. `6379` or `"53/udp"`. */
  exposedPorts?: Array<number | string>;
  /** Container port whose mapped host port must accept connections before start returns. */
  livenessPort?: number | string;
  binds?: string[];
  labels?: Record<string, string>;
  hostConfig?: Partial<HostConfig>;
};

const portKey = (port: number | string) => (String(port).includes('/') ? String(port) : `${port}/tcp`);

/** A container described entirely by options; mapped ports become available after start. */
export class GenericContainer implements ContainerVariant {
  readonly imageName: string;
  private info?: ContainerRuntimeInfo;

  constructor(private readonly options: GenericContainerOptions) {
    this.imageName = options.image;
  }

  containerConfig(): Omit<ContainerCreateOptions, 'Image'> {
    const { cmd, entrypoint, env, binds, labels } = this.options;
    const exposed = [...(this.options.exposedPorts ?? [])];
    if (this.options.livenessPort !== undefined) exposed.push(this.options.livenessPort);

    return {
      Cmd: cmd,
      Entrypoint: entrypoint,
      Env: Array.isArray(env) ? env : env ? Object.entries(env).map(([k, v]) => `${k}=${v}`) : undefined,
      Labels: labels,
      ExposedPorts: exposed.length > 0 ? Object.fromEntries(exposed.map((p) => [portKey(p), {}])) : undefined,
      HostConfig: binds ? { Binds: binds } : undefined,
    };
  }

  customizeHostConfig(hostConfig: HostConfig): HostConfig {
    return this.options.hostConfig ? { ...hostConfig, ...this.options.hostConfig } : hostConfig;
  }

  containerIsStarting(info: ContainerRuntimeInfo): void {
    this.info = info;
  }

  livenessCheckPort(info: ContainerRuntimeInfo): number | undefined {
    const { livenessPort } = this.options;
    if (livenessPort === undefined) return undefined;
    const hostPort = mappedPort(info, livenessPort);
    if (hostPort === undefined) {
      throw new Error(`Liveness port ${portKey(livenessPort)} is not published on the host`);
    }
    return hostPort;
  }

  /** Host port mapped to `containerPort`; only known once the container is starting. */
  getMappedPort(containerPort: number | string): number {
    if (!this.info) throw new Error('Container has not been started');
    const hostPort = mappedPort(this.info, containerPort);
    if (hostPort === undefined) throw new Error(`Port ${portKey(containerPort)} is not mapped`);
    return hostPort;
  }
}
