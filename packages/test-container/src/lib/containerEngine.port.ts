import type { ContainerCreateOptions } from 'dockerode';

export type ImageSummary = {
  id: string;
  repoTags: string[];
};

export type PullProgressEvent = {
  status?: string;
  id?: string;
  progress?: string;
  error?: string;
  errorDetail?: { message?: string; code?: number };
};

export type PortBinding = {
  hostIp: string;
  hostPort: number;
};

/** Runtime view of a container as reported by inspect. `name` carries no leading `/`. */
export type ContainerRuntimeInfo = {
  id: string;
  name: string;
  running: boolean;
  exitCode?: number;
  ports: Record<string, PortBinding[]>;
};

export type ContainerExit = {
  statusCode: number;
};

/** Engine operations the lifecycle depends on; transport and authentication live behind it. */
export interface ContainerEnginePort {
  listImages(repository: string): Promise<ImageSummary[]>;
  /** Streams pull progress. Returning the iterator early abandons the pull. */
  pullImage(image: string): AsyncIterable<PullProgressEvent>;
  createContainer(options: ContainerCreateOptions): Promise<string>;
  startContainer(containerId: string): Promise<void>;
  inspectContainer(containerId: string): Promise<ContainerRuntimeInfo>;
  /** Resolves once the container has exited. */
  waitContainer(containerId: string): Promise<ContainerExit>;
  killContainer(containerId: string): Promise<void>;
  removeContainer(containerId: string, options: { force: boolean }): Promise<void>;
}
