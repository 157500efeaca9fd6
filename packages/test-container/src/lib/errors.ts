export type ContainerErrorCode =
  | 'image_not_found'
  | 'image_pull_failed'
  | 'launch_failed'
  | 'readiness_timeout'
  | 'unexpected_exit'
  | 'invalid_state';

export class ContainerError extends Error {
  constructor(
    public readonly code: ContainerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ContainerError';
  }
}

export class ImageNotFoundError extends ContainerError {
  constructor(
    public readonly image: string,
    public readonly detail: string,
  ) {
    super('image_not_found', `Image '${image}' was not found: ${detail}`);
    this.name = 'ImageNotFoundError';
  }
}

export class ImagePullFailedError extends ContainerError {
  constructor(
    public readonly image: string,
    public readonly detail: string,
  ) {
    super('image_pull_failed', `Failed to pull image '${image}': ${detail}`);
    this.name = 'ImagePullFailedError';
  }
}

/**
 * Any failure while bringing a container up. `cause` holds the underlying error.
 * `containerId` is set when the engine had already created the container.
 */
export class ContainerLaunchError extends ContainerError {
  constructor(
    message: string,
    cause: unknown,
    public readonly containerId?: string,
  ) {
    super('launch_failed', message, { cause });
    this.name = 'ContainerLaunchError';
  }
}

export class ReadinessTimeoutError extends ContainerError {
  constructor(
    public readonly address: string,
    public readonly port: number,
    public readonly attempts: number,
    lastError?: unknown,
  ) {
    super(
      'readiness_timeout',
      `Timed out waiting for container port to open (${address}:${port} should be listening, ${attempts} attempts)`,
      { cause: lastError },
    );
    this.name = 'ReadinessTimeoutError';
  }
}

export class UnexpectedContainerExitError extends ContainerError {
  constructor(
    public readonly containerId: string,
    public readonly exitCode: number | undefined,
    cause?: unknown,
  ) {
    super(
      'unexpected_exit',
      exitCode === undefined
        ? `Container ${containerId.substring(0, 12)} exited unexpectedly`
        : `Container ${containerId.substring(0, 12)} exited unexpectedly with code ${exitCode}`,
      { cause },
    );
    this.name = 'UnexpectedContainerExitError';
  }
}

export class ContainerStateError extends ContainerError {
  constructor(message: string) {
    super('invalid_state', message);
    this.name = 'ContainerStateError';
  }
}

export function isContainerError(value: unknown, code?: ContainerErrorCode): value is ContainerError {
  if (!(value instanceof ContainerError)) return false;
  return code === undefined || value.code === code;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (e && typeof e === 'object' && 'message' in e) return String(e.message);
  return String(e);
}
