import type { ContainerEnginePort, PullProgressEvent } from './containerEngine.port';
import { ImageNotFoundError, ImagePullFailedError } from './errors';
import type { ImageReference } from './imageReference';
import type { LoggerService } from './logger.service';

const NOT_FOUND_RE = /404|not found/i;

export function pullEventError(event: PullProgressEvent): string | undefined {
  if (event.error !== undefined) return event.error;
  if (event.errorDetail?.message !== undefined) return event.errorDetail.message;
  return event.errorDetail?.code !== undefined ? `error code ${event.errorDetail.code}` : undefined;
}

export function classifyPullError(
  image: string,
  detail: string,
  statusCode?: number,
): ImageNotFoundError | ImagePullFailedError {
  return statusCode === 404 || NOT_FOUND_RE.test(detail)
    ? new ImageNotFoundError(image, detail)
    : new ImagePullFailedError(image, detail);
}

export class ImageResolver {
  constructor(
    private readonly engine: ContainerEnginePort,
    private readonly logger: LoggerService,
  ) {}

  /** Whether the engine already holds exactly this repository:tag. */
  async isPresent(ref: ImageReference): Promise<boolean> {
    const wanted = ref.toString();
    const images = await this.engine.listImages(ref.repository);
    return images.some((image) => image.repoTags.includes(wanted));
  }

  /**
   * Pulls the image unless it is already present. The first progress event carrying an error
   * ends the pull; there is no retry.
   */
  async ensureImagePresent(ref: ImageReference): Promise<void> {
    const image = ref.toString();
    if (await this.isPresent(ref)) {
      this.logger.debug(`Image '${image}' already present`);
      return;
    }

    this.logger.info(
      `Pulling docker image: ${image}. Please be patient; this may take some time but only needs to be done once.`,
    );
    for await (const event of this.engine.pullImage(image)) {
      const error = pullEventError(event);
      if (error !== undefined) {
        // leaving the loop returns the iterator, which abandons the pull stream
        throw classifyPullError(image, error, event.errorDetail?.code);
      }
      if (event.status) {
        this.logger.debug(event.id ? `${event.id}: ${event.status}` : event.status);
      }
    }
    this.logger.info(`Finished pulling image '${image}'`);
  }
}
