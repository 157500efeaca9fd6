import type { ContainerEnginePort } from './containerEngine.port';
import { UnexpectedContainerExitError, errorMessage } from './errors';
import type { LoggerService } from './logger.service';

export type ExitOutcome = { statusCode: number } | { error: unknown };

export type TerminationWatcherOptions = {
  engine: ContainerEnginePort;
  containerId: string;
  /** Read after the engine reports the exit, so a stop that caused it is always visible. */
  isNormalTermination: () => boolean;
  onUnexpectedExit: (error: UnexpectedContainerExitError) => void;
  logger: LoggerService;
};

/**
 * Blocks on the engine's wait call in the background and reports an exit that `stop` did not
 * cause. At most one fault is reported per watcher, however many outcomes it sees.
 */
export class TerminationWatcher {
  private started = false;
  private fired = false;
  private watching: Promise<void> = Promise.resolve();

  constructor(private readonly options: TerminationWatcherOptions) {}

  /** Resolves after the background wait has been handled. Never rejects. */
  get settled(): Promise<void> {
    return this.watching;
  }

  get faulted(): boolean {
    return this.fired;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.watching = this.watch();
  }

  private async watch(): Promise<void> {
    const { engine, containerId } = this.options;
    let outcome: ExitOutcome;
    try {
      outcome = await engine.waitContainer(containerId);
    } catch (error: unknown) {
      outcome = { error };
    }
    this.handleExit(outcome);
  }

  handleExit(outcome: ExitOutcome): void {
    const { containerId, logger } = this.options;
    const cid = containerId.substring(0, 12);
    if (this.options.isNormalTermination()) {
      logger.debug(`Container exited after stop cid=${cid}`);
      return;
    }
    if (this.fired) {
      logger.debug(`Ignoring repeated exit notification cid=${cid}`);
      return;
    }
    this.fired = true;

    const error =
      'statusCode' in outcome
        ? new UnexpectedContainerExitError(containerId, outcome.statusCode)
        : new UnexpectedContainerExitError(containerId, undefined, outcome.error);
    try {
      this.options.onUnexpectedExit(error);
    } catch (listenerError: unknown) {
      logger.error(`Unexpected-exit handler failed cid=${cid}: ${errorMessage(listenerError)}`, {
        error: listenerError,
      });
    }
  }
}
