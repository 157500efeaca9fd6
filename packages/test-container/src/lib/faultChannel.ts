import { EventEmitter } from 'node:events';

import type { FaultPolicy } from './config';
import type { UnexpectedContainerExitError } from './errors';
import { LoggerService } from './logger.service';

export type FaultChannelOptions = {
  logger?: LoggerService;
  policy?: FaultPolicy;
  /** Where `fail-run` records the failure; defaults to the current process. */
  exitCodeTarget?: { exitCode?: number | string | undefined };
};

/**
 * Delivers container faults that happen off the caller's stack (a container dying between
 * `start` and `stop`). Listeners subscribe to `'fault'`; every fault is also logged.
 *
 * Policy `report` only logs and emits. Policy `fail-run` also sets a non-zero exit code so the
 * surrounding test run ends failed without tearing the process down mid-test.
 */
export class ContainerFaultChannel extends EventEmitter {
  private readonly logger: LoggerService;
  private readonly exitCodeTarget: { exitCode?: number | string | undefined };
  private reported = 0;
  policy: FaultPolicy;

  constructor(options: FaultChannelOptions = {}) {
    super();
    this.logger = options.logger ?? new LoggerService({ scope: 'TestContainer:faults' });
    this.policy = options.policy ?? 'report';
    this.exitCodeTarget = options.exitCodeTarget ?? process;
  }

  get faultCount(): number {
    return this.reported;
  }

  onFault(listener: (error: UnexpectedContainerExitError) => void): () => void {
    this.on('fault', listener);
    return () => {
      this.off('fault', listener);
    };
  }

  report(error: UnexpectedContainerExitError, policy: FaultPolicy = this.policy): void {
    this.reported += 1;
    this.logger.error('Container exited unexpectedly', {
      containerId: error.containerId,
      exitCode: error.exitCode,
      policy,
      error,
    });
    if (policy === 'fail-run') {
      this.exitCodeTarget.exitCode = 1;
    }
    this.emit('fault', error);
  }
}

export const containerFaults = new ContainerFaultChannel();
