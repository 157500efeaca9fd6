import { errorMessage } from './errors';
import { LoggerService } from './logger.service';

export type ShutdownHook = () => void | Promise<void>;

export type ShutdownReason = 'beforeExit' | 'SIGINT' | 'SIGTERM' | 'manual';

const SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/** The slice of `process` the guard listens on; tests pass an EventEmitter. */
export interface ProcessEvents {
  readonly pid: number;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  removeListener(event: string, listener: (...args: unknown[]) => void): unknown;
  kill(pid: number, signal?: string | number): unknown;
}

type Registration = { name: string; hook: ShutdownHook };

/**
 * Runs registered cleanup hooks once when the process is about to go away: on `beforeExit`, or
 * on SIGINT/SIGTERM, after which the signal is raised again so default termination proceeds.
 * Listeners are only attached while at least one hook is registered.
 *
 * An explicit `process.exit()` only fires the synchronous `'exit'` event, where asynchronous
 * hooks cannot run; the guard then logs the hooks it had to skip, and their resources leak.
 */
export class ShutdownGuard {
  private readonly hooks = new Map<number, Registration>();
  private readonly logger: LoggerService;
  private nextId = 1;
  private installed = false;
  private running?: Promise<void>;

  private readonly onBeforeExit = () => {
    void this.runAll('beforeExit');
  };

  private readonly onExit = () => {
    if (this.hooks.size === 0) return;
    const names = [...this.hooks.values()].map(({ name }) => name);
    this.logger.warn(`Process exiting before ${names.length} shutdown hook(s) could run: ${names.join(', ')}`);
  };

  private readonly onSignal = (signal: unknown) => {
    const name = SIGNALS.find((s) => s === signal) ?? 'SIGTERM';
    void this.runAll(name).then(() => {
      this.uninstall();
      this.proc.kill(this.proc.pid, name);
    });
  };

  constructor(
    private readonly proc: ProcessEvents = process,
    logger?: LoggerService,
  ) {
    this.logger = logger ?? new LoggerService({ scope: 'TestContainer:shutdown' });
  }

  get size(): number {
    return this.hooks.size;
  }

  /** Returns a function that unregisters the hook; calling it twice is harmless. */
  register(name: string, hook: ShutdownHook): () => void {
    const id = this.nextId++;
    this.hooks.set(id, { name, hook });
    this.install();
    return () => {
      if (this.hooks.delete(id) && this.hooks.size === 0) this.uninstall();
    };
  }

  /** Runs and forgets every registered hook. Hook failures are logged, never thrown. */
  runAll(reason: ShutdownReason): Promise<void> {
    if (this.running) return this.running;
    this.running = this.drain(reason).finally(() => {
      this.running = undefined;
    });
    return this.running;
  }

  private async drain(reason: ShutdownReason): Promise<void> {
    const pending = [...this.hooks.values()];
    this.hooks.clear();
    if (pending.length === 0) return;
    this.logger.debug(`Running ${pending.length} shutdown hook(s)`, { reason });
    await Promise.all(
      pending.map(async ({ name, hook }) => {
        try {
          await hook();
        } catch (e: unknown) {
          this.logger.warn(`Shutdown hook '${name}' failed: ${errorMessage(e)}`, { error: e });
        }
      }),
    );
    if (reason !== 'SIGINT' && reason !== 'SIGTERM' && this.hooks.size === 0) this.uninstall();
  }

  private install(): void {
    if (this.installed) return;
    this.installed = true;
    this.proc.on('beforeExit', this.onBeforeExit);
    this.proc.on('exit', this.onExit);
    for (const signal of SIGNALS) this.proc.on(signal, this.onSignal);
  }

  private uninstall(): void {
    if (!this.installed) return;
    this.installed = false;
    this.proc.removeListener('beforeExit', this.onBeforeExit);
    this.proc.removeListener('exit', this.onExit);
    for (const signal of SIGNALS) this.proc.removeListener(signal, this.onSignal);
  }
}

export const shutdownGuard = new ShutdownGuard();
