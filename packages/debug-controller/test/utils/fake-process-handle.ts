import type {
  ProcessExit,
  ProcessHandle,
  ProcessLaunchRequest,
} from '../../src/types/index.js';

/**
 * Debuggee stand-in. The test ends it with {@link finish}; `kill` ends it as
 * a crash.
 */
export class FakeProcessHandle implements ProcessHandle {
  public started = false;
  public killed = false;
  private readonly listeners = new Set<(exit: ProcessExit) => void>();
  private exit?: ProcessExit;
  private resolveFinished: (exit: ProcessExit) => void = () => undefined;
  private readonly finished = new Promise<ProcessExit>((resolve) => {
    this.resolveFinished = resolve;
  });

  public constructor(
    public readonly request: ProcessLaunchRequest,
    private readonly launchError?: Error,
  ) {}

  public start(): Promise<void> {
    this.started = true;
    if (this.launchError) {
      this.finish({ exitCode: null, status: 'crashed' });
      return Promise.reject(this.launchError);
    }
    return Promise.resolve();
  }

  public waitForStart(): Promise<void> {
    return this.launchError ? Promise.reject(this.launchError) : Promise.resolve();
  }

  public waitForFinish(): Promise<ProcessExit> {
    if (!this.started) {
      return Promise.resolve({ exitCode: null, status: 'crashed' });
    }
    return this.finished;
  }

  public kill(): void {
    this.killed = true;
    this.finish({ exitCode: null, status: 'crashed' });
  }

  public onFinished(listener: (exit: ProcessExit) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public get listenerCount(): number {
    return this.listeners.size;
  }

  /** Ends the process; only the first call counts. */
  public finish(exit: ProcessExit = { exitCode: 0, status: 'normal' }): void {
    if (this.exit) return;
    this.exit = exit;
    this.resolveFinished(exit);
    for (const listener of this.listeners) {
      listener(exit);
    }
  }
}
