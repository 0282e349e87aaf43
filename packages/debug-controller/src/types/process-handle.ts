export type ProcessExitStatus = 'normal' | 'crashed';

export interface ProcessExit {
  exitCode: number | null;
  status: ProcessExitStatus;
}

export interface ProcessEvents {
  finished: ProcessExit;
}

/**
 * Lifecycle of the debuggee process.
 */
export interface ProcessHandle {
  start(): Promise<void>;
  /** Resolves once the process is running, rejects if it never spawned. */
  waitForStart(): Promise<void>;
  /** Resolves once the process has exited. */
  waitForFinish(): Promise<ProcessExit>;
  kill(): void;
  /** @returns unsubscribe function */
  onFinished(listener: (exit: ProcessExit) => void): () => void;
}

export interface ProcessLaunchRequest {
  script: string;
  workspaceDir: string;
}

export type ProcessHandleFactory = (request: ProcessLaunchRequest) => ProcessHandle;
