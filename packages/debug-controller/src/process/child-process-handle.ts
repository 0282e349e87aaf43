import Emittery from 'emittery';
import { execa } from 'execa';
import { createScopedLogger } from '@stepwise/core';
import type { ProcessLaunchConfig } from '@stepwise/schemas';
import type {
  ProcessEvents,
  ProcessExit,
  ProcessHandle,
  ProcessHandleFactory,
  ProcessLaunchRequest,
} from '../types/index.js';

const logger = createScopedLogger('debuggee');

const NEVER_RAN: ProcessExit = { exitCode: null, status: 'crashed' };

/**
 * A spawned OS process as seen by {@link ChildProcessHandle}.
 * `exited` never rejects.
 */
export interface LaunchedProcess {
  pid?: number;
  spawned: Promise<void>;
  exited: Promise<ProcessExit>;
  kill(): void;
}

export interface LaunchOptions {
  cwd: string;
  env?: Record<string, string>;
}

export type ProcessLauncher = (
  command: string,
  args: readonly string[],
  options: LaunchOptions,
) => LaunchedProcess;

export function toProcessExit(
  exitCode: number | undefined,
  signal: string | undefined,
): ProcessExit {
  // A non-zero exit code is still a normal exit; only signals and spawn failures crash
  if (signal || exitCode === undefined) {
    return { exitCode: exitCode ?? null, status: 'crashed' };
  }
  return { exitCode, status: 'normal' };
}

export const execaLauncher: ProcessLauncher = (command, args, { cwd, env }) => {
  const child = execa(command, [...args], {
    cwd,
    env,
    reject: false,
    stdin: 'ignore',
    stdout: 'pipe',
    stderr: 'pipe',
  });

  const spawned = new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', (error) => reject(error));
  });

  child.stdout?.on('data', (chunk: Buffer) => {
    logger.debug('stdout', { pid: child.pid, text: chunk.toString('utf8') });
  });
  child.stderr?.on('data', (chunk: Buffer) => {
    logger.debug('stderr', { pid: child.pid, text: chunk.toString('utf8') });
  });

  const exited = child.then((result) => toProcessExit(result.exitCode, result.signal));

  return {
    pid: child.pid,
    spawned,
    exited,
    kill: () => {
      child.kill('SIGKILL');
    },
  };
};

/**
 * Runs the debuggee script under the configured interpreter.
 */
export class ChildProcessHandle implements ProcessHandle {
  private readonly events = new Emittery<ProcessEvents>();
  private launched?: LaunchedProcess;
  private finished?: Promise<ProcessExit>;

  public constructor(
    private readonly request: ProcessLaunchRequest,
    private readonly config: ProcessLaunchConfig,
    private readonly launcher: ProcessLauncher = execaLauncher,
  ) {}

  public async start(): Promise<void> {
    if (this.launched) {
      throw new Error(`Process for ${this.request.script} was already started`);
    }

    const args = [...this.config.interpreterArgs, this.request.script];
    logger.debug('Launching debuggee', {
      command: this.config.interpreter,
      args,
      cwd: this.request.workspaceDir,
    });

    const launched = this.launcher(this.config.interpreter, args, {
      cwd: this.request.workspaceDir,
      env: this.config.env,
    });
    this.launched = launched;
    this.finished = launched.exited.then(
      (exit) => this.announce(exit),
      (error: unknown) => {
        logger.error('Debuggee exit could not be observed', error);
        return this.announce(NEVER_RAN);
      },
    );

    await launched.spawned;
  }

  public waitForStart(): Promise<void> {
    if (!this.launched) {
      return Promise.reject(new Error(`Process for ${this.request.script} was not started`));
    }
    return this.launched.spawned;
  }

  /** Resolves immediately when the process was never launched. */
  public waitForFinish(): Promise<ProcessExit> {
    return this.finished ?? Promise.resolve(NEVER_RAN);
  }

  public kill(): void {
    this.launched?.kill();
  }

  public onFinished(listener: (exit: ProcessExit) => void): () => void {
    return this.events.on('finished', listener);
  }

  private announce(exit: ProcessExit): ProcessExit {
    logger.info('Debuggee exited', { script: this.request.script, ...exit });
    this.events.emit('finished', exit).catch((error: unknown) => {
      logger.error('Process finished listener failed', error);
    });
    return exit;
  }
}

export function createChildProcessFactory(
  config: ProcessLaunchConfig,
  launcher?: ProcessLauncher,
): ProcessHandleFactory {
  return (request) => new ChildProcessHandle(request, config, launcher);
}
