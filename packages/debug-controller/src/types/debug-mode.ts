export type ActionName = 'stop' | 'run' | 'step-over' | 'step-in' | 'step-out';

export interface ActionDescriptor {
  name: ActionName;
  displayName: string;
  description: string;
}

export type CommandName = 'run' | 'stepOver' | 'stepInto' | 'stepReturn';

export interface CommandAcknowledgment {
  command: CommandName;
  sent: boolean;
}

/**
 * Capability surface of an editor mode, so the host can swap the debugger
 * for another mode without knowing its internals.
 */
export interface DebugMode {
  readonly name: string;
  readonly description: string;
  readonly icon: string;
  readonly isDebugger: boolean;

  actions(): readonly ActionDescriptor[];
  handleAction(name: string): Promise<void>;
  start(): Promise<void>;
  stop(): Promise<void>;
}
