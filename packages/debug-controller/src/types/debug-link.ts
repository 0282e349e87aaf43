import type { Breakpoint, BreakpointRef } from './breakpoint.js';
import type { StackSnapshot } from './stack.js';
import type { ProcessHandle } from './process-handle.js';

/**
 * Events delivered by a debug link, as one closed union.
 */
export type DebugLinkEvent =
  | { type: 'bootstrap' }
  | { type: 'line'; file: string; line: number }
  | { type: 'stack'; frames: StackSnapshot }
  | { type: 'breakpoint-enable'; breakpoint: BreakpointRef }
  | { type: 'breakpoint-disable'; breakpoint: BreakpointRef }
  | { type: 'breakpoint-ignore'; breakpoint: BreakpointRef; count: number }
  | { type: 'breakpoint-clear'; breakpoint: BreakpointRef }
  | { type: 'info'; message: string }
  | { type: 'warning'; message: string }
  | { type: 'error'; message: string }
  | { type: 'postmortem'; context: unknown }
  | { type: 'restart' }
  | { type: 'call'; args: unknown }
  | { type: 'return'; value: unknown }
  | { type: 'exception'; name: string; value: string };

export type DebugLinkListener = (event: DebugLinkEvent) => void;

/**
 * Asynchronous channel to the running debuggee.
 *
 * Requests resolve once handed to the transport, never on a reply; results
 * arrive later as events. A request on a link that is not connected rejects
 * with a link error.
 */
export interface DebugLink {
  open(): Promise<void>;
  close(): Promise<void>;

  run(): Promise<void>;
  stepOver(): Promise<void>;
  stepInto(): Promise<void>;
  stepReturn(): Promise<void>;

  setBreakpoint(file: string, line: number): Promise<void>;
  clearBreakpoint(breakpoint: Readonly<Breakpoint>): Promise<void>;
  enableBreakpoint(breakpoint: Readonly<Breakpoint>): Promise<void>;
  disableBreakpoint(breakpoint: Readonly<Breakpoint>): Promise<void>;

  /** @returns unsubscribe function */
  onEvent(listener: DebugLinkListener): () => void;
}

export interface DebugLinkTarget {
  host: string;
  port: number;
  process: ProcessHandle;
}

export type DebugLinkFactory = (target: DebugLinkTarget) => DebugLink;
