/**
 * Top-level state of the controller.
 *
 * - idle: no session
 * - starting: process launched, link not bootstrapped yet
 * - running: debuggee executing
 * - paused: debuggee halted at a breakpoint or step boundary
 * - finished: process exited, UI reset in progress
 */
export type SessionPhase = 'idle' | 'starting' | 'running' | 'paused' | 'finished';

export interface PhaseChange {
  from: SessionPhase;
  to: SessionPhase;
}
