import type { SessionPhase } from '../types/index.js';

const TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  idle: ['starting'],
  starting: ['running', 'finished', 'idle'],
  running: ['paused', 'finished', 'idle'],
  paused: ['running', 'paused', 'finished', 'idle'],
  finished: ['idle'],
};

export const ACTIVE_PHASES: readonly SessionPhase[] = ['starting', 'running', 'paused'];

export function canTransition(from: SessionPhase, to: SessionPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isActivePhase(phase: SessionPhase): boolean {
  return ACTIVE_PHASES.includes(phase);
}

/** Phases in which the debuggee accepts breakpoint and stepping requests. */
export function isLinkReady(phase: SessionPhase): boolean {
  return phase === 'running' || phase === 'paused';
}
