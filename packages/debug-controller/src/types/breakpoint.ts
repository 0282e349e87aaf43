/**
 * A pause point at a file/line, independently enable-able.
 *
 * `line` is 1-based, as the debuggee reports it.
 */
export interface Breakpoint {
  readonly id: number;
  readonly file: string;
  readonly line: number;
  enabled: boolean;
  /** Reserved: ignore counts are not honoured yet. */
  ignoreCount: number;
}

/**
 * Breakpoint as referenced by link events, which may describe breakpoints
 * the store has not seen yet.
 */
export interface BreakpointRef {
  file: string;
  line: number;
}

export type BreakpointChange =
  | { kind: 'created'; breakpoint: Readonly<Breakpoint> }
  | { kind: 'enabled'; breakpoint: Readonly<Breakpoint> }
  | { kind: 'disabled'; breakpoint: Readonly<Breakpoint> }
  | { kind: 'dropped'; file: string; count: number };

export interface BreakpointStoreEvents {
  change: BreakpointChange;
}
