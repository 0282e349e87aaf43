/** Local variable name to the debuggee's rendering of its value. */
export type LocalsMapping = Record<string, string>;

export interface StackFrame {
  /** Function or module name, when the link reports one. */
  name?: string;
  file?: string;
  line?: number;
  locals: LocalsMapping;
}

/** Innermost frame first. */
export type StackSnapshot = readonly StackFrame[];
