/**
 * Editor lines are 0-based, debuggee lines 1-based. Every crossing between
 * the two goes through these helpers.
 */

export function toLinkLine(uiLine: number): number {
  if (!Number.isInteger(uiLine) || uiLine < 0) {
    throw new RangeError(`Editor line must be a non-negative integer, got ${uiLine}`);
  }
  return uiLine + 1;
}

export function toUiLine(linkLine: number): number {
  if (!Number.isInteger(linkLine) || linkLine < 1) {
    throw new RangeError(`Debugger line must be a positive integer, got ${linkLine}`);
  }
  return linkLine - 1;
}
