import { describe, it, expect } from 'vitest';
import { toLinkLine, toUiLine } from './coordinates.js';

describe('coordinates', () => {
  it('shifts editor lines up by one for the debugger', () => {
    expect(toLinkLine(0)).toBe(1);
    expect(toLinkLine(9)).toBe(10);
  });

  it('shifts debugger lines down by one for the editor', () => {
    expect(toUiLine(1)).toBe(0);
    expect(toUiLine(10)).toBe(9);
  });

  it('translates back and forth without drift', () => {
    for (const line of [0, 1, 41, 1000]) {
      expect(toUiLine(toLinkLine(line))).toBe(line);
    }
  });

  it('rejects lines outside either coordinate system', () => {
    expect(() => toLinkLine(-1)).toThrow('Editor line must be a non-negative integer, got -1');
    expect(() => toLinkLine(1.5)).toThrow(RangeError);
    expect(() => toUiLine(0)).toThrow('Debugger line must be a positive integer, got 0');
  });
});
