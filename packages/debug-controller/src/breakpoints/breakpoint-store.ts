import Emittery from 'emittery';
import { createScopedLogger } from '@stepwise/core';
import type { Breakpoint, BreakpointChange, BreakpointStoreEvents } from '../types/index.js';

const logger = createScopedLogger('breakpoint-store');

const EMPTY: ReadonlyMap<number, Readonly<Breakpoint>> = new Map();

/**
 * Breakpoints of every open file, keyed by file and 1-based line.
 *
 * At most one record exists per (file, line). Records are never replaced:
 * creating at an occupied line hands back the existing instance.
 */
export class BreakpointStore {
  public readonly events = new Emittery<BreakpointStoreEvents>();

  private readonly byFile = new Map<string, Map<number, Breakpoint>>();
  private nextId = 1;

  public get(file: string, line: number): Readonly<Breakpoint> | undefined {
    return this.byFile.get(file)?.get(line);
  }

  /**
   * Creates the breakpoint at (file, line), or reuses and re-enables the one
   * already there.
   */
  public create(file: string, line: number): Readonly<Breakpoint> {
    if (!Number.isInteger(line) || line < 1) {
      throw new RangeError(`Breakpoint line must be a positive integer, got ${line}`);
    }

    const existing = this.byFile.get(file)?.get(line);
    if (existing) {
      this.enable(existing);
      return existing;
    }

    const breakpoint: Breakpoint = {
      id: this.nextId++,
      file,
      line,
      enabled: true,
      ignoreCount: 0,
    };
    let lines = this.byFile.get(file);
    if (!lines) {
      lines = new Map();
      this.byFile.set(file, lines);
    }
    lines.set(line, breakpoint);
    this.notify({ kind: 'created', breakpoint });
    return breakpoint;
  }

  /** @returns whether the state changed */
  public enable(breakpoint: Readonly<Breakpoint>): boolean {
    return this.setEnabled(breakpoint, true);
  }

  /** @returns whether the state changed */
  public disable(breakpoint: Readonly<Breakpoint>): boolean {
    return this.setEnabled(breakpoint, false);
  }

  public allFor(file: string): ReadonlyMap<number, Readonly<Breakpoint>> {
    return this.byFile.get(file) ?? EMPTY;
  }

  /** Enabled breakpoints of `file`, by ascending line. */
  public enabledFor(file: string): Readonly<Breakpoint>[] {
    return [...this.allFor(file).values()]
      .filter((breakpoint) => breakpoint.enabled)
      .sort((a, b) => a.line - b.line);
  }

  public files(): string[] {
    return [...this.byFile.keys()];
  }

  public dropFile(file: string): void {
    const lines = this.byFile.get(file);
    if (!lines) return;
    this.byFile.delete(file);
    this.notify({ kind: 'dropped', file, count: lines.size });
  }

  private setEnabled(breakpoint: Readonly<Breakpoint>, enabled: boolean): boolean {
    // Only the stored instance is mutated, never a copy handed in by a caller
    const record = this.byFile.get(breakpoint.file)?.get(breakpoint.line);
    if (!record) {
      throw new Error(`Unknown breakpoint ${breakpoint.file}:${breakpoint.line}`);
    }
    if (record.enabled === enabled) {
      return false;
    }
    record.enabled = enabled;
    this.notify({ kind: enabled ? 'enabled' : 'disabled', breakpoint: record });
    return true;
  }

  private notify(change: BreakpointChange): void {
    this.events.emit('change', change).catch((error: unknown) => {
      logger.error('Breakpoint change listener failed', error, { kind: change.kind });
    });
  }
}
