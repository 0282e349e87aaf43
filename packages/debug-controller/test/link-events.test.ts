import { describe, it, expect, beforeEach } from 'vitest';
import { createHarness, startPaused, startRunning, type Harness } from './utils/harness.js';
import type { DebugLinkEvent, StackFrame } from '../src/types/index.js';

describe('SessionController link events', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  it('hands the innermost locals and the full stack to the inspector', async () => {
    await startPaused(harness, 'a.py', 3);
    const frames: StackFrame[] = [
      { name: 'area', file: 'a.py', line: 3, locals: { width: '2', height: '5' } },
      { name: '<module>', file: 'a.py', line: 9, locals: { shapes: '[]' } },
    ];

    harness.link().emit({ type: 'stack', frames });
    await harness.controller.settled();

    expect(harness.ui.inspectorUpdates).toEqual([
      { locals: { width: '2', height: '5' }, frames },
    ]);
    expect(harness.controller.getPhase()).toBe('paused');
  });

  it('ignores an empty stack snapshot', async () => {
    await startPaused(harness, 'a.py', 3);
    harness.ui.clear();

    harness.link().emit({ type: 'stack', frames: [] });
    await harness.controller.settled();

    expect(harness.ui.calls).toEqual([]);
  });

  it('moves the selection on every line while paused', async () => {
    await startPaused(harness, 'a.py', 3);

    harness.link().emit({ type: 'line', file: 'b.py', line: 1 });
    await harness.controller.settled();

    expect(harness.ui.calls[harness.ui.calls.length - 1]).toBe('moveSelection b.py 0');
    expect(harness.controller.getPosition()).toEqual({ file: 'b.py', line: 0 });
    expect(harness.controller.getPhase()).toBe('paused');
  });

  it('ignores a line event before bootstrap', async () => {
    await harness.controller.start();
    harness.ui.clear();

    harness.link().emit({ type: 'line', file: 'a.py', line: 2 });
    await harness.controller.settled();

    expect(harness.ui.calls).toEqual([]);
    expect(harness.controller.getPhase()).toBe('starting');
  });

  it('bootstraps only once', async () => {
    await startRunning(harness);

    harness.link().emit({ type: 'bootstrap' });
    await harness.controller.settled();

    expect(harness.link().requests).toEqual(['open', 'run']);
    expect(harness.controller.getPhase()).toBe('running');
  });

  it('shows debugger messages as status lines', async () => {
    await startRunning(harness);
    harness.ui.clear();

    harness.link().emit({ type: 'info', message: 'attached' });
    harness.link().emit({ type: 'warning', message: 'slow frame' });
    harness.link().emit({ type: 'error', message: 'bad request' });
    await harness.controller.settled();

    expect(harness.ui.statuses()).toEqual([
      'Debugger info: attached',
      'Debugger warning: slow frame',
      'Debugger error: bad request',
    ]);
  });

  it('surfaces a postmortem without ending the session', async () => {
    await startPaused(harness, 'a.py', 3);
    harness.ui.clear();

    harness.link().emit({ type: 'postmortem', context: { exception: 'ZeroDivisionError' } });
    await harness.controller.settled();

    expect(harness.ui.calls).toEqual([
      'showStatus Debugger postmortem: {"exception":"ZeroDivisionError"}',
    ]);
    expect(harness.controller.getPhase()).toBe('paused');
    expect(harness.process().killed).toBe(false);
  });

  it.each<DebugLinkEvent>([
    { type: 'breakpoint-ignore', breakpoint: { file: 'a.py', line: 3 }, count: 2 },
    { type: 'breakpoint-clear', breakpoint: { file: 'a.py', line: 3 } },
    { type: 'restart' },
    { type: 'call', args: { n: '1' } },
    { type: 'return', value: '42' },
    { type: 'exception', name: 'KeyError', value: "'missing'" },
  ])('accepts $type without any effect', async (event) => {
    await startPaused(harness, 'a.py', 3);
    harness.ui.clear();

    harness.link().emit(event);
    await harness.controller.settled();

    expect(harness.ui.calls).toEqual([]);
    expect(harness.link().requests).toEqual(['open', 'run']);
    expect(harness.controller.getPhase()).toBe('paused');
  });
});
