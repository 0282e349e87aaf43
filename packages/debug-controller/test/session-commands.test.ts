import { describe, it, expect, beforeEach } from 'vitest';
import { createHarness, startPaused, startRunning, type Harness } from './utils/harness.js';

describe('SessionController commands', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  it.each([
    ['stepOver', 'stepOver'],
    ['stepInto', 'stepInto'],
    ['stepReturn', 'stepReturn'],
    ['run', 'run'],
  ] as const)('sends %s from paused and resumes running', async (command, request) => {
    await startPaused(harness, 'a.py', 3);

    const ack = await harness.controller[command]();

    expect(ack).toEqual({ command, sent: true });
    expect(harness.link().requests).toEqual(['open', 'run', request]);
    expect(harness.controller.getPhase()).toBe('running');
  });

  it('accepts run while already running', async () => {
    await startRunning(harness);

    await expect(harness.controller.run()).resolves.toEqual({ command: 'run', sent: true });
    expect(harness.controller.getPhase()).toBe('running');
  });

  it.each(['stepOver', 'stepInto', 'stepReturn'] as const)(
    'refuses %s unless paused',
    async (command) => {
      await startRunning(harness);

      await expect(harness.controller[command]()).resolves.toEqual({ command, sent: false });
      expect(harness.link().requests).toEqual(['open', 'run']);
    },
  );

  it('refuses commands without a session', async () => {
    await expect(harness.controller.run()).resolves.toEqual({ command: 'run', sent: false });
    await expect(harness.controller.stepOver()).resolves.toEqual({
      command: 'stepOver',
      sent: false,
    });
    expect(harness.controller.getPhase()).toBe('idle');
  });

  it('refuses commands before bootstrap', async () => {
    await harness.controller.start();

    await expect(harness.controller.run()).resolves.toEqual({ command: 'run', sent: false });
    expect(harness.link().requests).toEqual(['open']);
  });

  describe('as a debugger mode', () => {
    it('describes itself to the host', () => {
      expect(harness.controller.name).toBe('Graphical Debugger');
      expect(harness.controller.description).toBe('Debug your Python 3 code.');
      expect(harness.controller.icon).toBe('python');
      expect(harness.controller.isDebugger).toBe(true);
      expect(harness.controller.actions().map((action) => action.displayName)).toEqual([
        'Stop',
        'Continue',
        'Step Over',
        'Step In',
        'Step Out',
      ]);
    });

    it.each([
      ['run', 'run'],
      ['step-over', 'stepOver'],
      ['step-in', 'stepInto'],
      ['step-out', 'stepReturn'],
    ])('maps the %s action to %s', async (action, request) => {
      await startPaused(harness, 'a.py', 3);

      await harness.controller.handleAction(action);

      expect(harness.link().requests).toEqual(['open', 'run', request]);
    });

    it('stops the session from the stop action', async () => {
      await startRunning(harness);

      await harness.controller.handleAction('stop');

      expect(harness.controller.getPhase()).toBe('idle');
      expect(harness.process().killed).toBe(true);
    });

    it('ignores unknown actions', async () => {
      await startPaused(harness, 'a.py', 3);

      await harness.controller.handleAction('rewind');

      expect(harness.link().requests).toEqual(['open', 'run']);
      expect(harness.controller.getPhase()).toBe('paused');
    });
  });

  it('serializes commands issued back to back', async () => {
    await startPaused(harness, 'a.py', 3);

    const [first, second] = await Promise.all([
      harness.controller.stepOver(),
      harness.controller.stepOver(),
    ]);

    expect(first.sent).toBe(true);
    expect(second.sent).toBe(false);
    expect(harness.link().requests).toEqual(['open', 'run', 'stepOver']);
  });
});
