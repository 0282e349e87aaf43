import type { ActionDescriptor, ActionName } from '../types/index.js';

export const DEBUG_ACTIONS: readonly ActionDescriptor[] = [
  {
    name: 'stop',
    displayName: 'Stop',
    description: 'Stop the running code.',
  },
  {
    name: 'run',
    displayName: 'Continue',
    description: 'Continue to run your Python script.',
  },
  {
    name: 'step-over',
    displayName: 'Step Over',
    description: 'Step over a line of code.',
  },
  {
    name: 'step-in',
    displayName: 'Step In',
    description: 'Step into a function.',
  },
  {
    name: 'step-out',
    displayName: 'Step Out',
    description: 'Step out of a function.',
  },
];

export function isActionName(name: string): name is ActionName {
  return DEBUG_ACTIONS.some((action) => action.name === name);
}
