import { z } from 'zod';
import { ProcessLaunchConfigSchema } from './ProcessLaunchConfigSchema.js';

export const DEFAULT_DEBUGGER_PORT = 31415;

export const ControllerConfigSchema = ProcessLaunchConfigSchema.extend({
  debuggerHost: z.string().min(1).default('localhost'),
  debuggerPort: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(DEFAULT_DEBUGGER_PORT),
  // Mode the host switches back to once a session is stopped
  fallbackMode: z.string().min(1).default('python'),
});
