import { z } from 'zod';
import { ControllerConfigSchema, ProcessLaunchConfigSchema } from './config/index.js';

export * from './config/index.js';

export type ProcessLaunchConfig = z.infer<typeof ProcessLaunchConfigSchema>;
export type ControllerConfig = z.infer<typeof ControllerConfigSchema>;
export type ControllerConfigInput = z.input<typeof ControllerConfigSchema>;
