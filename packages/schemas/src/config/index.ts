export * from './ProcessLaunchConfigSchema.js';
export * from './ControllerConfigSchema.js';
