export const statusMessages = {
  running: (script: string) => `Running script ${script}`,
  finished: () => 'Your script has finished running.',
  info: (message: string) => `Debugger info: ${message}`,
  warning: (message: string) => `Debugger warning: ${message}`,
  error: (message: string) => `Debugger error: ${message}`,
  postmortem: (summary: string) => `Debugger postmortem: ${summary}`,
} as const;
