import { z } from 'zod';

// How the debuggee script is launched
export const ProcessLaunchConfigSchema = z.object({
  interpreter: z.string().min(1).default('python3'),
  interpreterArgs: z.array(z.string()).default([]),
  // Defaults to the directory of the script when absent
  workspaceDir: z.string().min(1).optional(),
  env: z.record(z.string(), z.string()).optional(),
});
