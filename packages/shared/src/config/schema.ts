import { z } from 'zod';

export const ToolTimeoutsSchema = z
  .object({
    list_files: z.number().positive().default(30),
    read_file: z.number().positive().default(10),
    search: z.number().positive().default(60),
    apply_patch: z.number().positive().default(10),
  })
  .default({});

export const SandboxConfigSchema = z
  .object({
    /** Container CLI used to start sandboxes */
    binary: z.string().default('docker'),
  })
  .default({});

export const GitConfigSchema = z
  .object({
    timeoutSec: z.number().positive().default(120),
  })
  .default({});

export const ToolsConfigSchema = z
  .object({
    /** Per-tool deadlines in seconds */
    timeouts: ToolTimeoutsSchema,
    /** Default deadline for the `run` tool in seconds */
    runTimeoutSec: z.number().positive().default(60),
    maxOutputLines: z.number().int().positive().default(2000),
    maxOutputBytes: z.number().int().positive().default(100_000),
  })
  .default({});

export const LoggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .default({});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Where run directories are created */
  outDir: z.string().default('out'),
  /** Directory holding `<suite>/<task>/task.yaml` */
  tasksRoot: z.string().default('tasks'),
  sandbox: SandboxConfigSchema,
  git: GitConfigSchema,
  tools: ToolsConfigSchema,
  logging: LoggingConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type ToolTimeouts = z.infer<typeof ToolTimeoutsSchema>;

/** Flags and partial files are merged before validation, so every key is optional. */
export type ConfigInput = z.input<typeof ConfigSchema>;
