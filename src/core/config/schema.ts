/**
 * Configuration file schema.
 */
import { z } from 'zod';

/**
 * Make an object field optional while still applying its inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * How to reach the container engine when no snapshot is supplied.
 * With nothing set, dockerode's own defaults apply (DOCKER_HOST, then the local socket).
 */
export const EngineSettingsSchema = z.object({
  socket_path: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
});

export const OutputSettingsSchema = z.object({
  /** Shorten image ids to 12 characters (--no-trunc overrides) */
  truncate_ids: z.boolean().default(true),
});

export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  error: z.number().int().default(1),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  engine: withDefaults(EngineSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  log_level: LogLevelSchema.default('warn'),
  exit_codes: withDefaults(ExitCodesSchema),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
