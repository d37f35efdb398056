import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';
import { DEFAULT_CONFIG } from '../constants/defaults.js';

/**
 * Centralised configuration schema for Grovekit.
 *
 * All environment driven defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // CLI mode - when true, reduces logging verbosity for better user experience
  CLI_MODE: z
    .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
    .default(false)
    .transform((value) => value === true || value === 'true' || value === '1'),

  // Depth past which validateTree reports a deep_nesting warning
  TREE_MAX_DEPTH_WARNING: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_CONFIG.VALIDATION.MAX_DEPTH_WARNING),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = configSchema.parse(
  await loadConfig({
    schema: configSchema,
    adapters: [
      // Order matters: later adapters win -> env overrides `.env` defaults.
      dotEnvAdapter({ path: '.env', silent: true }),
      envAdapter(),
    ],
  })
);
