import * as path from 'path';
import { z } from 'zod';

import { ValidationError } from './errors.js';

/** Templates shipped with the package, one level above src/ and dist/. */
export const BUNDLED_TEMPLATES_DIR = path.resolve(__dirname, '..', 'templates');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

/**
 * Zod schema for all supported environment variables.
 */
export const EnvSchema = z.object({
  EMIT_LOCK: booleanFlag.default('false'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  NODE_ENV: z.string().default('development'),

  TEMPLATES_DIR: z.string().min(1).default(BUNDLED_TEMPLATES_DIR),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Loads and validates the configuration from environment variables.
 * Throws a ValidationError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvVars {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.errors.map(e => ({ message: e.message, path: e.path }));
    const lines = details.map(d => `- ${d.path.join('.')}: ${d.message}`);
    throw new ValidationError('Invalid environment variables:\n' + lines.join('\n'), details);
  }
  return result.data;
}
