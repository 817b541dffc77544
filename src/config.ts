/**
 * Environment-driven configuration.
 *
 * Every setting has a default, so an empty environment yields a working
 * configuration that stores data under ./storage and uses the bundled rule
 * pack and ATT&CK reference table.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ThreatlineConfig } from './types/config.js';
import { DEFAULT_REFERENCE_PATH } from './knowledge/mitre-attack/loader.js';
import { LOG_LEVELS } from './utils/logger.js';

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../rules', import.meta.url));

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z.object({
  THREATLINE_STORAGE_PATH: z.string().min(1).default('./storage'),
  THREATLINE_RULES_PATH: z.string().min(1).default(DEFAULT_RULES_PATH),
  THREATLINE_REFERENCE_DATA: z.string().min(1).default(DEFAULT_REFERENCE_PATH),
  THREATLINE_MAX_EVENTS: nonNegativeInt(100_000),
  THREATLINE_TIMEOUT_MINUTES: nonNegativeInt(30),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Build the configuration from environment variables.  Empty strings count
 * as unset.  Throws listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ThreatlineConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = result.data;
  return {
    storage: {
      basePath: vars.THREATLINE_STORAGE_PATH,
      uploadsDir: 'uploads',
      resultsDir: 'results',
    },
    analysis: {
      maxEvents: vars.THREATLINE_MAX_EVENTS,
      timeoutMinutes: vars.THREATLINE_TIMEOUT_MINUTES,
    },
    rulesPath: vars.THREATLINE_RULES_PATH,
    referenceDataPath: vars.THREATLINE_REFERENCE_DATA,
    logging: { level: vars.LOG_LEVEL },
  };
}
