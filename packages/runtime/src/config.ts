// Runtime configuration from the environment

import { z } from 'zod';
import type { AutowireOptions } from './autowire/graph.js';
import { ValidationError } from './errors.js';
import { consoleLogger, createLevelLogger, silentLogger, type Logger } from './logger.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  ARMATURE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ARMATURE_STRICT_SCAN: booleanFlag.default('true'),
  ARMATURE_AUTOWIRE_ROOT: z.string().min(1).optional(),
  DATABASE_URL: z.string().url().optional(),
});

export type RuntimeConfig = {
  logLevel: z.infer<typeof EnvSchema>['ARMATURE_LOG_LEVEL'];
  /** Reject unsupported scan roots instead of returning no scopes */
  strictScan: boolean;
  autowireRoot?: string;
  databaseUrl?: string;
};

/**
 * Read the runtime configuration.
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ValidationError(`Invalid environment: ${invalid.join(', ')}`, {
      field: invalid[0],
      details: { issues: parsed.error.flatten().fieldErrors },
    });
  }

  return {
    logLevel: parsed.data.ARMATURE_LOG_LEVEL,
    strictScan: parsed.data.ARMATURE_STRICT_SCAN,
    autowireRoot: parsed.data.ARMATURE_AUTOWIRE_ROOT,
    databaseUrl: parsed.data.DATABASE_URL,
  };
}

/**
 * Logger matching the configured level.
 */
export function createConfiguredLogger(config: RuntimeConfig, base: Logger = consoleLogger): Logger {
  if (config.logLevel === 'silent') {
    return silentLogger;
  }
  return createLevelLogger(config.logLevel, base);
}

/**
 * Scan options for autowireConfig. The root is left out when unset so the
 * whole project is scanned.
 */
export function autowireOptions(config: RuntimeConfig): AutowireOptions {
  if (config.autowireRoot === undefined) {
    return { strict: config.strictScan };
  }
  return { strict: config.strictScan, root: config.autowireRoot };
}
