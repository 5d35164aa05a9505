import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '@celltrace/core';
import { Logger } from './logger.js';

const trackerConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logFormat: z.enum(['text', 'json']).default('text'),
  outputDir: z.string().min(1).default('.'),
});

export type TrackerConfig = z.infer<typeof trackerConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Read tracker settings from the environment:
 * CELLTRACE_LOG_LEVEL, CELLTRACE_LOG_FORMAT and CELLTRACE_OUTPUT_DIR.
 */
export function loadTrackerConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const parsed = trackerConfigSchema.safeParse({
    logLevel: emptyToUndefined(env.CELLTRACE_LOG_LEVEL),
    logFormat: emptyToUndefined(env.CELLTRACE_LOG_FORMAT),
    outputDir: emptyToUndefined(env.CELLTRACE_OUTPUT_DIR),
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError({
      code: 'INVALID_OPTIONS',
      message: `Invalid tracker configuration: ${details.join('; ')}`,
      suggestion: 'Check the CELLTRACE_* environment variables.',
      context: { issues: details },
    });
  }

  return parsed.data;
}

let defaults: { config: TrackerConfig; diagnostics: Logger } | undefined;

function getDefaults(): { config: TrackerConfig; diagnostics: Logger } {
  if (!defaults) {
    const config = loadTrackerConfig();
    defaults = {
      config,
      diagnostics: new Logger({ level: config.logLevel, format: config.logFormat }),
    };
  }
  return defaults;
}

/**
 * Process-wide diagnostics logger built from the environment on first use
 */
export function defaultDiagnostics(): Logger {
  return getDefaults().diagnostics;
}

/**
 * Resolve a default sink file name under the configured output directory
 */
export function defaultSinkPath(fileName: string): string {
  return join(getDefaults().config.outputDir, fileName);
}
