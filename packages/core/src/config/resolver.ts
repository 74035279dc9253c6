/**
 * Config Resolver
 *
 * Applies defaults and resolves environment variables ($VAR syntax).
 */

import { isAbsolute, resolve } from 'node:path';

import { DEFAULT_EXPECTED_TOOLS, DEFAULT_MIN_READY_ACTORS } from '../constants.js';

import { ConfigError, configSchema, type LogVerifyConfig, type ResolvedConfig } from './types.js';

/**
 * Resolve a string value that may be a $ENV_VAR reference.
 *
 * @example
 * resolveEnvVar('$REPORT_DIR')  // Returns process.env.REPORT_DIR
 * resolveEnvVar('./reports')    // Returns as-is
 */
export function resolveEnvVar(value: string): string {
  if (!value.startsWith('$')) {
    return value;
  }

  const envName = value.slice(1);
  const envValue = process.env[envName];

  if (envValue === undefined) {
    throw new ConfigError(`Environment variable ${envName} is not set (referenced as ${value})`);
  }

  return envValue;
}

/**
 * Validate raw config data against the schema.
 */
export function validateConfig(raw: unknown, file?: string): LogVerifyConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid config: ${issues.join('; ')}`, file);
  }
  return result.data;
}

/**
 * Apply defaults to a validated config.
 *
 * @param baseDir - Directory relative report paths are resolved against
 */
export function resolveConfig(config: LogVerifyConfig, baseDir = process.cwd()): ResolvedConfig {
  const markdown = config.reports?.markdown;

  return {
    expectedTools: config.expectedTools ?? DEFAULT_EXPECTED_TOOLS,
    minReadyActors: config.minReadyActors ?? DEFAULT_MIN_READY_ACTORS,
    reports: markdown
      ? {
          markdown: {
            ...markdown,
            path: resolvePath(resolveEnvVar(markdown.path), baseDir),
          },
        }
      : {},
  };
}

function resolvePath(path: string, baseDir: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}
