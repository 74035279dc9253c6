/**
 * Config Loader
 *
 * Discovers and loads logverify.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { CONFIG_ENV_VAR, CONFIG_FILE_NAMES, ENV_FILE_NAMES } from '../constants.js';

import { resolveConfig, validateConfig } from './resolver.js';
import { ConfigError, type LogVerifyConfig, type ResolvedConfig } from './types.js';

/**
 * First of the file names found in startDir or the nearest ancestor that has
 * one. Earlier names win within a directory.
 */
export function findUp(fileNames: readonly string[], startDir = process.cwd()): string | null {
  for (let dir = resolve(startDir); ; dir = dirname(dir)) {
    const found = fileNames.map((name) => join(dir, name)).find((path) => existsSync(path));
    if (found) {
      return found;
    }
    if (dirname(dir) === dir) {
      return null;
    }
  }
}

/**
 * Find the config file by searching from startDir up to root.
 */
export function findConfigFile(startDir?: string): string | null {
  return findUp(CONFIG_FILE_NAMES, startDir);
}

/**
 * Find the .env file for a run.
 *
 * The search starts beside the config file that loadConfig would pick
 * (LOGVERIFY_CONFIG, else a discovered logverify.config.yaml) and falls back
 * to startDir, walking up from there.
 */
export function findEnvFile(startDir = process.cwd()): string | null {
  const explicit = process.env[CONFIG_ENV_VAR];
  const configPath = explicit ? resolve(startDir, explicit) : findConfigFile(startDir);
  return findUp(ENV_FILE_NAMES, configPath ? dirname(configPath) : startDir);
}

/**
 * Get the directory containing the config file.
 */
export function getConfigDir(startDir?: string): string | null {
  const configPath = findConfigFile(startDir);
  return configPath ? dirname(configPath) : null;
}

/**
 * Parse YAML config content.
 */
export function parseConfig(content: string, file?: string): LogVerifyConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, file);
  }

  return validateConfig(raw, file);
}

/**
 * Load and validate a config file.
 */
export function loadConfigFile(configPath: string): LogVerifyConfig {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError('Config file not found', absolutePath);
  }

  return parseConfig(readFileSync(absolutePath, 'utf-8'), absolutePath);
}

/**
 * Options for loadConfig.
 */
export interface LoadConfigOptions {
  /** Explicit config file (takes priority over LOGVERIFY_CONFIG) */
  configPath?: string;
  /** Directory to start searching from (default: cwd) */
  cwd?: string;
}

/**
 * Load and resolve the config.
 *
 * Priority: explicit path, then the LOGVERIFY_CONFIG environment variable,
 * then a logverify.config.yaml found from cwd upwards. Without any file the
 * defaults apply.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const path = options.configPath ?? process.env[CONFIG_ENV_VAR] ?? findConfigFile(options.cwd);

  if (!path) {
    return resolveConfig({}, options.cwd);
  }

  const absolutePath = resolve(path);
  const config = loadConfigFile(absolutePath);

  return {
    ...resolveConfig(config, dirname(absolutePath)),
    configPath: absolutePath,
  };
}
