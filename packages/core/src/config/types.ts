/**
 * Configuration Types
 *
 * Schema for logverify.config.yaml.
 */

import { z } from 'zod';

import type { MarkdownReporterConfig } from '../reporters/markdown.js';

/**
 * Markdown report settings.
 */
const markdownReportSchema = z
  .object({
    /** Output directory; `$VAR` references are resolved from the environment */
    path: z.string().min(1),
    filename: z.string().min(1).optional(),
    onlyOnFailure: z.boolean().optional(),
  })
  .strict();

/**
 * Raw config file schema.
 */
export const configSchema = z
  .object({
    /** Tool names counted by the tool execution check */
    expectedTools: z.array(z.string().min(1)).min(1).optional(),
    /** Ready actors below this count produce a lifecycle warning */
    minReadyActors: z.number().int().min(0).optional(),
    reports: z
      .object({
        markdown: markdownReportSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Config as written in the file.
 */
export type LogVerifyConfig = z.infer<typeof configSchema>;

/**
 * Config with defaults applied and paths resolved.
 */
export interface ResolvedConfig {
  expectedTools: readonly string[];
  minReadyActors: number;
  reports: {
    markdown?: MarkdownReporterConfig;
  };
  /** File the config came from, if any */
  configPath?: string;
}

/**
 * Error thrown when a config file cannot be loaded or is invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly file?: string
  ) {
    super(file ? `${message} (${file})` : message);
    this.name = 'ConfigError';
  }
}
