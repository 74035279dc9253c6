/**
 * Markdown Reporter
 *
 * Writes verification reports as markdown files.
 */

import { writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { basename, extname, join } from 'node:path';

import { DEFAULT_MARKDOWN_FILENAME } from '../constants.js';
import { CATEGORY_NAMES, type VerificationReport } from '../verification/types.js';

import { isOverallPassed } from './status.js';
import { CATEGORY_LABELS, type ReportContext, type Reporter } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Markdown reporter configuration.
 */
export interface MarkdownReporterConfig {
  /** Directory for report files */
  path: string;

  /**
   * Filename template.
   * Supports placeholders: {log}, {timestamp}, {status}
   * Default: '{log}-{timestamp}.md'
   */
  filename?: string;

  /** Only write a report when verification failed (default: false) */
  onlyOnFailure?: boolean;
}

// =============================================================================
// Reporter
// =============================================================================

/**
 * Create a markdown reporter.
 *
 * @example
 * ```typescript
 * const reporter = createMarkdownReporter({
 *   path: './logverify-reports',
 *   onlyOnFailure: true,
 * });
 * ```
 */
export function createMarkdownReporter(config: MarkdownReporterConfig): Reporter & {
  /** Files written so far */
  readonly written: readonly string[];
} {
  const { path: outputPath, filename = DEFAULT_MARKDOWN_FILENAME, onlyOnFailure = false } = config;
  const written: string[] = [];

  return {
    written,

    onVerificationComplete(report: VerificationReport, context: ReportContext) {
      const passed = isOverallPassed(report);
      if (onlyOnFailure && passed) {
        return;
      }

      const generatedAt = context.generatedAt ?? new Date();
      const markdown = renderMarkdownReport(report, { ...context, generatedAt });
      const filepath = join(outputPath, resolveFilename(filename, context.logFile, passed, generatedAt));

      if (!existsSync(outputPath)) {
        mkdirSync(outputPath, { recursive: true });
      }

      writeFileSync(filepath, markdown, 'utf-8');
      written.push(filepath);
    },
  };
}

// =============================================================================
// Markdown Generation
// =============================================================================

/**
 * Render a report as markdown.
 */
export function renderMarkdownReport(report: VerificationReport, context: ReportContext = {}): string {
  const lines: string[] = [];
  const passed = isOverallPassed(report);

  lines.push('# Log Verification Report');
  lines.push('');
  lines.push(`**Status:** ${passed ? '✅ Passed' : '❌ Failed'}`);
  if (context.logFile) {
    lines.push(`**Log file:** \`${context.logFile}\``);
  }
  lines.push('');

  for (const name of CATEGORY_NAMES) {
    const result = report[name];

    lines.push('---');
    lines.push('');
    lines.push(`## ${CATEGORY_LABELS[name]} ${result.passed ? '✅' : '❌'}`);
    lines.push('');
    lines.push('| Metric | Count |');
    lines.push('| --- | --- |');
    for (const [metric, value] of Object.entries(result.summary)) {
      lines.push(`| ${metric} | ${value} |`);
    }

    if (result.errors.length > 0) {
      lines.push('');
      lines.push('**Errors:**');
      for (const error of result.errors) {
        lines.push(`- ${error}`);
      }
    }

    if (result.warnings.length > 0) {
      lines.push('');
      lines.push('**Warnings:**');
      for (const warning of result.warnings) {
        lines.push(`- ${warning}`);
      }
    }

    lines.push('');
  }

  // Footer
  lines.push('---');
  lines.push('');
  lines.push(`*Generated at ${(context.generatedAt ?? new Date()).toISOString()}*`);

  return lines.join('\n');
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Resolve filename template.
 */
export function resolveFilename(
  template: string,
  logFile: string | undefined,
  passed: boolean,
  generatedAt: Date
): string {
  const timestamp = generatedAt.toISOString().replace(/[:.]/g, '-');
  const log = logFile ? basename(logFile, extname(logFile)).replace(/[^a-zA-Z0-9-_]/g, '-') : 'log';

  return template
    .replace('{log}', log)
    .replace('{timestamp}', timestamp)
    .replace('{status}', passed ? 'passed' : 'failed');
}
