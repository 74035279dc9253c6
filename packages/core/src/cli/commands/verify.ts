/**
 * Verify Command
 *
 * Verify a captured HIVE log file and exit with its status.
 */

import { existsSync, readFileSync } from 'node:fs';

import type { Command } from 'commander';

import { loadConfig } from '../../config/loader.js';
import { parseLog } from '../../parser/parser.js';
import { createConsoleReporter } from '../../reporters/console.js';
import { createMarkdownReporter } from '../../reporters/markdown.js';
import { exitStatus, isOverallPassed } from '../../reporters/status.js';
import type { ReportContext, Reporter } from '../../reporters/types.js';
import { verifyEntries } from '../../verification/verify.js';
import * as output from '../utils/output.js';

/**
 * Verify command options.
 */
export interface VerifyOptions {
  tools?: string;
  config?: string;
  json?: boolean;
  markdown?: string;
  color?: boolean;
  verbose?: boolean;
}

/**
 * Register the verify command.
 */
export function registerVerifyCommand(program: Command): void {
  program
    .command('verify <log-file>', { isDefault: true })
    .description(
      'Verify that a HIVE log contains the expected lifecycle events. ' +
        'Runs by default; use `logverify verify <log-file>` when the file is named like a command (e.g. stats)'
    )
    .option('-t, --tools <names>', 'Comma-separated tool names to count (overrides config)')
    .option('-c, --config <path>', 'Path to logverify.config.yaml')
    .option('--json', 'Output as JSON')
    .option('--markdown <dir>', 'Also write a markdown report to this directory')
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Show parse statistics')
    .allowExcessArguments(false)
    .action(async (logFile: string, options: VerifyOptions) => {
      const code = await verifyCommand(logFile, options).catch((error: unknown) =>
        output.exitWithError(error instanceof Error ? error.message : String(error))
      );
      process.exit(code);
    });
}

/**
 * Execute the verify command.
 *
 * @returns The process exit status for the report
 */
export async function verifyCommand(logFile: string, options: VerifyOptions = {}): Promise<number> {
  if (!existsSync(logFile)) {
    throw new Error(`Log file ${logFile} does not exist`);
  }

  const config = loadConfig({ configPath: options.config });
  const expectedTools = options.tools !== undefined ? parseToolList(options.tools) : config.expectedTools;

  const content = readFileSync(logFile, 'utf-8');
  const entries = parseLog(content);
  const report = verifyEntries(entries, expectedTools, { minReadyActors: config.minReadyActors });
  const code = exitStatus(report);

  if (!options.json) {
    if (options.verbose) {
      if (config.configPath) {
        output.info(`Using config ${config.configPath}`);
      }
      const lines = content.split(/\r?\n/).filter((line) => line.trim()).length;
      output.dim(`Parsed ${entries.length} entries from ${lines} lines (${lines - entries.length} skipped)`);
    }
    if (entries.length === 0) {
      output.warning(`No log entries could be parsed from ${logFile}`);
    }
  }

  const reporters: Reporter[] = [];
  if (!options.json) {
    reporters.push(createConsoleReporter({ colors: options.color !== false && output.colorsEnabled() }));
  }

  const markdownConfig = options.markdown
    ? { ...config.reports.markdown, path: options.markdown }
    : config.reports.markdown;
  const markdown = markdownConfig ? createMarkdownReporter(markdownConfig) : undefined;
  if (markdown) {
    reporters.push(markdown);
  }

  const context: ReportContext = { logFile, generatedAt: new Date() };
  for (const reporter of reporters) {
    await reporter.onVerificationComplete?.(report, context);
  }
  for (const reporter of reporters) {
    await reporter.finalize?.();
  }

  if (options.json) {
    output.json({ passed: isOverallPassed(report), exitCode: code, results: report });
  } else if (markdown) {
    for (const file of markdown.written) {
      output.success(`Markdown report written to ${file}`);
    }
  }

  return code;
}

/**
 * Split a comma-separated tool list.
 */
export function parseToolList(value: string): string[] {
  const tools = value
    .split(',')
    .map((tool) => tool.trim())
    .filter(Boolean);

  if (tools.length === 0) {
    throw new Error('--tools needs at least one tool name');
  }

  return tools;
}
