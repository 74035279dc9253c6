/**
 * Console Reporter
 *
 * Colored terminal output for verification results.
 */

import { paint, type Style } from '../utils/ansi.js';
import { CATEGORY_NAMES, type VerificationReport, type VerificationResult } from '../verification/types.js';

import { isOverallPassed } from './status.js';
import { CATEGORY_LABELS, type ConsoleReporterOptions, type Reporter } from './types.js';

type Painter = (style: Style, text: string) => string;

/**
 * Status symbols.
 */
const symbols = {
  passed: '✓',
  failed: '✗',
  warning: '⚠',
};

/**
 * Render options.
 */
export interface RenderOptions {
  /** Use colors (default: true) */
  colors?: boolean;
}

/**
 * Render a report as terminal text.
 *
 * Each category lists its summary metrics, then errors, then warnings.
 */
export function renderConsoleReport(report: VerificationReport, options: RenderOptions = {}): string {
  const style = painter(options.colors ?? true);
  const lines: string[] = [];

  lines.push(style('bold', 'Log Verification Results'));
  lines.push(style('dim', '─'.repeat(60)));
  lines.push(`Overall Status: ${status(isOverallPassed(report), style)}`);
  lines.push('');

  for (const name of CATEGORY_NAMES) {
    lines.push(...renderCategory(CATEGORY_LABELS[name], report[name], style));
    lines.push('');
  }

  return lines.join('\n');
}

function renderCategory(label: string, result: VerificationResult, style: Painter): string[] {
  const lines = [`${style('cyan', label)}: ${status(result.passed, style)}`];

  for (const [metric, value] of Object.entries(result.summary)) {
    lines.push(`  - ${metric.replace(/_/g, ' ')}: ${value}`);
  }
  for (const error of result.errors) {
    lines.push(style('red', `  ${symbols.failed} ${error}`));
  }
  for (const warning of result.warnings) {
    lines.push(style('yellow', `  ${symbols.warning} ${warning}`));
  }

  return lines;
}

function status(passed: boolean, style: Painter): string {
  return passed
    ? style('green', `${symbols.passed} PASSED`)
    : style('red', `${symbols.failed} FAILED`);
}

function painter(useColors: boolean): Painter {
  return (name, text) => paint(name, text, useColors);
}

/**
 * Console reporter for terminal output.
 */
export class ConsoleReporter implements Reporter {
  private readonly useColors: boolean;
  private readonly stream: NodeJS.WritableStream;

  constructor(options: ConsoleReporterOptions = {}) {
    this.useColors = options.colors ?? true;
    this.stream = options.stream ?? process.stdout;
  }

  /**
   * Called once every check has run.
   */
  onVerificationComplete(report: VerificationReport): void {
    this.stream.write('\n' + renderConsoleReport(report, { colors: this.useColors }) + '\n');
  }
}

/**
 * Create a console reporter.
 */
export function createConsoleReporter(options?: ConsoleReporterOptions): ConsoleReporter {
  return new ConsoleReporter(options);
}
