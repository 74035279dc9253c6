/**
 * Stats Command
 *
 * Print entry counts of a log file by level, target and span.
 */

import { existsSync, readFileSync } from 'node:fs';

import type { Command } from 'commander';

import { parseLog } from '../../parser/parser.js';
import { computeStats } from '../../parser/query.js';
import * as output from '../utils/output.js';

/**
 * Stats command options.
 */
export interface StatsOptions {
  json?: boolean;
}

/**
 * Register the stats command.
 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats <log-file>')
    .description('Show entry counts by level, target and span')
    .option('--json', 'Output as JSON')
    .allowExcessArguments(false)
    .action((logFile: string, options: StatsOptions) => {
      try {
        statsCommand(logFile, options);
      } catch (error) {
        output.exitWithError(error instanceof Error ? error.message : String(error));
      }
    });
}

/**
 * Execute the stats command.
 */
export function statsCommand(logFile: string, options: StatsOptions = {}): void {
  if (!existsSync(logFile)) {
    throw new Error(`Log file ${logFile} does not exist`);
  }

  const stats = computeStats(parseLog(readFileSync(logFile, 'utf-8')));

  if (options.json) {
    output.json(stats);
    return;
  }

  output.header(`Log Statistics: ${logFile}`);
  output.dim(`Total entries: ${stats.totalEntries}`);

  printCounts('Levels', 'level', stats.levels);
  printCounts('Targets', 'target', stats.targets);
  printCounts('Spans', 'span', stats.spans);
}

function printCounts(title: string, column: string, counts: Record<string, number>): void {
  const rows = Object.entries(counts)
    .sort(([, a], [, b]) => b - a)
    .map(([name, count]) => ({ [column]: name, count }));

  if (rows.length === 0) return;

  output.header(title);
  output.table(rows);
}
