/**
 * CLI Module
 *
 * Command-line interface for logverify.
 */

import { Command } from 'commander';

import { registerStatsCommand, registerVerifyCommand } from './commands/index.js';

// Re-export for convenience
export * from './commands/index.js';
export * as output from './utils/output.js';

/**
 * Create the CLI program.
 */
export function createCli(): Command {
  const program = new Command();

  program
    .name('logverify')
    .description('Post-hoc verification of HIVE multi-agent log output')
    .version('0.1.0');

  // Register commands
  registerVerifyCommand(program);
  registerStatsCommand(program);

  return program;
}

/**
 * Run the CLI.
 */
export async function runCli(argv?: readonly string[]): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}
