/**
 * Log Verification
 *
 * Runs every check against one parsed log.
 */

import { DEFAULT_EXPECTED_TOOLS } from '../constants.js';
import { parseLog } from '../parser/parser.js';
import type { LogEntry } from '../parser/types.js';

import { verifyAgentLifecycle } from './lifecycle.js';
import { verifyLlmInteraction } from './llm.js';
import { verifySystemStartup } from './startup.js';
import { verifyToolExecution } from './tools.js';
import type { VerificationOptions, VerificationReport } from './types.js';

/**
 * Parse and verify a complete log buffer.
 *
 * @example
 * ```typescript
 * const report = verify(readFileSync('hive.log', 'utf-8'));
 * process.exit(exitStatus(report));
 * ```
 */
export function verify(
  logText: string,
  expectedTools: readonly string[] = DEFAULT_EXPECTED_TOOLS,
  options: VerificationOptions = {}
): VerificationReport {
  return verifyEntries(parseLog(logText), expectedTools, options);
}

/**
 * Verify already-parsed entries.
 */
export function verifyEntries(
  entries: readonly LogEntry[],
  expectedTools: readonly string[] = DEFAULT_EXPECTED_TOOLS,
  options: VerificationOptions = {}
): VerificationReport {
  return {
    system_startup: verifySystemStartup(entries),
    agent_lifecycle: verifyAgentLifecycle(entries, options),
    tool_execution: verifyToolExecution(entries, expectedTools),
    llm_interaction: verifyLlmInteraction(entries),
  };
}
