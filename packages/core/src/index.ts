/**
 * @logverify/core
 *
 * Post-hoc verification of HIVE multi-agent log output.
 *
 * @example
 * ```typescript
 * import { readFileSync } from 'node:fs';
 * import { verify, renderConsoleReport, exitStatus } from '@logverify/core';
 *
 * const report = verify(readFileSync('hive.log', 'utf-8'));
 * console.log(renderConsoleReport(report));
 * process.exit(exitStatus(report));
 * ```
 *
 * Or from the command line:
 * ```bash
 * npx logverify hive.log
 * npx logverify stats hive.log --json
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Parser
// =============================================================================

export {
  parseLog,
  parseLogLine,
  extractThreadId,
  splitSpanTarget,
  extractFields,
  stripQuotes,
  entriesByLevel,
  entriesByTarget,
  entriesBySpan,
  entriesWithMessage,
  entriesWithField,
  entriesWithFieldValue,
  containsSequence,
  entriesWithHiveMessages,
  entriesWithInterAgentMessages,
  entriesWithTaskCompleted,
  entriesWithAssistantToolCalls,
  entriesWithToolCall,
  containsMessageSequence,
  computeStats,
  HIVE_MESSAGE_VARIANTS,
  INTER_AGENT_MESSAGE_VARIANTS,
  messageObject,
  hiveMessage,
  interAgentMessage,
} from './parser/index.js';

export type { LogEntry, LogStats, MessageObject } from './parser/index.js';

// =============================================================================
// Verification
// =============================================================================

export {
  CATEGORY_NAMES,
  createResult,
  verify,
  verifyEntries,
  verifySystemStartup,
  verifyAgentLifecycle,
  verifyToolExecution,
  verifyLlmInteraction,
} from './verification/index.js';

export type {
  CategoryName,
  VerificationResult,
  VerificationReport,
  VerificationOptions,
} from './verification/index.js';

// =============================================================================
// Reporters
// =============================================================================

export {
  CATEGORY_LABELS,
  isOverallPassed,
  exitStatus,
  ConsoleReporter,
  createConsoleReporter,
  renderConsoleReport,
  createMarkdownReporter,
  renderMarkdownReport,
  resolveFilename,
} from './reporters/index.js';

export type {
  Reporter,
  ReportContext,
  ConsoleReporterOptions,
  RenderOptions,
  MarkdownReporterConfig,
} from './reporters/index.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  ConfigError,
  configSchema,
  resolveEnvVar,
  resolveConfig,
  validateConfig,
  findUp,
  findConfigFile,
  findEnvFile,
  getConfigDir,
  parseConfig,
  loadConfigFile,
  loadConfig,
} from './config/index.js';

export type { LogVerifyConfig, ResolvedConfig, LoadConfigOptions } from './config/index.js';

// =============================================================================
// Constants
// =============================================================================

export { DEFAULT_EXPECTED_TOOLS, DEFAULT_MIN_READY_ACTORS } from './constants.js';

// =============================================================================
// CLI
// =============================================================================

export { createCli, runCli } from './cli/index.js';
