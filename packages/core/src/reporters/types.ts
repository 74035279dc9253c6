/**
 * Reporter Types
 *
 * Interfaces for verification report output.
 */

import type { CategoryName, VerificationReport } from '../verification/types.js';

/**
 * Where a report came from.
 */
export interface ReportContext {
  /** Path of the verified log file, if it came from one */
  logFile?: string;
  /** Report time (default: now) */
  generatedAt?: Date;
}

/**
 * Reporter interface for verification output.
 *
 * All methods are optional - implement only what you need.
 */
export interface Reporter {
  /** Called once every check has run */
  onVerificationComplete?(report: VerificationReport, context: ReportContext): void | Promise<void>;

  /** Called to finalize the reporter (flush output, close files, etc.) */
  finalize?(): void | Promise<void>;
}

/**
 * Console reporter options.
 */
export interface ConsoleReporterOptions {
  /** Use colors */
  colors?: boolean;
  /** Output stream */
  stream?: NodeJS.WritableStream;
}

/**
 * Display labels for the verification categories.
 */
export const CATEGORY_LABELS: Record<CategoryName, string> = {
  system_startup: 'System Startup',
  agent_lifecycle: 'Agent Lifecycle',
  tool_execution: 'Tool Execution',
  llm_interaction: 'LLM Interaction',
};
