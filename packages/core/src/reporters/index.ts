/**
 * Reporters Module
 *
 * Verification result output formatters.
 */

// Types
export type { Reporter, ReportContext, ConsoleReporterOptions } from './types.js';
export { CATEGORY_LABELS } from './types.js';

// Status
export { isOverallPassed, exitStatus } from './status.js';

// Console Reporter
export { ConsoleReporter, createConsoleReporter, renderConsoleReport } from './console.js';
export type { RenderOptions } from './console.js';

// Markdown Reporter
export { createMarkdownReporter, renderMarkdownReport, resolveFilename } from './markdown.js';
export type { MarkdownReporterConfig } from './markdown.js';
