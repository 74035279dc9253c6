/**
 * CLI Commands
 */

export { registerVerifyCommand, verifyCommand, parseToolList } from './verify.js';
export type { VerifyOptions } from './verify.js';

export { registerStatsCommand, statsCommand } from './stats.js';
export type { StatsOptions } from './stats.js';
