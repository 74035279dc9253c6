/**
 * Verification Module
 *
 * Independent checks over parsed HIVE log entries.
 */

export {
  CATEGORY_NAMES,
  createResult,
  type CategoryName,
  type VerificationResult,
  type VerificationReport,
  type VerificationOptions,
} from './types.js';

export { verifySystemStartup } from './startup.js';
export { verifyAgentLifecycle } from './lifecycle.js';
export { verifyToolExecution } from './tools.js';
export { verifyLlmInteraction } from './llm.js';
export { verify, verifyEntries } from './verify.js';
