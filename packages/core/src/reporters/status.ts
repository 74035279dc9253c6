/**
 * Report Status
 *
 * Overall pass/fail and the process exit status derived from it.
 */

import { CATEGORY_NAMES, type VerificationReport } from '../verification/types.js';

/**
 * Whether every category passed.
 */
export function isOverallPassed(report: VerificationReport): boolean {
  return CATEGORY_NAMES.every((name) => report[name].passed);
}

/**
 * 0 when every category passed, 1 otherwise.
 */
export function exitStatus(report: VerificationReport): 0 | 1 {
  return isOverallPassed(report) ? 0 : 1;
}
