/**
 * Verification Types
 *
 * Result shapes for the log verification checks.
 */

/**
 * Verification categories, in report order.
 */
export const CATEGORY_NAMES = [
  'system_startup',
  'agent_lifecycle',
  'tool_execution',
  'llm_interaction',
] as const;

export type CategoryName = (typeof CATEGORY_NAMES)[number];

/**
 * Outcome of one verification category.
 */
export interface VerificationResult {
  /** True iff no errors were recorded; warnings never affect it */
  readonly passed: boolean;
  /** Hard failures, in detection order */
  readonly errors: readonly string[];
  /** Advisory findings, in detection order */
  readonly warnings: readonly string[];
  /** Metric name -> count */
  readonly summary: Readonly<Record<string, number>>;
}

/**
 * Results of every category for one log.
 */
export type VerificationReport = Readonly<Record<CategoryName, VerificationResult>>;

/**
 * Options shared by the checks.
 */
export interface VerificationOptions {
  /** Minimum ready actors before the lifecycle check warns (default: 4) */
  minReadyActors?: number;
}

/**
 * Build a result from collected findings.
 */
export function createResult(findings: {
  errors?: string[];
  warnings?: string[];
  summary: Record<string, number>;
}): VerificationResult {
  const errors = findings.errors ?? [];
  return {
    passed: errors.length === 0,
    errors,
    warnings: findings.warnings ?? [],
    summary: findings.summary,
  };
}
