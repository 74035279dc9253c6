/**
 * Tool Execution Check
 *
 * Descriptive only: records how tools were registered and mentioned, never
 * fails.
 */

import { LLM_REQUEST_SPAN, TOOLS_AVAILABLE_SPAN, TOOLS_COUNT_FIELD } from '../constants.js';
import { entriesBySpan } from '../parser/query.js';
import type { LogEntry } from '../parser/types.js';

import { createResult, type VerificationResult } from './types.js';

const INTEGER = /^[+-]?\d+$/;

/**
 * Summarize tool registration, tool-carrying LLM requests and mentions of
 * each expected tool.
 */
export function verifyToolExecution(
  entries: readonly LogEntry[],
  expectedTools: readonly string[]
): VerificationResult {
  const summary = new Map<string, number>();

  summary.set('tool_registration_events', entriesBySpan(entries, TOOLS_AVAILABLE_SPAN).length);

  const requestsWithTools = entriesBySpan(entries, LLM_REQUEST_SPAN).filter((e) =>
    e.fields.has(TOOLS_COUNT_FIELD)
  );
  summary.set('llm_requests_with_tools', requestsWithTools.length);

  if (requestsWithTools.length > 0) {
    const maxTools = requestsWithTools.reduce(
      (max, e) => Math.max(max, toInteger(e.fields.get(TOOLS_COUNT_FIELD))),
      Number.NEGATIVE_INFINITY
    );
    summary.set('max_tools_in_request', maxTools);
  }

  for (const tool of expectedTools) {
    const needle = tool.toLowerCase();
    const mentions = entries.filter((e) => e.message.toLowerCase().includes(needle)).length;
    summary.set(`${tool}_calls`, mentions);
  }

  return createResult({ summary: Object.fromEntries(summary) });
}

/**
 * Parse a field value as an integer, 0 when it is not one.
 */
function toInteger(value: string | undefined): number {
  if (value === undefined || !INTEGER.test(value)) return 0;
  return Number.parseInt(value, 10);
}
