/**
 * LLM Interaction Check
 */

import { CONNECTION_START, LLM_CHAT_REQUEST, USER_INPUT_SPAN } from '../constants.js';
import { entriesBySpan, entriesWithMessage } from '../parser/query.js';
import type { LogEntry } from '../parser/types.js';

import { createResult, type VerificationResult } from './types.js';

/**
 * Verify that LLM requests were made and reached the network.
 */
export function verifyLlmInteraction(entries: readonly LogEntry[]): VerificationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const requests = entriesWithMessage(entries, LLM_CHAT_REQUEST).length;
  if (requests === 0) {
    errors.push('No LLM requests found');
  }

  const connections = entriesWithMessage(entries, CONNECTION_START).length;
  if (requests > 0 && connections === 0) {
    warnings.push('LLM requests found but no network connections');
  }

  const userInputs = entriesBySpan(entries, USER_INPUT_SPAN).length;

  return createResult({
    errors,
    warnings,
    summary: {
      llm_requests: requests,
      network_connections: connections,
      user_input_events: userInputs,
    },
  });
}
