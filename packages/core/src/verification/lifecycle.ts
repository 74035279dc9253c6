/**
 * Agent Lifecycle Check
 */

import { ACTOR_READY, AGENT_START, DEFAULT_MIN_READY_ACTORS, STATE_TRANSITION } from '../constants.js';
import { entriesWithMessage } from '../parser/query.js';
import type { LogEntry } from '../parser/types.js';

import { createResult, type VerificationOptions, type VerificationResult } from './types.js';

/**
 * Verify that agents started, their actors became ready, and state moved.
 */
export function verifyAgentLifecycle(
  entries: readonly LogEntry[],
  options: VerificationOptions = {}
): VerificationResult {
  const { minReadyActors = DEFAULT_MIN_READY_ACTORS } = options;
  const errors: string[] = [];
  const warnings: string[] = [];

  const agentsStarted = entriesWithMessage(entries, AGENT_START).length;
  if (agentsStarted === 0) {
    errors.push('No agents were started');
  }

  const actorsReady = entriesWithMessage(entries, ACTOR_READY).length;
  if (actorsReady < minReadyActors) {
    warnings.push(`Expected at least ${minReadyActors} actors to be ready, got ${actorsReady}`);
  }

  const transitions = entriesWithMessage(entries, STATE_TRANSITION).length;
  if (transitions === 0) {
    errors.push('No agent state transitions found');
  }

  return createResult({
    errors,
    warnings,
    summary: {
      agents_started: agentsStarted,
      actors_ready: actorsReady,
      state_transitions: transitions,
    },
  });
}
