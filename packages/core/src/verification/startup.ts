/**
 * System Startup Check
 */

import { ACTOR_CREATION, CONFIG_TARGET, STARTUP_ANNOUNCEMENT } from '../constants.js';
import { entriesWithMessage } from '../parser/query.js';
import type { LogEntry } from '../parser/types.js';

import { createResult, type VerificationResult } from './types.js';

/**
 * Verify that the HIVE system booted and loaded its config.
 */
export function verifySystemStartup(entries: readonly LogEntry[]): VerificationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const startups = entriesWithMessage(entries, STARTUP_ANNOUNCEMENT).length;
  if (startups === 0) {
    errors.push('HIVE system startup not found');
  }

  const configEvents = entries.filter((e) => e.target.toLowerCase().includes(CONFIG_TARGET)).length;
  if (configEvents === 0) {
    warnings.push('No config loading events found');
  }

  const actorCreations = entriesWithMessage(entries, ACTOR_CREATION).length;

  return createResult({
    errors,
    warnings,
    summary: {
      hive_startup_events: startups,
      config_events: configEvents,
      actor_creation_events: actorCreations,
    },
  });
}
