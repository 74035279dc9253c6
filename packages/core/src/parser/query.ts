/**
 * Log Query
 *
 * Filters and aggregates over parsed entries. Every helper returns a new
 * array and leaves its input untouched.
 */

import { hiveMessage, interAgentMessage, isMessageObject } from './messages.js';
import type { LogEntry, LogStats } from './types.js';

// =============================================================================
// Filters
// =============================================================================

/**
 * Entries at the given level (case-insensitive).
 */
export function entriesByLevel(entries: readonly LogEntry[], level: string): LogEntry[] {
  const wanted = level.toUpperCase();
  return entries.filter((e) => e.level.toUpperCase() === wanted);
}

/**
 * Entries whose target contains the pattern.
 */
export function entriesByTarget(entries: readonly LogEntry[], pattern: string): LogEntry[] {
  return entries.filter((e) => e.target.includes(pattern));
}

/**
 * Entries whose span contains the pattern.
 */
export function entriesBySpan(entries: readonly LogEntry[], pattern: string): LogEntry[] {
  return entries.filter((e) => e.span !== '' && e.span.includes(pattern));
}

/**
 * Entries whose message contains the pattern.
 */
export function entriesWithMessage(entries: readonly LogEntry[], pattern: string): LogEntry[] {
  return entries.filter((e) => e.message.includes(pattern));
}

/**
 * Entries carrying the named field.
 */
export function entriesWithField(entries: readonly LogEntry[], name: string): LogEntry[] {
  return entries.filter((e) => e.fields.has(name));
}

/**
 * Entries whose named field equals the value.
 */
export function entriesWithFieldValue(
  entries: readonly LogEntry[],
  name: string,
  value: string
): LogEntry[] {
  return entries.filter((e) => e.fields.get(name) === value);
}

/**
 * Check that the message patterns appear in order, each in a later entry
 * than the one before.
 */
export function containsSequence(entries: readonly LogEntry[], patterns: readonly string[]): boolean {
  if (patterns.length === 0) return true;

  let index = 0;
  for (const entry of entries) {
    if (entry.message.includes(patterns[index])) {
      index++;
      if (index === patterns.length) {
        return true;
      }
    }
  }

  return false;
}

// =============================================================================
// Message Objects
// =============================================================================

/**
 * Entries whose `message` field decodes to a HIVE message.
 */
export function entriesWithHiveMessages(entries: readonly LogEntry[]): LogEntry[] {
  return entries.filter((e) => hiveMessage(e) !== undefined);
}

/**
 * Entries whose `message` field decodes to an inter-agent message.
 */
export function entriesWithInterAgentMessages(entries: readonly LogEntry[]): LogEntry[] {
  return entries.filter((e) => interAgentMessage(e) !== undefined);
}

export function entriesWithTaskCompleted(entries: readonly LogEntry[]): LogEntry[] {
  return entriesWithHiveVariant(entries, 'TaskCompleted');
}

export function entriesWithAssistantToolCalls(entries: readonly LogEntry[]): LogEntry[] {
  return entriesWithHiveVariant(entries, 'AssistantToolCall');
}

/**
 * Entries with an `AssistantToolCall` whose `fn_name` is the tool.
 */
export function entriesWithToolCall(entries: readonly LogEntry[], toolName: string): LogEntry[] {
  return entries.filter((e) => {
    const call = hiveMessage(e)?.['AssistantToolCall'];
    return isMessageObject(call) && call['fn_name'] === toolName;
  });
}

/**
 * Like containsSequence, matching HIVE message variants instead of message
 * text.
 */
export function containsMessageSequence(entries: readonly LogEntry[], variants: readonly string[]): boolean {
  if (variants.length === 0) return true;

  let index = 0;
  for (const entry of entries) {
    const message = hiveMessage(entry);
    if (message && variants[index] in message) {
      index++;
      if (index === variants.length) {
        return true;
      }
    }
  }

  return false;
}

function entriesWithHiveVariant(entries: readonly LogEntry[], variant: string): LogEntry[] {
  return entries.filter((e) => {
    const message = hiveMessage(e);
    return message !== undefined && variant in message;
  });
}

// =============================================================================
// Statistics
// =============================================================================

/**
 * Count entries by level, target and span.
 */
export function computeStats(entries: readonly LogEntry[]): LogStats {
  const levels = new Map<string, number>();
  const targets = new Map<string, number>();
  const spans = new Map<string, number>();

  for (const entry of entries) {
    increment(levels, entry.level.toUpperCase());
    increment(targets, entry.target);
    if (entry.span) {
      increment(spans, entry.span);
    }
  }

  return {
    totalEntries: entries.length,
    levels: Object.fromEntries(levels),
    targets: Object.fromEntries(targets),
    spans: Object.fromEntries(spans),
  };
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}
