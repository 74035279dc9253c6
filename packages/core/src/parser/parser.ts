/**
 * Log Parser
 *
 * Converts raw HIVE log output into typed entries. Parsing is best-effort:
 * a line that does not fit the grammar is dropped and the rest of the
 * input is still parsed.
 */

import { UNKNOWN_THREAD_ID } from '../constants.js';

import type { LogEntry } from './types.js';

const PATTERNS = {
  /**
   * timestamp, level, thread token, span:target, then the rest of the line.
   * `[\s\S]` rather than `.` so U+2028/U+2029 inside a message stay in it.
   */
  LINE: /^(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S[\s\S]*)$/,
  THREAD_ID: /^ThreadId\((\d+)\)/,
  FIELD: /(\w+)=(\S+)/g,
};

function normalizeInput(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Parse a complete log buffer into entries, in input order.
 *
 * Never throws: empty or fully malformed input yields an empty array.
 */
export function parseLog(text: string): LogEntry[] {
  const entries: LogEntry[] = [];

  for (const line of normalizeInput(text).split('\n')) {
    if (!line.trim()) continue;

    let entry: LogEntry | null;
    try {
      entry = parseLogLine(line);
    } catch {
      // Malformed line, skip it
      continue;
    }

    if (entry) {
      entries.push(entry);
    }
  }

  return entries;
}

/**
 * Parse a single line.
 *
 * Returns null when the line has fewer than 5 whitespace-delimited segments.
 */
export function parseLogLine(line: string): LogEntry | null {
  const match = PATTERNS.LINE.exec(line.trim());
  if (!match) {
    return null;
  }

  const [, timestamp, level, threadToken, spanTarget, message] = match;
  const { span, target } = splitSpanTarget(spanTarget);

  return {
    timestamp,
    level,
    threadId: extractThreadId(threadToken),
    span,
    target,
    message,
    fields: extractFields(message),
  };
}

/**
 * Extract the digits of a `ThreadId(N)` token.
 */
export function extractThreadId(token: string): string {
  const match = PATTERNS.THREAD_ID.exec(token);
  return match ? match[1] : UNKNOWN_THREAD_ID;
}

/**
 * Split `span:target` on its first colon.
 *
 * @example
 * splitSpanTarget('llm_request:hive::llm_client')  // { span: 'llm_request', target: 'hive::llm_client' }
 * splitSpanTarget('hive')                          // { span: '', target: 'hive' }
 */
export function splitSpanTarget(segment: string): { span: string; target: string } {
  const colon = segment.indexOf(':');
  if (colon === -1) {
    return { span: '', target: segment };
  }
  return { span: segment.slice(0, colon), target: segment.slice(colon + 1) };
}

/**
 * Extract every `key=value` token from a message segment.
 *
 * Tokens are applied in the order they appear, so a repeated key keeps the
 * value of its last occurrence.
 */
export function extractFields(segment: string): Map<string, string> {
  const fields = new Map<string, string>();

  for (const match of segment.matchAll(PATTERNS.FIELD)) {
    fields.set(match[1], stripQuotes(match[2]));
  }

  return fields;
}

/**
 * Remove one leading and one trailing double quote.
 *
 * The two sides are stripped independently: `"abc` becomes `abc`.
 */
export function stripQuotes(value: string): string {
  let result = value;
  if (result.startsWith('"')) {
    result = result.slice(1);
  }
  if (result.endsWith('"')) {
    result = result.slice(0, -1);
  }
  return result;
}
