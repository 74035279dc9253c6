/**
 * Parser Types
 *
 * Typed representation of HIVE tracing log lines.
 */

/**
 * One parsed log line.
 *
 * Line format:
 * `TIMESTAMP LEVEL ThreadId(N) span:target message key=value ...`
 */
export interface LogEntry {
  /** Opaque timestamp, carried through as written */
  readonly timestamp: string;
  /** Severity label (INFO, DEBUG, ...) */
  readonly level: string;
  /** Digits of the ThreadId(N) token, or "unknown" */
  readonly threadId: string;
  /** Span name (before the first colon), empty if none */
  readonly span: string;
  /** Logging target (after the first colon) */
  readonly target: string;
  /** Message segment, key=value tokens included */
  readonly message: string;
  /** key=value tokens of the message segment, last key wins */
  readonly fields: ReadonlyMap<string, string>;
}

/**
 * Aggregate counts over a set of entries.
 */
export interface LogStats {
  totalEntries: number;
  /** Upper-cased level -> count */
  levels: Record<string, number>;
  /** Target -> count */
  targets: Record<string, number>;
  /** Span -> count (non-empty spans only) */
  spans: Record<string, number>;
}
