/**
 * ANSI styling shared by the CLI output helpers and the console reporter.
 */

const CODES = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

export type Style = Exclude<keyof typeof CODES, 'reset'>;

/**
 * Wrap text in the style's escape codes, or return it unchanged when
 * styling is off.
 */
export function paint(style: Style, text: string, enabled = true): string {
  return enabled ? `${CODES[style]}${text}${CODES.reset}` : text;
}
