/**
 * CLI Output
 *
 * Terminal messages for the logverify commands. Styling follows NO_COLOR,
 * read on every call so a value loaded from .env still applies.
 */

import { paint, type Style } from '../../utils/ansi.js';

type Cell = string | number;

export function colorsEnabled(): boolean {
  return !process.env['NO_COLOR'];
}

function styled(style: Style, text: string): string {
  return paint(style, text, colorsEnabled());
}

export function success(message: string): void {
  console.log(styled('green', `✓ ${message}`));
}

export function warning(message: string): void {
  console.log(styled('yellow', `⚠ ${message}`));
}

export function info(message: string): void {
  console.log(styled('cyan', `ℹ ${message}`));
}

export function dim(message: string): void {
  console.log(styled('dim', message));
}

/**
 * Blank line, bold title, then a rule up to 60 columns wide.
 */
export function header(title: string): void {
  console.log('');
  console.log(styled('bold', title));
  console.log(styled('dim', '─'.repeat(Math.min(title.length + 4, 60))));
}

/**
 * Print rows as left-aligned columns, named by the keys of the first row.
 */
export function table(rows: ReadonlyArray<Readonly<Record<string, Cell>>>): void {
  if (rows.length === 0) return;

  const columns = Object.keys(rows[0]);
  const cells = rows.map((row) => columns.map((column) => String(row[column] ?? '')));
  const widths = columns.map((column, i) =>
    cells.reduce((width, rowCells) => Math.max(width, rowCells[i].length), column.length)
  );
  const line = (values: readonly string[]) => values.map((value, i) => value.padEnd(widths[i])).join('  ');

  console.log(styled('bold', line(columns)));
  console.log(styled('dim', widths.map((width) => '─'.repeat(width)).join('──')));
  for (const rowCells of cells) {
    console.log(line(rowCells));
  }
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print the message on stderr and exit.
 */
export function exitWithError(message: string, code = 1): never {
  console.error(styled('red', `✗ ${message}`));
  process.exit(code);
}
