/**
 * CLI Output Tests
 *
 * Tests for terminal output formatting functions.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  colorsEnabled,
  success,
  warning,
  info,
  dim,
  header,
  table,
  json,
  exitWithError,
} from '../../cli/utils/output.js';

// =============================================================================
// Test Setup
// =============================================================================

describe('CLI Output', () => {
  let originalNoColor: string | undefined;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  function loggedLines(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(() => {
    originalNoColor = process.env.NO_COLOR;
    process.env.NO_COLOR = '1';
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalNoColor === undefined) {
      delete process.env.NO_COLOR;
    } else {
      process.env.NO_COLOR = originalNoColor;
    }
  });

  // ===========================================================================
  // NO_COLOR
  // ===========================================================================

  describe('colorsEnabled', () => {
    it('should style messages unless NO_COLOR is set', () => {
      expect(colorsEnabled()).toBe(false);
      success('plain');

      delete process.env.NO_COLOR;
      expect(colorsEnabled()).toBe(true);
      success('styled');

      expect(loggedLines()).toEqual(['✓ plain', '\x1b[32m✓ styled\x1b[0m']);
    });
  });

  // ===========================================================================
  // Messages
  // ===========================================================================

  describe('messages', () => {
    it('should prefix each message with its symbol', () => {
      success('Operation completed');
      warning('Be careful');
      info('FYI');
      dim('Less important');

      expect(loggedLines()).toEqual(['✓ Operation completed', '⚠ Be careful', 'ℹ FYI', 'Less important']);
    });
  });

  // ===========================================================================
  // header()
  // ===========================================================================

  describe('header', () => {
    it('should print header with separator line', () => {
      header('Test Header');

      expect(loggedLines()).toEqual(['', 'Test Header', '─'.repeat(15)]);
    });

    it('should limit separator length to 60 characters', () => {
      header('A'.repeat(100));

      expect(loggedLines()[2]).toBe('─'.repeat(60));
    });
  });

  // ===========================================================================
  // table()
  // ===========================================================================

  describe('table', () => {
    it('should not print anything for empty array', () => {
      table([]);

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should align columns based on content width', () => {
      table([
        { level: 'DEBUG', count: 12 },
        { level: 'WARN', count: 3 },
      ]);

      expect(loggedLines()).toEqual(['level  count', '─'.repeat(12), 'DEBUG  12   ', 'WARN   3    ']);
    });

    it('should widen a column to its longest value', () => {
      table([{ target: 'hyper_util::client', count: 1 }]);

      expect(loggedLines()).toEqual(['target' + ' '.repeat(14) + 'count', '─'.repeat(25), 'hyper_util::client  1    ']);
    });
  });

  // ===========================================================================
  // json()
  // ===========================================================================

  describe('json', () => {
    it('should print indented JSON', () => {
      json({ key: 'value', nested: { a: 1 } });

      expect(consoleLogSpy).toHaveBeenCalledWith('{\n  "key": "value",\n  "nested": {\n    "a": 1\n  }\n}');
    });
  });

  // ===========================================================================
  // exitWithError()
  // ===========================================================================

  describe('exitWithError', () => {
    it('should print the error on stderr and exit with the given code', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });

      expect(() => exitWithError('Fatal', 2)).toThrow('process.exit called');
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Fatal');
      expect(exitSpy).toHaveBeenCalledWith(2);
    });
  });
});
