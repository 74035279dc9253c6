/**
 * Stats Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';

import { registerStatsCommand, statsCommand } from '../../../cli/commands/stats.js';
import { HEALTHY_RUN } from '../../fixtures/hive-logs.js';

describe('stats command', () => {
  let dir: string;
  let logFile: string;
  let originalNoColor: string | undefined;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  function loggedLines(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'logverify-stats-'));
    logFile = join(dir, 'hive.log');
    writeFileSync(logFile, HEALTHY_RUN);
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
    rmSync(dir, { recursive: true, force: true });
  });

  describe('statsCommand', () => {
    it('should print stats as JSON', () => {
      statsCommand(logFile, { json: true });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(loggedLines()[0])).toEqual({
        totalEntries: 10,
        levels: { INFO: 4, DEBUG: 6 },
        targets: {
          hive: 1,
          'hive::config': 1,
          'hive::agent': 2,
          'hive::actors': 4,
          'hive::llm_client': 1,
          'hyper_util::client::legacy::pool': 1,
        },
        spans: { main: 1, load: 1, agent: 2, actor: 4, llm_request: 1, http: 1 },
      });
    });

    it('should print tables sorted by count', () => {
      statsCommand(logFile);

      const lines = loggedLines();
      expect(lines).toContain(`Log Statistics: ${logFile}`);
      expect(lines).toContain('Total entries: 10');

      const levelHeader = lines.indexOf('level  count');
      expect(levelHeader).toBeGreaterThan(-1);
      expect(lines.slice(levelHeader + 2, levelHeader + 4)).toEqual(['DEBUG  6    ', 'INFO   4    ']);

      const spanHeader = lines.findIndex((line) => line.startsWith('span '));
      expect(lines[spanHeader + 2]).toMatch(/^actor\s+4\s*$/);
    });

    it('should throw for a missing file', () => {
      const missing = join(dir, 'missing.log');
      expect(() => statsCommand(missing)).toThrow(`Log file ${missing} does not exist`);
    });
  });

  describe('registerStatsCommand', () => {
    let program: Command;
    let exitSpy: MockInstance<typeof process.exit>;

    beforeEach(() => {
      program = new Command();
      program.exitOverride();
      program.configureOutput({ writeOut: () => {}, writeErr: () => {} });
      registerStatsCommand(program);

      exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });
    });

    it('should run the stats subcommand', async () => {
      await program.parseAsync(['node', 'logverify', 'stats', logFile, '--json']);

      expect(JSON.parse(loggedLines()[0]).totalEntries).toBe(10);
      expect(exitSpy).not.toHaveBeenCalled();
    });

    it('should exit with 1 for a missing file', async () => {
      const missing = join(dir, 'missing.log');

      await expect(program.parseAsync(['node', 'logverify', 'stats', missing])).rejects.toThrow(
        'process.exit called'
      );
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(`✗ Log file ${missing} does not exist`);
    });
  });
});
