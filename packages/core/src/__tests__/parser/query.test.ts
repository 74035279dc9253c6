/**
 * Log Query Tests
 */

import { describe, it, expect } from 'vitest';

import { parseLog } from '../../parser/parser.js';
import {
  entriesByLevel,
  entriesByTarget,
  entriesBySpan,
  entriesWithMessage,
  entriesWithField,
  entriesWithFieldValue,
  containsSequence,
  containsMessageSequence,
  entriesWithHiveMessages,
  entriesWithInterAgentMessages,
  entriesWithTaskCompleted,
  entriesWithAssistantToolCalls,
  entriesWithToolCall,
  computeStats,
} from '../../parser/query.js';
import { hiveMessage, interAgentMessage, messageObject } from '../../parser/messages.js';
import { logLine } from '../fixtures/hive-logs.js';

describe('Log Query', () => {
  const entries = parseLog(
    [
      logLine('main:hive', 'Starting headless HIVE multi-agent system'),
      logLine('load:hive::config', 'Loaded configuration path="hive.toml"', { level: 'debug' }),
      logLine('agent', 'Agent starting execution agent_id=main'),
      logLine('llm_request:hive::llm_client', 'Executing LLM chat request tools_count=3'),
      logLine('llm_request:hive::llm_client', 'Executing LLM chat request tools_count=5', {
        level: 'WARN',
      }),
    ].join('\n')
  );

  it('should filter by level case-insensitively', () => {
    expect(entriesByLevel(entries, 'DEBUG').map((e) => e.target)).toEqual(['hive::config']);
    expect(entriesByLevel(entries, 'info')).toHaveLength(3);
  });

  it('should filter by target substring', () => {
    expect(entriesByTarget(entries, 'hive::')).toHaveLength(3);
    expect(entriesByTarget(entries, 'config')).toHaveLength(1);
  });

  it('should filter by span substring', () => {
    expect(entriesBySpan(entries, 'llm')).toHaveLength(2);
    expect(entriesBySpan(entries, '')).toHaveLength(4);
  });

  it('should filter by message substring', () => {
    expect(entriesWithMessage(entries, 'LLM chat request')).toHaveLength(2);
    expect(entriesWithMessage(entries, 'nothing like this')).toEqual([]);
  });

  it('should filter by field presence and value', () => {
    expect(entriesWithField(entries, 'tools_count')).toHaveLength(2);
    expect(entriesWithFieldValue(entries, 'tools_count', '5').map((e) => e.level)).toEqual(['WARN']);
    expect(entriesWithFieldValue(entries, 'path', 'hive.toml')).toHaveLength(1);
  });

  it('should not modify the input', () => {
    const before = entries.map((e) => e.message);
    entriesByLevel(entries, 'INFO');
    computeStats(entries);
    expect(entries.map((e) => e.message)).toEqual(before);
  });

  describe('containsSequence', () => {
    it('should find patterns in order', () => {
      expect(containsSequence(entries, ['Starting headless', 'Agent starting', 'tools_count=5'])).toBe(
        true
      );
    });

    it('should reject patterns out of order', () => {
      expect(containsSequence(entries, ['Agent starting', 'Starting headless'])).toBe(false);
    });

    it('should need a separate entry for each pattern', () => {
      expect(containsSequence(entries, ['tools_count=5', 'tools_count=5'])).toBe(false);
    });

    it('should accept an empty pattern list', () => {
      expect(containsSequence(entries, [])).toBe(true);
      expect(containsSequence([], [])).toBe(true);
    });
  });

  describe('message objects', () => {
    const [action, plannerCall, commandCall, completed, approved, truncated, unknown, array] = parseLog(
      [
        logLine('actor:hive::actors', 'Processing message message={"Action":{"kind":"start"}}'),
        logLine(
          'actor:hive::actors',
          'Processing message message={"AssistantToolCall":{"fn_name":"planner","call_id":"c1"}}'
        ),
        logLine('actor:hive::actors', 'Processing message message={"AssistantToolCall":{"fn_name":"command"}}'),
        logLine('actor:hive::actors', 'Processing message message={"TaskCompleted":{"summary":"done"}}'),
        logLine('agent:hive::agent', 'Routing message message={"PlanApproved":{"plan_id":"p1"}}'),
        logLine('agent:hive::agent', 'Bad message message={"TaskCompleted":'),
        logLine('agent:hive::agent', 'Unknown message message={"Other":1}'),
        logLine('agent:hive::agent', 'Array message message=["TaskCompleted"]'),
      ].join('\n')
    );
    const all = [action, plannerCall, commandCall, completed, approved, truncated, unknown, array];

    it('should decode JSON objects from the message field', () => {
      expect(messageObject(unknown)).toEqual({ Other: 1 });
      expect(messageObject(truncated)).toBeUndefined();
      expect(messageObject(array)).toBeUndefined();
      expect(messageObject(entries[0])).toBeUndefined();
    });

    it('should classify objects by their variant', () => {
      expect(hiveMessage(completed)).toEqual({ TaskCompleted: { summary: 'done' } });
      expect(hiveMessage(approved)).toBeUndefined();
      expect(hiveMessage(unknown)).toBeUndefined();
      expect(interAgentMessage(approved)).toEqual({ PlanApproved: { plan_id: 'p1' } });
      expect(interAgentMessage(completed)).toBeUndefined();
    });

    it('should filter entries by message kind', () => {
      expect(entriesWithHiveMessages(all)).toEqual([action, plannerCall, commandCall, completed]);
      expect(entriesWithInterAgentMessages(all)).toEqual([approved]);
      expect(entriesWithTaskCompleted(all)).toEqual([completed]);
      expect(entriesWithAssistantToolCalls(all)).toEqual([plannerCall, commandCall]);
    });

    it('should filter tool calls by function name', () => {
      expect(entriesWithToolCall(all, 'planner')).toEqual([plannerCall]);
      expect(entriesWithToolCall(all, 'file_reader')).toEqual([]);
    });

    it('should find message variants in order', () => {
      expect(containsMessageSequence(all, ['Action', 'AssistantToolCall', 'TaskCompleted'])).toBe(true);
      expect(containsMessageSequence(all, ['TaskCompleted', 'Action'])).toBe(false);
      expect(containsMessageSequence(all, ['PlanApproved'])).toBe(false);
      expect(containsMessageSequence(all, [])).toBe(true);
    });
  });

  describe('computeStats', () => {
    it('should count levels, targets and spans', () => {
      expect(computeStats(entries)).toEqual({
        totalEntries: 5,
        levels: { INFO: 3, DEBUG: 1, WARN: 1 },
        targets: { hive: 1, 'hive::config': 1, agent: 1, 'hive::llm_client': 2 },
        spans: { main: 1, load: 1, llm_request: 2 },
      });
    });

    it('should handle no entries', () => {
      expect(computeStats([])).toEqual({ totalEntries: 0, levels: {}, targets: {}, spans: {} });
    });
  });
});
