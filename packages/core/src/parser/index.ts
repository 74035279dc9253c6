/**
 * Parser Module
 *
 * Log line parsing and entry queries.
 */

export type { LogEntry, LogStats } from './types.js';

export {
  parseLog,
  parseLogLine,
  extractThreadId,
  splitSpanTarget,
  extractFields,
  stripQuotes,
} from './parser.js';

export {
  entriesByLevel,
  entriesByTarget,
  entriesBySpan,
  entriesWithMessage,
  entriesWithField,
  entriesWithFieldValue,
  containsSequence,
  entriesWithHiveMessages,
  entriesWithInterAgentMessages,
  entriesWithTaskCompleted,
  entriesWithAssistantToolCalls,
  entriesWithToolCall,
  containsMessageSequence,
  computeStats,
} from './query.js';

export {
  HIVE_MESSAGE_VARIANTS,
  INTER_AGENT_MESSAGE_VARIANTS,
  messageObject,
  hiveMessage,
  interAgentMessage,
  isMessageObject,
} from './messages.js';
export type { MessageObject } from './messages.js';
