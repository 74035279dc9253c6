/**
 * Message Objects
 *
 * HIVE logs serialized messages as compact JSON in a `message=` field, e.g.
 * `message={"TaskCompleted":{"summary":"done"}}`. The top-level key names
 * the variant.
 */

import type { LogEntry } from './types.js';

export type MessageObject = { readonly [variant: string]: unknown };

const MESSAGE_FIELD = 'message';

/** Variants of messages exchanged between an agent and its actors */
export const HIVE_MESSAGE_VARIANTS = [
  'Action',
  'AssistantResponse',
  'AssistantToolCall',
  'TaskCompleted',
  'AgentSpawned',
] as const;

/** Variants of messages exchanged between agents */
export const INTER_AGENT_MESSAGE_VARIANTS = ['TaskStatusUpdate', 'PlanApproved', 'PlanRejected'] as const;

/**
 * Decode the entry's `message` field as a JSON object.
 *
 * Returns undefined when the field is missing, is not valid JSON, or is not
 * an object.
 */
export function messageObject(entry: LogEntry): MessageObject | undefined {
  const raw = entry.fields.get(MESSAGE_FIELD);
  if (raw === undefined) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }

  return isMessageObject(parsed) ? parsed : undefined;
}

/**
 * The entry's message object when it carries a HIVE message variant.
 */
export function hiveMessage(entry: LogEntry): MessageObject | undefined {
  return withVariant(messageObject(entry), HIVE_MESSAGE_VARIANTS);
}

/**
 * The entry's message object when it carries an inter-agent message variant.
 */
export function interAgentMessage(entry: LogEntry): MessageObject | undefined {
  return withVariant(messageObject(entry), INTER_AGENT_MESSAGE_VARIANTS);
}

export function isMessageObject(value: unknown): value is MessageObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withVariant(
  message: MessageObject | undefined,
  variants: readonly string[]
): MessageObject | undefined {
  return message && variants.some((variant) => variant in message) ? message : undefined;
}
