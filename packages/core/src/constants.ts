/**
 * Constants
 *
 * Centralized event texts and defaults for logverify.
 */

// =============================================================================
// Event Texts
// =============================================================================

/** Message text emitted when the HIVE system boots */
export const STARTUP_ANNOUNCEMENT = 'Starting headless HIVE multi-agent system';

/** Message text emitted when actors are spawned for an agent */
export const ACTOR_CREATION = 'Starting actors for agent';

/** Message text emitted when an agent begins executing */
export const AGENT_START = 'Agent starting execution';

/** Message text emitted when an actor reports ready */
export const ACTOR_READY = 'Actor ready, sending ready signal';

/** Message text of an agent state transition */
export const STATE_TRANSITION = 'state transition';

/** Message text emitted for each LLM chat request */
export const LLM_CHAT_REQUEST = 'Executing LLM chat request';

/** Message text emitted by the HTTP client when it opens a connection */
export const CONNECTION_START = 'starting new connection';

// =============================================================================
// Span and Field Names
// =============================================================================

export const TOOLS_AVAILABLE_SPAN = 'tools_available';
export const LLM_REQUEST_SPAN = 'llm_request';
export const USER_INPUT_SPAN = 'user_input';
export const TOOLS_COUNT_FIELD = 'tools_count';

/** Substring of a target that marks config loading */
export const CONFIG_TARGET = 'config';

// =============================================================================
// Verification Defaults
// =============================================================================

/** Tools checked when none are configured */
export const DEFAULT_EXPECTED_TOOLS: readonly string[] = [
  'planner',
  'spawn_agent',
  'command',
  'file_reader',
];

/** Assistant, planner, spawn_agent and plan_approval */
export const DEFAULT_MIN_READY_ACTORS = 4;

/** Thread id used when a line has no ThreadId(N) token */
export const UNKNOWN_THREAD_ID = 'unknown';

// =============================================================================
// Configuration Defaults
// =============================================================================

/** Config file names to search for (in order of priority) */
export const CONFIG_FILE_NAMES = ['logverify.config.yaml', 'logverify.config.yml'] as const;

/** Env files loaded by the CLI, in order of priority */
export const ENV_FILE_NAMES = ['.env', '.env.local'] as const;

/** Environment variable naming an explicit config file */
export const CONFIG_ENV_VAR = 'LOGVERIFY_CONFIG';

/** Default markdown report filename template */
export const DEFAULT_MARKDOWN_FILENAME = '{log}-{timestamp}.md';
