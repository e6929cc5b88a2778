/**
 * Application-wide constants for timeouts, retries, sizes, and limits
 *
 * These values are for internal use and maintenance - they are not exposed
 * to users through the configuration system. User-facing settings live in
 * defaults.ts.
 */

// ===========================================
// NETWORK & API TIMEOUTS
// ===========================================

/**
 * Timeouts for network, API and subprocess operations
 */
export const API_TIMEOUTS = {
  /** Default timeout for one chat completion request (2 minutes) */
  LLM_REQUEST_DEFAULT: 120000,

  /** Default MCP initialize handshake timeout (30 seconds) */
  MCP_HANDSHAKE_DEFAULT: 30000,
} as const;

const RETRYABLE_HTTP_STATUSES: readonly number[] = [429, 500, 502, 503];

/**
 * Retry configuration for LLM request error handling
 */
export const RETRY_CONFIG = {
  /** Maximum backoff delay between retries (seconds) */
  MAX_BACKOFF_SECONDS: 30,

  /** Default number of retries after the first attempt */
  DEFAULT_MAX_RETRIES: 3,

  /** HTTP status codes treated as transient */
  RETRYABLE_HTTP_STATUSES,
} as const;

// ===========================================
// TIME UNIT CONVERSIONS
// ===========================================

export const TIME_UNITS = {
  /** Milliseconds per second */
  MS_PER_SECOND: 1000,
} as const;

// ===========================================
// ID GENERATION
// ===========================================

/**
 * Parameters for request/event ID generation
 */
export const ID_GENERATION = {
  /** Radix for random string generation (base-36) */
  RANDOM_STRING_RADIX: 36,

  /** Skip the '0.' prefix of Math.random().toString() */
  RANDOM_STRING_SUBSTRING_START: 2,

  /** Length of random suffix */
  RANDOM_STRING_LENGTH: 7,
} as const;

// ===========================================
// TEXT LIMITS
// ===========================================

export const TEXT_LIMITS = {
  /** Message preview length (100 chars) */
  MESSAGE_PREVIEW_MAX: 100,

  /** Content preview length (200 chars) */
  CONTENT_PREVIEW_MAX: 200,
} as const;

// ===========================================
// AGENT
// ===========================================

export const AGENT_CONFIG = {
  /** Default reasoning-loop iteration budget */
  DEFAULT_MAX_ITERATIONS: 10,
} as const;

// ===========================================
// MCP
// ===========================================

export const MCP_CLIENT_INFO = {
  name: 'tool-agents',
  version: '0.1.0',
} as const;
