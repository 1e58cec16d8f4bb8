/**
 * Shared constants
 */

/**
 * Error codes carried by BridgeError
 */
export const ERROR_CODES = {
  CONVERSION: "conversion",
  ARGUMENT: "argument",
  UNKNOWN_SESSION: "unknown_session",
  UNKNOWN_REQUEST: "unknown_request",
  INVALID_OPTIONS: "invalid_options",
  TRANSPORT: "transport",
  INVALID_ENCODING: "invalid_encoding",
  INVALID_JSON: "invalid_json",
  DIRECTORY: "directory",
  PROCESS: "process",
  HTML: "html",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Process-style exit codes reported by the script runtime
 */
export const EXIT_CODES = {
  OK: 0,
  SCRIPT_ERROR: 1,
  TIMEOUT: 124,
  MEMORY_LIMIT: 137,
} as const;

/**
 * Maximum nesting depth when converting script values
 */
export const MAX_VALUE_DEPTH = 64;

export const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const CONFIG_FILE_NAME = "capbridge.config.json";
