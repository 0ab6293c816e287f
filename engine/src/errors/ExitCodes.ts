/**
 * Process exit codes
 *
 * Process-level codes used by the CLI and any embedding process.
 * Engine error codes (GP-X-NNN) map onto these through
 * `getExitCodeForError()`.
 *
 * Ranges:
 * - 0-1: generic
 * - 100-199: input / definition problems
 * - 200-249: execution problems
 * - 250-255: runtime / infrastructure problems
 *
 * Every value fits in an 8-bit process exit status.
 *
 * @module errors
 */

export enum ExitCodes {
  SUCCESS = 0,
  GENERAL_ERROR = 1,

  /** Plan document does not match the schema */
  INVALID_SCHEMA = 103,

  /** Plan document is not parseable YAML/JSON */
  INVALID_FORMAT = 104,

  /** Plan is well-formed but cannot be used as given */
  VALIDATION_FAILED = 105,

  /** A declared plan input was not supplied */
  MISSING_REQUIRED_INPUT = 107,

  /** Engine configuration is invalid */
  INVALID_CONFIG = 108,

  /** Plan file does not exist or is unreadable */
  INVALID_FILE = 110,

  /** Interrupted by signal or caller (mirrors 128 + SIGINT) */
  CANCELLED = 130,

  /** Plan execution ended in the failed state */
  EXECUTION_FAILED = 200,

  /** A formula could not be evaluated */
  STEP_FAILED = 201,

  /** A facade (tool, retrieval, agent) reported a failure */
  EXTERNAL_SERVICE_FAILED = 202,

  INTERNAL_ERROR = 250,
}
