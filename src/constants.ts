/**
 * Centralized configuration constants for pqframe
 *
 * Wire-level constants shared by both ends of a deployment, plus the few
 * environment-driven settings the CLI reads at run time.
 */

// ============================================================================
// WIRE FORMAT
// ============================================================================

/**
 * Protocol version written into every header.
 * Bump whenever the layout of either header or of structured entries changes.
 */
export const FORMAT_VERSION = 1;

/**
 * Width in bytes of each length prefix in a structured-entries buffer (u64).
 */
export const ENTRY_LENGTH_FIELD_WIDTH = 8;

/**
 * All multi-byte fields are little-endian.
 */
export const LITTLE_ENDIAN = true;

/**
 * Largest value a u32 `data_len` field can carry.
 */
export const MAX_DATA_LEN = 0xffff_ffff;

/**
 * Largest value a u64 identifier can carry.
 */
export const MAX_IDENTIFIER = 0xffff_ffff_ffff_ffffn;

/**
 * `success` value written into a failed response header.
 */
export const RESPONSE_FAILURE = -1;

// ============================================================================
// ENVIRONMENT
// ============================================================================

/**
 * Environment variable that turns on debug logging.
 */
export const DEBUG_ENV_VAR = 'PQFRAME_DEBUG';

/**
 * Default ceiling on decoded hex input accepted by the CLI (1 MiB).
 */
export const DEFAULT_MAX_INPUT_BYTES = 1024 * 1024;

/**
 * Largest decoded hex input the CLI accepts.
 * Overridable through PQFRAME_MAX_INPUT_BYTES; invalid values fall back to the default.
 */
export function getMaxInputBytes(): number {
  const raw = process.env['PQFRAME_MAX_INPUT_BYTES'];
  if (raw === undefined) {
    return DEFAULT_MAX_INPUT_BYTES;
  }
  const parsed = parseInt(raw, 10);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_INPUT_BYTES;
}

// ============================================================================
// CLI
// ============================================================================

/**
 * Description for the --json option
 */
export const JSON_OPTION_DESCRIPTION = 'Output as JSON';
