// Shared constants

/**
 * All lookup sources a redirect chain can hold.
 */
export const SOURCE_NAMES = ["static", "store", "yaml", "json"] as const;

/**
 * Redirect record field constraints.
 */
export const RECORD_CONFIG = {
  /** Every request pathname starts with this; other keys could never match */
  PATH_PREFIX: "/",

  /** Upper bound for either field, matching common URL length limits */
  MAX_FIELD_LENGTH: 2048,
} as const;
