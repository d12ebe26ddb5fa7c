/**
 * Redirect Map Builder
 *
 * Normalizes records from any source (static literal, parsed YAML, parsed
 * JSON, CLI input) into a single path → URL mapping.
 *
 * Contract:
 * - Every record must be an object with a non-empty string `url` and a
 *   string `path` starting with "/". Anything else aborts the build with
 *   InvalidRecordError; no partial mapping is ever returned.
 * - Duplicate paths are not an error. Later records overwrite earlier ones.
 * - Fields other than `path` and `url` are ignored.
 */

import { z } from "zod";

import { RECORD_CONFIG } from "../constants/index.js";
import { InvalidRecordError } from "../errors.js";
import type { RedirectEntry, RedirectMapping, SourceName } from "../types/index.js";

// =============================================================================
// Record Schema
// =============================================================================

const redirectRecordSchema = z.object(
  {
    path: z
      .string({
        required_error: "path is required",
        invalid_type_error: "path must be a string",
      })
      .startsWith(RECORD_CONFIG.PATH_PREFIX, `path must start with "${RECORD_CONFIG.PATH_PREFIX}"`)
      .max(RECORD_CONFIG.MAX_FIELD_LENGTH, "path is too long"),
    url: z
      .string({
        required_error: "url is required",
        invalid_type_error: "url must be a string",
      })
      .min(1, "url must not be empty")
      .max(RECORD_CONFIG.MAX_FIELD_LENGTH, "url is too long"),
  },
  {
    required_error: "record is required",
    invalid_type_error: "record must be an object with path and url",
  }
);

// =============================================================================
// Builders
// =============================================================================

/**
 * Validate one raw record.
 *
 * @param record - Value taken from a parsed source
 * @param index - Position of the record, reported on failure
 * @throws InvalidRecordError
 */
export function validateRecord(
  record: unknown,
  index = 0,
  source?: SourceName
): RedirectEntry {
  const result = redirectRecordSchema.safeParse(record);
  if (!result.success) {
    throw new InvalidRecordError(
      index,
      result.error.issues.map((issue) => issue.message),
      { source }
    );
  }
  return { path: result.data.path, url: result.data.url };
}

/**
 * Build a mapping from a sequence of raw records.
 *
 * @throws InvalidRecordError on the first invalid record
 */
export function buildRedirectMap(
  records: readonly unknown[],
  source?: SourceName
): RedirectMapping {
  const redirects = new Map<string, string>();
  records.forEach((record, index) => {
    const { path, url } = validateRecord(record, index, source);
    redirects.set(path, url);
  });
  return redirects;
}

/**
 * Build a mapping from a static path → URL literal.
 */
export function fromStaticMap(
  pathsToUrls: Readonly<Record<string, string>>,
  source: SourceName = "static"
): RedirectMapping {
  return buildRedirectMap(
    Object.entries(pathsToUrls).map(([path, url]) => ({ path, url })),
    source
  );
}
