/**
 * @waypost/shared - Shared Package Exports
 *
 * Central export point for redirect types, the error taxonomy, the
 * redirect map builder and the YAML/JSON record parsers.
 *
 * ```ts
 * import { buildRedirectMap, parseYamlRecords } from "@waypost/shared";
 *
 * const mapping = buildRedirectMap(parseYamlRecords(content), "yaml");
 * ```
 */

// Types (RedirectEntry, RedirectMapping, RedirectSource, SourceName)
export * from "./types/index.js";

// Errors (WaypostError and subclasses, ErrorCode)
export * from "./errors.js";

// Utilities (map builder, parsers)
export * from "./utils/index.js";

// Constants (SOURCE_NAMES, RECORD_CONFIG)
export * from "./constants/index.js";
