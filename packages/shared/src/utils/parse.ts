/**
 * Structured-data parsers for redirect files.
 *
 * Both formats hold a top-level sequence of `{ path, url }` records:
 *
 *     - path: /some-path
 *       url: https://www.example.com/demo
 *
 * Parsers only check syntax and the top-level shape. Record contents are
 * validated by buildRedirectMap.
 */

import { parse as parseYaml } from "yaml";

import { ParseError } from "../errors.js";

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse a YAML document into raw records.
 * An empty document yields no records.
 *
 * @throws ParseError on invalid syntax (duplicate keys included) or a non-sequence document
 */
export function parseYamlRecords(content: string): unknown[] {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new ParseError(`Invalid YAML: ${describe(err)}`, { source: "yaml", cause: err });
  }

  if (data === null || data === undefined) return [];
  if (!Array.isArray(data)) {
    throw new ParseError("YAML redirect file must contain a sequence of records", {
      source: "yaml",
    });
  }
  return data;
}

/**
 * Parse a JSON document into raw records.
 *
 * @throws ParseError on invalid syntax (an empty document included) or a non-array document
 */
export function parseJsonRecords(content: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new ParseError(`Invalid JSON: ${describe(err)}`, { source: "json", cause: err });
  }

  if (!Array.isArray(data)) {
    throw new ParseError("JSON redirect file must contain an array of records", {
      source: "json",
    });
  }
  return data;
}
