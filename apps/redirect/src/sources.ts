/**
 * Source Loaders
 *
 * One builder per source kind. Each turns that source's raw input into a
 * RedirectSource; the handler itself is the same for all of them.
 */

import { readFile } from "node:fs/promises";
import {
  SourceError,
  buildRedirectMap,
  fromStaticMap,
  parseJsonRecords,
  parseYamlRecords,
  type RedirectSource,
  type SourceName,
} from "@waypost/shared";
import { loadStoreSnapshot, type StoreOptions } from "@waypost/store";

export interface StoreSource extends RedirectSource {
  /** True when the store was created and seeded by this load */
  seeded: boolean;
}

export function staticSource(pathsToUrls: Readonly<Record<string, string>>): RedirectSource {
  return { name: "static", mapping: fromStaticMap(pathsToUrls) };
}

/**
 * @throws ParseError, InvalidRecordError
 */
export function yamlSource(content: string): RedirectSource {
  return { name: "yaml", mapping: buildRedirectMap(parseYamlRecords(content), "yaml") };
}

/**
 * @throws ParseError, InvalidRecordError
 */
export function jsonSource(content: string): RedirectSource {
  return { name: "json", mapping: buildRedirectMap(parseJsonRecords(content), "json") };
}

/**
 * @throws StoreError, InvalidRecordError
 */
export function storeSource(file: string, options: StoreOptions = {}): StoreSource {
  const { mapping, seeded } = loadStoreSnapshot(file, options);
  return { name: "store", mapping, seeded };
}

/**
 * Read a redirect file as UTF-8.
 *
 * @throws SourceError
 */
export async function readSourceFile(file: string, source: SourceName): Promise<string> {
  try {
    return await readFile(file, "utf8");
  } catch (err) {
    throw new SourceError(file, { source, cause: err });
  }
}
