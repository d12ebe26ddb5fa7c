/**
 * Store Type Definitions
 */

import type { RedirectEntry } from "@waypost/shared";

/**
 * Name of the table acting as the redirect bucket.
 * Quoted everywhere it appears in SQL: it is mixed-case.
 */
export const BUCKET = "URLRedirects";

/**
 * Default bound on waiting for another process's lock (ms)
 */
export const DEFAULT_OPEN_TIMEOUT_MS = 10_000;

/**
 * Entry written when the bucket is first created, so a fresh store
 * demonstrates the format.
 */
export const SEED_ENTRY: Readonly<RedirectEntry> = {
  path: "/waypost-store",
  url: "https://example.com/waypost/store",
};

export interface StoreOptions {
  /**
   * How long opening and seeding may wait on a lock held elsewhere (ms).
   * Default: 10000
   */
  timeoutMs?: number;
}

/**
 * Raw bucket row. Keys and values are stored as BLOBs of UTF-8 text.
 */
export interface RedirectRow {
  key: Buffer;
  value: Buffer;
}
