/**
 * Startup snapshot: open, seed if new, read everything, close.
 */

import type { RedirectMapping } from "@waypost/shared";

import { RedirectStore } from "./client.js";
import type { StoreOptions } from "./types.js";

export interface StoreSnapshot {
  mapping: RedirectMapping;

  /** True when the store file or bucket was created during this load */
  seeded: boolean;
}

/**
 * Read a store file into memory. The handle is released before returning;
 * nothing reads the store after startup.
 *
 * @throws StoreError, or InvalidRecordError for a bad stored entry
 */
export function loadStoreSnapshot(file: string, options: StoreOptions = {}): StoreSnapshot {
  const store = RedirectStore.open(file, options);
  try {
    return { mapping: store.snapshot(), seeded: store.seeded };
  } finally {
    store.close();
  }
}
