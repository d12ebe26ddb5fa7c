/**
 * @waypost/store - Key-Value Redirect Store
 *
 * Usage:
 * ```ts
 * import { loadStoreSnapshot, openRedirectStore } from "@waypost/store";
 *
 * // Startup: read once, release the file
 * const { mapping } = loadStoreSnapshot("redirects.db", { timeoutMs: 10_000 });
 *
 * // Maintenance
 * const store = openRedirectStore("redirects.db");
 * store.put("/docs", "https://example.com/docs");
 * store.close();
 * ```
 */

export { RedirectStore, openRedirectStore } from "./client.js";
export { ensureBucket } from "./seed.js";
export { loadStoreSnapshot, type StoreSnapshot } from "./snapshot.js";
export * from "./types.js";
