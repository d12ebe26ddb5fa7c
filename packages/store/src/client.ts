/**
 * Key-Value Redirect Store
 *
 * Embedded SQLite file holding one bucket (table) of path → URL pairs.
 * The redirect service only reads it once at startup; writes come from
 * the store CLI.
 *
 * Locking:
 * - `timeoutMs` becomes SQLite's busy timeout, so opening waits at most
 *   that long for a lock held by another process, then fails with
 *   STORE_LOCKED.
 * - The bucket check and seed run in one IMMEDIATE transaction, so two
 *   processes starting together cannot both seed.
 */

import Database from "better-sqlite3";
import {
  ErrorCode,
  StoreError,
  buildRedirectMap,
  validateRecord,
  type RedirectEntry,
  type RedirectMapping,
} from "@waypost/shared";

import { ensureBucket } from "./seed.js";
import { BUCKET, DEFAULT_OPEN_TIMEOUT_MS, type RedirectRow, type StoreOptions } from "./types.js";

// =============================================================================
// SQL
// =============================================================================

const SELECT_ONE = `SELECT key, value FROM "${BUCKET}" WHERE key = ?`;
const SELECT_ALL = `SELECT key, value FROM "${BUCKET}" ORDER BY key`;
const UPSERT = `INSERT OR REPLACE INTO "${BUCKET}" (key, value) VALUES (?, ?)`;
const DELETE = `DELETE FROM "${BUCKET}" WHERE key = ?`;

// =============================================================================
// Error Mapping
// =============================================================================

// Errors from the native binding may come from another realm, so match on shape.
function sqliteCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

function toStoreError(file: string, action: string, err: unknown): StoreError {
  const code = sqliteCode(err);
  if (code?.startsWith("SQLITE_BUSY") || code?.startsWith("SQLITE_LOCKED")) {
    return new StoreError(
      ErrorCode.STORE_LOCKED,
      `Store "${file}" is locked by another process (${action})`,
      { cause: err }
    );
  }
  const detail = errorMessage(err);
  return new StoreError(
    ErrorCode.STORE_OPEN_FAILED,
    `Cannot ${action} store "${file}": ${detail}`,
    { cause: err }
  );
}

function toEntry(row: RedirectRow): RedirectEntry {
  return { path: row.key.toString("utf8"), url: row.value.toString("utf8") };
}

// =============================================================================
// Store
// =============================================================================

export class RedirectStore {
  /** True when this open created the bucket and wrote the seed entry */
  readonly seeded: boolean;

  private constructor(
    readonly file: string,
    private readonly db: Database.Database,
    seeded: boolean
  ) {
    this.seeded = seeded;
  }

  /**
   * Open (creating if absent) a store file and make sure its bucket exists.
   *
   * @throws StoreError with STORE_LOCKED or STORE_OPEN_FAILED
   */
  static open(file: string, options: StoreOptions = {}): RedirectStore {
    const timeout = options.timeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;

    let db: Database.Database;
    try {
      db = new Database(file, { timeout });
    } catch (err) {
      throw toStoreError(file, "open", err);
    }

    try {
      const seeded = ensureBucket(db);
      return new RedirectStore(file, db, seeded);
    } catch (err) {
      db.close();
      throw toStoreError(file, "initialize", err);
    }
  }

  get(path: string): string | undefined {
    const row = this.db
      .prepare<[Buffer], RedirectRow>(SELECT_ONE)
      .get(Buffer.from(path, "utf8"));
    return row ? toEntry(row).url : undefined;
  }

  /**
   * Insert or overwrite one entry. The entry is validated first.
   *
   * @throws InvalidRecordError
   */
  put(path: string, url: string): void {
    const entry = validateRecord({ path, url }, 0, "store");
    this.db
      .prepare<[Buffer, Buffer], RedirectRow>(UPSERT)
      .run(Buffer.from(entry.path, "utf8"), Buffer.from(entry.url, "utf8"));
  }

  /**
   * @returns Whether an entry was removed
   */
  delete(path: string): boolean {
    const result = this.db
      .prepare<[Buffer], RedirectRow>(DELETE)
      .run(Buffer.from(path, "utf8"));
    return result.changes > 0;
  }

  /**
   * All entries, ordered by key bytes.
   */
  entries(): RedirectEntry[] {
    return this.db.prepare<[], RedirectRow>(SELECT_ALL).all().map(toEntry);
  }

  /**
   * Materialize the bucket as an in-memory mapping.
   * Entries go through the same validation as file sources.
   *
   * @throws InvalidRecordError if the bucket holds an invalid entry
   */
  snapshot(): RedirectMapping {
    return buildRedirectMap(this.entries(), "store");
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

/**
 * Open a store file.
 *
 * @see RedirectStore.open
 */
export function openRedirectStore(file: string, options: StoreOptions = {}): RedirectStore {
  return RedirectStore.open(file, options);
}
