/**
 * Bucket creation and seeding.
 *
 * A bucket is seeded exactly once, when it is created. An existing bucket
 * is never touched, even if it has been emptied since.
 */

import type Database from "better-sqlite3";

import { BUCKET, SEED_ENTRY } from "./types.js";

const BUCKET_EXISTS = `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`;

const CREATE_BUCKET = `
  CREATE TABLE "${BUCKET}" (
    key   BLOB PRIMARY KEY NOT NULL,
    value BLOB NOT NULL
  ) WITHOUT ROWID
`;

const INSERT_SEED = `INSERT INTO "${BUCKET}" (key, value) VALUES (?, ?)`;

/**
 * Create and seed the bucket if it does not exist.
 *
 * @returns true if the bucket was created by this call
 */
export function ensureBucket(db: Database.Database): boolean {
  const create = db.transaction((): boolean => {
    const existing = db.prepare<[string], { name: string }>(BUCKET_EXISTS).get(BUCKET);
    if (existing) return false;

    db.exec(CREATE_BUCKET);
    db.prepare<[Buffer, Buffer]>(INSERT_SEED).run(
      Buffer.from(SEED_ENTRY.path, "utf8"),
      Buffer.from(SEED_ENTRY.url, "utf8")
    );
    return true;
  });

  return create.immediate();
}
