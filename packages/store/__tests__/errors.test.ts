/**
 * Store error mapping for errors raised by the native binding.
 *
 * The binding can hand back error objects that are not instances of this
 * realm's Error, so the mapping must work from the error's shape alone.
 */

import { describe, it, expect, jest } from "@jest/globals";
import { ErrorCode, StoreError } from "@waypost/shared";
import { openRedirectStore } from "../src/index.js";

jest.mock("better-sqlite3", () => ({
  __esModule: true,
  default: function Database(file: string) {
    throw file.includes("busy")
      ? { code: "SQLITE_BUSY", message: "database is locked" }
      : { code: "SQLITE_CANTOPEN", message: "unable to open database file" };
  },
}));

function openError(file: string): unknown {
  try {
    openRedirectStore(file).close();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("Store error mapping", () => {
  it("should report a busy database as locked", () => {
    const err = openError("busy.db");

    expect(err).toBeInstanceOf(StoreError);
    if (!(err instanceof StoreError)) return;
    expect(err.code).toBe(ErrorCode.STORE_LOCKED);
    expect(err.message).toBe('Store "busy.db" is locked by another process (open)');
  });

  it("should keep the binding's message for other failures", () => {
    const err = openError("missing.db");

    expect(err).toBeInstanceOf(StoreError);
    if (!(err instanceof StoreError)) return;
    expect(err.code).toBe(ErrorCode.STORE_OPEN_FAILED);
    expect(err.message).toBe('Cannot open store "missing.db": unable to open database file');
  });
});
