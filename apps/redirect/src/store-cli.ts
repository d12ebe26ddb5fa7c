/**
 * Store Maintenance Command
 *
 * Lists and edits the key-value store the redirect service reads at
 * startup. Changes take effect on the next service start.
 *
 * Usage:
 *   waypost-store list                  [--boltfile redirects.db]
 *   waypost-store put <path> <url>      [--boltfile redirects.db]
 *   waypost-store delete <path>         [--boltfile redirects.db]
 */

import { parseArgs } from "node:util";
import { createLogger, type Logger } from "@waypost/logger";
import { ConfigError, isWaypostError } from "@waypost/shared";
import { openRedirectStore, type RedirectStore } from "@waypost/store";

import { DEFAULT_STORE_FILE } from "./config.js";

export const USAGE = [
  "Usage:",
  "  waypost-store list [--boltfile <file>]",
  "  waypost-store put <path> <url> [--boltfile <file>]",
  "  waypost-store delete <path> [--boltfile <file>]",
].join("\n");

export interface StoreCliOptions {
  /** Receives command output, one line per call */
  write?: (line: string) => void;
  logger?: Logger;
  env?: Readonly<Record<string, string | undefined>>;
}

type Command = (store: RedirectStore, args: string[], write: (line: string) => void) => number;

const COMMANDS: Record<string, { arity: number; run: Command }> = {
  list: {
    arity: 0,
    run: (store, _args, write) => {
      for (const { path, url } of store.entries()) {
        write(`${path} -> ${url}`);
      }
      return 0;
    },
  },
  put: {
    arity: 2,
    run: (store, [path = "", url = ""], write) => {
      store.put(path, url);
      write(`put ${path} -> ${url}`);
      return 0;
    },
  },
  delete: {
    arity: 1,
    run: (store, [path = ""], write) => {
      if (!store.delete(path)) {
        write(`not found: ${path}`);
        return 1;
      }
      write(`deleted ${path}`);
      return 0;
    },
  },
};

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: { boltfile: { type: "string" } },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

/**
 * Run one command.
 *
 * @returns Process exit status
 */
export function runStoreCli(argv: readonly string[], options: StoreCliOptions = {}): number {
  const write = options.write ?? ((line: string) => console.log(line));
  const log = options.logger ?? createLogger("store-cli");
  const env = options.env ?? process.env;

  try {
    const { values, positionals } = parseCommandLine(argv);
    const [name = "", ...args] = positionals;
    const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;

    if (!command || args.length !== command.arity) {
      write(USAGE);
      return 1;
    }

    const file = values.boltfile ?? (env.STORE_FILE || DEFAULT_STORE_FILE);
    if (file === "") {
      throw new ConfigError("Store file must not be empty");
    }

    const store = openRedirectStore(file);
    try {
      return command.run(store, args, write);
    } finally {
      store.close();
    }
  } catch (err) {
    if (!isWaypostError(err)) throw err;
    log.error({ err, code: err.code }, err.message);
    return 1;
  }
}
