/**
 * Workspace Packaging Tests
 *
 * Compiled code must load compiled workspace packages: each package builds
 * src/ into its own dist/, and its runtime entry points there.
 */

import { describe, it, expect } from "@jest/globals";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

const ROOT = join(__dirname, "..", "..", "..");

const manifestSchema = z.object({
  main: z.string().optional(),
  types: z.string().optional(),
  bin: z.record(z.string()).optional(),
  scripts: z.record(z.string()).optional(),
  exports: z.record(z.object({ types: z.string(), default: z.string() })).optional(),
});

const tsconfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, ...segments: string[]): T {
  const parsed: unknown = JSON.parse(readFileSync(join(ROOT, ...segments), "utf8"));
  return schema.parse(parsed);
}

describe("Workspace packaging", () => {
  describe.each(["logger", "shared", "store"])("@waypost/%s", (name) => {
    const manifest = readJson(manifestSchema, "packages", name, "package.json");

    it("should load compiled output at run time", () => {
      expect(manifest.main).toBe("./dist/index.js");
      expect(manifest.exports?.["."]?.default).toBe("./dist/index.js");
    });

    it("should resolve types from source", () => {
      expect(manifest.types).toBe("./src/index.ts");
      expect(manifest.exports?.["."]?.types).toBe("./src/index.ts");
    });

    it("should build src into dist", () => {
      const tsconfig = readJson(tsconfigSchema, "packages", name, "tsconfig.json");
      expect(tsconfig.compilerOptions).toEqual({ rootDir: "src", outDir: "dist" });
    });
  });

  describe("@waypost/redirect", () => {
    it("should build src into dist", () => {
      const tsconfig = readJson(tsconfigSchema, "apps", "redirect", "tsconfig.json");
      expect(tsconfig.compilerOptions).toEqual({ rootDir: "src", outDir: "dist" });
    });

    it("should start and expose the store command from dist", () => {
      const manifest = readJson(manifestSchema, "package.json");

      expect(manifest.scripts?.start).toBe("node apps/redirect/dist/index.js");
      expect(manifest.bin?.["waypost-store"]).toBe("apps/redirect/dist/bin/waypost-store.js");
    });
  });
});
