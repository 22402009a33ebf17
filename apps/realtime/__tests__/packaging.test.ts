/**
 * Workspace Packaging Tests
 *
 * The production entry runs the compiled output under plain Node, so every
 * workspace must resolve to JavaScript in the build directory while the
 * type-checker and Jest keep reading the TypeScript sources.
 */

import { readFileSync } from "node:fs";
import path from "node:path";
import { describe, it, expect } from "@jest/globals";

const ROOT = path.resolve(__dirname, "../../..");

interface Manifest {
  name: string;
  main?: string;
  types?: string;
  scripts?: Record<string, string>;
}

function readManifest(dir: string): Manifest {
  return JSON.parse(readFileSync(path.join(ROOT, dir, "package.json"), "utf8"));
}

const tsconfig: { compilerOptions: { outDir: string; rootDir: string } } = JSON.parse(
  readFileSync(path.join(ROOT, "tsconfig.json"), "utf8")
);
const OUT_DIR = path.join(ROOT, tsconfig.compilerOptions.outDir);

const WORKSPACES = [
  "packages/logger",
  "packages/shared",
  "packages/cache",
  "packages/analytics",
  "apps/realtime",
];

describe("workspace packages", () => {
  it("should compile every workspace from the repository root", () => {
    expect(tsconfig.compilerOptions.rootDir).toBe(".");
  });

  it.each(WORKSPACES)("%s should load its compiled entry at runtime", (dir) => {
    const manifest = readManifest(dir);

    expect(manifest.main).toBeDefined();
    expect(path.resolve(ROOT, dir, manifest.main ?? "")).toBe(
      path.join(OUT_DIR, dir, "src", "index.js")
    );
  });

  it.each(WORKSPACES)("%s should expose its TypeScript sources for type-checking", (dir) => {
    expect(readManifest(dir).types).toBe("./src/index.ts");
  });

  it("should start the realtime service from the compiled output", () => {
    const root = readManifest(".");

    expect(root.scripts?.["start:realtime"]).toBe(
      `node ${path.relative(ROOT, path.join(OUT_DIR, "apps/realtime/src/index.js"))}`
    );
  });
});
