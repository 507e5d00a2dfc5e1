import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const packageDir = join(dirname(fileURLToPath(import.meta.url)), "..");

describe("greenlight bin", () => {
  it("points at a node script that loads the TypeScript entry through tsx", () => {
    const pkg: { bin: Record<string, string>; dependencies: Record<string, string> } = JSON.parse(
      readFileSync(join(packageDir, "package.json"), "utf-8"),
    );
    const bin = join(packageDir, pkg.bin["greenlight"] ?? "");

    expect(bin.endsWith(".js")).toBe(true);
    const lines = readFileSync(bin, "utf-8").split("\n");
    expect(lines[0]).toBe("#!/usr/bin/env node");
    expect(lines).toContain('import { register } from "tsx/esm/api";');
    expect(lines).toContain('await import("../src/index.ts");');
    expect(existsSync(join(packageDir, "src", "index.ts"))).toBe(true);
    expect(pkg.dependencies["tsx"]).toBeDefined();
  });
});
