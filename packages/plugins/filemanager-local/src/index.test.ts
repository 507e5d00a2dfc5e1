import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigError, silentLogger, type FileManager, type PluginInstance } from "@greenlight/core";
import { create, manifest, default as defaultExport } from "./index.js";

let baseDir: string;
let depot: string;
let workspace: string;

function setup(config: Record<string, unknown> = {}, projectRoot: string | null = null) {
  const instance: PluginInstance = create({
    config: { root: depot, workspace, author: "mira", ...config },
    projectRoot,
    logger: silentLogger,
  });
  const files: FileManager | undefined = instance.capabilities.fileManager;
  if (!files) throw new Error("fileManager capability missing");
  return { instance, files };
}

function writeWorkspace(dir: string, path: string, content: string): void {
  mkdirSync(dirname(join(dir, path)), { recursive: true });
  writeFileSync(join(dir, path), content);
}

beforeEach(() => {
  baseDir = mkdtempSync(join(tmpdir(), "greenlight-files-"));
  depot = join(baseDir, "depot");
  workspace = join(baseDir, "work");
  mkdirSync(depot);
  mkdirSync(workspace);
});

afterEach(() => {
  rmSync(baseDir, { recursive: true, force: true });
});

describe("manifest", () => {
  it("provides the fileManager capability", () => {
    expect(manifest.name).toBe("local-files");
    expect(manifest.capabilities).toEqual(["fileManager"]);
    expect(defaultExport.create).toBe(create);
  });
});

describe("load", () => {
  it("fails when the configured depot root is unreachable", async () => {
    const missing = join(baseDir, "offline");
    const { instance } = setup({ root: missing });
    await expect(instance.load?.()).rejects.toThrow(`depot root unreachable: ${missing}`);
  });

  it("creates the default depot inside the project", async () => {
    const projectRoot = join(baseDir, "fenwick");
    const instance = create({ config: {}, projectRoot, logger: silentLogger });
    await instance.load?.();
    expect(existsSync(join(projectRoot, ".greenlight", "depot"))).toBe(true);
  });

  it("fails without a root or a project", async () => {
    const instance = create({ config: {}, projectRoot: null, logger: silentLogger });
    await expect(instance.load?.()).rejects.toThrow("no depot root");
  });

  it("rejects a malformed plugin config", () => {
    expect(() => create({ config: { root: 5 }, projectRoot: null, logger: silentLogger })).toThrow(
      new ConfigError("Invalid local-files plugin config: root: Expected string, received number"),
    );
  });
});

describe("checkout and submit", () => {
  it("stores numbered revisions with their description and author", async () => {
    const { files } = setup();
    await files.checkout("assets/sword.ma");
    writeWorkspace(workspace, "assets/sword.ma", "v1");
    const first = await files.submit("assets/sword.ma", "blockout");

    await files.checkout("assets/sword.ma");
    writeWorkspace(workspace, "assets/sword.ma", "v2");
    await files.submit("assets/sword.ma", "uvs");

    expect(first.id).toBe("1");
    expect(first.author).toBe("mira");
    const history = await files.history("assets/sword.ma");
    expect(history.map((r) => [r.id, r.description])).toEqual([
      ["1", "blockout"],
      ["2", "uvs"],
    ]);
    expect(readFileSync(join(depot, "assets/sword.ma", "r1"), "utf-8")).toBe("v1");
  });

  it("refuses a checkout held by someone else", async () => {
    await setup().files.checkout("assets/sword.ma");
    const other = setup({ author: "jon" }).files;
    await expect(other.checkout("assets/sword.ma")).rejects.toThrow("assets/sword.ma is checked out by mira");
  });

  it("treats a repeated checkout by the holder as a no-op", async () => {
    const { files } = setup();
    await expect(files.checkout("assets/sword.ma")).resolves.toBe(true);
    await expect(files.checkout("assets/sword.ma")).resolves.toBe(false);
  });

  it("refuses to submit without a checkout", async () => {
    writeWorkspace(workspace, "assets/sword.ma", "v1");
    const { files } = setup();
    await expect(files.submit("assets/sword.ma", "blockout")).rejects.toThrow(
      "assets/sword.ma is not checked out by mira",
    );
  });

  it("refuses to submit a missing workspace file", async () => {
    const { files } = setup();
    await files.checkout("assets/sword.ma");
    await expect(files.submit("assets/sword.ma", "blockout")).rejects.toThrow(
      `nothing to submit: ${join(workspace, "assets/sword.ma")} does not exist`,
    );
  });

  it("fetches the latest revision into another workspace on checkout", async () => {
    const { files } = setup();
    await files.checkout("assets/sword.ma");
    writeWorkspace(workspace, "assets/sword.ma", "v1");
    await files.submit("assets/sword.ma", "blockout");

    const otherWorkspace = join(baseDir, "other");
    const other = setup({ author: "jon", workspace: otherWorkspace }).files;
    await other.checkout("assets/sword.ma");
    expect(readFileSync(join(otherWorkspace, "assets/sword.ma"), "utf-8")).toBe("v1");
  });

  it("refuses paths outside the depot", async () => {
    const { files } = setup();
    await expect(files.checkout("../outside.ma")).rejects.toThrow("path escapes the depot: ../outside.ma");
  });
});

describe("optional operations", () => {
  it("revert releases the checkout and restores the latest revision", async () => {
    const { files } = setup();
    await files.checkout("assets/sword.ma");
    writeWorkspace(workspace, "assets/sword.ma", "v1");
    await files.submit("assets/sword.ma", "blockout");
    await files.checkout("assets/sword.ma");
    writeWorkspace(workspace, "assets/sword.ma", "scratch");

    await files.revert?.("assets/sword.ma");

    expect(readFileSync(join(workspace, "assets/sword.ma"), "utf-8")).toBe("v1");
    await expect(setup({ author: "jon" }).files.checkout("assets/sword.ma")).resolves.toBe(true);
  });

  it("add puts a path under version control with an empty history", async () => {
    const { files } = setup();
    await files.add?.(["assets/shield.ma"]);
    expect(await files.history("assets/shield.ma")).toEqual([]);
    expect(existsSync(join(depot, "assets/shield.ma", "history.yaml"))).toBe(true);
  });

  it("getLatest fails for a path with no revisions", async () => {
    const { files } = setup();
    await expect(files.getLatest?.("assets/shield.ma")).rejects.toThrow("assets/shield.ma has no revisions");
  });
});
