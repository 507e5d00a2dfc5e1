import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  DelegationFailure,
  createConfigResolver,
  createLifecycleManager,
  createPluginRegistry,
  silentLogger,
  type ConfigResolver,
  type PluginRegistry,
  type TaskManager,
} from "@greenlight/core";

let baseDir: string;
let sitePath: string;

function makeRegistry(): { resolver: ConfigResolver; registry: PluginRegistry } {
  const resolver = createConfigResolver({
    env: { GREENLIGHT_SITE_CONFIG: sitePath, GREENLIGHT_USER_DIR: join(baseDir, "user") },
    logger: silentLogger,
  });
  const registry = createPluginRegistry({
    resolver,
    logger: silentLogger,
    importFn: (specifier) => import(specifier),
  });
  return { resolver, registry };
}

beforeEach(() => {
  baseDir = mkdtempSync(join(tmpdir(), "greenlight-builtins-"));
  sitePath = join(baseDir, "site.yaml");
});

afterEach(() => {
  rmSync(baseDir, { recursive: true, force: true });
});

describe("built-in plugins", () => {
  it("registers a file manager and a task manager, unloaded, with no plugin dirs", async () => {
    const { registry } = makeRegistry();
    const report = await registry.discover();

    expect(report.failures).toEqual([]);
    expect(registry.getByCapability("fileManager").map((d) => [d.manifest.name, d.state, d.source])).toEqual([
      ["local-files", "unloaded", "builtin"],
    ]);
    expect(registry.getByCapability("taskManager").map((d) => [d.manifest.name, d.state, d.source])).toEqual([
      ["local-tasks", "unloaded", "builtin"],
    ]);
    expect(registry.list().map((d) => d.key)).toEqual([
      "local-files@0.1.0",
      "local-tasks@0.1.0",
      "exec-app@0.1.0",
      "webhook@0.1.0",
    ]);
  });

  it("fails to load the file manager when its depot is unreachable", async () => {
    const offline = join(baseDir, "offline-depot");
    writeFileSync(sitePath, `plugins:\n  - name: local-files\n    config:\n      root: ${offline}\n`);
    const { registry } = makeRegistry();
    await registry.discover();

    const descriptor = registry.get("local-files");
    if (!descriptor) throw new Error("local-files not registered");

    expect(await registry.load(descriptor)).toBe(false);
    const after = registry.get("local-files");
    expect(after?.state).toBe("failed");
    expect(after?.failureReason).toBe(`Plugin load failed [load] "local-files": depot root unreachable: ${offline}`);
    expect(registry.getActive("fileManager")).toBeNull();
  });

  it("loads the file manager against a reachable depot", async () => {
    writeFileSync(sitePath, `plugins:\n  - name: local-files\n    config:\n      root: ${baseDir}\n`);
    const { registry } = makeRegistry();
    await registry.discover();

    const loaded = await registry.loadActive();

    expect(loaded.map((d) => d.key)).toEqual(["local-files@0.1.0"]);
    expect(registry.getActive("fileManager")?.key).toBe("local-files@0.1.0");
    await registry.close();
  });
});

describe("lifecycle against the local file manager", () => {
  it("keeps a checkout the user already held when starting development fails", async () => {
    const depot = join(baseDir, "depot");
    const work = join(baseDir, "work");
    mkdirSync(depot);
    mkdirSync(join(work, "assets"), { recursive: true });
    writeFileSync(
      sitePath,
      `plugins:\n  - name: local-files\n    config:\n      root: ${depot}\n      workspace: ${work}\n      author: tester\n  - name: offline-tasks\n`,
    );
    const { resolver, registry } = makeRegistry();
    await registry.discover();
    await registry.loadActive();

    const offlineTasks: TaskManager = {
      name: "offline-tasks",
      create: () => Promise.reject(new Error("tracker offline")),
      link: () => Promise.resolve(),
      status: () => Promise.resolve("open"),
    };
    const tasks = registry.register({
      manifest: { name: "offline-tasks", version: "1.0.0", description: "", capabilities: ["taskManager"] },
      create: () => ({ capabilities: { taskManager: offlineTasks } }),
    });
    await registry.load(tasks);

    const active = registry.getActive("fileManager");
    const files = active ? registry.capability(active, "fileManager") : null;
    if (!files) throw new Error("local-files not loaded");

    const workspaceFile = join(work, "assets", "hero");
    await files.checkout("assets/hero");
    writeFileSync(workspaceFile, "v1");
    await files.submit("assets/hero", "first pass");
    await files.checkout("assets/hero");
    writeFileSync(workspaceFile, "unsubmitted edits");

    const lifecycle = createLifecycleManager({ resolver, registry, logger: silentLogger, actor: "tester" });
    await lifecycle.createAsset({ name: "Hero", path: "assets/hero" });
    await lifecycle.transition("hero::", "candidate");

    await expect(lifecycle.transition("hero::", "in_development")).rejects.toBeInstanceOf(DelegationFailure);

    expect(readFileSync(workspaceFile, "utf-8")).toBe("unsubmitted edits");
    expect(existsSync(join(depot, "assets", "hero", "lock.yaml"))).toBe(true);
    expect(lifecycle.getAsset("hero::")?.state).toBe("candidate");
    await registry.close();
  });
});
