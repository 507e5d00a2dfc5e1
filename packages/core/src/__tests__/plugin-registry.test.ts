import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { pathToFileURL } from "node:url";
import { createConfigResolver } from "../config-resolver.js";
import { silentLogger } from "../logger.js";
import { compareVersions, createPluginRegistry } from "../plugin-registry.js";
import type {
  Capability,
  CapabilityProviders,
  ConfigResolver,
  FileManager,
  PluginInstance,
  PluginModule,
  TaskManager,
} from "../types.js";

let baseDir: string;
let resolver: ConfigResolver;

function makeFileManager(name = "fake-files"): FileManager {
  return {
    name,
    checkout: vi.fn().mockResolvedValue(true),
    submit: vi.fn(),
    history: vi.fn().mockResolvedValue([]),
  };
}

function makeTaskManager(name = "fake-tasks"): TaskManager {
  return {
    name,
    create: vi.fn().mockResolvedValue("TASK-1"),
    link: vi.fn().mockResolvedValue(undefined),
    status: vi.fn().mockResolvedValue("open"),
  };
}

function makeModule(
  name: string,
  capabilities: Capability[],
  providers: CapabilityProviders,
  overrides: { version?: string; instance?: Partial<PluginInstance> } = {},
): PluginModule {
  return {
    manifest: {
      name,
      version: overrides.version ?? "1.0.0",
      description: `${name} test plugin`,
      capabilities,
    },
    create: vi.fn(() => ({ capabilities: providers, ...overrides.instance })),
  };
}

function registry(withResolver = false) {
  return createPluginRegistry({
    resolver: withResolver ? resolver : undefined,
    logger: silentLogger,
    builtins: [],
  });
}

beforeEach(() => {
  baseDir = mkdtempSync(join(tmpdir(), "greenlight-plugins-"));
  resolver = createConfigResolver({
    env: { GREENLIGHT_USER_DIR: join(baseDir, "user") },
    logger: silentLogger,
  });
});

afterEach(() => {
  rmSync(baseDir, { recursive: true, force: true });
});

describe("register", () => {
  it("keeps one descriptor per name and version", () => {
    const reg = registry();
    reg.register(makeModule("local-files", ["fileManager"], { fileManager: makeFileManager() }));
    reg.register(makeModule("local-files", ["fileManager"], { fileManager: makeFileManager() }));

    expect(reg.list().map((d) => d.key)).toEqual(["local-files@1.0.0"]);
  });

  it("replaces an entry in place", () => {
    const reg = registry();
    reg.register(makeModule("a", ["tool"], {}));
    reg.register(makeModule("b", ["tool"], {}));
    const replacement = makeModule("a", ["tool"], {});
    const descriptor = reg.register(replacement, "/plugins");

    expect(reg.list().map((d) => d.key)).toEqual(["a@1.0.0", "b@1.0.0"]);
    expect(reg.get("a")).toBe(descriptor);
    expect(descriptor.source).toBe("/plugins");
  });

  it("treats registering the same module object again as a no-op", () => {
    const reg = registry();
    const mod = makeModule("a", ["tool"], {});
    const first = reg.register(mod);
    expect(reg.register(mod)).toBe(first);
  });

  it("registers new plugins unloaded", () => {
    const reg = registry();
    const descriptor = reg.register(makeModule("a", ["tool"], {}));
    expect(descriptor.state).toBe("unloaded");
    expect(descriptor.failureReason).toBeNull();
  });
});

describe("lookup", () => {
  it("returns capability matches in registration order", () => {
    const reg = registry();
    reg.register(makeModule("z-files", ["fileManager"], {}));
    reg.register(makeModule("tasks", ["taskManager"], {}));
    reg.register(makeModule("a-files", ["fileManager"], {}));

    const names = () => reg.getByCapability("fileManager").map((d) => d.manifest.name);
    expect(names()).toEqual(["z-files", "a-files"]);
    expect(names()).toEqual(["z-files", "a-files"]);
  });

  it("returns an empty list for an unclaimed capability", () => {
    expect(registry().getByCapability("service")).toEqual([]);
  });

  it("picks the highest version unless pinned", () => {
    const reg = registry();
    reg.register(makeModule("a", ["tool"], {}, { version: "1.9.0" }));
    reg.register(makeModule("a", ["tool"], {}, { version: "1.10.0" }));

    expect(reg.get("a")?.manifest.version).toBe("1.10.0");
    expect(reg.get("a", "1.9.0")?.manifest.version).toBe("1.9.0");
    expect(reg.get("a", "2.0.0")).toBeNull();
    expect(reg.get("missing")).toBeNull();
  });

  it("compares dotted versions numerically", () => {
    expect(compareVersions("1.10.0", "1.9.2")).toBeGreaterThan(0);
    expect(compareVersions("1.0", "1.0.0")).toBe(0);
  });
});

describe("load", () => {
  it("loads a plugin and exposes its providers", async () => {
    const fileManager = makeFileManager();
    const reg = registry();
    const descriptor = reg.register(makeModule("local-files", ["fileManager"], { fileManager }));

    expect(reg.capability(descriptor, "fileManager")).toBeNull();
    expect(await reg.load(descriptor)).toBe(true);
    expect(descriptor.state).toBe("loaded");
    expect(reg.capability(descriptor, "fileManager")).toBe(fileManager);
  });

  it("records a failing load hook without throwing", async () => {
    const reg = registry();
    const descriptor = reg.register(
      makeModule("local-files", ["fileManager"], { fileManager: makeFileManager() }, {
        instance: { load: vi.fn().mockRejectedValue(new Error("depot root unreachable: /mnt/depot")) },
      }),
    );

    expect(await reg.load(descriptor)).toBe(false);
    expect(descriptor.state).toBe("failed");
    expect(descriptor.failureReason).toBe(
      'Plugin load failed [load] "local-files": depot root unreachable: /mnt/depot',
    );
    expect(descriptor.error?.cause).toBeInstanceOf(Error);
    expect(reg.capability(descriptor, "fileManager")).toBeNull();
  });

  it("fails a plugin that does not provide a declared capability", async () => {
    const reg = registry();
    const descriptor = reg.register(makeModule("half", ["fileManager", "taskManager"], { fileManager: makeFileManager() }));

    expect(await reg.load(descriptor)).toBe(false);
    expect(descriptor.failureReason).toBe(
      'Plugin load failed [validate] "half": declares taskManager but does not provide it',
    );
  });

  it("fails a plugin whose create() throws", async () => {
    const reg = registry();
    const mod: PluginModule = {
      manifest: { name: "broken", version: "0.1.0", description: "", capabilities: ["tool"] },
      create() {
        throw new Error("missing licence");
      },
    };
    const descriptor = reg.register(mod);

    expect(await reg.load(descriptor)).toBe(false);
    expect(descriptor.failureReason).toBe('Plugin load failed [create] "broken": missing licence');
  });

  it("does not rerun the load hook for a loaded plugin", async () => {
    const load = vi.fn().mockResolvedValue(undefined);
    const reg = registry();
    const descriptor = reg.register(makeModule("a", ["tool"], { tool: { name: "a", run: vi.fn() } }, { instance: { load } }));

    await reg.load(descriptor);
    expect(await reg.load(descriptor)).toBe(true);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("retries a failed plugin", async () => {
    const load = vi.fn().mockRejectedValueOnce(new Error("busy")).mockResolvedValueOnce(undefined);
    const reg = registry();
    const descriptor = reg.register(makeModule("a", ["tool"], { tool: { name: "a", run: vi.fn() } }, { instance: { load } }));

    expect(await reg.load(descriptor)).toBe(false);
    expect(await reg.load(descriptor)).toBe(true);
    expect(descriptor.failureReason).toBeNull();
  });

  it("passes plugin config and project root to create()", async () => {
    resolver.update("user", (draft) => {
      draft.plugins = [{ name: "local-files", config: { root: "/mnt/depot" } }];
    });
    const reg = registry(true);
    const mod = makeModule("local-files", ["fileManager"], { fileManager: makeFileManager() });
    await reg.load(reg.register(mod));

    expect(mod.create).toHaveBeenCalledWith(
      expect.objectContaining({ config: { root: "/mnt/depot" }, projectRoot: null }),
    );
  });

  it("unloads through the plugin's hook", async () => {
    const unload = vi.fn().mockResolvedValue(undefined);
    const reg = registry();
    const descriptor = reg.register(makeModule("a", ["tool"], { tool: { name: "a", run: vi.fn() } }, { instance: { unload } }));
    await reg.load(descriptor);
    await reg.unload(descriptor);

    expect(unload).toHaveBeenCalledTimes(1);
    expect(descriptor.state).toBe("unloaded");
  });

  it("discards an instance whose entry was replaced mid-load", async () => {
    let finish: () => void = () => {};
    const unload = vi.fn().mockResolvedValue(undefined);
    const tool = { name: "t", run: vi.fn() };
    const reg = registry();
    const first = reg.register(
      makeModule("a", ["tool"], { tool }, {
        instance: {
          load: () =>
            new Promise<void>((resolve) => {
              finish = resolve;
            }),
          unload,
        },
      }),
    );

    const pending = reg.load(first);
    const second = reg.register(makeModule("a", ["tool"], { tool }));
    finish();

    await expect(pending).resolves.toBe(false);
    expect(unload).toHaveBeenCalledTimes(1);
    expect(first.state).toBe("unloaded");
    expect(reg.get("a")).toBe(second);
    expect(reg.get("a")?.state).toBe("unloaded");
  });

  it("unloads everything on close", async () => {
    const unloadA = vi.fn().mockResolvedValue(undefined);
    const unloadB = vi.fn().mockResolvedValue(undefined);
    const reg = registry();
    const tool = { name: "t", run: vi.fn() };
    await reg.load(reg.register(makeModule("a", ["tool"], { tool }, { instance: { unload: unloadA } })));
    await reg.load(reg.register(makeModule("b", ["tool"], { tool }, { instance: { unload: unloadB } })));
    await reg.close();

    expect(unloadA).toHaveBeenCalledTimes(1);
    expect(unloadB).toHaveBeenCalledTimes(1);
  });
});

describe("active plugins", () => {
  it("treats every plugin as active when no layer lists plugins", () => {
    const reg = registry(true);
    const descriptor = reg.register(makeModule("a", ["tool"], {}));
    expect(reg.isActive(descriptor)).toBe(true);
  });

  it("activates only listed, enabled plugins with a matching pin", () => {
    resolver.update("user", (draft) => {
      draft.plugins = [
        { name: "a" },
        { name: "b", enabled: false },
        { name: "c", version: "2.0.0" },
      ];
    });
    const reg = registry(true);
    const a = reg.register(makeModule("a", ["tool"], {}));
    const b = reg.register(makeModule("b", ["tool"], {}));
    const c = reg.register(makeModule("c", ["tool"], {}));
    const d = reg.register(makeModule("d", ["tool"], {}));

    expect([a, b, c, d].map((x) => reg.isActive(x))).toEqual([true, false, false, false]);
    expect(reg.listAvailable("tool")).toEqual([a]);
  });

  it("loads only active plugins", async () => {
    resolver.update("user", (draft) => {
      draft.plugins = [{ name: "local-files" }];
    });
    const reg = registry(true);
    const files = reg.register(makeModule("local-files", ["fileManager"], { fileManager: makeFileManager() }));
    const tasks = reg.register(makeModule("local-tasks", ["taskManager"], { taskManager: makeTaskManager() }));

    expect(await reg.loadActive()).toEqual([files]);
    expect(tasks.state).toBe("unloaded");
  });

  it("prefers the plugin selected for a capability", async () => {
    resolver.update("user", (draft) => {
      draft.active.fileManager = "studio-files";
    });
    const reg = registry(true);
    reg.register(makeModule("local-files", ["fileManager"], { fileManager: makeFileManager("local") }));
    const studio = reg.register(makeModule("studio-files", ["fileManager"], { fileManager: makeFileManager("studio") }));
    await reg.loadActive();

    expect(reg.getActive("fileManager")).toBe(studio);
  });

  it("falls back to the first loaded plugin when the selection is unavailable", async () => {
    resolver.update("user", (draft) => {
      draft.active.fileManager = "studio-files";
    });
    const reg = registry(true);
    const local = reg.register(makeModule("local-files", ["fileManager"], { fileManager: makeFileManager() }));
    await reg.loadActive();

    expect(reg.getActive("fileManager")).toBe(local);
  });

  it("never loads a plugin during lookup", () => {
    const reg = registry(true);
    reg.register(makeModule("local-files", ["fileManager"], { fileManager: makeFileManager() }));
    expect(reg.getActive("fileManager")).toBeNull();
  });
});

describe("discover", () => {
  it("registers built-ins and records the ones that fail to import", async () => {
    const local = makeModule("local-files", ["fileManager"], { fileManager: makeFileManager() });
    const importFn = vi.fn(async (specifier: string) => {
      if (specifier === "@greenlight/plugin-filemanager-local") return { default: local };
      throw new Error(`Cannot find package '${specifier}'`);
    });
    const reg = createPluginRegistry({
      logger: silentLogger,
      importFn,
      builtins: ["@greenlight/plugin-filemanager-local", "@greenlight/plugin-missing"],
    });

    const report = await reg.discover([]);

    expect(report.registered.map((d) => d.key)).toEqual(["local-files@1.0.0"]);
    expect(report.registered[0]?.source).toBe("builtin");
    expect(report.failures).toEqual([
      {
        path: "@greenlight/plugin-missing",
        reason: "import failed: Cannot find package '@greenlight/plugin-missing'",
      },
    ]);
    expect(reg.discoveryFailures()).toEqual(report.failures);
  });

  it("reads a plugins array export", async () => {
    const files = makeModule("local-files", ["fileManager"], {});
    const tasks = makeModule("local-tasks", ["taskManager"], {});
    const reg = createPluginRegistry({
      logger: silentLogger,
      importFn: async () => ({ plugins: [files, tasks] }),
      builtins: ["bundle"],
    });

    const report = await reg.discover([]);
    expect(report.registered.map((d) => d.manifest.name)).toEqual(["local-files", "local-tasks"]);
  });

  it("records modules without a valid entry point", async () => {
    const reg = createPluginRegistry({
      logger: silentLogger,
      importFn: async () => ({ default: { manifest: { name: "x", version: "1" }, create: () => ({}) } }),
      builtins: ["bad"],
    });

    const report = await reg.discover([]);
    expect(report.registered).toEqual([]);
    expect(report.failures).toEqual([
      {
        path: "bad",
        reason: "default export: invalid manifest: description: Required; capabilities: Required",
      },
    ]);
  });

  it("scans plugin directories in name order", async () => {
    const dir = join(baseDir, "plugins");
    mkdirSync(join(dir, "a-dir"), { recursive: true });
    writeFileSync(join(dir, "a-dir", "index.mjs"), "");
    writeFileSync(join(dir, "b-plugin.mjs"), "");
    writeFileSync(join(dir, "notes.txt"), "");
    mkdirSync(join(dir, "empty-dir"));

    const dirModule = makeModule("dir-plugin", ["tool"], {});
    const fileModule = makeModule("file-plugin", ["tool"], {});
    const modules = new Map<string, unknown>([
      [pathToFileURL(join(dir, "a-dir", "index.mjs")).href, { default: dirModule }],
      [pathToFileURL(join(dir, "b-plugin.mjs")).href, { default: fileModule }],
    ]);
    const importFn = vi.fn(async (specifier: string) => modules.get(specifier));
    const reg = createPluginRegistry({ logger: silentLogger, importFn, builtins: [] });

    const report = await reg.discover([dir]);

    expect(importFn.mock.calls.map((call) => call[0])).toEqual([...modules.keys()]);
    expect(report.registered.map((d) => d.manifest.name)).toEqual(["dir-plugin", "file-plugin"]);
    expect(report.registered.every((d) => d.source === dir)).toBe(true);
    expect(report.failures).toEqual([]);
  });

  it("skips search paths that do not exist", async () => {
    const reg = createPluginRegistry({ logger: silentLogger, builtins: [] });
    const report = await reg.discover([join(baseDir, "nowhere")]);
    expect(report).toEqual({ registered: [], failures: [] });
  });

  it("uses the resolver's plugin dirs by default", async () => {
    const dir = join(baseDir, "from-config");
    mkdirSync(dir);
    writeFileSync(join(dir, "only.mjs"), "");
    resolver.update("user", (draft) => {
      draft.pluginDirs = [dir];
    });
    const importFn = vi.fn(async () => ({ default: makeModule("only", ["tool"], {}) }));
    const reg = createPluginRegistry({ resolver, logger: silentLogger, importFn, builtins: [] });

    await reg.discover();
    expect(importFn).toHaveBeenCalledWith(pathToFileURL(join(dir, "only.mjs")).href);
  });
});
