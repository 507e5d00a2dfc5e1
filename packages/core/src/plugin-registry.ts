/**
 * Plugin Registry — discovers, loads and exposes plugins.
 *
 * Plugins can be:
 * 1. Built-in (packages/plugins/*, imported by package name)
 * 2. Modules found in plugin directories (config layers + GREENLIGHT_PLUGIN_DIRS)
 * 3. Registered directly by a host
 */

import { BUILTIN_PLUGINS } from "./constants.js";
import { PluginLoadError, errorMessage, toError } from "./errors.js";
import { createLogger } from "./logger.js";
import {
  defaultImportFn,
  extractPluginModules,
  fileSpecifier,
  scanPluginDir,
  type ImportFn,
} from "./plugin-discovery.js";
import type {
  Capability,
  CapabilityMap,
  ConfigResolver,
  DiscoveryFailure,
  DiscoveryReport,
  Logger,
  PluginContext,
  PluginDescriptor,
  PluginInstance,
  PluginKey,
  PluginLoadState,
  PluginModule,
  PluginSource,
  PluginRegistry,
} from "./types.js";

export interface PluginRegistryDeps {
  /** Supplies plugin dirs, active selections and per-plugin config */
  resolver?: ConfigResolver;
  logger?: Logger;
  /** Used for built-in packages and discovered files */
  importFn?: ImportFn;
  /** Built-in package names; defaults to the bundled plugins */
  builtins?: readonly string[];
}

interface MutableDescriptor {
  key: PluginKey;
  manifest: PluginModule["manifest"];
  source: PluginSource;
  state: PluginLoadState;
  failureReason: string | null;
  error: Error | null;
}

interface Entry {
  descriptor: MutableDescriptor;
  module: PluginModule;
  instance: PluginInstance | null;
}

function makeKey(name: string, version: string): PluginKey {
  return `${name}@${version}`;
}

/** Compare dotted versions numerically ("1.10.0" > "1.9.2"); non-numeric parts compare as text */
export function compareVersions(a: string, b: string): number {
  const pa = a.split(/[.-]/);
  const pb = b.split(/[.-]/);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const x = pa[i] ?? "0";
    const y = pb[i] ?? "0";
    const nx = Number(x);
    const ny = Number(y);
    const diff = Number.isNaN(nx) || Number.isNaN(ny) ? x.localeCompare(y) : nx - ny;
    if (diff !== 0) return diff;
  }
  return 0;
}

export function createPluginRegistry(deps: PluginRegistryDeps = {}): PluginRegistry {
  const logger = deps.logger ?? createLogger("plugins");
  const importFn = deps.importFn ?? defaultImportFn;
  const builtins = deps.builtins ?? BUILTIN_PLUGINS;
  const { resolver } = deps;

  const entries = new Map<PluginKey, Entry>();
  /** Instances displaced by re-registration, still owed an unload() */
  const retired: PluginInstance[] = [];
  let lastFailures: DiscoveryFailure[] = [];

  function entryFor(descriptor: PluginDescriptor): Entry | null {
    return entries.get(descriptor.key) ?? null;
  }

  function descriptors(): PluginDescriptor[] {
    return [...entries.values()].map((e) => e.descriptor);
  }

  function declares(descriptor: PluginDescriptor, capability: Capability): boolean {
    return descriptor.manifest.capabilities.includes(capability);
  }

  function pluginConfig(descriptor: PluginDescriptor): Record<string, unknown> {
    const refs = resolver?.getEffectiveConfig().plugins ?? [];
    const ref = refs.find((r) => r.name === descriptor.manifest.name);
    return ref?.config ? { ...ref.config } : {};
  }

  function register(plugin: PluginModule, source: PluginSource = "builtin"): PluginDescriptor {
    const { manifest } = plugin;
    const key = makeKey(manifest.name, manifest.version);
    const existing = entries.get(key);
    if (existing?.module === plugin) return existing.descriptor;

    if (existing?.instance) retired.push(existing.instance);
    const descriptor: MutableDescriptor = {
      key,
      manifest,
      source,
      state: "unloaded",
      failureReason: null,
      error: null,
    };
    // Map.set on an existing key keeps its position
    entries.set(key, { descriptor, module: plugin, instance: null });
    logger.debug(`${existing ? "Replaced" : "Registered"} ${key} (${source})`);
    return descriptor;
  }

  function get(name: string, version?: string): PluginDescriptor | null {
    if (version !== undefined) return entries.get(makeKey(name, version))?.descriptor ?? null;
    let best: PluginDescriptor | null = null;
    for (const { descriptor } of entries.values()) {
      if (descriptor.manifest.name !== name) continue;
      if (!best || compareVersions(descriptor.manifest.version, best.manifest.version) > 0) {
        best = descriptor;
      }
    }
    return best;
  }

  function isActive(descriptor: PluginDescriptor): boolean {
    const refs = resolver?.getEffectiveConfig().plugins ?? [];
    if (refs.length === 0) return true;
    const ref = refs.find((r) => r.name === descriptor.manifest.name);
    if (!ref || ref.enabled === false) return false;
    return ref.version === undefined || ref.version === descriptor.manifest.version;
  }

  function capability<C extends Capability>(
    descriptor: PluginDescriptor,
    cap: C,
  ): CapabilityMap[C] | null {
    const entry = entryFor(descriptor);
    if (!entry || entry.descriptor.state !== "loaded" || !entry.instance) return null;
    return entry.instance.capabilities[cap] ?? null;
  }

  function usable(descriptor: PluginDescriptor, cap: Capability): boolean {
    return (
      declares(descriptor, cap) &&
      isActive(descriptor) &&
      descriptor.state === "loaded" &&
      capability(descriptor, cap) !== null
    );
  }

  async function registerFrom(
    specifier: string,
    source: PluginSource,
    report: DiscoveryReport,
  ): Promise<void> {
    let namespace: unknown;
    try {
      namespace = await importFn(specifier);
    } catch (err) {
      report.failures.push({ path: specifier, reason: `import failed: ${errorMessage(err)}` });
      return;
    }
    const { modules, problems } = extractPluginModules(namespace);
    for (const problem of problems) report.failures.push({ path: specifier, reason: problem });
    for (const mod of modules) report.registered.push(register(mod, source));
  }

  async function load(descriptor: PluginDescriptor): Promise<boolean> {
    const entry = entryFor(descriptor);
    if (!entry) {
      logger.warn(`Cannot load ${descriptor.key}: not registered`);
      return false;
    }
    const d = entry.descriptor;
    if (d.state === "loaded") return true;
    if (d.state === "loading") return false;

    d.state = "loading";
    d.failureReason = null;
    d.error = null;
    const { name, capabilities } = d.manifest;

    try {
      const context: PluginContext = {
        config: pluginConfig(d),
        projectRoot: resolver?.currentProjectRoot() ?? null,
        logger: logger.child(name),
      };

      let instance: PluginInstance;
      try {
        instance = entry.module.create(context);
      } catch (err) {
        throw new PluginLoadError(name, "create", errorMessage(err), { cause: err });
      }

      const missing = capabilities.filter((c) => instance.capabilities[c] === undefined);
      if (missing.length > 0) {
        throw new PluginLoadError(name, "validate", `declares ${missing.join(", ")} but does not provide it`);
      }

      try {
        await instance.load?.();
      } catch (err) {
        throw new PluginLoadError(name, "load", errorMessage(err), { cause: err });
      }

      if (entries.get(d.key) !== entry) {
        // register() replaced this entry while load() was pending
        d.state = "unloaded";
        logger.debug(`${d.key} was replaced while loading; discarding the instance`);
        await instance.unload?.();
        return false;
      }

      entry.instance = instance;
      d.state = "loaded";
      logger.info(`Loaded ${d.key}`);
      return true;
    } catch (err) {
      const error = toError(err);
      d.state = "failed";
      d.failureReason = error.message;
      d.error = error;
      logger.warn(error.message);
      return false;
    }
  }

  async function unload(descriptor: PluginDescriptor): Promise<void> {
    const entry = entryFor(descriptor);
    if (!entry || !entry.instance) return;
    const instance = entry.instance;
    entry.instance = null;
    entry.descriptor.state = "unloaded";
    await instance.unload?.();
    logger.debug(`Unloaded ${entry.descriptor.key}`);
  }

  return {
    register,
    get,
    isActive,
    capability,
    load,
    unload,

    async discover(searchPaths?: string[]): Promise<DiscoveryReport> {
      const report: DiscoveryReport = { registered: [], failures: [] };

      for (const pkg of builtins) {
        await registerFrom(pkg, "builtin", report);
      }

      const dirs = searchPaths ?? resolver?.pluginDirs() ?? [];
      for (const dir of dirs) {
        const scan = await scanPluginDir(dir);
        report.failures.push(...scan.failures);
        for (const candidate of scan.candidates) {
          await registerFrom(fileSpecifier(candidate), dir, report);
        }
      }

      for (const failure of report.failures) {
        logger.warn(`Skipped ${failure.path}: ${failure.reason}`);
      }
      logger.debug(`Discovered ${report.registered.length} plugin(s)`);
      lastFailures = report.failures;
      return report;
    },

    getByCapability(cap) {
      return descriptors().filter((d) => declares(d, cap));
    },

    list() {
      return descriptors();
    },

    discoveryFailures() {
      return [...lastFailures];
    },

    async loadActive() {
      const loaded: PluginDescriptor[] = [];
      for (const descriptor of descriptors()) {
        if (!isActive(descriptor)) continue;
        if (await load(descriptor)) loaded.push(descriptor);
      }
      return loaded;
    },

    getActive(cap) {
      const preferred = resolver?.getEffectiveConfig().active[cap];
      if (preferred !== undefined) {
        const selected = descriptors()
          .filter((d) => d.manifest.name === preferred && usable(d, cap))
          .sort((a, b) => compareVersions(b.manifest.version, a.manifest.version))[0];
        if (selected) return selected;
        logger.debug(`Selected ${cap} plugin "${preferred}" is not available; using the first loaded one`);
      }
      return descriptors().find((d) => usable(d, cap)) ?? null;
    },

    listAvailable(cap) {
      return descriptors().filter((d) => declares(d, cap) && isActive(d));
    },

    async close() {
      const errors: Error[] = [];
      const instances = [...retired];
      retired.length = 0;
      for (const entry of entries.values()) {
        if (entry.instance) instances.push(entry.instance);
        entry.instance = null;
        entry.descriptor.state = "unloaded";
      }
      for (const instance of instances) {
        try {
          await instance.unload?.();
        } catch (err) {
          errors.push(toError(err));
        }
      }
      if (errors.length > 0) {
        throw new AggregateError(errors, `${errors.length} plugin(s) failed to unload`);
      }
    },
  };
}
