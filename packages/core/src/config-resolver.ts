/**
 * Layered Configuration Resolver — Site → User → Project.
 *
 * Each layer loads lazily from its YAML file on first access. Reads of the
 * merged view take no lock: every write swaps in a validated copy of the
 * layer (copy-on-write) and drops the cached effective view. Saves are
 * serialized per scope.
 */

import { delimiter, isAbsolute, resolve } from "node:path";
import { parseLayerData } from "./config-schema.js";
import {
  defaultLayerData,
  defaultProjectName,
  isWritable as isWritablePath,
  projectLocation,
  readLayerFile,
  siteLocation,
  userLocation,
  writeLayerFile,
  type LayerLocation,
} from "./config-store.js";
import { ENV, MAX_RECENT_PROJECTS, NOT_CONFIGURED } from "./constants.js";
import { ConfigError, ConfigParseError } from "./errors.js";
import { DEFAULT_GATES, normalizeGateRule } from "./gating.js";
import { createLogger } from "./logger.js";
import { isTransitionKey } from "./state-machine.js";
import type {
  Capability,
  ConfigDiagnostic,
  ConfigLayer,
  ConfigResolver,
  ConfigScope,
  EffectiveConfig,
  GateRule,
  LayerData,
  LayerDataByScope,
  Logger,
  NotConfigured,
  PluginRef,
  ProjectConfig,
  SettingValue,
  TransitionKey,
} from "./types.js";

export interface ConfigResolverOptions {
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Base for ~/.greenlight when GREENLIGHT_USER_DIR is unset */
  homeDir?: string;
  /** Open this project instead of the user layer's current project */
  projectRoot?: string;
  logger?: Logger;
}

/** One scope's state: location, last-known-good data, and the first-load failure if any */
class LayerSlot<S extends ConfigScope> {
  data: LayerDataByScope[S] | null = null;
  persisted = false;
  loaded = false;
  /** Set when the first load failed; writes are refused until a reload succeeds */
  error: ConfigParseError | null = null;

  constructor(
    readonly scope: S,
    readonly location: LayerLocation,
    readonly seed: Record<string, unknown> = {},
  ) {}
}

type Slots = { readonly [S in ConfigScope]: LayerSlot<S> | null };

const SCOPES: readonly ConfigScope[] = ["site", "user", "project"];

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

export function createConfigResolver(options: ConfigResolverOptions = {}): ConfigResolver {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger("config");

  const siteSlot = new LayerSlot("site", siteLocation(env));
  const userSlot = new LayerSlot("user", userLocation(env, options.homeDir));
  let projectSlot: LayerSlot<"project"> | null = null;
  let projectResolved = false;

  const slots: Slots = {
    site: siteSlot,
    user: userSlot,
    get project() {
      return ensureProjectSlot();
    },
  };

  const diagnostics: ConfigDiagnostic[] = [];
  const saveChains = new Map<ConfigScope, Promise<void>>();
  let effective: EffectiveConfig | null = null;

  function invalidate(): void {
    effective = null;
  }

  function recordFailure(scope: ConfigScope, err: ConfigParseError): void {
    diagnostics.push({ scope, path: err.path, message: err.message, at: new Date() });
    logger.warn(err.message);
  }

  function readSlot<S extends ConfigScope>(slot: LayerSlot<S>): void {
    const path = slot.location.path;
    if (path === null) {
      slot.data = defaultLayerData(slot.scope, slot.seed);
      slot.persisted = false;
      return;
    }
    const result = readLayerFile(slot.scope, path, slot.seed);
    slot.data = result.data;
    slot.persisted = result.persisted;
    slot.error = null;
  }

  function ensureLoaded<S extends ConfigScope>(slot: LayerSlot<S>): LayerSlot<S> {
    if (slot.loaded) return slot;
    slot.loaded = true;
    try {
      readSlot(slot);
    } catch (err) {
      if (!(err instanceof ConfigParseError)) throw err;
      slot.error = err;
      recordFailure(slot.scope, err);
    }
    return slot;
  }

  function createProjectSlot(rootDir: string): LayerSlot<"project"> {
    const root = resolve(rootDir);
    return new LayerSlot("project", projectLocation(root), { name: defaultProjectName(root) });
  }

  /** The project comes from options.projectRoot, else the user layer's current project */
  function ensureProjectSlot(): LayerSlot<"project"> | null {
    if (projectResolved) return projectSlot;
    projectResolved = true;

    let root = options.projectRoot ?? null;
    if (root === null) {
      const user = ensureLoaded(userSlot).data;
      const current = user?.currentProject ?? null;
      root = current !== null ? (user?.projects[current] ?? null) : null;
      if (current !== null && root === null) {
        logger.warn(`Current project "${current}" has no known root directory`);
      }
    }
    projectSlot = root !== null ? createProjectSlot(root) : null;
    return projectSlot;
  }

  function slotFor<S extends ConfigScope>(scope: S): LayerSlot<S> | null {
    const slot = slots[scope];
    return slot ? ensureLoaded(slot) : null;
  }

  /** A loaded slot that may be written, or throw */
  function writableSlot<S extends ConfigScope>(scope: S): LayerSlot<S> & { data: LayerDataByScope[S] } {
    const slot = slotFor(scope);
    if (!slot) throw new ConfigError("No current project: open or create a project first");
    if (slot.error) throw slot.error;
    if (slot.location.path === null) {
      throw new ConfigError(`The ${scope} layer has no location; set ${ENV.SITE_CONFIG}`);
    }
    const data = slot.data;
    if (data === null) throw new ConfigError(`The ${scope} layer is not loaded`);
    return Object.assign(slot, { data });
  }

  function layerData(scope: ConfigScope): LayerData | null {
    return slotFor(scope)?.data ?? null;
  }

  function computeEffective(): EffectiveConfig {
    const layers = SCOPES.map(layerData).filter((d): d is LayerData => d !== null);
    const projectRoot = currentProjectRoot();

    const settings: Record<string, SettingValue> = {};
    const active: Partial<Record<Capability, string>> = {};
    const gates: Partial<Record<TransitionKey, GateRule>> = { ...DEFAULT_GATES };
    const plugins = new Map<string, PluginRef>();

    for (const layer of layers) {
      Object.assign(settings, layer.settings);
      Object.assign(active, layer.active);
      for (const [key, rule] of Object.entries(layer.gates)) {
        if (rule !== undefined && isTransitionKey(key)) gates[key] = normalizeGateRule(rule);
      }
      for (const ref of layer.plugins) plugins.set(ref.name, ref);
    }

    const dirs: string[] = [];
    for (const scope of SCOPES) {
      const data = layerData(scope);
      if (!data) continue;
      for (const dir of data.pluginDirs) {
        dirs.push(scope === "project" && projectRoot !== null && !isAbsolute(dir) ? resolve(projectRoot, dir) : dir);
      }
    }
    const envDirs = env[ENV.PLUGIN_DIRS];
    if (envDirs) dirs.push(...envDirs.split(delimiter).filter((d) => d.length > 0));

    const project = currentProject();
    return {
      settings,
      active,
      gates,
      plugins: [...plugins.values()],
      pluginDirs: dedupe(dirs),
      project: project && projectRoot !== null ? { name: project.name, rootDir: projectRoot } : null,
    };
  }

  function getEffectiveConfig(): EffectiveConfig {
    if (!effective) effective = computeEffective();
    return effective;
  }

  function update<S extends ConfigScope>(scope: S, recipe: (draft: LayerDataByScope[S]) => void): void {
    const slot = writableSlot(scope);
    const draft = structuredClone(slot.data);
    recipe(draft);
    const result = parseLayerData(scope, draft);
    if (!result.success) {
      throw new ConfigError(`Invalid ${scope} config: ${result.diagnostic}`);
    }
    slot.data = result.data;
    invalidate();
  }

  async function writeScope(scope: ConfigScope): Promise<void> {
    const slot = writableSlot(scope);
    const path = slot.location.path;
    if (path === null) return;
    if (!isWritablePath(path)) throw new ConfigError(`The ${scope} config file is not writable: ${path}`);
    const savedAt = new Date().toISOString();
    await writeLayerFile(path, { ...slot.data, savedAt });
    // Edits made while the write was pending stay in memory
    slot.data = { ...slot.data, savedAt };
    slot.persisted = true;
    logger.debug(`Saved ${scope} config to ${path}`);
  }

  function currentProject(): ProjectConfig | null {
    return slotFor("project")?.data ?? null;
  }

  function currentProjectRoot(): string | null {
    const slot = ensureProjectSlot();
    if (!slot) return null;
    // "project:<root>"
    return slot.location.key.slice("project:".length);
  }

  function rememberProject(name: string, root: string): void {
    const user = ensureLoaded(userSlot);
    if (user.error) {
      logger.warn(`Not recording project "${name}": user config is unreadable`);
      return;
    }
    update("user", (draft) => {
      const renamed = new Set<string>([name]);
      for (const [known, dir] of Object.entries(draft.projects)) {
        if (dir === root && known !== name) {
          delete draft.projects[known];
          renamed.add(known);
        }
      }
      draft.projects[name] = root;
      draft.currentProject = name;
      draft.recentProjects = [name, ...draft.recentProjects.filter((p) => !renamed.has(p))].slice(
        0,
        MAX_RECENT_PROJECTS,
      );
    });
  }

  function lookup(settings: Record<string, SettingValue>, key: string): SettingValue | NotConfigured {
    return Object.hasOwn(settings, key) ? settings[key] : NOT_CONFIGURED;
  }

  function resolveKey(key: string): SettingValue | NotConfigured {
    return lookup(getEffectiveConfig().settings, key);
  }

  return {
    get(scope, key) {
      const data = layerData(scope);
      return data ? lookup(data.settings, key) : NOT_CONFIGURED;
    },

    resolve: resolveKey,

    resolveOr(key, fallback) {
      const value = resolveKey(key);
      return value === NOT_CONFIGURED ? fallback : value;
    },

    set(scope, key, value) {
      update(scope, (draft) => {
        draft.settings[key] = value;
      });
    },

    unset(scope, key) {
      update(scope, (draft) => {
        delete draft.settings[key];
      });
    },

    update,

    save(scope) {
      const previous = saveChains.get(scope) ?? Promise.resolve();
      // An earlier failed save already rejected for its own caller
      const next = previous.catch(() => undefined).then(() => writeScope(scope));
      saveChains.set(scope, next);
      return next;
    },

    isWritable(scope) {
      const path = slotFor(scope)?.location.path ?? null;
      return path !== null && isWritablePath(path);
    },

    reload(scope) {
      const slot = slots[scope];
      if (!slot) throw new ConfigError("No current project to reload");
      slot.loaded = true;
      try {
        readSlot(slot);
      } catch (err) {
        if (err instanceof ConfigParseError) {
          recordFailure(scope, err);
          // First load never succeeded: keep refusing writes
          if (slot.data === null) slot.error = err;
        }
        throw err;
      }
      invalidate();
      logger.debug(`Reloaded ${scope} config`);
    },

    layer<S extends ConfigScope>(scope: S): ConfigLayer<S> | null {
      const slot = slotFor(scope);
      if (!slot || slot.data === null) return null;
      return {
        key: slot.location.key,
        scope,
        path: slot.location.path,
        persisted: slot.persisted,
        data: slot.data,
      };
    },

    currentProject,
    currentProjectRoot,

    openProject(rootDir) {
      const slot = ensureLoaded(createProjectSlot(rootDir));
      if (slot.error) throw slot.error;
      const data = slot.data;
      if (data === null) throw new ConfigError(`Project at ${rootDir} could not be loaded`);

      projectSlot = slot;
      projectResolved = true;
      invalidate();

      const root = slot.location.key.slice("project:".length);
      rememberProject(data.name, root);
      logger.info(`Opened project "${data.name}" at ${root}`);
      return data;
    },

    listProjects() {
      const data = ensureLoaded(userSlot).data;
      return { ...(data?.projects ?? {}) };
    },

    getEffectiveConfig,

    pluginDirs() {
      return [...getEffectiveConfig().pluginDirs];
    },

    diagnostics() {
      return [...diagnostics];
    },

    async close() {
      await Promise.allSettled([...saveChains.values()]);
      saveChains.clear();
      invalidate();
    },
  };
}

// ---------------------------------------------------------------------------
// Process default
// ---------------------------------------------------------------------------

let defaultResolver: ConfigResolver | null = null;

/** The process-wide resolver, created from process.env on first use */
export function getConfigResolver(): ConfigResolver {
  if (!defaultResolver) defaultResolver = createConfigResolver();
  return defaultResolver;
}

export function setConfigResolver(resolver: ConfigResolver): void {
  defaultResolver = resolver;
}

/** Close and forget the process default */
export async function resetConfigResolver(): Promise<void> {
  const resolver = defaultResolver;
  defaultResolver = null;
  if (resolver) await resolver.close();
}
