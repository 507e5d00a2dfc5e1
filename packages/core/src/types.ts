/**
 * Greenlight — Core Type Definitions
 *
 * Every plugin, CLI command and host front-end builds against these.
 *
 * Architecture: 6 capability contracts + 3 core services
 *   1. Application        — DCC / tool launcher (maya, houdini, photoshop)
 *   2. FileManager        — file versioning (perforce, git, local depot)
 *   3. TaskManager        — task tracking (jira, shotgrid, local)
 *   4. Service            — parameterized remote service
 *   5. Tool               — standalone pipeline tool
 *   6. NotificationSystem — push notifications (webhook, email)
 *   + Config Resolver, Plugin Registry, Lifecycle Manager (core, not pluggable)
 */

import type { NOT_CONFIGURED } from "./constants.js";

// =============================================================================
// LOGGING
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Derive a logger whose prefix names a sub-component */
  child(scope: string): Logger;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

/** The three configuration layers, least to most specific */
export type ConfigScope = "site" | "user" | "project";

/** Identity of a config record: "<scope>:<location>" */
export type ConfigKey = `${ConfigScope}:${string}`;

/** JSON-compatible setting value */
export type SettingValue =
  | string
  | number
  | boolean
  | null
  | SettingValue[]
  | { [key: string]: SettingValue };

/** Sentinel returned when a key exists in no layer */
export type NotConfigured = typeof NOT_CONFIGURED;

/** A plugin named in a config layer */
export interface PluginRef {
  name: string;
  /** Exact version pin (e.g. "1.2.0"). Unpinned refs match any version. */
  version?: string;
  /** Defaults to true */
  enabled?: boolean;
  /** Passed to the plugin through its PluginContext */
  config?: Record<string, unknown>;
}

/** Fields every layer carries */
export interface LayerData {
  settings: Record<string, SettingValue>;
  plugins: PluginRef[];
  /** Which named plugin fills a capability */
  active: Partial<Record<Capability, string>>;
  /** Lifecycle gating-rule overrides, keyed "<from>-><to>" */
  gates: Partial<Record<TransitionKey, GateRuleInput>>;
  /** Extra plugin search directories */
  pluginDirs: string[];
  /** ISO timestamp of the last save */
  savedAt: string | null;
}

export interface SiteConfig extends LayerData {
  /** Studio name */
  name: string | null;
}

export interface UserConfig extends LayerData {
  currentProject: string | null;
  /** Known projects: name → project root directory */
  projects: Record<string, string>;
  /** Most recently opened project names, newest first */
  recentProjects: string[];
  /** animator, rigger, concept artist, etc. */
  roles: string[];
}

export interface ProjectConfig extends LayerData {
  name: string;
  /** Short code, e.g. "FEN" */
  key: string | null;
  /** Maps to the asset types offered when the project is created */
  projectType: string | null;
  assetTypes: string[];
  /** Persisted lifecycle records */
  assets: AssetRecordData[];
}

export interface LayerDataByScope {
  site: SiteConfig;
  user: UserConfig;
  project: ProjectConfig;
}

/** A loaded configuration record. Identity is `key`, never content. */
export interface ConfigLayer<S extends ConfigScope = ConfigScope> {
  readonly key: ConfigKey;
  readonly scope: S;
  /** Backing file, or null when the scope has no location (e.g. site env var unset) */
  readonly path: string | null;
  /** Whether the backing file existed when last read */
  readonly persisted: boolean;
  readonly data: LayerDataByScope[S];
}

/** Merged Site → User → Project view */
export interface EffectiveConfig {
  settings: Record<string, SettingValue>;
  plugins: PluginRef[];
  active: Partial<Record<Capability, string>>;
  /** Rules for the legal transitions; absent keys mean no requirement */
  gates: Partial<Record<TransitionKey, GateRule>>;
  pluginDirs: string[];
  project: { name: string; rootDir: string } | null;
}

/** A recorded failure to load a layer */
export interface ConfigDiagnostic {
  scope: ConfigScope;
  path: string;
  message: string;
  at: Date;
}

/** Layered configuration resolver — see config-resolver.ts */
export interface ConfigResolver {
  /** Read one layer only */
  get(scope: ConfigScope, key: string): SettingValue | NotConfigured;

  /** Read the effective value, Project > User > Site */
  resolve(key: string): SettingValue | NotConfigured;

  /** Effective value or a caller default */
  resolveOr(key: string, fallback: SettingValue): SettingValue;

  /** Write a setting into exactly the given scope */
  set(scope: ConfigScope, key: string, value: SettingValue): void;

  /** Remove a setting from exactly the given scope */
  unset(scope: ConfigScope, key: string): void;

  /** Structured edit of one layer; the result is validated before it replaces the old data */
  update<S extends ConfigScope>(scope: S, recipe: (draft: LayerDataByScope[S]) => void): void;

  /** Persist one layer (serialized per scope) */
  save(scope: ConfigScope): Promise<void>;

  /** Whether save(scope) could write the layer's file */
  isWritable(scope: ConfigScope): boolean;

  /** Re-read one layer from disk; throws ConfigParseError and keeps the previous data */
  reload(scope: ConfigScope): void;

  /** The loaded layer record for a scope (null for project when none is current) */
  layer<S extends ConfigScope>(scope: S): ConfigLayer<S> | null;

  currentProject(): ProjectConfig | null;

  /** Root directory of the current project */
  currentProjectRoot(): string | null;

  /** Make the project at rootDir current and record it in the user layer */
  openProject(rootDir: string): ProjectConfig;

  /** Known projects from the user layer: name → root dir */
  listProjects(): Record<string, string>;

  getEffectiveConfig(): EffectiveConfig;

  /** Effective plugin search directories (config layers + GREENLIGHT_PLUGIN_DIRS) */
  pluginDirs(): string[];

  /** Load failures recorded per scope */
  diagnostics(): ConfigDiagnostic[];

  /** Wait for pending saves and drop cached state */
  close(): Promise<void>;
}

// =============================================================================
// CAPABILITIES — the six plugin contracts
// =============================================================================

export type Capability =
  | "application"
  | "fileManager"
  | "taskManager"
  | "service"
  | "tool"
  | "notification";

// --- Application ---

/**
 * Launches a DCC application with the environment needed to expose the
 * pipeline menus and tools.
 */
export interface Application {
  readonly name: string;

  /** Locate the executable; null when it is not installed */
  find(): Promise<string | null>;

  /** Start the application and return a handle to the spawned process */
  launch(args: string[], options?: LaunchOptions): Promise<ProcessHandle>;

  /** Optional: adjust the environment the application is launched with */
  setupEnv?(env: Record<string, string>): Record<string, string>;
}

export interface LaunchOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export interface ProcessHandle {
  pid: number | null;
  command: string;
  args: string[];
}

// --- FileManager ---

/**
 * Versioned storage for asset files — a local or network drive, Perforce, git.
 */
export interface FileManager {
  readonly name: string;

  /**
   * Exclusive checkout of a path, fetching its latest revision into the
   * workspace. Resolves false when the caller already held the checkout and
   * nothing changed.
   */
  checkout(path: string): Promise<boolean>;

  /** Store the workspace copy as a new revision and release the checkout */
  submit(path: string, description: string): Promise<Revision>;

  /** Revisions of a path, oldest first */
  history(path: string): Promise<Revision[]>;

  /** Optional: put new files under version control */
  add?(paths: string[]): Promise<void>;

  /** Optional: sync the latest revision without checking out */
  getLatest?(path: string): Promise<void>;

  /** Optional: discard a checkout */
  revert?(path: string): Promise<void>;
}

export interface Revision {
  /** Backend revision identifier (changelist, commit hash, sequence number) */
  id: string;
  path: string;
  description: string;
  author: string;
  timestamp: Date;
}

// --- TaskManager ---

/** Opaque task identifier, interpreted by the active TaskManager */
export type TaskId = string;

export type TaskState = "open" | "in_progress" | "review" | "done" | "cancelled";

export const TASK_STATE = {
  OPEN: "open" as const,
  IN_PROGRESS: "in_progress" as const,
  REVIEW: "review" as const,
  DONE: "done" as const,
  CANCELLED: "cancelled" as const,
} satisfies Record<string, TaskState>;

export interface TaskSpec {
  title: string;
  description?: string;
  assetId: AssetId;
  assignee?: string;
}

/**
 * Bridge to the site's task tracker.
 */
export interface TaskManager {
  readonly name: string;

  create(spec: TaskSpec): Promise<TaskId>;

  /** Associate an existing task with an asset */
  link(assetId: AssetId, taskId: TaskId): Promise<void>;

  status(taskId: TaskId): Promise<TaskState>;

  /** Optional: move a task to a new state */
  update?(taskId: TaskId, state: TaskState): Promise<void>;
}

// --- Service ---

/**
 * Parameterized remote service with a small request API.
 */
export interface Service {
  readonly name: string;
  readonly url: string;
  request(path: string, params?: Record<string, string>): Promise<unknown>;
}

// --- Tool ---

export interface Tool {
  readonly name: string;
  run(args: string[]): Promise<void>;
}

// --- NotificationSystem ---

/**
 * Delivers notifications to a log, chat channel, email or broadcast system.
 */
export interface NotificationSystem {
  readonly name: string;
  notify(title: string, message: string, context?: NotifyContext): Promise<void>;
}

export interface NotifyContext {
  assetId?: AssetId;
  projectName?: string;
  from?: LifecycleState;
  to?: LifecycleState;
  actor?: string;
}

/** Capability name → provider contract */
export interface CapabilityMap {
  application: Application;
  fileManager: FileManager;
  taskManager: TaskManager;
  service: Service;
  tool: Tool;
  notification: NotificationSystem;
}

// =============================================================================
// PLUGIN SYSTEM
// =============================================================================

/** Plugin identity: "<name>@<version>" */
export type PluginKey = `${string}@${string}`;

export type PluginLoadState = "unloaded" | "loading" | "loaded" | "failed";

export const PLUGIN_STATE = {
  UNLOADED: "unloaded" as const,
  LOADING: "loading" as const,
  LOADED: "loaded" as const,
  FAILED: "failed" as const,
} satisfies Record<string, PluginLoadState>;

/** Plugin manifest — what every plugin exports */
export interface PluginManifest {
  /** Plugin name (e.g. "local-files", "jira", "maya") */
  name: string;

  version: string;

  /** Human-readable description */
  description: string;

  vendor?: string;

  /** Which contracts the plugin implements */
  capabilities: readonly Capability[];
}

/** Handed to a plugin's create() */
export interface PluginContext {
  /** Plugin-specific config from the effective plugin refs */
  config: Record<string, unknown>;
  /** Root of the current project, if any */
  projectRoot: string | null;
  logger: Logger;
}

/** Providers for the declared capabilities */
export type CapabilityProviders = { [C in Capability]?: CapabilityMap[C] };

/** What create() returns */
export interface PluginInstance {
  readonly capabilities: CapabilityProviders;

  /**
   * Optional initialization hook, run on load. A file manager may open its
   * backend connection here; an application may verify its executable.
   */
  load?(): Promise<void>;

  /** Optional teardown hook */
  unload?(): Promise<void>;
}

/** What a plugin module must export (as `default`, or inside a `plugins` array) */
export interface PluginModule {
  manifest: PluginManifest;
  create(context: PluginContext): PluginInstance;
}

/** Where a plugin came from: "builtin" or the directory it was found in */
export type PluginSource = string;

/** The registry's record of a plugin */
export interface PluginDescriptor {
  readonly key: PluginKey;
  readonly manifest: PluginManifest;
  readonly source: PluginSource;
  readonly state: PluginLoadState;
  /** Why the last load failed */
  readonly failureReason: string | null;
  /** The error behind failureReason */
  readonly error: Error | null;
}

/** A candidate module that could not be registered */
export interface DiscoveryFailure {
  path: string;
  reason: string;
}

export interface DiscoveryReport {
  registered: PluginDescriptor[];
  failures: DiscoveryFailure[];
}

/** Plugin registry — discovery, loading and capability lookup */
export interface PluginRegistry {
  /** Register a plugin; re-registering the same name@version replaces the entry */
  register(plugin: PluginModule, source?: PluginSource): PluginDescriptor;

  /** Register built-ins, then scan directories (defaults to the config's plugin dirs) */
  discover(searchPaths?: string[]): Promise<DiscoveryReport>;

  /** Look up by name; highest version unless pinned */
  get(name: string, version?: string): PluginDescriptor | null;

  /** All descriptors implementing a capability, in registration order */
  getByCapability(capability: Capability): PluginDescriptor[];

  list(): PluginDescriptor[];

  discoveryFailures(): DiscoveryFailure[];

  /** Run the plugin's create() and load() hooks; false on failure */
  load(descriptor: PluginDescriptor): Promise<boolean>;

  /** Load every active plugin, sequentially */
  loadActive(): Promise<PluginDescriptor[]>;

  unload(descriptor: PluginDescriptor): Promise<void>;

  /** Provider for a capability of a loaded plugin */
  capability<C extends Capability>(
    descriptor: PluginDescriptor,
    capability: C,
  ): CapabilityMap[C] | null;

  /** Whether the effective config activates this plugin */
  isActive(descriptor: PluginDescriptor): boolean;

  /** The loaded plugin currently selected for a capability */
  getActive(capability: Capability): PluginDescriptor | null;

  /** Active descriptors implementing a capability */
  listAvailable(capability: Capability): PluginDescriptor[];

  /** Unload everything */
  close(): Promise<void>;
}

// =============================================================================
// ASSET LIFECYCLE
// =============================================================================

/** Asset identifier, `scope::path`, e.g. "hero_sword::" (see asset-id.ts) */
export type AssetId = string;

export type LifecycleState =
  | "idea"
  | "candidate"
  | "in_development"
  | "review"
  | "production_ready"
  | "rejected";

export const LIFECYCLE_STATE = {
  IDEA: "idea" as const,
  CANDIDATE: "candidate" as const,
  IN_DEVELOPMENT: "in_development" as const,
  REVIEW: "review" as const,
  PRODUCTION_READY: "production_ready" as const,
  REJECTED: "rejected" as const,
} satisfies Record<string, LifecycleState>;

/** "<from>-><to>", e.g. "in_development->review" */
export type TransitionKey = `${LifecycleState}->${LifecycleState}`;

export type TransitionOutcome = "applied" | "failed" | "refused";

export interface TransitionEntry {
  from: LifecycleState;
  to: LifecycleState;
  timestamp: Date;
  /** Who requested the transition */
  actor: string;
  /** Plugins that performed side effects */
  plugins: string[];
  outcome: TransitionOutcome;
  reason: string | null;
}

export interface AssetRecord {
  id: AssetId;
  name: string;
  /** Versioned file location, relative to the project root */
  path: string;
  assetType: string | null;
  state: LifecycleState;
  /** Linked external task identifiers */
  taskIds: TaskId[];
  createdAt: Date;
  history: TransitionEntry[];
}

/** Persisted shape of an AssetRecord (dates as ISO strings) */
export interface AssetRecordData {
  id: string;
  name: string;
  path: string;
  assetType: string | null;
  state: LifecycleState;
  taskIds: string[];
  createdAt: string;
  history: Array<Omit<TransitionEntry, "timestamp"> & { timestamp: string }>;
}

export interface CreateAssetInput {
  name: string;
  id?: AssetId;
  path?: string;
  assetType?: string;
  taskIds?: TaskId[];
}

// --- Gating ---

export type GateRule =
  | { type: "none" }
  | { type: "linked-task"; states?: TaskState[] }
  | { type: "file-submitted" }
  | { type: "setting"; key: string; equals?: SettingValue }
  | { type: "all"; rules: GateRule[] };

/** As written in config: a rule object or a shorthand string */
export type GateRuleInput = GateRule | "none" | "no requirement" | "linked-task" | "file-submitted";

export interface GateCheck {
  transition: TransitionKey;
  rule: GateRule;
  satisfied: boolean;
  /** Why the rule is not satisfied */
  reason: string | null;
}

export interface TransitionOptions {
  actor?: string;
  /** Used as the file manager submit description */
  description?: string;
}

export interface TransitionResult {
  asset: AssetRecord;
  entry: TransitionEntry;
  /** Notification failures; they never undo a transition */
  notificationErrors: Array<{ plugin: string; error: Error }>;
}

/** Persistence for lifecycle records */
export interface AssetStore {
  load(): AssetRecord[];
  save(records: AssetRecord[]): Promise<void>;
}

/** Lifecycle manager — gated asset state machine */
export interface LifecycleManager {
  createAsset(input: CreateAssetInput): Promise<AssetRecord>;

  getAsset(assetId: AssetId): AssetRecord | null;

  listAssets(state?: LifecycleState): AssetRecord[];

  /** Link an existing task through the active TaskManager */
  linkTask(assetId: AssetId, taskId: TaskId): Promise<AssetRecord>;

  /** Evaluate the gate for a transition without side effects */
  checkTransition(assetId: AssetId, target: LifecycleState): Promise<GateCheck>;

  /** Advance an asset; throws on structural, gating or delegation failure */
  transition(
    assetId: AssetId,
    target: LifecycleState,
    options?: TransitionOptions,
  ): Promise<TransitionResult>;
}
