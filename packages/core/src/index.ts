/**
 * @greenlight/core
 *
 * Core library for Greenlight: layered configuration, the plugin registry
 * and the asset lifecycle manager.
 */

// Types — everything plugins and hosts build against
export * from "./types.js";

export {
  NOT_CONFIGURED,
  ENV,
  BUILTIN_PLUGINS,
  CONFIG_DIR_NAME,
  USER_CONFIG_FILE,
  PROJECT_CONFIG_FILE,
  MAX_RECENT_PROJECTS,
} from "./constants.js";

export {
  GreenlightError,
  isGreenlightError,
  errorMessage,
  toError,
  ConfigParseError,
  ConfigError,
  PluginLoadError,
  IllegalTransitionError,
  GatingViolation,
  CapabilityUnavailableError,
  DelegationFailure,
  TransitionInProgressError,
  AssetNotFoundError,
  AssetExistsError,
  InvalidAssetIdError,
} from "./errors.js";
export type { ErrorCode, PluginLoadPhase } from "./errors.js";

export { createLogger, logLevelFromEnv, silentLogger } from "./logger.js";

// Config resolver — Site → User → Project
export {
  createConfigResolver,
  getConfigResolver,
  setConfigResolver,
  resetConfigResolver,
} from "./config-resolver.js";
export type { ConfigResolverOptions } from "./config-resolver.js";
export { isWritable, projectLocation, userLocation, siteLocation } from "./config-store.js";
export {
  parseLayerData,
  parsePluginConfig,
  formatIssues,
  GateRuleSchema,
  SettingValueSchema,
  CAPABILITIES,
  CONFIG_SCOPES,
  isCapability,
  isConfigScope,
} from "./config-schema.js";

// Plugin registry — discovery, loading, capability lookup
export { createPluginRegistry, compareVersions } from "./plugin-registry.js";
export type { PluginRegistryDeps } from "./plugin-registry.js";
export { isPluginModule, extractPluginModules, scanPluginDir } from "./plugin-discovery.js";
export type { ImportFn } from "./plugin-discovery.js";

// Lifecycle — gated asset state machine
export { assetIdFromName, defaultAssetPath, isAssetId, parseAssetId } from "./asset-id.js";
export type { ParsedAssetId } from "./asset-id.js";
export { createLifecycleManager } from "./lifecycle-manager.js";
export type { LifecycleManagerDeps } from "./lifecycle-manager.js";
export {
  LIFECYCLE_STATES,
  nextStates,
  canTransition,
  isTerminal,
  isLifecycleState,
  isTransitionKey,
  transitionKey,
  TRANSITION_KEYS,
} from "./state-machine.js";
export { DEFAULT_GATES, normalizeGateRule, evaluateGate, describeGateRule, gateFor } from "./gating.js";
export {
  createProjectAssetStore,
  createMemoryAssetStore,
  toAssetData,
  fromAssetData,
} from "./asset-store.js";
