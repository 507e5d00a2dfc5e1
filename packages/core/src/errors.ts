import type { AssetId, Capability, GateRule, LifecycleState, TransitionKey } from "./types.js";

export type ErrorCode =
  | "CONFIG_PARSE"
  | "CONFIG_INVALID"
  | "PLUGIN_LOAD"
  | "CAPABILITY_UNAVAILABLE"
  | "GATING_VIOLATION"
  | "DELEGATION_FAILED"
  | "ILLEGAL_TRANSITION"
  | "TRANSITION_IN_PROGRESS"
  | "ASSET_NOT_FOUND"
  | "ASSET_EXISTS"
  | "INVALID_ASSET_ID";

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

/**
 * Base class for all Greenlight errors.
 *
 * Enables generic catch: `if (isGreenlightError(e))`
 */
export abstract class GreenlightError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function isGreenlightError(err: unknown): err is GreenlightError {
  return err instanceof GreenlightError;
}

/** Render any thrown value as a message */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Coerce any thrown value into an Error, keeping the original as cause */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err), { cause: err });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * A persisted config file could not be parsed or failed schema validation.
 */
export class ConfigParseError extends GreenlightError {
  readonly code = "CONFIG_PARSE" as const;
  readonly path: string;
  /** Parser or validator output */
  readonly diagnostic: string;

  constructor(path: string, diagnostic: string, options?: { cause?: unknown }) {
    super(`Malformed config file ${path}: ${diagnostic}`, options);
    this.path = path;
    this.diagnostic = diagnostic;
  }
}

/** An invalid config write: no location for the scope, or a value the schema rejects. */
export class ConfigError extends GreenlightError {
  readonly code = "CONFIG_INVALID" as const;
}

// ---------------------------------------------------------------------------
// Plugins
// ---------------------------------------------------------------------------

/** Phase of plugin loading where the failure occurred. */
export type PluginLoadPhase = "create" | "validate" | "load";

/**
 * A plugin failed to initialize. Recorded on its descriptor, never thrown
 * out of discovery or loadActive().
 */
export class PluginLoadError extends GreenlightError {
  readonly code = "PLUGIN_LOAD" as const;
  readonly pluginName: string;
  readonly phase: PluginLoadPhase;

  constructor(pluginName: string, phase: PluginLoadPhase, message: string, options?: { cause?: unknown }) {
    super(`Plugin load failed [${phase}] "${pluginName}": ${message}`, options);
    this.pluginName = pluginName;
    this.phase = phase;
  }
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

/** The requested state is not adjacent to the current one. */
export class IllegalTransitionError extends GreenlightError {
  readonly code = "ILLEGAL_TRANSITION" as const;
  readonly assetId: AssetId;
  readonly from: LifecycleState;
  readonly to: LifecycleState;

  constructor(assetId: AssetId, from: LifecycleState, to: LifecycleState) {
    super(`Asset ${assetId} cannot move from ${from} to ${to}`);
    this.assetId = assetId;
    this.from = from;
    this.to = to;
  }
}

/** The gate for a transition is not satisfied. No plugin was invoked. */
export class GatingViolation extends GreenlightError {
  readonly code = "GATING_VIOLATION" as const;
  readonly assetId: AssetId;
  readonly transition: TransitionKey;
  readonly rule: GateRule;
  readonly reason: string;
  /** Set when the refusal could not be saved to the asset history */
  readonly persistError: Error | null;

  constructor(
    assetId: AssetId,
    transition: TransitionKey,
    rule: GateRule,
    reason: string,
    persistError: Error | null = null,
  ) {
    super(`Gate ${transition} refused for ${assetId}: ${reason}`);
    this.assetId = assetId;
    this.transition = transition;
    this.rule = rule;
    this.reason = reason;
    this.persistError = persistError;
  }
}

/** No active, loaded plugin provides a capability a transition needs. */
export class CapabilityUnavailableError extends GreenlightError {
  readonly code = "CAPABILITY_UNAVAILABLE" as const;
  readonly capability: Capability;

  constructor(capability: Capability, context: string) {
    super(`No active ${capability} plugin available for ${context}`);
    this.capability = capability;
  }
}

/**
 * A plugin call failed mid-transition. The asset keeps its previous state;
 * the plugin's own error is the cause.
 */
export class DelegationFailure extends GreenlightError {
  readonly code = "DELEGATION_FAILED" as const;
  readonly assetId: AssetId;
  /** null for delegations outside a transition, such as linking a task */
  readonly transition: TransitionKey | null;
  readonly plugin: string;
  readonly step: string;
  /** Errors raised while undoing earlier steps */
  readonly compensationErrors: Error[];
  /** Set when the failed attempt could not be saved to the asset history */
  readonly persistError: Error | null;

  constructor(opts: {
    assetId: AssetId;
    transition: TransitionKey | null;
    plugin: string;
    step: string;
    cause: unknown;
    compensationErrors?: Error[];
    persistError?: Error | null;
  }) {
    super(`${opts.plugin} ${opts.step} failed: ${errorMessage(opts.cause)}`, { cause: opts.cause });
    this.assetId = opts.assetId;
    this.transition = opts.transition;
    this.plugin = opts.plugin;
    this.step = opts.step;
    this.compensationErrors = opts.compensationErrors ?? [];
    this.persistError = opts.persistError ?? null;
  }
}

/** Another transition of the same asset has not returned yet. */
export class TransitionInProgressError extends GreenlightError {
  readonly code = "TRANSITION_IN_PROGRESS" as const;

  constructor(assetId: AssetId) {
    super(`A transition of ${assetId} is already in progress`);
  }
}

export class AssetNotFoundError extends GreenlightError {
  readonly code = "ASSET_NOT_FOUND" as const;

  constructor(assetId: AssetId) {
    super(`Asset ${assetId} not found`);
  }
}

export class AssetExistsError extends GreenlightError {
  readonly code = "ASSET_EXISTS" as const;

  constructor(assetId: AssetId) {
    super(`Asset ${assetId} already exists`);
  }
}

/** An asset id that does not follow `scope::path[#version|@changelist]`. */
export class InvalidAssetIdError extends GreenlightError {
  readonly code = "INVALID_ASSET_ID" as const;
  readonly value: string;
  readonly reason: string;

  constructor(value: string, reason: string) {
    super(`Invalid asset id "${value}": ${reason}`);
    this.value = value;
    this.reason = reason;
  }
}
