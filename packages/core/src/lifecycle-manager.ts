/**
 * Lifecycle Manager — gated asset state machine.
 *
 * A transition runs in a fixed order:
 * 1. Structural check against the adjacency table (nothing recorded)
 * 2. Gate evaluation (refusals are recorded, no plugin side effects)
 * 3. Capability check for the transition's delegation plan
 * 4. Delegation, one plugin call at a time, compensating on failure
 * 5. Commit + persist
 * 6. Notify (failures never undo the commit)
 */

import { userInfo } from "node:os";
import { assetIdFromName, defaultAssetPath, parseAssetId } from "./asset-id.js";
import { createMemoryAssetStore } from "./asset-store.js";
import {
  AssetExistsError,
  AssetNotFoundError,
  CapabilityUnavailableError,
  DelegationFailure,
  GatingViolation,
  IllegalTransitionError,
  InvalidAssetIdError,
  TransitionInProgressError,
  errorMessage,
  toError,
} from "./errors.js";
import { evaluateGate, gateFor, type GateContext } from "./gating.js";
import { createLogger } from "./logger.js";
import { canTransition, transitionKey } from "./state-machine.js";
import type {
  AssetId,
  AssetRecord,
  AssetStore,
  Capability,
  CapabilityMap,
  ConfigResolver,
  GateCheck,
  LifecycleManager,
  LifecycleState,
  Logger,
  PluginRegistry,
  TaskId,
  TaskState,
  TransitionEntry,
  TransitionKey,
  TransitionOptions,
  TransitionOutcome,
  TransitionResult,
} from "./types.js";

export interface LifecycleManagerDeps {
  resolver: ConfigResolver;
  registry: PluginRegistry;
  /** Defaults to an in-memory store */
  store?: AssetStore;
  logger?: Logger;
  /** Recorded on history entries when a call names no actor */
  actor?: string;
  now?: () => Date;
}

/** A loaded provider and the plugin it came from */
interface Provider<C extends Capability> {
  plugin: string;
  api: CapabilityMap[C];
}

/** One side-effecting plugin call in a delegation plan */
interface Step {
  plugin: string;
  label: string;
  run(): Promise<void>;
  /** Undo run(); present only when the plugin offers a way to */
  compensate?: () => Promise<void>;
}

/** Ids gathered by steps, linked to the asset on commit */
interface Scratch {
  createdTaskIds: TaskId[];
}

function defaultActor(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env["USER"] ?? "unknown";
  }
}

export function createLifecycleManager(deps: LifecycleManagerDeps): LifecycleManager {
  const { resolver, registry } = deps;
  const store = deps.store ?? createMemoryAssetStore();
  const logger = deps.logger ?? createLogger("lifecycle");
  const now = deps.now ?? (() => new Date());

  const assets = new Map<AssetId, AssetRecord>(store.load().map((r) => [r.id, r]));
  const inFlight = new Set<AssetId>();

  function requireAsset(assetId: AssetId): AssetRecord {
    const asset = assets.get(assetId);
    if (!asset) throw new AssetNotFoundError(assetId);
    return asset;
  }

  function snapshot(asset: AssetRecord): AssetRecord {
    return structuredClone(asset);
  }

  async function persist(): Promise<void> {
    await store.save([...assets.values()]);
  }

  /** Save after a refused or failed transition without masking why it failed */
  async function persistFailure(): Promise<Error | null> {
    try {
      await persist();
      return null;
    } catch (err) {
      const error = toError(err);
      logger.error(`Could not save asset history: ${error.message}`);
      return error;
    }
  }

  function provider<C extends Capability>(capability: C): Provider<C> | null {
    const descriptor = registry.getActive(capability);
    if (!descriptor) return null;
    const api = registry.capability(descriptor, capability);
    return api ? { plugin: descriptor.manifest.name, api } : null;
  }

  function need<C extends Capability>(
    found: Provider<C> | null,
    capability: C,
    key: TransitionKey,
  ): Provider<C> {
    if (!found) throw new CapabilityUnavailableError(capability, key);
    return found;
  }

  function record(
    asset: AssetRecord,
    to: LifecycleState,
    outcome: TransitionOutcome,
    actor: string,
    plugins: string[],
    reason: string | null,
  ): TransitionEntry {
    const entry: TransitionEntry = {
      from: asset.state,
      to,
      timestamp: now(),
      actor,
      plugins,
      outcome,
      reason,
    };
    asset.history.push(entry);
    return entry;
  }

  function taskUpdateStep(
    tasks: Provider<"taskManager"> | null,
    taskIds: () => TaskId[],
    state: TaskState,
  ): Step | null {
    if (!tasks) return null;
    const update = tasks.api.update?.bind(tasks.api);
    if (!update) return null;
    return {
      plugin: tasks.plugin,
      label: `update task to ${state}`,
      async run() {
        for (const id of taskIds()) await update(id, state);
      },
    };
  }

  /**
   * Steps for a transition. Throws CapabilityUnavailableError before any
   * step runs when a required provider is missing.
   */
  function planFor(
    asset: AssetRecord,
    to: LifecycleState,
    options: TransitionOptions,
    scratch: Scratch,
  ): Step[] {
    const key = transitionKey(asset.state, to);
    const files = provider("fileManager");
    const tasks = provider("taskManager");
    const linked = () => [...asset.taskIds, ...scratch.createdTaskIds];
    const steps: Array<Step | null> = [];

    if (to === "rejected") {
      if (asset.taskIds.length > 0) steps.push(taskUpdateStep(tasks, linked, "cancelled"));
      return steps.filter((s): s is Step => s !== null);
    }

    switch (key) {
      case "candidate->in_development": {
        const fm = need(files, "fileManager", key);
        const tm = need(tasks, "taskManager", key);
        const revert = fm.api.revert?.bind(fm.api);
        // Only a checkout this transition took is undone; one the user
        // already held keeps its lock and workspace edits
        let acquired = false;
        steps.push({
          plugin: fm.plugin,
          label: "checkout",
          async run() {
            acquired = await fm.api.checkout(asset.path);
          },
          compensate: revert
            ? async () => {
                if (acquired) await revert(asset.path);
              }
            : undefined,
        });
        if (asset.taskIds.length === 0) {
          const cancel = tm.api.update?.bind(tm.api);
          steps.push({
            plugin: tm.plugin,
            label: "create task",
            async run() {
              const taskId = await tm.api.create({
                title: asset.name,
                description: `Develop ${asset.name} (${asset.path})`,
                assetId: asset.id,
              });
              scratch.createdTaskIds.push(taskId);
            },
            compensate: cancel
              ? async () => {
                  for (const id of scratch.createdTaskIds) await cancel(id, "cancelled");
                }
              : undefined,
          });
          steps.push({
            plugin: tm.plugin,
            label: "link task",
            async run() {
              for (const id of scratch.createdTaskIds) await tm.api.link(asset.id, id);
            },
          });
        }
        steps.push(taskUpdateStep(tm, linked, "in_progress"));
        break;
      }

      case "in_development->review": {
        const fm = need(files, "fileManager", key);
        steps.push({
          plugin: fm.plugin,
          label: "submit",
          async run() {
            await fm.api.submit(asset.path, options.description ?? `${asset.name}: submitted for review`);
          },
        });
        steps.push(taskUpdateStep(tasks, linked, "review"));
        break;
      }

      case "review->production_ready":
        steps.push(taskUpdateStep(tasks, linked, "done"));
        break;

      default:
        break;
    }
    return steps.filter((s): s is Step => s !== null);
  }

  /** Undo completed steps, newest first; returns what could not be undone */
  async function compensate(completed: Step[]): Promise<Error[]> {
    const errors: Error[] = [];
    for (const step of [...completed].reverse()) {
      if (!step.compensate) continue;
      try {
        await step.compensate();
      } catch (err) {
        logger.warn(`Compensation of ${step.plugin} ${step.label} failed: ${errorMessage(err)}`);
        errors.push(toError(err));
      }
    }
    return errors;
  }

  function gateContext(asset: AssetRecord): GateContext {
    return {
      asset: snapshot(asset),
      settings: resolver.getEffectiveConfig().settings,
      taskManager: provider("taskManager")?.api ?? null,
      fileManager: provider("fileManager")?.api ?? null,
    };
  }

  async function check(asset: AssetRecord, to: LifecycleState): Promise<GateCheck> {
    if (!canTransition(asset.state, to)) throw new IllegalTransitionError(asset.id, asset.state, to);
    const key = transitionKey(asset.state, to);
    const rule = gateFor(resolver.getEffectiveConfig().gates, key);
    const outcome = await evaluateGate(rule, gateContext(asset));
    return { transition: key, rule, satisfied: outcome.satisfied, reason: outcome.reason };
  }

  async function notify(asset: AssetRecord, entry: TransitionEntry): Promise<TransitionResult["notificationErrors"]> {
    const errors: TransitionResult["notificationErrors"] = [];
    const project = resolver.getEffectiveConfig().project;
    for (const descriptor of registry.listAvailable("notification")) {
      const notifier = registry.capability(descriptor, "notification");
      if (!notifier) continue;
      try {
        await notifier.notify(
          `${asset.name}: ${entry.from} → ${entry.to}`,
          `${entry.actor} moved ${asset.id} from ${entry.from} to ${entry.to}`,
          {
            assetId: asset.id,
            projectName: project?.name,
            from: entry.from,
            to: entry.to,
            actor: entry.actor,
          },
        );
      } catch (err) {
        const error = toError(err);
        logger.warn(`Notifier ${descriptor.manifest.name} failed: ${error.message}`);
        errors.push({ plugin: descriptor.manifest.name, error });
      }
    }
    return errors;
  }

  async function runTransition(
    asset: AssetRecord,
    to: LifecycleState,
    options: TransitionOptions,
  ): Promise<TransitionResult> {
    const actor = options.actor ?? deps.actor ?? defaultActor();
    const gate = await check(asset, to);

    if (!gate.satisfied) {
      const reason = gate.reason ?? "gate not satisfied";
      record(asset, to, "refused", actor, [], reason);
      const persistError = await persistFailure();
      logger.info(`Refused ${gate.transition} for ${asset.id}: ${reason}`);
      throw new GatingViolation(asset.id, gate.transition, gate.rule, reason, persistError);
    }

    const scratch: Scratch = { createdTaskIds: [] };
    let steps: Step[];
    try {
      steps = planFor(asset, to, options, scratch);
    } catch (err) {
      record(asset, to, "failed", actor, [], errorMessage(err));
      await persistFailure();
      throw err;
    }

    const completed: Step[] = [];
    const plugins: string[] = [];
    for (const step of steps) {
      try {
        await step.run();
      } catch (err) {
        const compensationErrors = await compensate(completed);
        const reason = `${step.plugin} ${step.label} failed: ${errorMessage(err)}`;
        record(asset, to, "failed", actor, [...new Set([...plugins, step.plugin])], reason);
        const persistError = await persistFailure();
        logger.warn(`Transition ${gate.transition} of ${asset.id} failed: ${reason}`);
        throw new DelegationFailure({
          assetId: asset.id,
          transition: gate.transition,
          plugin: step.plugin,
          step: step.label,
          cause: err,
          compensationErrors,
          persistError,
        });
      }
      completed.push(step);
      if (!plugins.includes(step.plugin)) plugins.push(step.plugin);
    }

    const entry = record(asset, to, "applied", actor, plugins, null);
    asset.state = to;
    for (const id of scratch.createdTaskIds) {
      if (!asset.taskIds.includes(id)) asset.taskIds.push(id);
    }
    await persist();
    logger.info(`${asset.id}: ${entry.from} → ${entry.to}`);

    const notificationErrors = await notify(asset, entry);
    return { asset: snapshot(asset), entry: { ...entry, plugins: [...entry.plugins] }, notificationErrors };
  }

  return {
    async createAsset(input) {
      const parsed = parseAssetId(input.id ?? assetIdFromName(input.name));
      if (parsed.version !== null || parsed.changelist !== null) {
        throw new InvalidAssetIdError(parsed.value, "an asset cannot be pinned to a #version or @changelist");
      }
      const id = parsed.value;
      if (assets.has(id)) throw new AssetExistsError(id);

      const asset: AssetRecord = {
        id,
        name: input.name,
        path: input.path ?? defaultAssetPath(parsed),
        assetType: input.assetType ?? null,
        state: "idea",
        taskIds: [...(input.taskIds ?? [])],
        createdAt: now(),
        history: [],
      };
      assets.set(id, asset);
      await persist();
      logger.info(`Created asset ${id}`);
      return snapshot(asset);
    },

    getAsset(assetId) {
      const asset = assets.get(assetId);
      return asset ? snapshot(asset) : null;
    },

    listAssets(state) {
      return [...assets.values()].filter((a) => state === undefined || a.state === state).map(snapshot);
    },

    async linkTask(assetId, taskId) {
      const asset = requireAsset(assetId);
      const tasks = provider("taskManager");
      if (!tasks) throw new CapabilityUnavailableError("taskManager", `linking a task to ${assetId}`);
      try {
        await tasks.api.link(assetId, taskId);
      } catch (err) {
        throw new DelegationFailure({ assetId, transition: null, plugin: tasks.plugin, step: "link", cause: err });
      }
      if (!asset.taskIds.includes(taskId)) {
        asset.taskIds.push(taskId);
        await persist();
      }
      return snapshot(asset);
    },

    async checkTransition(assetId, target) {
      return check(requireAsset(assetId), target);
    },

    async transition(assetId, target, options = {}) {
      const asset = requireAsset(assetId);
      if (inFlight.has(assetId)) throw new TransitionInProgressError(assetId);
      inFlight.add(assetId);
      try {
        return await runTransition(asset, target, options);
      } finally {
        inFlight.delete(assetId);
      }
    },
  };
}
