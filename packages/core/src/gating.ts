import { isDeepStrictEqual } from "node:util";
import { errorMessage } from "./errors.js";
import type {
  AssetRecord,
  FileManager,
  GateRule,
  GateRuleInput,
  SettingValue,
  TaskManager,
  TaskState,
  TransitionKey,
} from "./types.js";

const NO_REQUIREMENT: GateRule = { type: "none" };

/** Expand shorthand strings into rule objects */
export function normalizeGateRule(input: GateRuleInput): GateRule {
  switch (input) {
    case "none":
    case "no requirement":
      return NO_REQUIREMENT;
    case "linked-task":
      return { type: "linked-task" };
    case "file-submitted":
      return { type: "file-submitted" };
    default:
      return input;
  }
}

/**
 * Rules applied when no config layer overrides a transition. A legal
 * transition missing here has no requirement.
 */
export const DEFAULT_GATES: Readonly<Partial<Record<TransitionKey, GateRule>>> = {
  "idea->candidate": NO_REQUIREMENT,
  "idea->rejected": NO_REQUIREMENT,
  "candidate->in_development": NO_REQUIREMENT,
  "candidate->rejected": NO_REQUIREMENT,
  "in_development->review": { type: "linked-task" },
  "review->production_ready": { type: "linked-task", states: ["review", "done"] },
};

/** Rule for a transition in a merged gate table */
export function gateFor(gates: Partial<Record<TransitionKey, GateRule>>, key: TransitionKey): GateRule {
  return gates[key] ?? NO_REQUIREMENT;
}

/** Read-only view of the world a gate may consult */
export interface GateContext {
  asset: AssetRecord;
  settings: Record<string, SettingValue>;
  taskManager: TaskManager | null;
  fileManager: FileManager | null;
}

export interface GateOutcome {
  satisfied: boolean;
  reason: string | null;
}

const PASS: GateOutcome = { satisfied: true, reason: null };

function refuse(reason: string): GateOutcome {
  return { satisfied: false, reason };
}

function describeStates(states: TaskState[]): string {
  return states.map((s) => `"${s}"`).join(" or ");
}

/**
 * Evaluate a rule. Only queries plugins (status, history); never mutates.
 * Query errors refuse the gate with the plugin's message.
 */
export async function evaluateGate(rule: GateRule, ctx: GateContext): Promise<GateOutcome> {
  switch (rule.type) {
    case "none":
      return PASS;

    case "linked-task": {
      if (ctx.asset.taskIds.length === 0) return refuse("no linked task");
      const states = rule.states;
      if (!states || states.length === 0) return PASS;
      if (!ctx.taskManager) return refuse("no active taskManager plugin to check task state");

      for (const taskId of ctx.asset.taskIds) {
        let state: TaskState;
        try {
          state = await ctx.taskManager.status(taskId);
        } catch (err) {
          return refuse(`status of task ${taskId} unavailable: ${errorMessage(err)}`);
        }
        if (!states.includes(state)) {
          return refuse(`task ${taskId} is "${state}", expected ${describeStates(states)}`);
        }
      }
      return PASS;
    }

    case "file-submitted": {
      if (!ctx.fileManager) return refuse("no active fileManager plugin to check revisions");
      let count: number;
      try {
        count = (await ctx.fileManager.history(ctx.asset.path)).length;
      } catch (err) {
        return refuse(`history of ${ctx.asset.path} unavailable: ${errorMessage(err)}`);
      }
      return count > 0 ? PASS : refuse(`no submitted revision of ${ctx.asset.path}`);
    }

    case "setting": {
      if (!Object.hasOwn(ctx.settings, rule.key)) {
        return refuse(`setting "${rule.key}" is not configured`);
      }
      const value = ctx.settings[rule.key];
      if (rule.equals !== undefined) {
        return isDeepStrictEqual(value, rule.equals)
          ? PASS
          : refuse(`setting "${rule.key}" is ${JSON.stringify(value)}, expected ${JSON.stringify(rule.equals)}`);
      }
      return value === false || value === null ? refuse(`setting "${rule.key}" is not enabled`) : PASS;
    }

    case "all":
      for (const inner of rule.rules) {
        const outcome = await evaluateGate(inner, ctx);
        if (!outcome.satisfied) return outcome;
      }
      return PASS;
  }
}

/** One-line rendering for CLI output and history reasons */
export function describeGateRule(rule: GateRule): string {
  switch (rule.type) {
    case "none":
      return "no requirement";
    case "linked-task":
      return rule.states && rule.states.length > 0
        ? `linked task in ${describeStates(rule.states)}`
        : "linked task";
    case "file-submitted":
      return "submitted file";
    case "setting":
      return rule.equals === undefined
        ? `setting ${rule.key}`
        : `setting ${rule.key} = ${JSON.stringify(rule.equals)}`;
    case "all":
      return rule.rules.map(describeGateRule).join(" and ");
  }
}
