/**
 * Zod schemas for the Site, User and Project config files — validate parsed
 * YAML against the layer types from types.ts and fill in defaults.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { isTransitionKey } from "./state-machine.js";
import type {
  AssetRecordData,
  Capability,
  ConfigScope,
  GateRule,
  GateRuleInput,
  LayerDataByScope,
  LifecycleState,
  SettingValue,
  TaskState,
  TransitionKey,
} from "./types.js";

export const SettingValueSchema: z.ZodType<SettingValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(SettingValueSchema),
    z.record(SettingValueSchema),
  ]),
);

export const CapabilitySchema = z.enum([
  "application",
  "fileManager",
  "taskManager",
  "service",
  "tool",
  "notification",
]);

export const CAPABILITIES: readonly Capability[] = CapabilitySchema.options;

export function isCapability(value: string): value is Capability {
  return CapabilitySchema.safeParse(value).success;
}

export const CONFIG_SCOPES: readonly ConfigScope[] = ["site", "user", "project"];

export function isConfigScope(value: string): value is ConfigScope {
  return value === "site" || value === "user" || value === "project";
}

const TaskStateSchema: z.ZodType<TaskState> = z.enum([
  "open",
  "in_progress",
  "review",
  "done",
  "cancelled",
]);

const LifecycleStateSchema: z.ZodType<LifecycleState> = z.enum([
  "idea",
  "candidate",
  "in_development",
  "review",
  "production_ready",
  "rejected",
]);

export const GateRuleSchema: z.ZodType<GateRule> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal("none") }),
    z.object({ type: z.literal("linked-task"), states: z.array(TaskStateSchema).optional() }),
    z.object({ type: z.literal("file-submitted") }),
    z.object({
      type: z.literal("setting"),
      key: z.string().min(1),
      equals: SettingValueSchema.optional(),
    }),
    z.object({ type: z.literal("all"), rules: z.array(GateRuleSchema) }),
  ]),
);

export const GateRuleInputSchema: z.ZodType<GateRuleInput> = z.union([
  GateRuleSchema,
  z.enum(["none", "no requirement", "linked-task", "file-submitted"]),
]);

const GatesSchema = z
  .record(z.string(), GateRuleInputSchema)
  .superRefine((gates, ctx) => {
    for (const key of Object.keys(gates)) {
      if (!isTransitionKey(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `"${key}" is not a legal lifecycle transition`,
        });
      }
    }
  })
  .transform((gates) => {
    const result: Partial<Record<TransitionKey, GateRuleInput>> = {};
    for (const [key, rule] of Object.entries(gates)) {
      if (isTransitionKey(key)) result[key] = rule;
    }
    return result;
  });

export const PluginRefSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1).optional(),
  enabled: z.boolean().optional(),
  config: z.record(z.unknown()).optional(),
});

const ActiveSchema = z
  .object({
    application: z.string().min(1).optional(),
    fileManager: z.string().min(1).optional(),
    taskManager: z.string().min(1).optional(),
    service: z.string().min(1).optional(),
    tool: z.string().min(1).optional(),
    notification: z.string().min(1).optional(),
  })
  .strict();

const LayerDataSchema = z.object({
  settings: z.record(SettingValueSchema).default({}),
  plugins: z.array(PluginRefSchema).default([]),
  active: ActiveSchema.default({}),
  gates: GatesSchema.default({}),
  pluginDirs: z.array(z.string().min(1)).default([]),
  savedAt: z.string().nullable().default(null),
});

export const SiteConfigSchema = LayerDataSchema.extend({
  name: z.string().nullable().default(null),
});

export const UserConfigSchema = LayerDataSchema.extend({
  currentProject: z.string().nullable().default(null),
  projects: z.record(z.string()).default({}),
  recentProjects: z.array(z.string()).default([]),
  roles: z.array(z.string()).default([]),
});

const TransitionEntryDataSchema = z.object({
  from: LifecycleStateSchema,
  to: LifecycleStateSchema,
  timestamp: z.string(),
  actor: z.string(),
  plugins: z.array(z.string()).default([]),
  outcome: z.enum(["applied", "failed", "refused"]),
  reason: z.string().nullable().default(null),
});

export const AssetRecordDataSchema: z.ZodType<AssetRecordData, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  path: z.string().min(1),
  assetType: z.string().nullable().default(null),
  state: LifecycleStateSchema,
  taskIds: z.array(z.string()).default([]),
  createdAt: z.string(),
  history: z.array(TransitionEntryDataSchema).default([]),
});

export const ProjectConfigSchema = LayerDataSchema.extend({
  name: z.string().min(1),
  key: z.string().nullable().default(null),
  projectType: z.string().nullable().default(null),
  assetTypes: z.array(z.string()).default([]),
  assets: z.array(AssetRecordDataSchema).default([]),
});

const LAYER_SCHEMAS: {
  [S in ConfigScope]: z.ZodType<LayerDataByScope[S], z.ZodTypeDef, unknown>;
} = {
  site: SiteConfigSchema,
  user: UserConfigSchema,
  project: ProjectConfigSchema,
};

/** Render zod issues as "path: message" lines */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

export type LayerParseResult<S extends ConfigScope> =
  | { success: true; data: LayerDataByScope[S] }
  | { success: false; diagnostic: string };

/** Validate raw (parsed YAML) data for a scope, applying defaults */
export function parseLayerData<S extends ConfigScope>(scope: S, raw: unknown): LayerParseResult<S> {
  const schema: z.ZodType<LayerDataByScope[S], z.ZodTypeDef, unknown> = LAYER_SCHEMAS[scope];
  const result = schema.safeParse(raw ?? {});
  if (result.success) return { success: true, data: result.data };
  return { success: false, diagnostic: formatIssues(result.error) };
}

/**
 * Validate the `config` block a plugin receives. Throws ConfigError naming
 * each offending field; create() lets it propagate so the load fails.
 */
export function parsePluginConfig<T>(
  pluginName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: Record<string, unknown>,
): T {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  throw new ConfigError(`Invalid ${pluginName} plugin config: ${formatIssues(result.error)}`);
}
