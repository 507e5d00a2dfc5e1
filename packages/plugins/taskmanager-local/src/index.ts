import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";
import {
  formatIssues,
  parsePluginConfig,
  type PluginContext,
  type PluginInstance,
  type PluginModule,
  type TaskManager,
} from "@greenlight/core";

export const manifest = {
  name: "local-tasks",
  version: "0.1.0",
  description: "Task manager plugin: tasks kept in a YAML file",
  vendor: "greenlight",
  capabilities: ["taskManager"] as const,
};

const ConfigSchema = z.object({
  /** Task file; defaults to <project>/.greenlight/tasks.yaml */
  file: z.string().min(1).optional(),
});

const TaskStateSchema = z.enum(["open", "in_progress", "review", "done", "cancelled"]);

const TaskSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().default(""),
  assetIds: z.array(z.string()).default([]),
  assignee: z.string().nullable().default(null),
  state: TaskStateSchema,
});

const TaskFileSchema = z.object({
  nextId: z.number().int().min(1).default(1),
  tasks: z.array(TaskSchema).default([]),
});
type TaskFile = z.infer<typeof TaskFileSchema>;
type Task = z.infer<typeof TaskSchema>;

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function create(context: PluginContext): PluginInstance {
  const config = parsePluginConfig(manifest.name, ConfigSchema, context.config);
  const log = context.logger;

  const configured = config.file !== undefined
    ? isAbsolute(config.file) ? config.file : resolve(context.projectRoot ?? process.cwd(), config.file)
    : null;

  function taskFile(): string {
    const file = configured ?? (context.projectRoot !== null ? join(context.projectRoot, ".greenlight", "tasks.yaml") : null);
    if (file === null) throw new Error("no task file: set `file` in the plugin config or open a project");
    return file;
  }

  async function read(): Promise<TaskFile> {
    const file = taskFile();
    let text: string;
    try {
      text = await readFile(file, "utf-8");
    } catch (err) {
      if (isMissing(err)) return { nextId: 1, tasks: [] };
      throw err;
    }
    const result = TaskFileSchema.safeParse(parse(text) ?? {});
    if (!result.success) throw new Error(`${file}: ${formatIssues(result.error)}`);
    return result.data;
  }

  async function write(data: TaskFile): Promise<void> {
    const file = taskFile();
    await mkdir(dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.tmp`;
    await writeFile(tmp, stringify(data), "utf-8");
    await rename(tmp, file);
  }

  // Read-modify-write cycles run one at a time
  let queue: Promise<unknown> = Promise.resolve();
  function mutate<T>(recipe: (data: TaskFile) => T): Promise<T> {
    const run = queue.then(async () => {
      const data = await read();
      const result = recipe(data);
      await write(data);
      return result;
    });
    // The caller of a failed run gets the rejection
    queue = run.catch(() => undefined);
    return run;
  }

  function find(data: TaskFile, taskId: string): Task {
    const task = data.tasks.find((t) => t.id === taskId);
    if (!task) throw new Error(`unknown task ${taskId}`);
    return task;
  }

  const taskManager: TaskManager = {
    name: manifest.name,

    async create(spec) {
      const id = await mutate((data) => {
        const taskId = `TASK-${data.nextId}`;
        data.nextId += 1;
        data.tasks.push({
          id: taskId,
          title: spec.title,
          description: spec.description ?? "",
          assetIds: [spec.assetId],
          assignee: spec.assignee ?? null,
          state: "open",
        });
        return taskId;
      });
      log.info(`Created ${id}: ${spec.title}`);
      return id;
    },

    async link(assetId, taskId) {
      await mutate((data) => {
        const task = find(data, taskId);
        if (!task.assetIds.includes(assetId)) task.assetIds.push(assetId);
      });
    },

    async status(taskId) {
      return find(await read(), taskId).state;
    },

    async update(taskId, state) {
      await mutate((data) => {
        find(data, taskId).state = state;
      });
      log.debug(`${taskId} → ${state}`);
    },
  };

  return {
    capabilities: { taskManager },

    async load() {
      await read();
      log.debug(`Tasks in ${taskFile()}`);
    },
  };
}

export default { manifest, create } satisfies PluginModule;
