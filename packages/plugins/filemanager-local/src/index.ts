import { copyFile, mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve, sep } from "node:path";
import { userInfo } from "node:os";
import { parse, stringify } from "yaml";
import { z } from "zod";
import {
  formatIssues,
  parsePluginConfig,
  type FileManager,
  type PluginContext,
  type PluginInstance,
  type PluginModule,
  type Revision,
} from "@greenlight/core";

export const manifest = {
  name: "local-files",
  version: "0.1.0",
  description: "File manager plugin: local revision depot with exclusive checkouts",
  vendor: "greenlight",
  capabilities: ["fileManager"] as const,
};

const ConfigSchema = z.object({
  /** Depot directory; defaults to <project>/.greenlight/depot */
  root: z.string().min(1).optional(),
  /** Where checked-out files live; defaults to the project root */
  workspace: z.string().min(1).optional(),
  author: z.string().min(1).optional(),
});

const HISTORY_FILE = "history.yaml";
const LOCK_FILE = "lock.yaml";

const RevisionEntrySchema = z.object({
  id: z.string(),
  description: z.string(),
  author: z.string(),
  timestamp: z.string(),
});
type RevisionEntry = z.infer<typeof RevisionEntrySchema>;

const HistorySchema = z.array(RevisionEntrySchema);

const LockSchema = z.object({
  author: z.string(),
  since: z.string(),
});
type Lock = z.infer<typeof LockSchema>;

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function isDirectory(path: string): Promise<boolean> {
  return stat(path).then(
    (info) => info.isDirectory(),
    () => false,
  );
}

async function isFile(path: string): Promise<boolean> {
  return stat(path).then(
    (info) => info.isFile(),
    () => false,
  );
}

async function readYaml<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
  const result = schema.safeParse(parse(text));
  if (!result.success) throw new Error(`${file}: ${formatIssues(result.error)}`);
  return result.data;
}

async function writeYaml(file: string, data: unknown): Promise<void> {
  const tmp = `${file}.${process.pid}.tmp`;
  await writeFile(tmp, stringify(data), "utf-8");
  await rename(tmp, file);
}

/** Resolve a relative asset path under base, refusing paths that climb out of it */
function inside(base: string, path: string, what: string): string {
  const target = resolve(base, path);
  if (target === base || !target.startsWith(base + sep)) {
    throw new Error(`path escapes the ${what}: ${path}`);
  }
  return target;
}

function resolveFrom(base: string | null, path: string): string {
  return isAbsolute(path) ? path : resolve(base ?? process.cwd(), path);
}

function toRevision(path: string, entry: RevisionEntry): Revision {
  return {
    id: entry.id,
    path,
    description: entry.description,
    author: entry.author,
    timestamp: new Date(entry.timestamp),
  };
}

/**
 * Each versioned path gets a directory in the depot holding its numbered
 * revisions (r1, r2, …), a history.yaml and, while checked out, a lock.yaml.
 */
export function create(context: PluginContext): PluginInstance {
  const config = parsePluginConfig(manifest.name, ConfigSchema, context.config);
  const log = context.logger;

  const configuredRoot = config.root !== undefined ? resolveFrom(context.projectRoot, config.root) : null;
  const defaultRoot = context.projectRoot !== null ? join(context.projectRoot, ".greenlight", "depot") : null;
  const workspace = config.workspace !== undefined
    ? resolveFrom(context.projectRoot, config.workspace)
    : (context.projectRoot ?? process.cwd());
  const author = config.author ?? userInfo().username;

  function depotRoot(): string {
    const root = configuredRoot ?? defaultRoot;
    if (root === null) throw new Error("no depot root: set `root` in the plugin config or open a project");
    return root;
  }

  const entryDir = (path: string) => inside(depotRoot(), path, "depot");
  const workspaceFile = (path: string) => inside(workspace, path, "workspace");
  const revisionFile = (entry: string, id: string) => join(entry, `r${id}`);

  async function readHistory(entry: string): Promise<RevisionEntry[]> {
    return (await readYaml(join(entry, HISTORY_FILE), HistorySchema)) ?? [];
  }

  async function readLock(entry: string): Promise<Lock | null> {
    return readYaml(join(entry, LOCK_FILE), LockSchema);
  }

  async function restore(entry: string, path: string, id: string): Promise<void> {
    const target = workspaceFile(path);
    await mkdir(dirname(target), { recursive: true });
    await copyFile(revisionFile(entry, id), target);
  }

  async function assertNotLockedByOther(entry: string, path: string): Promise<Lock | null> {
    const lock = await readLock(entry);
    if (lock && lock.author !== author) throw new Error(`${path} is checked out by ${lock.author}`);
    return lock;
  }

  const fileManager: FileManager = {
    name: manifest.name,

    async checkout(path) {
      const entry = entryDir(path);
      const lock = await assertNotLockedByOther(entry, path);
      if (lock) return false;

      await mkdir(entry, { recursive: true });
      await writeYaml(join(entry, LOCK_FILE), { author, since: new Date().toISOString() });
      const latest = (await readHistory(entry)).at(-1);
      if (latest) await restore(entry, path, latest.id);
      log.info(`Checked out ${path}${latest ? ` at revision ${latest.id}` : ""}`);
      return true;
    },

    async submit(path, description) {
      const entry = entryDir(path);
      const lock = await readLock(entry);
      if (!lock || lock.author !== author) throw new Error(`${path} is not checked out by ${author}`);

      const source = workspaceFile(path);
      if (!(await isFile(source))) throw new Error(`nothing to submit: ${source} does not exist`);

      const history = await readHistory(entry);
      const timestamp = new Date();
      const record: RevisionEntry = {
        id: String(history.length + 1),
        description,
        author,
        timestamp: timestamp.toISOString(),
      };
      await copyFile(source, revisionFile(entry, record.id));
      await writeYaml(join(entry, HISTORY_FILE), [...history, record]);
      await rm(join(entry, LOCK_FILE), { force: true });

      log.info(`Submitted ${path} revision ${record.id}`);
      return toRevision(path, record);
    },

    async history(path) {
      const entries = await readHistory(entryDir(path));
      return entries.map((entry) => toRevision(path, entry));
    },

    async add(paths) {
      for (const path of paths) {
        const entry = entryDir(path);
        await mkdir(entry, { recursive: true });
        if ((await readYaml(join(entry, HISTORY_FILE), HistorySchema)) === null) {
          await writeYaml(join(entry, HISTORY_FILE), []);
        }
      }
    },

    async getLatest(path) {
      const entry = entryDir(path);
      const latest = (await readHistory(entry)).at(-1);
      if (!latest) throw new Error(`${path} has no revisions`);
      await restore(entry, path, latest.id);
    },

    async revert(path) {
      const entry = entryDir(path);
      const lock = await assertNotLockedByOther(entry, path);
      if (!lock) return;
      await rm(join(entry, LOCK_FILE), { force: true });
      const latest = (await readHistory(entry)).at(-1);
      if (latest) await restore(entry, path, latest.id);
      log.info(`Reverted ${path}`);
    },
  };

  return {
    capabilities: { fileManager },

    async load() {
      if (configuredRoot !== null) {
        if (!(await isDirectory(configuredRoot))) throw new Error(`depot root unreachable: ${configuredRoot}`);
      } else {
        await mkdir(depotRoot(), { recursive: true });
      }
      log.debug(`Depot at ${depotRoot()}, workspace ${workspace}`);
    },
  };
}

export default { manifest, create } satisfies PluginModule;
