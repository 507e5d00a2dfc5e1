import { spawn } from "node:child_process";
import { access, constants, stat } from "node:fs/promises";
import { delimiter, isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import {
  parsePluginConfig,
  type Application,
  type PluginContext,
  type PluginInstance,
  type PluginModule,
} from "@greenlight/core";

export const manifest = {
  name: "exec-app",
  version: "0.1.0",
  description: "Application plugin: launch an executable found on PATH",
  vendor: "greenlight",
  capabilities: ["application"] as const,
};

const ConfigSchema = z.object({
  /** Command name looked up on PATH, or a path to the executable */
  executable: z.string().min(1),
  /** Prepended to every launch */
  args: z.array(z.string()).default([]),
  /** Extra environment for the launched application */
  env: z.record(z.string()).default({}),
});

/** Tells the launched application which project it works in */
export const PROJECT_ROOT_VAR = "GREENLIGHT_PROJECT_ROOT";

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function definedEnv(source: NodeJS.ProcessEnv): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

function executableNames(name: string): string[] {
  if (process.platform !== "win32") return [name];
  const extensions = (process.env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";").filter(Boolean);
  return [name, ...extensions.map((ext) => `${name}${ext.toLowerCase()}`)];
}

export function create(context: PluginContext): PluginInstance {
  const config = parsePluginConfig(manifest.name, ConfigSchema, context.config);
  const log = context.logger;
  const { executable } = config;

  async function find(): Promise<string | null> {
    if (isAbsolute(executable) || executable.includes("/") || executable.includes("\\")) {
      const path = resolve(context.projectRoot ?? process.cwd(), executable);
      return (await isExecutable(path)) ? path : null;
    }
    const dirs = (process.env.PATH ?? "").split(delimiter).filter(Boolean);
    for (const dir of dirs) {
      for (const name of executableNames(executable)) {
        const candidate = join(dir, name);
        if (await isExecutable(candidate)) return candidate;
      }
    }
    return null;
  }

  function setupEnv(env: Record<string, string>): Record<string, string> {
    const result = { ...env, ...config.env };
    if (context.projectRoot !== null) result[PROJECT_ROOT_VAR] = context.projectRoot;
    return result;
  }

  const application: Application = {
    name: manifest.name,
    find,
    setupEnv,

    async launch(args, options) {
      const command = await find();
      if (command === null) throw new Error(`executable not found: ${executable}`);

      const fullArgs = [...config.args, ...args];
      const env = setupEnv({ ...definedEnv(process.env), ...options?.env });
      const child = spawn(command, fullArgs, {
        cwd: options?.cwd ?? context.projectRoot ?? undefined,
        env,
        detached: true,
        stdio: "ignore",
      });

      await new Promise<void>((resolvePromise, reject) => {
        child.once("spawn", () => resolvePromise());
        child.once("error", reject);
      });
      child.unref();

      log.info(`Launched ${command} (pid ${child.pid ?? "unknown"})`);
      return { pid: child.pid ?? null, command, args: fullArgs };
    },
  };

  return {
    capabilities: { application },

    async load() {
      const path = await find();
      if (path === null) throw new Error(`executable not found: ${executable}`);
      log.debug(`Using ${path}`);
    },
  };
}

export default { manifest, create } satisfies PluginModule;
