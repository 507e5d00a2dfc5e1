/**
 * Plugin discovery — find candidate modules in search directories and pull
 * plugin modules out of whatever they export.
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import { CapabilitySchema, formatIssues } from "./config-schema.js";
import { errorMessage } from "./errors.js";
import type { DiscoveryFailure, PluginModule } from "./types.js";

/** Imports a module by specifier (package name or file URL) */
export type ImportFn = (specifier: string) => Promise<unknown>;

export const defaultImportFn: ImportFn = (specifier) => import(specifier);

const PluginManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string(),
  vendor: z.string().optional(),
  capabilities: z.array(CapabilitySchema).min(1),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Why `value` is not a plugin module, or null when it is one */
function pluginModuleProblem(value: unknown): string | null {
  if (!isRecord(value)) return "not an object";
  const manifest = PluginManifestSchema.safeParse(value["manifest"]);
  if (!manifest.success) return `invalid manifest: ${formatIssues(manifest.error)}`;
  if (typeof value["create"] !== "function") return "missing create() function";
  return null;
}

export function isPluginModule(value: unknown): value is PluginModule {
  return pluginModuleProblem(value) === null;
}

export interface ExtractedModules {
  modules: PluginModule[];
  problems: string[];
}

/**
 * Read the entry point of an imported module: a default-exported plugin
 * module, or a `plugins` array of them.
 */
export function extractPluginModules(namespace: unknown): ExtractedModules {
  const modules: PluginModule[] = [];
  const problems: string[] = [];
  if (!isRecord(namespace)) {
    return { modules, problems: ["module did not evaluate to an object"] };
  }

  const candidates: Array<{ label: string; value: unknown }> = [];
  if (namespace["default"] !== undefined) {
    candidates.push({ label: "default export", value: namespace["default"] });
  }
  const list = namespace["plugins"];
  if (Array.isArray(list)) {
    list.forEach((value: unknown, index) => candidates.push({ label: `plugins[${index}]`, value }));
  } else if (list !== undefined) {
    problems.push("`plugins` export is not an array");
  }

  if (candidates.length === 0 && problems.length === 0) {
    problems.push("no plugin entry point (expected a default export or a `plugins` array)");
  }

  for (const { label, value } of candidates) {
    const problem = pluginModuleProblem(value);
    if (problem !== null) {
      problems.push(`${label}: ${problem}`);
    } else if (isPluginModule(value)) {
      modules.push(value);
    }
  }
  return { modules, problems };
}

const MODULE_EXTENSIONS = new Set([".js", ".mjs"]);
const DIRECTORY_ENTRIES = ["index.mjs", "index.js"];

export interface ScanResult {
  /** Absolute file paths of module entry points, sorted by entry name */
  candidates: string[];
  failures: DiscoveryFailure[];
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/** Entry file of a plugin directory: package.json "main", else index.mjs / index.js */
async function resolveDirectoryEntry(dir: string): Promise<string | null> {
  const pkgPath = join(dir, "package.json");
  if (await isFile(pkgPath)) {
    const pkg: unknown = JSON.parse(await readFile(pkgPath, "utf-8"));
    if (isRecord(pkg) && typeof pkg["main"] === "string") return join(dir, pkg["main"]);
  }
  for (const name of DIRECTORY_ENTRIES) {
    const entry = join(dir, name);
    if (await isFile(entry)) return entry;
  }
  return null;
}

/**
 * Non-recursive scan of one search directory. A directory that does not
 * exist yields nothing; other read errors become failures.
 */
export async function scanPluginDir(dir: string): Promise<ScanResult> {
  const result: ScanResult = { candidates: [], failures: [] };

  let entries: string[];
  try {
    entries = (await readdir(dir)).sort();
  } catch (err) {
    if (isRecord(err) && err["code"] === "ENOENT") return result;
    result.failures.push({ path: dir, reason: `cannot read directory: ${errorMessage(err)}` });
    return result;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry);
    try {
      const info = await stat(fullPath);
      if (info.isFile()) {
        if (MODULE_EXTENSIONS.has(extname(entry))) result.candidates.push(fullPath);
        continue;
      }
      if (!info.isDirectory()) continue;
      const entryFile = await resolveDirectoryEntry(fullPath);
      if (entryFile !== null) result.candidates.push(entryFile);
    } catch (err) {
      result.failures.push({ path: fullPath, reason: errorMessage(err) });
    }
  }
  return result;
}

/** Specifier for importing a candidate file */
export function fileSpecifier(path: string): string {
  return pathToFileURL(path).href;
}
