/**
 * Config file I/O: where each layer lives, reading and validating YAML,
 * and atomic writes.
 */

import { accessSync, constants, existsSync, readFileSync, statSync } from "node:fs";
import { mkdir, rename, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { basename, dirname, join, resolve } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { parseLayerData } from "./config-schema.js";
import { CONFIG_DIR_NAME, ENV, PROJECT_CONFIG_FILE, USER_CONFIG_FILE } from "./constants.js";
import { ConfigError, ConfigParseError, errorMessage } from "./errors.js";
import type { ConfigKey, ConfigScope, LayerDataByScope } from "./types.js";

export interface LayerLocation {
  key: ConfigKey;
  path: string | null;
}

export function siteLocation(env: Record<string, string | undefined>): LayerLocation {
  const raw = env[ENV.SITE_CONFIG];
  if (!raw) return { key: "site:<unset>", path: null };
  const path = resolve(raw);
  return { key: `site:${path}`, path };
}

export function userLocation(
  env: Record<string, string | undefined>,
  homeDir: string = homedir(),
): LayerLocation {
  const dir = resolve(env[ENV.USER_DIR] ?? join(homeDir, CONFIG_DIR_NAME));
  return { key: `user:${dir}`, path: join(dir, USER_CONFIG_FILE) };
}

export function projectLocation(rootDir: string): LayerLocation {
  const root = resolve(rootDir);
  return { key: `project:${root}`, path: join(root, CONFIG_DIR_NAME, PROJECT_CONFIG_FILE) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Fresh data for a layer whose file does not exist yet */
export function defaultLayerData<S extends ConfigScope>(
  scope: S,
  seed: Record<string, unknown> = {},
): LayerDataByScope[S] {
  const result = parseLayerData(scope, seed);
  if (!result.success) {
    throw new ConfigError(`Invalid ${scope} config defaults: ${result.diagnostic}`);
  }
  return result.data;
}

export interface ReadLayerResult<S extends ConfigScope> {
  data: LayerDataByScope[S];
  persisted: boolean;
}

/**
 * Read and validate a layer file. A missing file yields defaults; an
 * unreadable, unparsable or invalid one throws ConfigParseError.
 *
 * `seed` fills fields the file may omit (the project name).
 */
export function readLayerFile<S extends ConfigScope>(
  scope: S,
  path: string,
  seed: Record<string, unknown> = {},
): ReadLayerResult<S> {
  if (!existsSync(path)) {
    return { data: defaultLayerData(scope, seed), persisted: false };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigParseError(path, errorMessage(err), { cause: err });
  }

  // Empty file parses to null
  const input = raw === null || raw === undefined ? {} : raw;
  const seeded = isRecord(input) ? { ...seed, ...input } : input;

  const result = parseLayerData(scope, seeded);
  if (!result.success) throw new ConfigParseError(path, result.diagnostic);
  return { data: result.data, persisted: true };
}

/** Write a layer file via a temp file and rename, so readers never see a partial file. */
export async function writeLayerFile(path: string, data: object): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, stringifyYaml(data, { indent: 2 }), "utf-8");
  await rename(tmp, path);
}

/** Project name used when project.yaml does not set one */
export function defaultProjectName(rootDir: string): string {
  return basename(resolve(rootDir));
}

/** Whether a layer file (or, if absent, its directory) can be written */
export function isWritable(path: string): boolean {
  let target = path;
  while (!existsSync(target)) {
    const parent = dirname(target);
    if (parent === target) return false;
    target = parent;
  }
  // Nothing can be created beneath a regular file
  if (target !== path && !statSync(target).isDirectory()) return false;
  try {
    accessSync(target, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}
