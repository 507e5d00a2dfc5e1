/**
 * Asset ids — `scope::relative/path`, unique per project.
 *
 *   hero_sword::                 an asset
 *   hero_sword:blade::           a sub-asset
 *   hero_sword::model/blade.usd  a file of the asset
 *
 * The scope is one or more prim names joined by single colons. The part
 * after "::" may end in `#<version>` or `@<changelist>`, never both.
 */

import { InvalidAssetIdError } from "./errors.js";
import type { AssetId } from "./types.js";

const PRIM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SUFFIX = /^([^#@]*)(?:#(\d+)|@(\d+))$/;

export interface ParsedAssetId {
  /** The id as given, trimmed */
  readonly value: AssetId;
  readonly segments: readonly string[];
  /** Text after "::" without its suffix */
  readonly path: string;
  readonly version: number | null;
  readonly changelist: number | null;
  /** The scope on its own, e.g. "hero_sword:blade::" */
  readonly scope: AssetId;
}

export function parseAssetId(raw: string): ParsedAssetId {
  const value = raw.trim();
  const separator = value.indexOf("::");
  if (separator === -1) throw new InvalidAssetIdError(value, 'missing "::" separator');

  const prefix = value.slice(0, separator);
  const rest = value.slice(separator + 2);
  if (prefix.length === 0) throw new InvalidAssetIdError(value, 'empty scope before "::"');

  const segments = prefix.split(":");
  for (const [index, segment] of segments.entries()) {
    if (segment.length === 0) {
      throw new InvalidAssetIdError(value, `scope segment ${index} is empty`);
    }
    if (!PRIM_NAME.test(segment)) {
      throw new InvalidAssetIdError(value, `scope segment "${segment}" must match [A-Za-z_][A-Za-z0-9_]*`);
    }
  }

  let path = rest;
  let version: number | null = null;
  let changelist: number | null = null;
  const hasVersion = rest.includes("#");
  const hasChangelist = rest.includes("@");
  if (hasVersion && hasChangelist) {
    throw new InvalidAssetIdError(value, "use either #version or @changelist, not both");
  }
  if (hasVersion || hasChangelist) {
    const match = SUFFIX.exec(rest);
    if (!match) throw new InvalidAssetIdError(value, "# and @ must be followed by digits only");
    path = match[1] ?? "";
    version = match[2] !== undefined ? Number(match[2]) : null;
    changelist = match[3] !== undefined ? Number(match[3]) : null;
  }

  return { value, segments, path, version, changelist, scope: `${prefix}::` };
}

export function isAssetId(raw: string): boolean {
  try {
    parseAssetId(raw);
    return true;
  } catch (err) {
    if (err instanceof InvalidAssetIdError) return false;
    throw err;
  }
}

/** "Hero Sword" → "hero_sword::" */
export function assetIdFromName(name: string): AssetId {
  const prim = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (prim.length === 0) throw new InvalidAssetIdError(name, "the name has no letters or digits to derive an id from");
  return `${/^\d/.test(prim) ? `_${prim}` : prim}::`;
}

/** Default versioned path: "hero_sword:blade::model/blade.usd" → "assets/hero_sword/blade/model/blade.usd" */
export function defaultAssetPath(id: ParsedAssetId): string {
  return ["assets", ...id.segments, ...(id.path.length > 0 ? [id.path] : [])].join("/");
}
