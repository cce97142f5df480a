import { joinRel, relDirname } from "../fs/pathUtils.js";
import type { ModuleID } from "./types.js";

export type ResolveKind = "relative" | "absolute" | "external" | "unresolved";

export interface ResolveResult {
  targets: ModuleID[];
  kind: ResolveKind;
}

export interface ResolveContext {
  /** Known module ids, discovery order. */
  moduleIds: readonly ModuleID[];
  /** Extension appended to dotted paths, e.g. ".py". */
  extension: string;
  /** Stem of a package's index module, e.g. "__init__". */
  indexModule: string;
}

export function isRelativeImport(imp: string): boolean {
  return imp.startsWith(".");
}

function leadingDots(imp: string): number {
  let n = 0;
  while (n < imp.length && imp[n] === ".") n++;
  return n;
}

function dottedToPath(dotted: string): string {
  return dotted.split(".").filter((p) => p !== "").join("/");
}

/**
 * Candidate path for a relative import from a module in `fromDir`. One dot is
 * `fromDir` itself; each extra dot climbs one directory. Null when the import
 * climbs above the scan root.
 */
export function relativeCandidate(
  fromDir: string,
  imp: string,
  ctx: Pick<ResolveContext, "extension" | "indexModule">,
): string | null {
  const dots = leadingDots(imp);
  const parts = fromDir === "" ? [] : fromDir.split("/");
  const up = dots - 1;
  if (up > parts.length) return null;

  const base = parts.slice(0, parts.length - up).join("/");
  const rest = dottedToPath(imp.slice(dots));
  if (rest === "") return joinRel(base, ctx.indexModule + ctx.extension);
  return joinRel(base, rest + ctx.extension);
}

function endsWithSegment(relPath: string, suffix: string): boolean {
  return relPath === suffix || relPath.endsWith("/" + suffix);
}

/**
 * Resolve one import string of module `fromId` against the known modules.
 * Total: never throws; anything unmatched is external or unresolved.
 */
export function resolveImport(fromId: ModuleID, imp: string, ctx: ResolveContext): ResolveResult {
  if (isRelativeImport(imp)) {
    const candidate = relativeCandidate(relDirname(fromId), imp, ctx);
    if (candidate === null) return { targets: [], kind: "unresolved" };
    const hit = ctx.moduleIds.includes(candidate);
    return hit ? { targets: [candidate], kind: "relative" } : { targets: [], kind: "unresolved" };
  }

  const path = dottedToPath(imp);
  if (path === "") return { targets: [], kind: "external" };
  const asModule = path + ctx.extension;
  const asPackage = joinRel(path, ctx.indexModule + ctx.extension);

  const targets = ctx.moduleIds.filter(
    (id) => endsWithSegment(id, asModule) || endsWithSegment(id, asPackage),
  );
  return targets.length > 0 ? { targets, kind: "absolute" } : { targets: [], kind: "external" };
}
