/**
 * Helpers over root-relative module paths, which always use forward slashes.
 */

/** Directory part of a root-relative module path ("" for root-level modules). */
export function relDirname(relPath: string): string {
  const i = relPath.lastIndexOf("/");
  return i < 0 ? "" : relPath.slice(0, i);
}

/** File name without its final extension. */
export function stem(relPath: string): string {
  const base = relPath.slice(relPath.lastIndexOf("/") + 1);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

export function joinRel(...parts: string[]): string {
  return parts.filter((p) => p !== "").join("/");
}
