import { stem } from "../fs/pathUtils.js";
import { sortStrings } from "../util/stableSort.js";
import { isRelativeImport } from "./resolveImport.js";
import type { ModuleTable } from "./types.js";

/**
 * Names an absolute import may start with to count as internal: the top-level
 * directory of every nested module and the stem of every root-level module.
 */
export function internalRoots(table: ModuleTable): Set<string> {
  const roots = new Set<string>();
  for (const id of table.keys()) {
    const slash = id.indexOf("/");
    roots.add(slash < 0 ? stem(id) : id.slice(0, slash));
  }
  return roots;
}

export function isExternalImport(imp: string, roots: ReadonlySet<string>): boolean {
  if (isRelativeImport(imp)) return false;
  const root = imp.split(".")[0] ?? imp;
  return !roots.has(root);
}

/** Sorted, deduplicated external import strings across all modules. */
export function collectExternalImports(table: ModuleTable): string[] {
  const roots = internalRoots(table);
  const external = new Set<string>();
  for (const record of table.values()) {
    for (const imp of record.imports) {
      if (isExternalImport(imp, roots)) external.add(imp);
    }
  }
  return sortStrings(external);
}

/** Relative and internal absolute import strings across all modules, sorted. */
export function collectInternalImports(table: ModuleTable): string[] {
  const roots = internalRoots(table);
  const internal = new Set<string>();
  for (const record of table.values()) {
    for (const imp of record.imports) {
      if (!isExternalImport(imp, roots)) internal.add(imp);
    }
  }
  return sortStrings(internal);
}
