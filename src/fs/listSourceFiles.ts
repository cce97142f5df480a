import { readdirSync } from "fs";
import { join, resolve } from "path";
import { ModuleReadError } from "../util/errors.js";
import { sortStrings } from "../util/stableSort.js";

const SKIP_DIRS = new Set(["node_modules", "__pycache__"]);

/**
 * Depth-first listing of source files under `root`, entries of each directory in
 * sorted order. The returned order is the run's discovery order.
 */
export function listSourceFiles(root: string, extensions: readonly string[]): string[] {
  const absRoot = resolve(root);
  const out: string[] = [];

  function walk(dir: string): void {
    let names: string[];
    const dirs = new Set<string>();
    try {
      const entries = readdirSync(dir, { withFileTypes: true });
      names = sortStrings(entries.map((e) => e.name));
      for (const e of entries) {
        if (e.isDirectory()) dirs.add(e.name);
      }
    } catch (err) {
      throw new ModuleReadError(dir, err);
    }

    for (const name of names) {
      if (name.startsWith(".")) continue;
      const abs = join(dir, name);
      if (dirs.has(name)) {
        if (!SKIP_DIRS.has(name)) walk(abs);
      } else if (extensions.some((ext) => name.endsWith(ext))) {
        out.push(abs);
      }
    }
  }

  walk(absRoot);
  return out;
}
