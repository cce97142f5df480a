import { assertText } from "../util/errors.js";
import type { ModuleID, ModuleRecord } from "../graph/types.js";

export interface Extracted {
  imports: Set<string>;
  types: Set<string>;
  callables: Set<string>;
}

/**
 * Pulls import strings and declared names out of module text.
 * `lineExtractor` is the line-pattern implementation.
 */
export interface DeclarationExtractor {
  extract(text: string): Extracted;
}

const IMPORT_LINE = /^[ \t]*(?:from[ \t]+(\S+)[ \t]+)?import[ \t]+([^#\n]+)/gm;
const CLASS_DECL = /^[ \t]*class[ \t]+(\w+)/gm;
const DEF_DECL = /^[ \t]*(?:async[ \t]+)?def[ \t]+(\w+)/gm;

function firstImportName(names: string): string {
  const first = names.split(",")[0] ?? "";
  // `import a.b as c` names a.b
  return first.trim().split(/\s+/)[0] ?? "";
}

export const lineExtractor: DeclarationExtractor = {
  extract(text: string): Extracted {
    const imports = new Set<string>();
    const types = new Set<string>();
    const callables = new Set<string>();

    for (const m of text.matchAll(IMPORT_LINE)) {
      const imp = m[1] !== undefined ? m[1] : firstImportName(m[2] ?? "");
      if (imp) imports.add(imp);
    }
    for (const m of text.matchAll(CLASS_DECL)) {
      if (m[1]) types.add(m[1]);
    }
    for (const m of text.matchAll(DEF_DECL)) {
      if (m[1]) callables.add(m[1]);
    }

    return { imports, types, callables };
  },
};

export interface ExcludeOptions {
  /** Substrings; a module whose relative path contains any of them is skipped. */
  exclude: readonly string[];
  /** Absolute path never scanned (typically the tool's own entry file). */
  excludePath?: string;
}

export function shouldExclude(relPath: string, absPath: string, opts: ExcludeOptions): boolean {
  if (opts.excludePath !== undefined && absPath === opts.excludePath) return true;
  return opts.exclude.some((pattern) => pattern !== "" && relPath.includes(pattern));
}

export function scanModule(
  id: ModuleID,
  content: unknown,
  filePath = "",
  extractor: DeclarationExtractor = lineExtractor,
): ModuleRecord {
  assertText(content, id);
  const { imports, types, callables } = extractor.extract(content);
  return Object.freeze({ id, filePath, content, imports, types, callables });
}
