import { mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { assembleArtifact, renderBanner, renderOverview, type OverviewOptions } from "../assemble/assembleArtifact.js";
import { canonicalPath } from "../fs/canonicalPath.js";
import { listSourceFiles } from "../fs/listSourceFiles.js";
import { buildGraph } from "../graph/buildGraph.js";
import { orderModules } from "../graph/topoOrder.js";
import type { DependencyGraph, ModuleID, ModuleRecord, ModuleTable, OrderingResult } from "../graph/types.js";
import { lineExtractor, scanModule, shouldExclude, type DeclarationExtractor } from "../parse/scanModule.js";
import type { LabelMode } from "../render/graphText.js";
import { packageNotebook, serializeNotebook } from "../render/notebook.js";
import { renderDependencyReport } from "../render/report.js";
import { defaultRules, type SummaryLevel, type SummaryRule } from "../transform/rules.js";
import { transformModule } from "../transform/transformContent.js";
import { ModuleReadError } from "../util/errors.js";
import { createLogger } from "../util/logger.js";
import { TOOL_NAME } from "../version.js";

const log = createLogger("scan");
const utf8 = new TextDecoder("utf-8", { fatal: true });

export interface ScanOptions {
  exclude: readonly string[];
  excludePath?: string;
  extensions: readonly string[];
  extractor?: DeclarationExtractor;
}

export interface WeaveOptions extends ScanOptions {
  root: string;
  level: SummaryLevel;
  rules?: readonly SummaryRule[];
  labels: LabelMode;
  removeDisconnected: boolean;
  /** Defaults to the current time. */
  generatedAt?: Date;
}

export interface WeaveResult {
  artifact: string;
  banner: string;
  overview: string;
  table: ModuleTable;
  graph: DependencyGraph;
  ordering: OrderingResult;
}

/**
 * Scan every source file under `root` into the module table, in discovery order.
 * Any read failure aborts with the offending path.
 */
export function loadModules(root: string, opts: ScanOptions): Map<ModuleID, ModuleRecord> {
  const absRoot = resolve(root);
  const excludePath = opts.excludePath !== undefined ? resolve(opts.excludePath) : undefined;
  const table = new Map<ModuleID, ModuleRecord>();

  for (const absFile of listSourceFiles(absRoot, opts.extensions)) {
    const id = canonicalPath(absFile, absRoot);
    if (shouldExclude(id, absFile, { exclude: opts.exclude, excludePath })) {
      log.debug(`excluding ${id}`);
      continue;
    }

    let content: string;
    try {
      content = utf8.decode(readFileSync(absFile));
    } catch (err) {
      throw new ModuleReadError(absFile, err);
    }

    const record = scanModule(id, content, absFile, opts.extractor ?? lineExtractor);
    table.set(id, record);
    if (record.imports.size > 0) {
      log.debug(`${id}: imports ${[...record.imports].join(", ")}`);
    }
  }

  return table;
}

/** Graph, order, transform and assemble an already-scanned table. */
export function weaveTable(
  table: ModuleTable,
  opts: Omit<WeaveOptions, keyof ScanOptions> & { extension?: string },
): WeaveResult {
  const extension = opts.extension ?? ".py";
  const graph = buildGraph(table, { extension, indexModule: "__init__" });
  const ordering = orderModules(graph);
  const rules = opts.rules ?? defaultRules();

  const contents = new Map<ModuleID, string>();
  for (const [id, record] of table) {
    contents.set(id, transformModule(record.content, opts.level, rules));
  }

  const overviewOpts: OverviewOptions = {
    rootLabel: opts.root,
    labels: opts.labels,
    removeDisconnected: opts.removeDisconnected,
  };
  const generatedAt = opts.generatedAt ?? new Date();

  return {
    artifact: assembleArtifact({
      ordering,
      contents,
      table,
      graph,
      level: opts.level,
      overview: overviewOpts,
      generatedAt,
    }),
    banner: renderBanner(opts.level, generatedAt),
    overview: renderOverview(table, graph, overviewOpts),
    table,
    graph,
    ordering,
  };
}

export function weave(opts: WeaveOptions): WeaveResult {
  return weaveTable(loadModules(opts.root, opts), { ...opts, extension: opts.extensions[0] });
}

/** Write via a temporary sibling, then rename into place. */
export function writeOutput(path: string, text: string): string {
  const abs = resolve(path);
  mkdirSync(dirname(abs), { recursive: true });
  const tmp = `${abs}.tmp-${process.pid}`;
  writeFileSync(tmp, text, "utf8");
  renameSync(tmp, abs);
  return abs;
}

export function writeNotebook(path: string, result: WeaveResult): string {
  const notebook = packageNotebook(result.artifact, `Notebook generated by ${TOOL_NAME}`, result.banner);
  return writeOutput(path, serializeNotebook(notebook));
}

export function dependencyReport(result: WeaveResult): string {
  return renderDependencyReport(result.table, result.graph, result.ordering, result.overview);
}
