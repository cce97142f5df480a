import { collectExternalImports, collectInternalImports } from "../graph/externalImports.js";
import type { DependencyGraph, ModuleID, ModuleTable, OrderingResult } from "../graph/types.js";
import { renderDirectoryTree } from "../render/directoryTree.js";
import { renderGraphText, type LabelMode } from "../render/graphText.js";
import type { SummaryLevel } from "../transform/rules.js";
import { TOOL_NAME, TOOL_VERSION } from "../version.js";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ` +
    `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  );
}

export function renderBanner(level: SummaryLevel, generatedAt: Date): string {
  return [
    `# Generated by ${TOOL_NAME} ${TOOL_VERSION}`,
    `# Generated: ${formatTimestamp(generatedAt)}`,
    `# Summary level: ${level}`,
  ].join("\n");
}

export interface OverviewOptions {
  rootLabel: string;
  labels: LabelMode;
  removeDisconnected: boolean;
}

/** Directory listing, dependency picture and import summary. */
export function renderOverview(table: ModuleTable, graph: DependencyGraph, opts: OverviewOptions): string {
  const picture = renderGraphText(graph, { labels: opts.labels, removeDisconnected: opts.removeDisconnected });
  const external = collectExternalImports(table);
  const internal = collectInternalImports(table);
  return [
    "Directory Structure:",
    renderDirectoryTree(opts.rootLabel, [...table.keys()]),
    "",
    "Module Dependencies:",
    picture.text,
    "",
    "Import Summary:",
    "  External Dependencies:",
    `    ${external.length > 0 ? external.join(", ") : "(none)"}`,
    "  Internal Dependencies:",
    `    ${internal.length > 0 ? internal.join(", ") : "(none)"}`,
  ].join("\n");
}

export interface AssembleInput {
  ordering: OrderingResult;
  /** Transformed content per module. */
  contents: ReadonlyMap<ModuleID, string>;
  table: ModuleTable;
  graph: DependencyGraph;
  level: SummaryLevel;
  overview: OverviewOptions;
  generatedAt: Date;
}

/**
 * The whole artifact, in memory: banner, quoted overview block, external imports,
 * then each module under a `# From <path>` line in the given order.
 */
export function assembleArtifact(input: AssembleInput): string {
  const out: string[] = [
    renderBanner(input.level, input.generatedAt),
    "",
    '"""',
    renderOverview(input.table, input.graph, input.overview),
    '"""',
    "",
    "# External imports",
    ...collectExternalImports(input.table).map((imp) => `import ${imp}`),
    "",
    "# Combined module code",
  ];

  const emitted = new Set<ModuleID>();
  for (const id of input.ordering.order) {
    const content = input.contents.get(id);
    if (content === undefined || emitted.has(id)) continue;
    emitted.add(id);
    out.push("", `# From ${id}`, content);
  }

  return out.join("\n");
}
