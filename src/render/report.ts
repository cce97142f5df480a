import { dependenciesOf } from "../graph/buildGraph.js";
import type { DependencyGraph, ModuleTable, OrderingResult } from "../graph/types.js";
import { sortStrings } from "../util/stableSort.js";

function listOrNone(values: Iterable<string>): string {
  const sorted = sortStrings(values);
  return sorted.length > 0 ? sorted.join(", ") : "None";
}

/**
 * Plain-text dependency report: module and edge counts, the dependency chain in
 * emit order (or the cycles that prevented one) and what each module declares.
 */
export function renderDependencyReport(
  table: ModuleTable,
  graph: DependencyGraph,
  ordering: OrderingResult,
  overview: string,
): string {
  const lines: string[] = ["Dependency Analysis Report", "=".repeat(26), "", overview, ""];

  lines.push(
    "Module Statistics:",
    `Total modules: ${table.size}`,
    `Total dependencies: ${graph.edges.length}`,
    "",
  );

  if (ordering.kind === "sorted") {
    const deps = dependenciesOf(graph);
    lines.push("Dependency Chains:", "-".repeat(18));
    ordering.order.forEach((id, i) => {
      lines.push(`${i + 1}. ${id}`);
      const d = deps.get(id) ?? [];
      if (d.length > 0) lines.push(`   Depends on: ${d.join(", ")}`);
    });
  } else {
    lines.push("Warning: Circular dependencies detected!", "Cycles found:");
    for (const cycle of ordering.cycles) {
      lines.push(`  ${[...cycle, cycle[0]].join(" -> ")}`);
    }
  }
  lines.push("");

  lines.push("Module Details:", "-".repeat(15));
  for (const record of table.values()) {
    lines.push(
      "",
      `${record.id}:`,
      `Classes: ${listOrNone(record.types)}`,
      `Functions: ${listOrNone(record.callables)}`,
      `Imports: ${listOrNone(record.imports)}`,
    );
  }

  return lines.join("\n") + "\n";
}
