import { createLogger } from "../util/logger.js";
import { insertSorted } from "../util/stableSort.js";
import { detectCycles } from "./detectCycles.js";
import type { DependencyGraph, ModuleID, OrderingResult } from "./types.js";

const log = createLogger("order");

/**
 * Kahn's algorithm over dependency → dependent edges. Among ready modules the one
 * discovered first goes next. A graph with cycles falls back to discovery order
 * and reports every simple cycle; it never fails.
 */
export function orderModules(graph: DependencyGraph): OrderingResult {
  const n = graph.nodes.length;
  const indexByNode = new Map<ModuleID, number>();
  graph.nodes.forEach((id, i) => indexByNode.set(id, i));

  const inDegree = new Array<number>(n).fill(0);
  const outEdges = graph.nodes.map((): number[] => []);
  for (const e of graph.edges) {
    const from = indexByNode.get(e.from);
    const to = indexByNode.get(e.to);
    if (from == null || to == null || from === to) continue;
    outEdges[from].push(to);
    inDegree[to]++;
  }

  const ready: number[] = [];
  for (let i = 0; i < n; i++) {
    if (inDegree[i] === 0) ready.push(i);
  }

  const order: ModuleID[] = [];
  let v: number | undefined;
  while ((v = ready.shift()) !== undefined) {
    order.push(graph.nodes[v]);
    for (const w of outEdges[v]) {
      inDegree[w]--;
      if (inDegree[w] === 0) insertSorted(ready, w);
    }
  }

  if (order.length === n) {
    return { kind: "sorted", order };
  }

  const cycles = detectCycles(graph);
  log.warn("circular dependencies detected:");
  for (const cycle of cycles) {
    log.warn(`  ${[...cycle, cycle[0]].join(" -> ")}`);
  }
  log.warn("using discovery order instead");

  return { kind: "cyclic", order: [...graph.nodes], cycles };
}
