import { createLogger } from "../util/logger.js";
import { resolveImport, type ResolveContext } from "./resolveImport.js";
import type { DependencyGraph, Edge, ModuleID, ModuleTable } from "./types.js";

const log = createLogger("graph");

export interface GraphOptions {
  extension: string;
  indexModule: string;
}

export const DEFAULT_GRAPH_OPTIONS: GraphOptions = { extension: ".py", indexModule: "__init__" };

/**
 * Build the "dependency → dependent" graph over every module in the table.
 * Nodes keep discovery order; edges keep first-insertion order.
 */
export function buildGraph(table: ModuleTable, opts: GraphOptions = DEFAULT_GRAPH_OPTIONS): DependencyGraph {
  const nodes: ModuleID[] = [...table.keys()];
  const ctx: ResolveContext = {
    moduleIds: nodes,
    extension: opts.extension,
    indexModule: opts.indexModule,
  };

  for (const id of nodes) log.debug(`added node: ${id}`);

  const edgeSet = new Set<string>();
  const edges: Edge[] = [];

  function addEdge(from: ModuleID, to: ModuleID): void {
    if (from === to) return;
    const key = `${from}→${to}`;
    if (edgeSet.has(key)) return;
    edgeSet.add(key);
    edges.push({ from, to });
    log.debug(`adding edge: ${from} -> ${to}`);
  }

  for (const [id, record] of table) {
    for (const imp of record.imports) {
      const res = resolveImport(id, imp, ctx);
      if (res.kind === "unresolved") {
        log.debug(`unresolved import in ${id}: ${imp}`);
        continue;
      }
      for (const target of res.targets) addEdge(target, id);
    }
  }

  return { nodes, edges };
}

/** Direct dependencies of each node, in edge order. */
export function dependenciesOf(graph: DependencyGraph): Map<ModuleID, ModuleID[]> {
  const deps = new Map<ModuleID, ModuleID[]>();
  for (const n of graph.nodes) deps.set(n, []);
  for (const e of graph.edges) deps.get(e.to)?.push(e.from);
  return deps;
}
