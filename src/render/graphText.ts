import type { DependencyGraph, ModuleID } from "../graph/types.js";

export type LabelMode = "letters" | "numbers";

export interface GraphTextOptions {
  labels: LabelMode;
  /** Drop modules with no edges from the picture. */
  removeDisconnected: boolean;
}

export interface GraphText {
  text: string;
  /** label → module id, in label order */
  legend: Map<string, ModuleID>;
}

/** 0 → A, 25 → Z, 26 → AA, 27 → AB ... */
export function letterLabel(index: number): string {
  let label = "";
  let i = index;
  while (i >= 0) {
    label = String.fromCharCode(65 + (i % 26)) + label;
    i = Math.floor(i / 26) - 1;
  }
  return label;
}

/** Longest-path layer of each node, or null when the graph has a cycle. */
function layerNodes(nodes: ModuleID[], graph: DependencyGraph): ModuleID[][] | null {
  const inDegree = new Map<ModuleID, number>(nodes.map((n) => [n, 0]));
  const out = new Map<ModuleID, ModuleID[]>(nodes.map((n) => [n, []]));
  for (const e of graph.edges) {
    if (!inDegree.has(e.from) || !inDegree.has(e.to)) continue;
    out.get(e.from)?.push(e.to);
    inDegree.set(e.to, (inDegree.get(e.to) ?? 0) + 1);
  }

  const layer = new Map<ModuleID, number>();
  let frontier = nodes.filter((n) => inDegree.get(n) === 0);
  for (const n of frontier) layer.set(n, 0);
  let seen = 0;

  while (frontier.length > 0) {
    const next: ModuleID[] = [];
    for (const n of frontier) {
      seen++;
      for (const m of out.get(n) ?? []) {
        layer.set(m, Math.max(layer.get(m) ?? 0, (layer.get(n) ?? 0) + 1));
        const d = (inDegree.get(m) ?? 0) - 1;
        inDegree.set(m, d);
        if (d === 0) next.push(m);
      }
    }
    frontier = next;
  }
  if (seen < nodes.length) return null;

  const rows: ModuleID[][] = [];
  for (const n of nodes) {
    const l = layer.get(n) ?? 0;
    const row = rows[l] ?? [];
    row.push(n);
    rows[l] = row;
  }
  return rows;
}

/**
 * Text picture of the dependency graph: a legend mapping short labels to module
 * paths, the modules arranged in dependency layers, and the edge list.
 */
export function renderGraphText(graph: DependencyGraph, opts: GraphTextOptions): GraphText {
  const connected = new Set<ModuleID>();
  for (const e of graph.edges) {
    connected.add(e.from);
    connected.add(e.to);
  }
  const nodes = opts.removeDisconnected ? graph.nodes.filter((n) => connected.has(n)) : graph.nodes;

  const legend = new Map<string, ModuleID>();
  const labelOf = new Map<ModuleID, string>();
  nodes.forEach((n, i) => {
    const label = opts.labels === "letters" ? letterLabel(i) : String(i + 1);
    legend.set(label, n);
    labelOf.set(n, label);
  });

  const lines: string[] = ["Legend:"];
  for (const [label, id] of legend) lines.push(`${label}: ${id}`);
  lines.push(
    opts.removeDisconnected
      ? "non-dependent modules elided"
      : "modules that appear in no edge are not connected and are likely unused.",
  );

  lines.push("", "Layers:");
  const layers = layerNodes(nodes, graph);
  if (layers === null) {
    lines.push("  (unavailable: circular dependencies)");
  } else {
    for (const row of layers) {
      lines.push("  " + row.map((n) => `[${labelOf.get(n) ?? "?"}]`).join("  "));
    }
  }

  lines.push("", "Edges:");
  const shown = graph.edges.filter((e) => labelOf.has(e.from) && labelOf.has(e.to));
  if (shown.length === 0) {
    lines.push("  (none)");
  } else {
    for (const e of shown) lines.push(`  ${labelOf.get(e.from) ?? "?"} -> ${labelOf.get(e.to) ?? "?"}`);
  }

  return { text: lines.join("\n"), legend };
}
