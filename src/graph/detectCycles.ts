import type { DependencyGraph, ModuleID } from "./types.js";

function adjacency(graph: DependencyGraph): number[][] {
  const indexByNode = new Map<ModuleID, number>();
  graph.nodes.forEach((n, i) => indexByNode.set(n, i));

  const outEdges = graph.nodes.map((): number[] => []);
  for (const e of graph.edges) {
    const fromIdx = indexByNode.get(e.from);
    const toIdx = indexByNode.get(e.to);
    if (fromIdx != null && toIdx != null && fromIdx !== toIdx) {
      outEdges[fromIdx].push(toIdx);
    }
  }
  for (const out of outEdges) out.sort((a, b) => a - b);
  return outEdges;
}

/**
 * Strongly connected components with more than one node (Tarjan).
 * Members are node indices in discovery order; components are ordered by their
 * first member.
 */
function stronglyConnected(nodeCount: number, outEdges: number[][]): number[][] {
  let indexCounter = 0;
  const index = new Array<number>(nodeCount).fill(-1);
  const lowlink = new Array<number>(nodeCount).fill(-1);
  const onStack = new Array<boolean>(nodeCount).fill(false);
  const stack: number[] = [];
  const sccs: number[][] = [];

  function strongConnect(v: number): void {
    index[v] = indexCounter;
    lowlink[v] = indexCounter;
    indexCounter++;
    stack.push(v);
    onStack[v] = true;

    for (const w of outEdges[v]) {
      if (index[w] === -1) {
        strongConnect(w);
        lowlink[v] = Math.min(lowlink[v], lowlink[w]);
      } else if (onStack[w]) {
        lowlink[v] = Math.min(lowlink[v], index[w]);
      }
    }

    if (lowlink[v] === index[v]) {
      const scc: number[] = [];
      let w: number | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack[w] = false;
        scc.push(w);
      } while (w !== v);
      if (scc.length > 1) {
        scc.sort((a, b) => a - b);
        sccs.push(scc);
      }
    }
  }

  for (let v = 0; v < nodeCount; v++) {
    if (index[v] === -1) strongConnect(v);
  }

  return sccs.sort((a, b) => a[0] - b[0]);
}

/**
 * Every simple cycle of the graph. Each cycle starts at its member with the lowest
 * discovery index and follows edge direction (dependency → dependent).
 * Deterministic: same graph produces the same cycles in the same order.
 */
export function detectCycles(graph: DependencyGraph): ModuleID[][] {
  const outEdges = adjacency(graph);
  const cycles: number[][] = [];

  for (const scc of stronglyConnected(graph.nodes.length, outEdges)) {
    const members = new Set(scc);
    for (const start of scc) {
      // only nodes after `start` may appear, so each cycle is found once
      const path: number[] = [start];
      const onPath = new Set<number>([start]);

      const search = (v: number): void => {
        for (const w of outEdges[v]) {
          if (!members.has(w) || w < start) continue;
          if (w === start) {
            cycles.push([...path]);
          } else if (!onPath.has(w)) {
            path.push(w);
            onPath.add(w);
            search(w);
            onPath.delete(w);
            path.pop();
          }
        }
      };

      search(start);
    }
  }

  cycles.sort((a, b) => {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
  });

  return cycles.map((c) => c.map((i) => graph.nodes[i]));
}
