/** Canonical root-relative path of a module, forward slashes. */
export type ModuleID = string;

export interface ModuleRecord {
  id: ModuleID;
  /** Absolute path the content was read from (empty for in-memory sources). */
  filePath: string;
  content: string;
  /** Import strings as written, leading dots kept for relative forms. */
  imports: ReadonlySet<string>;
  types: ReadonlySet<string>;
  callables: ReadonlySet<string>;
}

/** Insertion order is discovery order. */
export type ModuleTable = ReadonlyMap<ModuleID, ModuleRecord>;

/** `from` must be emitted before `to`. */
export interface Edge {
  from: ModuleID;
  to: ModuleID;
}

export interface DependencyGraph {
  /** Discovery order. */
  nodes: ModuleID[];
  /** Insertion order, deduplicated, no self-edges. */
  edges: Edge[];
}

export type OrderingResult =
  | { kind: "sorted"; order: ModuleID[] }
  | { kind: "cyclic"; order: ModuleID[]; cycles: ModuleID[][] };
