import { sortStrings } from "../util/stableSort.js";

interface DirNode {
  dirs: Map<string, DirNode>;
  files: string[];
}

function emptyDir(): DirNode {
  return { dirs: new Map(), files: [] };
}

/**
 * `tree`-style listing of root-relative file paths under a root label.
 */
export function renderDirectoryTree(rootLabel: string, relPaths: readonly string[]): string {
  const root = emptyDir();
  for (const rel of relPaths) {
    const parts = rel.split("/");
    const file = parts.pop();
    if (file === undefined || file === "") continue;
    let node = root;
    for (const part of parts) {
      let child = node.dirs.get(part);
      if (!child) {
        child = emptyDir();
        node.dirs.set(part, child);
      }
      node = child;
    }
    node.files.push(file);
  }

  const lines: string[] = [rootLabel];
  let dirCount = 0;
  let fileCount = 0;

  function walk(node: DirNode, prefix: string): void {
    const entries: { name: string; child: DirNode | null }[] = [
      ...sortStrings(node.dirs.keys()).map((name) => ({ name, child: node.dirs.get(name) ?? null })),
      ...sortStrings(node.files).map((name) => ({ name, child: null })),
    ];
    entries.forEach((entry, i) => {
      const last = i === entries.length - 1;
      lines.push(`${prefix}${last ? "└── " : "├── "}${entry.name}`);
      if (entry.child) {
        dirCount++;
        walk(entry.child, prefix + (last ? "    " : "│   "));
      } else {
        fileCount++;
      }
    });
  }

  walk(root, "");
  lines.push("", `${dirCount} ${dirCount === 1 ? "directory" : "directories"}, ${fileCount} ${fileCount === 1 ? "file" : "files"}`);
  return lines.join("\n");
}
