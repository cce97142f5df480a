/**
 * Text collaborators: graph picture, directory tree, notebook packaging, report.
 */

import { buildGraph } from "../src/graph/buildGraph.js";
import { orderModules } from "../src/graph/topoOrder.js";
import type { DependencyGraph, ModuleID, ModuleRecord } from "../src/graph/types.js";
import { scanModule } from "../src/parse/scanModule.js";
import { renderDirectoryTree } from "../src/render/directoryTree.js";
import { letterLabel, renderGraphText } from "../src/render/graphText.js";
import { packageNotebook, serializeNotebook, splitLinesKeepEnds } from "../src/render/notebook.js";
import { renderDependencyReport } from "../src/render/report.js";

const graph: DependencyGraph = {
  nodes: ["a.py", "b.py", "c.py", "d.py"],
  edges: [
    { from: "a.py", to: "b.py" },
    { from: "a.py", to: "c.py" },
    { from: "b.py", to: "c.py" },
  ],
};

describe("renderGraphText", () => {
  it("letters: legend, layers and edges", () => {
    const out = renderGraphText(graph, { labels: "letters", removeDisconnected: false });
    expect(out.text).toBe(
      [
        "Legend:",
        "A: a.py",
        "B: b.py",
        "C: c.py",
        "D: d.py",
        "modules that appear in no edge are not connected and are likely unused.",
        "",
        "Layers:",
        "  [A]  [D]",
        "  [B]",
        "  [C]",
        "",
        "Edges:",
        "  A -> B",
        "  A -> C",
        "  B -> C",
      ].join("\n"),
    );
    expect(out.legend.get("D")).toBe("d.py");
  });

  it("numbers, with disconnected modules elided", () => {
    const out = renderGraphText(graph, { labels: "numbers", removeDisconnected: true });
    expect(out.text).toBe(
      [
        "Legend:",
        "1: a.py",
        "2: b.py",
        "3: c.py",
        "non-dependent modules elided",
        "",
        "Layers:",
        "  [1]",
        "  [2]",
        "  [3]",
        "",
        "Edges:",
        "  1 -> 2",
        "  1 -> 3",
        "  2 -> 3",
      ].join("\n"),
    );
  });

  it("skips layers for a cyclic graph", () => {
    const cyclic: DependencyGraph = {
      nodes: ["a.py", "b.py"],
      edges: [
        { from: "a.py", to: "b.py" },
        { from: "b.py", to: "a.py" },
      ],
    };
    const out = renderGraphText(cyclic, { labels: "letters", removeDisconnected: false });
    expect(out.text).toContain("Layers:\n  (unavailable: circular dependencies)\n");
  });

  it("letterLabel continues past Z", () => {
    expect([0, 25, 26, 27, 701, 702].map(letterLabel)).toEqual(["A", "Z", "AA", "AB", "ZZ", "AAA"]);
  });
});

describe("renderDirectoryTree", () => {
  it("draws nested directories before files", () => {
    expect(renderDirectoryTree("src", ["main.py", "pkg/a.py", "pkg/sub/c.py"])).toBe(
      [
        "src",
        "├── pkg",
        "│   ├── sub",
        "│   │   └── c.py",
        "│   └── a.py",
        "└── main.py",
        "",
        "2 directories, 3 files",
      ].join("\n"),
    );
  });

  it("singular counts", () => {
    expect(renderDirectoryTree(".", ["x/y.py"])).toBe(".\n└── x\n    └── y.py\n\n1 directory, 1 file");
  });
});

describe("packageNotebook", () => {
  it("wraps the text unmodified as the code cell", () => {
    const code = "a = 1\nb = 2";
    const nb = packageNotebook(code, "Title", "# banner");
    expect(nb.cells.map((c) => c.cell_type)).toEqual(["markdown", "code", "markdown"]);
    expect(nb.cells[0]?.source).toEqual(["## Title\n"]);
    expect(nb.cells[1]?.source).toEqual(["a = 1\n", "b = 2"]);
    expect(nb.cells[1]?.source.join("")).toBe(code);
    expect(nb.cells[1]?.outputs).toEqual([]);
    expect(nb.cells[2]?.source).toEqual(["```\n", "# banner\n", "```\n"]);
    expect(nb.nbformat).toBe(4);
    expect(nb.nbformat_minor).toBe(4);
  });

  it("serializes as indented JSON", () => {
    const nb = packageNotebook("x", "T", "b");
    const parsed = JSON.parse(serializeNotebook(nb));
    expect(parsed.metadata.kernelspec.name).toBe("python3");
    expect(parsed.cells[1].execution_count).toBeNull();
  });

  it("splitLinesKeepEnds", () => {
    expect(splitLinesKeepEnds("")).toEqual([]);
    expect(splitLinesKeepEnds("a\n")).toEqual(["a\n"]);
    expect(splitLinesKeepEnds("a\n\nb")).toEqual(["a\n", "\n", "b"]);
  });
});

describe("renderDependencyReport", () => {
  function tableOf(files: Record<string, string>): Map<ModuleID, ModuleRecord> {
    return new Map(Object.entries(files).map(([id, content]) => [id, scanModule(id, content)]));
  }

  it("lists statistics, chains and module details", () => {
    const table = tableOf({
      "a.py": "import json\n\nclass A:\n    def run(self):\n        pass\n",
      "b.py": "from .a import A\n",
    });
    const g = buildGraph(table);
    const report = renderDependencyReport(table, g, orderModules(g), "OVERVIEW");
    expect(report).toContain("Total modules: 2\nTotal dependencies: 1\n");
    expect(report).toContain("1. a.py\n2. b.py\n   Depends on: a.py\n");
    expect(report).toContain("a.py:\nClasses: A\nFunctions: run\nImports: json\n");
    expect(report).toContain("b.py:\nClasses: None\nFunctions: None\nImports: .a\n");
  });

  it("lists cycles instead of chains", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const table = tableOf({ "a.py": "from .b import x\n", "b.py": "from .a import y\n" });
    const g = buildGraph(table);
    const report = renderDependencyReport(table, g, orderModules(g), "");
    expect(report).toContain("Cycles found:\n  a.py -> b.py -> a.py\n");
    warn.mockRestore();
  });
});
