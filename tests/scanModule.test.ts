/**
 * Module scanning: import strings, declared names, exclusion.
 */

import { lineExtractor, scanModule, shouldExclude } from "../src/parse/scanModule.js";

const SOURCE = [
  "import os, sys",
  "import numpy as np",
  "from .sibling import thing",
  "from ..pkg.core import Core",
  "from collections import OrderedDict",
  "",
  "class Alpha(Base):",
  "    def method(self):",
  "        pass",
  "",
  "async def fetch():",
  "    pass",
  "",
  "def helper(x):",
  "    return x",
  "",
].join("\n");

describe("scanModule", () => {
  it("captures from-imports verbatim and the first name of plain imports", () => {
    const record = scanModule("pkg/mod.py", SOURCE);
    expect([...record.imports]).toEqual(["os", "numpy", ".sibling", "..pkg.core", "collections"]);
  });

  it("collects declared type and callable names", () => {
    const record = scanModule("pkg/mod.py", SOURCE);
    expect([...record.types]).toEqual(["Alpha"]);
    expect([...record.callables]).toEqual(["method", "fetch", "helper"]);
  });

  it("does not read words that merely contain a keyword", () => {
    const { imports, types } = lineExtractor.extract("important = 1\nsubclass Thing\n");
    expect(imports.size).toBe(0);
    expect(types.size).toBe(0);
  });

  it("empty text yields an empty record", () => {
    const record = scanModule("empty.py", "");
    expect(record.id).toBe("empty.py");
    expect(record.imports.size).toBe(0);
    expect(record.types.size).toBe(0);
    expect(record.callables.size).toBe(0);
  });

  it("records are frozen", () => {
    const record = scanModule("a.py", "import os\n");
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("rejects non-text content with a TypeError", () => {
    expect(() => scanModule("a.py", 42)).toThrow(TypeError);
  });

  it("uses a supplied extractor", () => {
    const record = scanModule("a.py", "anything", "", {
      extract: () => ({ imports: new Set(["x"]), types: new Set(), callables: new Set() }),
    });
    expect([...record.imports]).toEqual(["x"]);
  });
});

describe("shouldExclude", () => {
  it("skips paths containing an exclusion substring", () => {
    expect(shouldExclude("tools/gen.py", "/repo/src/tools/gen.py", { exclude: ["tools/"] })).toBe(true);
    expect(shouldExclude("pkg/a.py", "/repo/src/pkg/a.py", { exclude: ["tools/"] })).toBe(false);
  });

  it("skips the explicit exclusion path", () => {
    const opts = { exclude: [], excludePath: "/repo/src/build.py" };
    expect(shouldExclude("build.py", "/repo/src/build.py", opts)).toBe(true);
    expect(shouldExclude("other.py", "/repo/src/other.py", opts)).toBe(false);
  });

  it("ignores empty exclusion strings", () => {
    expect(shouldExclude("a.py", "/r/a.py", { exclude: [""] })).toBe(false);
  });
});
