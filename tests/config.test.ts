import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { resolveRunOptions } from "../src/cli/options.js";
import { defaultConfig, loadWeaveConfig, parseWeaveConfig } from "../src/config/weaveYaml.js";

describe(".modweave.yml", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "modweave-config-"));
  });

  it("missing file → defaults", () => {
    expect(loadWeaveConfig(tmpDir)).toEqual(defaultConfig());
  });

  it("reads every supported key", () => {
    writeFileSync(
      join(tmpDir, ".modweave.yml"),
      [
        "level: core",
        "exclude:",
        "  - tools/",
        "extensions: [py, .pyi]",
        "labels: numbers",
        "removeDisconnected: true",
        "output: out/all.py",
        "notebook: out/all.ipynb",
        "rules:",
        '  - pattern: "^print\\\\(.*\\\\)$"',
        "    replacement: pass",
        "    explanation: print removed",
        "    level: core",
      ].join("\n"),
      "utf8",
    );
    expect(loadWeaveConfig(tmpDir)).toEqual({
      level: "core",
      exclude: ["tools/"],
      extensions: [".py", ".pyi"],
      labels: "numbers",
      removeDisconnected: true,
      output: "out/all.py",
      notebook: "out/all.ipynb",
      rules: [{ pattern: "^print\\(.*\\)$", replacement: "pass", explanation: "print removed", level: "core" }],
    });
  });

  it("unknown keys throw", () => {
    expect(() => parseWeaveConfig({ foo: 1 })).toThrow('.modweave.yml: unknown key "foo"');
  });

  it("invalid values throw", () => {
    expect(() => parseWeaveConfig({ level: "full" })).toThrow(".modweave.yml: level must be none, interface or core");
    expect(() => parseWeaveConfig({ exclude: "tools/" })).toThrow(".modweave.yml: exclude must be an array of strings");
    expect(() => parseWeaveConfig({ rules: [{ pattern: "x", replacement: "y", explanation: "z", level: "all" }] })).toThrow(
      ".modweave.yml: rules[0]: level must be interface or core",
    );
    expect(() => parseWeaveConfig([])).toThrow(".modweave.yml: root must be an object");
  });

  it("invalid YAML throws", () => {
    writeFileSync(join(tmpDir, ".modweave.yml"), "level: [", "utf8");
    expect(() => loadWeaveConfig(tmpDir)).toThrow(/invalid YAML/);
  });

  it("an explicit path that does not exist throws", () => {
    const path = join(tmpDir, "nope.yml");
    expect(() => loadWeaveConfig(tmpDir, path)).toThrow(`${path}: config file not found`);
  });
});

describe("resolveRunOptions", () => {
  it("flags override the config and exclusions accumulate", () => {
    const config = { ...defaultConfig(), exclude: ["tools/"], level: "interface" as const };
    const opts = resolveRunOptions("src", { exclude: ["cats/"], ext: ["pyi"], level: "core", out: "x.py" }, config);
    expect(opts.exclude).toEqual(["tools/", "cats/"]);
    expect(opts.extensions).toEqual([".pyi"]);
    expect(opts.level).toBe("core");
    expect(opts.out).toBe("x.py");
    expect(opts.notebook).toBeNull();
    expect(opts.rules).toHaveLength(4);
  });

  it("--notebook without a file uses the default notebook path", () => {
    const opts = resolveRunOptions("src", { exclude: [], ext: [], notebook: true }, defaultConfig());
    expect(opts.notebook).toBe("combined.ipynb");
  });

  it("config rules replace the defaults", () => {
    const config = {
      ...defaultConfig(),
      rules: [{ pattern: "^x$", replacement: "y", explanation: "z", level: "interface" as const }],
    };
    const opts = resolveRunOptions("src", { exclude: [], ext: [] }, config);
    expect(opts.rules.map((r) => r.explanation)).toEqual(["z"]);
  });

  it("rejects an unknown level", () => {
    expect(() => resolveRunOptions("src", { exclude: [], ext: [], level: "full" }, defaultConfig())).toThrow(
      '--level must be none, interface or core (got "full")',
    );
  });
});
