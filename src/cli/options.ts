import type { WeaveConfig } from "../config/weaveYaml.js";
import type { LabelMode } from "../render/graphText.js";
import { compileRules, defaultRules, isSummaryLevel, type SummaryLevel, type SummaryRule } from "../transform/rules.js";

/** Flags as commander hands them over; absent flags are undefined. */
export interface CliFlags {
  out?: string;
  level?: string;
  exclude: string[];
  excludePath?: string;
  ext: string[];
  notebook?: string | boolean;
  report?: boolean;
  labels?: string;
  removeDisconnected?: boolean;
  config?: string;
  debug?: boolean;
}

export interface RunOptions {
  root: string;
  out: string;
  level: SummaryLevel;
  exclude: string[];
  excludePath?: string;
  extensions: string[];
  notebook: string | null;
  report: boolean;
  labels: LabelMode;
  removeDisconnected: boolean;
  rules: SummaryRule[];
  debug: boolean;
}

export const DEFAULT_NOTEBOOK = "combined.ipynb";

/** Command-line flags win over the config file; exclusions from both apply. */
export function resolveRunOptions(root: string, flags: CliFlags, config: WeaveConfig): RunOptions {
  let level = config.level;
  if (flags.level !== undefined) {
    if (!isSummaryLevel(flags.level)) {
      throw new Error(`--level must be none, interface or core (got "${flags.level}")`);
    }
    level = flags.level;
  }

  let labels = config.labels;
  if (flags.labels !== undefined) {
    if (flags.labels !== "letters" && flags.labels !== "numbers") {
      throw new Error(`--labels must be letters or numbers (got "${flags.labels}")`);
    }
    labels = flags.labels;
  }

  let notebook = config.notebook;
  if (flags.notebook === true) notebook = notebook ?? DEFAULT_NOTEBOOK;
  else if (typeof flags.notebook === "string") notebook = flags.notebook;

  const extensions =
    flags.ext.length > 0 ? flags.ext.map((e) => (e.startsWith(".") ? e : `.${e}`)) : config.extensions;

  return {
    root,
    out: flags.out ?? config.output,
    level,
    exclude: [...config.exclude, ...flags.exclude],
    excludePath: flags.excludePath,
    extensions,
    notebook,
    report: flags.report ?? false,
    labels,
    removeDisconnected: flags.removeDisconnected ?? config.removeDisconnected,
    rules: config.rules !== null ? compileRules(config.rules) : defaultRules(),
    debug: flags.debug ?? false,
  };
}
