/**
 * .modweave.yml loader. Strict schema: unknown keys or invalid values throw.
 * Missing file → defaults.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import type { LabelMode } from "../render/graphText.js";
import { isSummaryLevel, type RuleSource, type SummaryLevel } from "../transform/rules.js";

export const CONFIG_FILE = ".modweave.yml";

const ALLOWED_KEYS = new Set([
  "level",
  "exclude",
  "extensions",
  "labels",
  "removeDisconnected",
  "output",
  "notebook",
  "rules",
]);
const ALLOWED_RULE_KEYS = new Set(["pattern", "flags", "replacement", "explanation", "level"]);
const VALID_LABELS = new Set(["letters", "numbers"]);
const VALID_RULE_LEVELS = new Set(["interface", "core"]);

export interface WeaveConfig {
  level: SummaryLevel;
  exclude: string[];
  extensions: string[];
  labels: LabelMode;
  removeDisconnected: boolean;
  output: string;
  /** Notebook output path; null when no notebook is written. */
  notebook: string | null;
  /** Custom rules replacing the defaults; null keeps the defaults. */
  rules: RuleSource[] | null;
}

export function defaultConfig(): WeaveConfig {
  return {
    level: "none",
    exclude: [],
    extensions: [".py"],
    labels: "letters",
    removeDisconnected: false,
    output: "combined.py",
    notebook: null,
    rules: null,
  };
}

function stringArray(obj: Record<string, unknown>, key: string, label: string): string[] {
  const v = obj[key];
  if (!Array.isArray(v)) {
    throw new Error(`${label}: ${key} must be an array of strings`);
  }
  return v.map((item: unknown, i) => {
    if (typeof item !== "string") {
      throw new Error(`${label}: ${key}[${i}] must be a string`);
    }
    return item;
  });
}

function nonEmptyString(obj: Record<string, unknown>, key: string, label: string): string {
  const v = obj[key];
  if (typeof v !== "string" || v.trim() === "") {
    throw new Error(`${label}: ${key} must be a non-empty string`);
  }
  return v;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function parseRule(raw: unknown, i: number, label: string): RuleSource {
  const where = `${label}: rules[${i}]`;
  if (!isRecord(raw)) throw new Error(`${where} must be an object`);
  for (const key of Object.keys(raw)) {
    if (!ALLOWED_RULE_KEYS.has(key)) throw new Error(`${where}: unknown key "${key}"`);
  }
  const pattern = nonEmptyString(raw, "pattern", where);
  const replacement = raw.replacement;
  if (typeof replacement !== "string") throw new Error(`${where}: replacement must be a string`);
  const explanation = nonEmptyString(raw, "explanation", where);
  const level = raw.level;
  if (typeof level !== "string" || !VALID_RULE_LEVELS.has(level)) {
    throw new Error(`${where}: level must be interface or core`);
  }
  const rule: RuleSource = {
    pattern,
    replacement,
    explanation,
    level: level === "core" ? "core" : "interface",
  };
  const flags = raw.flags;
  if (flags !== undefined) {
    if (typeof flags !== "string" || !/^[gimsuy]*$/.test(flags)) {
      throw new Error(`${where}: flags must be a string of regular expression flags`);
    }
    rule.flags = flags;
  }
  return rule;
}

/** Validate an already-parsed config object. `label` prefixes every error. */
export function parseWeaveConfig(raw: unknown, label = CONFIG_FILE): WeaveConfig {
  const config = defaultConfig();
  if (raw === null || raw === undefined) return config;
  if (!isRecord(raw)) {
    throw new Error(`${label}: root must be an object`);
  }

  for (const key of Object.keys(raw)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new Error(`${label}: unknown key "${key}"`);
    }
  }

  const level = raw.level;
  if (level !== undefined) {
    if (!isSummaryLevel(level)) {
      throw new Error(`${label}: level must be none, interface or core`);
    }
    config.level = level;
  }

  if (raw.exclude !== undefined) config.exclude = stringArray(raw, "exclude", label);

  if (raw.extensions !== undefined) {
    const exts = stringArray(raw, "extensions", label);
    if (exts.length === 0) throw new Error(`${label}: extensions must not be empty`);
    config.extensions = exts.map((e) => (e.startsWith(".") ? e : `.${e}`));
  }

  const labels = raw.labels;
  if (labels !== undefined) {
    if (typeof labels !== "string" || !VALID_LABELS.has(labels)) {
      throw new Error(`${label}: labels must be letters or numbers`);
    }
    config.labels = labels === "numbers" ? "numbers" : "letters";
  }

  const removeDisconnected = raw.removeDisconnected;
  if (removeDisconnected !== undefined) {
    if (typeof removeDisconnected !== "boolean") {
      throw new Error(`${label}: removeDisconnected must be true or false`);
    }
    config.removeDisconnected = removeDisconnected;
  }

  if (raw.output !== undefined) config.output = nonEmptyString(raw, "output", label);
  if (raw.notebook !== undefined) config.notebook = nonEmptyString(raw, "notebook", label);

  const rules = raw.rules;
  if (rules !== undefined) {
    if (!Array.isArray(rules)) {
      throw new Error(`${label}: rules must be an array`);
    }
    config.rules = rules.map((r: unknown, i) => parseRule(r, i, label));
  }

  return config;
}

/**
 * Load and validate the config file. `path` defaults to .modweave.yml under `root`;
 * an explicit path that does not exist is an error, a missing default is not.
 */
export function loadWeaveConfig(root: string, path?: string): WeaveConfig {
  const file = path ?? join(root, CONFIG_FILE);
  const label = path ?? CONFIG_FILE;
  if (!existsSync(file)) {
    if (path !== undefined) throw new Error(`${file}: config file not found`);
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(file, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${label}: invalid YAML: ${msg}`);
  }
  return parseWeaveConfig(raw, label);
}
