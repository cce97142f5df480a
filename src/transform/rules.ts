/**
 * Summarization rules: pattern / replacement / explanation triples. A rule is a
 * pure text rewrite; the explanation is appended to every replacement as a
 * trailing comment so a reader can tell what was elided.
 */

export type SummaryLevel = "none" | "interface" | "core";
export type RuleLevel = Exclude<SummaryLevel, "none">;

export const SUMMARY_LEVELS: readonly SummaryLevel[] = ["none", "interface", "core"];

export interface SummaryRule {
  pattern: RegExp;
  replacement: string;
  explanation: string;
  level: RuleLevel;
}

/** Raw rule as it appears in configuration. */
export interface RuleSource {
  pattern: string;
  flags?: string;
  replacement: string;
  explanation: string;
  level: RuleLevel;
}

export function isSummaryLevel(value: unknown): value is SummaryLevel {
  return SUMMARY_LEVELS.some((level) => level === value);
}

// A line that opens a top-level declaration: class, def, async def or a decorator.
const TOP_LEVEL_DECL = String.raw`(?:(?:class|def|async[ \t]+def)[ \t]|@)`;
// Refuses a header already followed by an elision placeholder.
const NOT_ELIDED = String.raw`(?![ \t]*\n[ \t]*\.\.\. #)`;
// Lines up to (not including) the next top-level declaration.
const TOP_LEVEL_BODY = String.raw`[^\n]*(?:\n(?!${TOP_LEVEL_DECL})[^\n]*)*`;
// Blank lines, or lines indented deeper than the captured indentation \1.
const NESTED_BODY = String.raw`[^\n]*(?:\n(?:[ \t]*(?![^\n])|\1[ \t][^\n]*))*`;
// One level of nested parentheses: tuple defaults, calls in a base list.
const PARAMS = String.raw`\((?:[^()]|\([^()]*\))*\)`;
const RETURNS = String.raw`(?:[ \t]*->[^:\n]*)?`;

export function defaultRules(): SummaryRule[] {
  return [
    {
      pattern: new RegExp(String.raw`^(class[ \t]+\w+(?:${PARAMS})?[ \t]*:)${NOT_ELIDED}${TOP_LEVEL_BODY}`, "gm"),
      replacement: "$1\n    ...",
      explanation: "Class interface preserved",
      level: "interface",
    },
    {
      pattern: new RegExp(
        String.raw`^((?:async[ \t]+)?def[ \t]+\w+[ \t]*${PARAMS}${RETURNS}[ \t]*:)${NOT_ELIDED}${TOP_LEVEL_BODY}`,
        "gm",
      ),
      replacement: "$1\n    ...",
      explanation: "Function signature preserved",
      level: "interface",
    },
    {
      pattern: new RegExp(
        String.raw`^([ \t]*)((?:async[ \t]+)?def[ \t]+get_\w+[ \t]*${PARAMS}${RETURNS}[ \t]*:)[ \t]*(?:\n[ \t]*)?return\b[^\n]*(?:\n(?!\1[ \t]+\S)|(?![\s\S]))`,
        "gm",
      ),
      replacement: "$1$2 ...",
      explanation: "Getter method summarized",
      level: "core",
    },
    {
      pattern: new RegExp(
        String.raw`^([ \t]*)(def[ \t]+__init__[ \t]*${PARAMS}${RETURNS}[ \t]*:)(?![ \t]*\.\.\. #)${NOT_ELIDED}${NESTED_BODY}`,
        "gm",
      ),
      replacement: "$1$2 ...",
      explanation: "Standard initialization summarized",
      level: "core",
    },
  ];
}

function withGlobal(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, pattern.flags + "g");
}

export function applyRule(rule: SummaryRule, text: string): string {
  const explanation = rule.explanation.replace(/\$/g, "$$$$");
  return text.replace(withGlobal(rule.pattern), `${rule.replacement} # ${explanation}\n`);
}

/** Rules that run at `level`, in application order: interface rules, then core rules. */
export function rulesForLevel(rules: readonly SummaryRule[], level: SummaryLevel): SummaryRule[] {
  if (level === "none") return [];
  const iface = rules.filter((r) => r.level === "interface");
  if (level === "interface") return iface;
  return [...iface, ...rules.filter((r) => r.level === "core")];
}

/** Build rules from configuration. Invalid patterns throw with the rule index. */
export function compileRules(sources: readonly RuleSource[]): SummaryRule[] {
  return sources.map((src, i) => {
    let flags = src.flags ?? "m";
    if (!flags.includes("g")) flags += "g";
    let pattern: RegExp;
    try {
      pattern = new RegExp(src.pattern, flags);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`rules[${i}]: invalid pattern: ${msg}`);
    }
    return { pattern, replacement: src.replacement, explanation: src.explanation, level: src.level };
  });
}
