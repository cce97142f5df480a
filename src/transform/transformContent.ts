import { assertText } from "../util/errors.js";
import { applyRule, defaultRules, rulesForLevel, type SummaryLevel, type SummaryRule } from "./rules.js";

export const RELATIVE_IMPORT_TAG = "RELATIVE_IMPORT";

const RELATIVE_IMPORT_LINE = /^([ \t]*)from[ \t]+\.[^\n]*$/gm;

/**
 * Wrap every relative-import line in an inert string block, keeping the line
 * itself verbatim.
 */
export function neutralizeRelativeImports(content: unknown): string {
  assertText(content, "neutralizeRelativeImports");
  return content.replace(
    RELATIVE_IMPORT_LINE,
    (line: string, indent: string) => `${indent}"""${RELATIVE_IMPORT_TAG}:\n${line}\n${indent}"""`,
  );
}

/** `none` returns the content unchanged. */
export function summarize(
  content: unknown,
  level: SummaryLevel,
  rules: readonly SummaryRule[] = defaultRules(),
): string {
  assertText(content, "summarize");
  let result = content;
  for (const rule of rulesForLevel(rules, level)) {
    result = applyRule(rule, result);
  }
  return result;
}

export function transformModule(
  content: unknown,
  level: SummaryLevel,
  rules: readonly SummaryRule[] = defaultRules(),
): string {
  return summarize(neutralizeRelativeImports(content), level, rules);
}
