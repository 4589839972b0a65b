/**
 * Best-effort rewriting of linear math text into LaTeX markup.
 *
 * Every rule is a global substring replacement and all rules run in order.
 * Lines arrive here already escaped, so `^` and `_` may appear either raw or
 * as `\textasciicircum{}` / `\_`; the exponent and integral rules accept both.
 */

import { MATH_FUNCTIONS } from "./classify.js";

export interface RewriteRule {
  readonly name: string;
  readonly pattern: RegExp;
  readonly replace: string | ((match: string, ...groups: string[]) => string);
}

const CARET = String.raw`(?:\^|\\textasciicircum\{\})`;
const UNDERSCORE = String.raw`(?:_|\\_)`;

export const REWRITE_RULES: readonly RewriteRule[] = Object.freeze([
  {
    name: "function",
    pattern: new RegExp(String.raw`(?<!\\)\b(${MATH_FUNCTIONS.join("|")})\b`, "g"),
    replace: "\\$1",
  },
  {
    name: "fraction",
    pattern: /(\d+)\/(\d+)/g,
    replace: "\\frac{$1}{$2}",
  },
  {
    name: "exponent",
    pattern: new RegExp(String.raw`(\w+)${CARET}(\d+)`, "g"),
    replace: "$1^{$2}",
  },
  {
    name: "sqrt",
    pattern: /sqrt\(([^)]+)\)/g,
    replace: "\\sqrt{$1}",
  },
  {
    // The upper bound may already be braced by the exponent rule.
    name: "integral",
    pattern: new RegExp(
      String.raw`\\?int${UNDERSCORE}(\w+)(?:\^\{(\w+)\}|${CARET}(\w+))\s*(\w+)`,
      "g"
    ),
    replace: (_match: string, lower: string, bracedUpper: string | undefined, upper: string | undefined, integrand: string) =>
      `\\int_{${lower}}^{${bracedUpper ?? upper ?? ""}} ${integrand}`,
  },
]);

/** Copy of `rule` whose pattern replaces every match. */
export function globalRule(rule: RewriteRule): RewriteRule {
  if (rule.pattern.global) return rule;
  return Object.freeze({ ...rule, pattern: new RegExp(rule.pattern.source, rule.pattern.flags + "g") });
}

function applyRule(text: string, rule: RewriteRule): string {
  const { pattern, replace } = rule;
  // Same call twice: String#replace has no overload taking the union.
  if (typeof replace === "string") return text.replace(pattern, replace);
  return text.replace(pattern, replace);
}

export function rewriteMath(text: string, rules: readonly RewriteRule[] = REWRITE_RULES): string {
  return rules.reduce(applyRule, text);
}
