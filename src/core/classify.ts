/**
 * Decides whether an escaped line of OCR text is prose, display math or
 * inline math. Checks run in a fixed order and the first match wins.
 */

export type LineKind = "prose" | "display" | "inline";

export interface ClassifierRules {
  /** Characters counted as math-like, in addition to Unicode decimal digits. */
  readonly mathSymbols: string;
  /** A line whose math-like share of non-whitespace characters exceeds this is display math. */
  readonly mathRatio: number;
  readonly displayPatterns: readonly RegExp[];
  readonly inlinePatterns: readonly RegExp[];
}

export const MATH_FUNCTIONS = Object.freeze([
  "sin",
  "cos",
  "tan",
  "log",
  "ln",
  "lim",
  "sum",
  "prod",
  "int",
] as const);

export const DEFAULT_CLASSIFIER_RULES: ClassifierRules = Object.freeze({
  mathSymbols: "=+-*/^()[]{}<>|±×÷∂∆∇∫∑∏√∞≈≠≤≥αβγδϵζηθικλμνξπρστυϕχψω",
  mathRatio: 0.6,
  displayPatterns: Object.freeze([
    /[=+\-*\/^()\[\]]/, // operators and brackets
    /\d+[+\-*\/]\d+/,
    /[a-zA-Z]\s*=\s*\d+/,
    /[a-zA-Z]\([^)]+\)/, // call-like: f(x)
    new RegExp(`\\b(?:${MATH_FUNCTIONS.join("|")})\\b`),
  ]),
  inlinePatterns: Object.freeze([
    /^[a-zA-Z]\s*=\s*.+$/,
    /^.+\^.+\s*=.+$/,
    /^[xyz]\s*=\s*\d+$/,
  ]),
});

/** Copy of `pattern` without the `g` and `y` flags, so `test` keeps no `lastIndex` between lines. */
function statelessPattern(pattern: RegExp): RegExp {
  return pattern.global || pattern.sticky ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "")) : pattern;
}

export function normalizeClassifierRules(rules: ClassifierRules): ClassifierRules {
  return Object.freeze({
    mathSymbols: rules.mathSymbols,
    mathRatio: rules.mathRatio,
    displayPatterns: Object.freeze(rules.displayPatterns.map(statelessPattern)),
    inlinePatterns: Object.freeze(rules.inlinePatterns.map(statelessPattern)),
  });
}

const DIGIT = /^\p{Nd}$/u;
const WHITESPACE = /^\s$/u;

/** Share of non-whitespace characters that are digits or math symbols; 0 for a blank line. */
export function mathCharRatio(text: string, symbols = DEFAULT_CLASSIFIER_RULES.mathSymbols): number {
  const symbolSet = new Set(symbols);
  let total = 0;
  let math = 0;
  for (const ch of text) {
    if (WHITESPACE.test(ch)) continue;
    total++;
    if (symbolSet.has(ch) || DIGIT.test(ch)) math++;
  }
  return total === 0 ? 0 : math / total;
}

export function isDisplayMath(text: string, rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES): boolean {
  // Escaping leaves a backslash behind for every special character.
  if (text.includes("\\")) return true;
  if (mathCharRatio(text, rules.mathSymbols) > rules.mathRatio) return true;
  return rules.displayPatterns.some((p) => p.test(text));
}

export function isInlineMath(text: string, rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES): boolean {
  return rules.inlinePatterns.some((p) => p.test(text));
}

export function classifyLine(text: string, rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES): LineKind {
  if (isDisplayMath(text, rules)) return "display";
  if (isInlineMath(text, rules)) return "inline";
  return "prose";
}
