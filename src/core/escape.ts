/**
 * LaTeX special-character escaping.
 *
 * Substitution is a single pass over the original string: each character is
 * looked up once, so backslashes introduced by a replacement (e.g. `\&`) are
 * never seen by the `\` rule.
 */

export interface EscapeRule {
  readonly char: string;
  readonly replacement: string;
}

export const LATEX_ESCAPES: readonly EscapeRule[] = Object.freeze([
  { char: "&", replacement: "\\&" },
  { char: "%", replacement: "\\%" },
  { char: "$", replacement: "\\$" },
  { char: "#", replacement: "\\#" },
  { char: "_", replacement: "\\_" },
  { char: "{", replacement: "\\{" },
  { char: "}", replacement: "\\}" },
  { char: "~", replacement: "\\textasciitilde{}" },
  { char: "^", replacement: "\\textasciicircum{}" },
  { char: "\\", replacement: "\\textbackslash{}" },
]);

export function createEscaper(rules: readonly EscapeRule[]): (text: string) => string {
  const table = new Map<string, string>();
  for (const rule of rules) {
    if (!table.has(rule.char)) table.set(rule.char, rule.replacement);
  }
  if (table.size === 0) return (text) => text;

  const alternatives = [...table.keys()].map((c) => c.replace(/[.*+?^${}()|[\]\\-]/g, "\\$&"));
  const pattern = new RegExp(alternatives.join("|"), "g");
  return (text) => text.replace(pattern, (ch) => table.get(ch) ?? ch);
}

export const escapeLatex = createEscaper(LATEX_ESCAPES);
