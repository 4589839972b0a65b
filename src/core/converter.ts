/**
 * Orchestrates escape → classify → rewrite for each line of OCR text.
 */

import { escapeLatex } from "./escape.js";
import {
  classifyLine,
  normalizeClassifierRules,
  DEFAULT_CLASSIFIER_RULES,
  type ClassifierRules,
  type LineKind,
} from "./classify.js";
import { globalRule, rewriteMath, REWRITE_RULES, type RewriteRule } from "./rewrite.js";

export type DelimiterStyle = "brackets" | "dollars";

export interface ConverterOptions {
  /** `brackets`: `\[ … \]` and `\( … \)`. `dollars`: `$$ … $$` and `$ … $`. */
  delimiters?: DelimiterStyle;
  classifier?: ClassifierRules;
  rewriteRules?: readonly RewriteRule[];
}

export interface ConvertedLine {
  /** Trimmed input line, before escaping. */
  source: string;
  kind: LineKind;
  latex: string;
}

type Delimiters = Readonly<Record<Exclude<LineKind, "prose">, readonly [string, string]>>;

const DELIMITERS: Readonly<Record<DelimiterStyle, Delimiters>> = {
  brackets: { display: ["\\[", "\\]"], inline: ["\\(", "\\)"] },
  dollars: { display: ["$$", "$$"], inline: ["$", "$"] },
};

export class LatexConverter {
  private readonly delimiters: Delimiters;
  private readonly classifier: ClassifierRules;
  private readonly rewriteRules: readonly RewriteRule[];

  constructor(options: ConverterOptions = {}) {
    this.delimiters = DELIMITERS[options.delimiters ?? "brackets"];
    this.classifier = options.classifier ? normalizeClassifierRules(options.classifier) : DEFAULT_CLASSIFIER_RULES;
    this.rewriteRules = options.rewriteRules ? Object.freeze(options.rewriteRules.map(globalRule)) : REWRITE_RULES;
    Object.freeze(this);
  }

  convertLines(text: string): ConvertedLine[] {
    const out: ConvertedLine[] = [];
    for (const raw of text.split(/\r\n|\r|\n/)) {
      const source = raw.trim();
      if (!source) continue;

      const escaped = escapeLatex(source);
      const kind = classifyLine(escaped, this.classifier);
      if (kind === "prose") {
        out.push({ source, kind, latex: escaped });
      } else {
        const [open, close] = this.delimiters[kind];
        const math = rewriteMath(escaped, this.rewriteRules);
        out.push({ source, kind, latex: `${open} ${math} ${close}` });
      }
    }
    return out;
  }

  convert(text: string): string {
    return this.convertLines(text)
      .map((line) => line.latex)
      .join("\n");
  }
}

export function convertToLatex(text: string, options?: ConverterOptions): string {
  return new LatexConverter(options).convert(text);
}
