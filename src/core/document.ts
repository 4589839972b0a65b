import { escapeLatex } from "./escape.js";

export interface DocumentOptions {
  title?: string;
  author?: string;
  /** Name of the source image, recorded in a comment above the body. */
  source?: string;
}

export const DEFAULT_TITLE = "OCR to LaTeX Conversion";
export const DEFAULT_AUTHOR = "tex-ocr";

/**
 * Embed a converted body in a minimal article that compiles with pdflatex.
 * Exported as a pure function; writing the file is the caller's job.
 */
export function wrapDocument(body: string, options: DocumentOptions = {}): string {
  const title = escapeLatex(options.title ?? DEFAULT_TITLE);
  const author = escapeLatex(options.author ?? DEFAULT_AUTHOR);
  // A newline in the source name would end the comment early.
  const source = options.source ? options.source.replace(/[\r\n]+/g, " ") : "image";

  const lines = [
    "\\documentclass{article}",
    "\\usepackage{amsmath}",
    "\\usepackage{amssymb}",
    "\\usepackage[utf8]{inputenc}",
    "\\usepackage{graphicx}",
    "\\begin{document}",
    "",
    `\\title{${title}}`,
    `\\author{${author}}`,
    "\\maketitle",
    "",
    `% Converted from ${source}`,
    body,
    "",
    "\\end{document}",
  ];
  return lines.join("\n") + "\n";
}
