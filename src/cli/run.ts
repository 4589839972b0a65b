/**
 * Command-line front end: image → OCR → LaTeX body + compilable preview.
 *
 * Status messages go to stderr; the converted body goes to stdout.
 *
 * Usage:
 *   tex-ocr equation.png
 *   tex-ocr equation.png ind --out result.tex
 *   OPENAI_API_KEY=... tex-ocr notes.jpg --engine openai --dollars
 *
 * Environment variables:
 *   TEX_OCR_ENGINE     tesseract (default), openai, anthropic, ollama or sample
 *   TEX_OCR_LANG       default: eng
 *   TESSERACT_PATH     explicit tesseract binary
 *   TESSERACT_PSM      default: 6
 *   TEX_OCR_TIMEOUT_MS default: 60000
 *   OPENAI_API_KEY / OPENAI_MODEL, ANTHROPIC_API_KEY / ANTHROPIC_MODEL,
 *   OLLAMA_HOST / OLLAMA_MODEL
 */

import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { imageToLatex, type ImageToLatexResult } from "../core/ocr.js";
import { OcrError, errorMessage } from "../core/errors.js";
import { SampleTextEngine } from "../core/providers/sample.js";
import {
  buildEngine,
  parseEngineName,
  parsePositiveInt,
  resolveSettings,
  settingsFromEnv,
  type TexOcrSettings,
} from "./settings.js";

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

const consoleIo: CliIo = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export const USAGE = `\
Usage: tex-ocr <image> [language] [options]

Options:
  -e, --engine <name>    tesseract | openai | anthropic | ollama | sample
  -l, --lang <code>      OCR language code (default: eng)
  -o, --out <file>       body-only output (default: output.tex)
  -p, --preview <file>   full document output (default: preview.tex)
      --title <text>     document title
      --author <text>    document author
      --dollars          use $$ … $$ and $ … $ instead of \\[ … \\] and \\( … \\)
      --no-fallback      fail instead of using placeholder sample text
      --timeout <ms>     OCR timeout in milliseconds
      --stdout           print the body only; write no files
  -h, --help             show this help`;

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      engine: { type: "string", short: "e" },
      lang: { type: "string", short: "l" },
      out: { type: "string", short: "o" },
      preview: { type: "string", short: "p" },
      title: { type: "string" },
      author: { type: "string" },
      dollars: { type: "boolean" },
      "no-fallback": { type: "boolean" },
      timeout: { type: "string" },
      stdout: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

type ParsedCli = ReturnType<typeof parseCli>;

function flagSettings({ values, positionals }: ParsedCli): Partial<TexOcrSettings> {
  const out: Partial<TexOcrSettings> = {};
  if (values.engine) out.engine = parseEngineName(values.engine);
  const language = values.lang ?? positionals[1];
  if (language) out.language = language;
  if (values.out) out.outputPath = values.out;
  if (values.preview) out.previewPath = values.preview;
  if (values.title) out.documentTitle = values.title;
  if (values.author) out.documentAuthor = values.author;
  if (values.dollars) out.delimiters = "dollars";
  if (values["no-fallback"]) out.fallback = false;
  if (values.timeout) out.timeoutMs = parsePositiveInt(values.timeout, "--timeout");
  if (values.stdout) out.stdoutOnly = true;
  return out;
}

export async function run(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIo = consoleIo
): Promise<number> {
  let parsed: ParsedCli;
  let settings: Readonly<TexOcrSettings>;
  try {
    parsed = parseCli(argv);
    settings = resolveSettings(settingsFromEnv(env), flagSettings(parsed));
  } catch (err) {
    io.stderr(errorMessage(err));
    io.stderr(USAGE);
    return 2;
  }

  if (parsed.values.help) {
    io.stdout(USAGE);
    return 0;
  }

  const imagePath = parsed.positionals[0];
  if (!imagePath) {
    io.stderr(USAGE);
    return 2;
  }

  io.stderr(`Image    : ${imagePath}`);
  io.stderr(`Engine   : ${settings.engine}`);
  io.stderr(`Language : ${settings.language}`);

  const engine = buildEngine(settings, env);
  const fallback = settings.fallback && !engine.placeholder ? new SampleTextEngine() : null;

  let result: ImageToLatexResult;
  try {
    result = await imageToLatex(imagePath, engine, {
      language: settings.language,
      fallback,
      log: { warn: (...data: unknown[]) => io.stderr(data.map(String).join(" ")) },
      converter: { delimiters: settings.delimiters },
      document: { title: settings.documentTitle, author: settings.documentAuthor },
    });
  } catch (err) {
    const kind = err instanceof OcrError ? err.kind : "error";
    io.stderr(`[tex-ocr] ${kind}: ${errorMessage(err)}`);
    return 1;
  }

  if (result.recognition.degraded) {
    io.stderr(
      `[tex-ocr] WARNING: text comes from the ${result.recognition.engine} placeholder, not from the image`
    );
  }
  io.stderr(`\nRecognised text:\n${result.recognition.text}\n`);
  io.stdout(result.latex);

  if (settings.stdoutOnly) return 0;

  try {
    await writeFile(settings.outputPath, result.latex, "utf8");
    io.stderr(`\nBody saved to     : ${settings.outputPath}`);
    await writeFile(settings.previewPath, result.document, "utf8");
    io.stderr(`Document saved to : ${settings.previewPath}`);
  } catch (err) {
    io.stderr(`[tex-ocr] could not write output: ${errorMessage(err)}`);
    return 1;
  }
  io.stderr(`Compile with      : pdflatex ${settings.previewPath}`);
  return 0;
}
