/**
 * Orchestrates: image path → OCR engine (with one fallback) → LaTeX body.
 */

import { stat } from "node:fs/promises";
import type { OcrEngine } from "./providers/base.js";
import { DEFAULT_LANGUAGE } from "./providers/base.js";
import { SUPPORTED_EXTENSIONS, imageExtension } from "./image.js";
import { OcrError, errorMessage, toOcrError } from "./errors.js";
import { LatexConverter, type ConverterOptions } from "./converter.js";
import { wrapDocument, type DocumentOptions } from "./document.js";

export interface RecognizeOptions {
  language?: string;
  /** Engine tried once when the primary one is unavailable or fails. `null` disables the fallback. */
  fallback?: OcrEngine | null;
  log?: Pick<Console, "warn">;
}

export interface Recognition {
  text: string;
  /** Name of the engine that produced `text`. */
  engine: string;
  /** True when `text` came from a placeholder rather than real recognition. */
  degraded: boolean;
}

export async function assertReadableImage(imagePath: string): Promise<void> {
  const info = await stat(imagePath).catch(() => null);
  if (!info) throw new OcrError("invalid-input", `Image not found: ${imagePath}`);
  if (!info.isFile()) throw new OcrError("invalid-input", `Not a file: ${imagePath}`);

  const ext = imageExtension(imagePath);
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new OcrError("invalid-input", `Unsupported image extension: .${ext || "(none)"}`);
  }
}

export async function recognizeImage(
  imagePath: string,
  engine: OcrEngine,
  { language = DEFAULT_LANGUAGE, fallback = null, log = console }: RecognizeOptions = {}
): Promise<Recognition> {
  await assertReadableImage(imagePath);

  try {
    const text = await engine.recognize(imagePath, language);
    return { text, engine: engine.name, degraded: engine.placeholder === true };
  } catch (err) {
    const primaryError = toOcrError(err, `${engine.name} recognition`);
    if (!fallback || primaryError.kind === "invalid-input") throw primaryError;
    return recognizeWithFallback(imagePath, language, engine.name, primaryError, fallback, log);
  }
}

async function recognizeWithFallback(
  imagePath: string,
  language: string,
  engineName: string,
  primaryError: OcrError,
  fallback: OcrEngine,
  log: Pick<Console, "warn">
): Promise<Recognition> {
  const note = fallback.placeholder ? " (placeholder output)" : "";
  log.warn(`[tex-ocr] ${primaryError.message}; falling back to ${fallback.name}${note}`);
  try {
    const text = await fallback.recognize(imagePath, language);
    return { text, engine: fallback.name, degraded: true };
  } catch (err) {
    throw new OcrError(
      "execution-failure",
      `${engineName} failed (${primaryError.message}) and fallback ${fallback.name} failed (${errorMessage(err)})`,
      { cause: err }
    );
  }
}

export interface ImageToLatexOptions extends RecognizeOptions {
  converter?: ConverterOptions;
  document?: DocumentOptions;
}

export interface ImageToLatexResult {
  recognition: Recognition;
  /** Converted body only. */
  latex: string;
  /** `latex` wrapped in a compilable article. */
  document: string;
}

export async function imageToLatex(
  imagePath: string,
  engine: OcrEngine,
  options: ImageToLatexOptions = {}
): Promise<ImageToLatexResult> {
  const recognition = await recognizeImage(imagePath, engine, options);
  const latex = new LatexConverter(options.converter).convert(recognition.text);
  const document = wrapDocument(latex, { source: imagePath, ...options.document });
  return { recognition, latex, document };
}
