/**
 * Image file helpers shared by the OCR orchestrator and the vision engines.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { OcrError } from "./errors.js";

/** Formats the vision APIs accept inline. */
export type ImageMime = "image/png" | "image/jpeg" | "image/webp" | "image/gif";

const MIME: Record<string, ImageMime> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  webp: "image/webp",
  gif: "image/gif",
};

/** Everything tesseract reads through leptonica. */
export const SUPPORTED_EXTENSIONS = new Set([
  ...Object.keys(MIME),
  "bmp",
  "tif",
  "tiff",
  "pnm",
  "pbm",
  "pgm",
  "ppm",
]);

export function imageExtension(imagePath: string): string {
  return extname(imagePath).slice(1).toLowerCase();
}

export function extensionToMime(ext: string): ImageMime | undefined {
  return MIME[ext.toLowerCase()];
}

export interface EncodedImage {
  mime: ImageMime;
  base64: string;
}

export async function readImageBase64(imagePath: string): Promise<EncodedImage> {
  const ext = imageExtension(imagePath);
  const mime = extensionToMime(ext);
  if (!mime) {
    throw new OcrError("execution-failure", `Vision engines do not accept .${ext} images: ${imagePath}`);
  }
  const buf = await readFile(imagePath);
  return { mime, base64: buf.toString("base64") };
}

export function toDataUrl({ mime, base64 }: EncodedImage): string {
  return `data:${mime};base64,${base64}`;
}
