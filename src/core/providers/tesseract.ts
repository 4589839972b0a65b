/**
 * Runs the tesseract CLI as a child process.
 *
 * The binary is located once, when the engine is constructed; an engine built
 * without one reports itself unavailable on every call.
 */

import { execFile } from "node:child_process";
import { accessSync, constants, statSync } from "node:fs";
import { delimiter, isAbsolute, join } from "node:path";
import type { OcrEngine } from "./base.js";
import { OcrError } from "../errors.js";

export const TESSERACT_CANDIDATES: readonly string[] = Object.freeze([
  "tesseract",
  "/usr/bin/tesseract",
  "/usr/local/bin/tesseract",
  "/opt/homebrew/bin/tesseract",
  "C:\\Program Files\\Tesseract-OCR\\tesseract.exe",
]);

export interface TesseractOptions {
  /** Explicit binary path. When empty, TESSERACT_CANDIDATES are searched. */
  binaryPath?: string;
  /** Page segmentation mode (`--psm`). 6 = a single uniform block of text. */
  pageSegMode?: number;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** Resolve the first candidate that is an executable file, searching PATH for bare names. */
export function locateExecutable(
  candidates: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): string | null {
  const dirs = (env.PATH ?? "").split(delimiter).filter(Boolean);
  const suffixes = process.platform === "win32" ? ["", ".exe"] : [""];

  for (const candidate of candidates) {
    if (isAbsolute(candidate) || /[\\/]/.test(candidate)) {
      if (isExecutableFile(candidate)) return candidate;
      continue;
    }
    for (const dir of dirs) {
      for (const suffix of suffixes) {
        const full = join(dir, candidate + suffix);
        if (isExecutableFile(full)) return full;
      }
    }
  }
  return null;
}

export class TesseractEngine implements OcrEngine {
  readonly name = "tesseract";
  readonly binaryPath: string | null;
  readonly pageSegMode: number;
  readonly timeoutMs: number;

  constructor(options: TesseractOptions = {}) {
    const candidates = options.binaryPath ? [options.binaryPath] : TESSERACT_CANDIDATES;
    this.binaryPath = locateExecutable(candidates, options.env);
    this.pageSegMode = options.pageSegMode ?? 6;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    Object.freeze(this);
  }

  recognize(imagePath: string, language: string): Promise<string> {
    const binary = this.binaryPath;
    if (!binary) {
      return Promise.reject(new OcrError("engine-unavailable", "tesseract was not found on this system"));
    }

    const args = [imagePath, "stdout", "-l", language, "--psm", String(this.pageSegMode)];
    return new Promise((resolve, reject) => {
      execFile(
        binary,
        args,
        { encoding: "utf8", timeout: this.timeoutMs, maxBuffer: 16 * 1024 * 1024, windowsHide: true },
        (error, stdout, stderr) => {
          if (!error) {
            resolve(stdout.trim());
            return;
          }
          if (error.code === "ENOENT") {
            reject(new OcrError("engine-unavailable", `tesseract could not be started: ${binary}`, { cause: error }));
          } else if (error.killed) {
            reject(new OcrError("execution-failure", `tesseract timed out after ${this.timeoutMs} ms`, { cause: error }));
          } else {
            const detail = stderr.trim() || error.message;
            reject(new OcrError("execution-failure", `tesseract failed on ${imagePath}: ${detail}`, { cause: error }));
          }
        }
      );
    });
  }
}
