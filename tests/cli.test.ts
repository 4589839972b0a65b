/**
 * Tests for the CLI entry point, run against the sample engine and a
 * tesseract path that does not exist.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { run, USAGE, type CliIo } from "../src/cli/run.js";

const SAMPLE_BODY = [
  String.raw`\[ E = mc^{2} \]`,
  String.raw`\[ ∫ from 0 to 1 x^{2} dx = \frac{1}{3} \]`,
  String.raw`\[ \lim x→∞ (1 + 1/x)\textasciicircum{}x = e \]`,
].join("\n");

let dir: string;
let image: string;
let out: string;
let preview: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "tex-ocr-cli-"));
  image = join(dir, "equation.png");
  writeFileSync(image, "fake");
  out = join(dir, "body.tex");
  preview = join(dir, "preview.tex");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function captureIo(): CliIo & { out: string[]; err: string[] } {
  const captured = { out: [] as string[], err: [] as string[] };
  return {
    ...captured,
    stdout: (text) => captured.out.push(text),
    stderr: (text) => captured.err.push(text),
  };
}

// ── Argument handling ─────────────────────────────────────────────────────────

describe("arguments", () => {
  it("prints usage for --help", async () => {
    const io = captureIo();
    expect(await run(["--help"], {}, io)).toBe(0);
    expect(io.out).toEqual([USAGE]);
  });

  it("exits with 2 when no image is given", async () => {
    const io = captureIo();
    expect(await run([], {}, io)).toBe(2);
    expect(io.err).toEqual([USAGE]);
  });

  it("exits with 2 for an unknown engine", async () => {
    const io = captureIo();
    expect(await run([image, "--engine", "bogus"], {}, io)).toBe(2);
    expect(io.err[0]).toBe(
      "Unknown OCR engine: bogus (expected one of tesseract, openai, anthropic, ollama, sample)"
    );
  });

  it("exits with 2 for an unknown option", async () => {
    const io = captureIo();
    expect(await run([image, "--wat"], {}, io)).toBe(2);
    expect(io.err.at(-1)).toBe(USAGE);
  });
});

// ── Conversion ────────────────────────────────────────────────────────────────

describe("conversion", () => {
  it("writes the body and the preview document", async () => {
    const io = captureIo();
    const code = await run([image, "--engine", "sample", "--out", out, "--preview", preview], {}, io);

    expect(code).toBe(0);
    expect(io.out).toEqual([SAMPLE_BODY]);
    expect(readFileSync(out, "utf8")).toBe(SAMPLE_BODY);

    const doc = readFileSync(preview, "utf8");
    expect(doc).toContain(String.raw`\title{OCR to LaTeX Conversion}`);
    expect(doc).toContain(`% Converted from ${image}\n${SAMPLE_BODY}\n`);
    expect(io.err).toContain(
      "[tex-ocr] WARNING: text comes from the sample placeholder, not from the image"
    );
  });

  it("uses dollar delimiters and a custom title", async () => {
    const io = captureIo();
    await run([image, "-e", "sample", "--dollars", "--title", "Homework", "-o", out, "-p", preview], {}, io);

    expect(readFileSync(out, "utf8").split("\n")[0]).toBe("$$ E = mc^{2} $$");
    expect(readFileSync(preview, "utf8")).toContain(String.raw`\title{Homework}`);
  });

  it("writes no files with --stdout", async () => {
    const io = captureIo();
    const code = await run([image, "--engine", "sample", "--stdout", "--out", out, "--preview", preview], {}, io);

    expect(code).toBe(0);
    expect(io.out).toEqual([SAMPLE_BODY]);
    expect(existsSync(out)).toBe(false);
    expect(existsSync(preview)).toBe(false);
  });

  it("takes the language from the second positional argument", async () => {
    const io = captureIo();
    await run([image, "ind", "--engine", "sample", "--stdout"], {}, io);
    expect(io.err).toContain("Language : ind");
  });
});

// ── Failures and fallback ─────────────────────────────────────────────────────

describe("failures", () => {
  it("falls back to the sample text when tesseract is missing", async () => {
    const io = captureIo();
    const env = { TESSERACT_PATH: join(dir, "no-tesseract") };
    const code = await run([image, "--out", out, "--preview", preview], env, io);

    expect(code).toBe(0);
    expect(io.err).toContain(
      "[tex-ocr] tesseract was not found on this system; falling back to sample (placeholder output)"
    );
    expect(readFileSync(out, "utf8")).toBe(SAMPLE_BODY);
  });

  it("fails with --no-fallback when tesseract is missing", async () => {
    const io = captureIo();
    const env = { TESSERACT_PATH: join(dir, "no-tesseract") };
    const code = await run([image, "--no-fallback", "--out", out], env, io);

    expect(code).toBe(1);
    expect(io.err.at(-1)).toBe("[tex-ocr] engine-unavailable: tesseract was not found on this system");
    expect(existsSync(out)).toBe(false);
  });

  it("fails fast on a missing image", async () => {
    const io = captureIo();
    const missing = join(dir, "missing.png");
    const code = await run([missing, "--engine", "sample"], {}, io);

    expect(code).toBe(1);
    expect(io.err.at(-1)).toBe(`[tex-ocr] invalid-input: Image not found: ${missing}`);
  });
});
