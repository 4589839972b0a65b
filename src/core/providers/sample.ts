import type { OcrEngine } from "./base.js";

export const SAMPLE_TEXT = "E = mc^2\n\n∫ from 0 to 1 x^2 dx = 1/3\n\nlim x→∞ (1 + 1/x)^x = e";

/** Deterministic stand-in for demos and as the fallback when real OCR is unavailable. */
export class SampleTextEngine implements OcrEngine {
  readonly name = "sample";
  readonly placeholder = true;

  async recognize(): Promise<string> {
    return SAMPLE_TEXT;
  }
}
