import type { DelimiterStyle } from "../core/converter.js";
import type { OcrEngine } from "../core/providers/base.js";
import { DEFAULT_LANGUAGE } from "../core/providers/base.js";
import { TesseractEngine } from "../core/providers/tesseract.js";
import { SampleTextEngine } from "../core/providers/sample.js";
import { OpenAIEngine } from "../core/providers/openai.js";
import { AnthropicEngine } from "../core/providers/anthropic.js";
import { OllamaEngine } from "../core/providers/ollama.js";
import { DEFAULT_AUTHOR, DEFAULT_TITLE } from "../core/document.js";

export const ENGINE_NAMES = ["tesseract", "openai", "anthropic", "ollama", "sample"] as const;
export type EngineName = (typeof ENGINE_NAMES)[number];

export interface TexOcrSettings {
  engine: EngineName;
  /** Tesseract language code, e.g. "eng" or "ind". Passed to vision engines as a hint. */
  language: string;
  /** Explicit tesseract binary. Empty = search the usual install locations. */
  tesseractPath: string;
  pageSegMode: number;
  /** Upper bound on a single OCR call. */
  timeoutMs: number;
  /** Use the sample-text stand-in when the engine is unavailable or fails. */
  fallback: boolean;
  openaiApiKey: string;
  openaiModel: string;
  anthropicApiKey: string;
  anthropicModel: string;
  /** Ollama server URL, e.g. "http://localhost:11434" or a remote host */
  ollamaHost: string;
  ollamaModel: string;
  delimiters: DelimiterStyle;
  /** Body-only output file. */
  outputPath: string;
  /** Full-document output file. */
  previewPath: string;
  documentTitle: string;
  documentAuthor: string;
  /** Print the body to stdout instead of writing files. */
  stdoutOnly: boolean;
}

export const DEFAULT_SETTINGS: Readonly<TexOcrSettings> = Object.freeze({
  engine: "tesseract",
  language: DEFAULT_LANGUAGE,
  tesseractPath: "",
  pageSegMode: 6,
  timeoutMs: 60_000,
  fallback: true,
  openaiApiKey: "",
  openaiModel: "gpt-4o",
  anthropicApiKey: "",
  anthropicModel: "claude-sonnet-4-5",
  ollamaHost: "http://localhost:11434",
  ollamaModel: "llama3.2-vision",
  delimiters: "brackets",
  outputPath: "output.tex",
  previewPath: "preview.tex",
  documentTitle: DEFAULT_TITLE,
  documentAuthor: DEFAULT_AUTHOR,
  stdoutOnly: false,
});

export function isEngineName(value: string): value is EngineName {
  return ENGINE_NAMES.some((name) => name === value);
}

export function parseEngineName(value: string): EngineName {
  const name = value.toLowerCase();
  if (!isEngineName(name)) {
    throw new Error(`Unknown OCR engine: ${value} (expected one of ${ENGINE_NAMES.join(", ")})`);
  }
  return name;
}

export function parsePositiveInt(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`${label} must be a positive integer, got "${value}"`);
  return n;
}

/** Settings taken from environment variables; unset or empty variables are omitted. */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<TexOcrSettings> {
  const out: Partial<TexOcrSettings> = {};
  const get = (key: string): string | undefined => env[key]?.trim() || undefined;

  const engine = get("TEX_OCR_ENGINE");
  if (engine) out.engine = parseEngineName(engine);
  const language = get("TEX_OCR_LANG");
  if (language) out.language = language;
  const tesseractPath = get("TESSERACT_PATH");
  if (tesseractPath) out.tesseractPath = tesseractPath;
  const psm = get("TESSERACT_PSM");
  if (psm) out.pageSegMode = parsePositiveInt(psm, "TESSERACT_PSM");
  const timeout = get("TEX_OCR_TIMEOUT_MS");
  if (timeout) out.timeoutMs = parsePositiveInt(timeout, "TEX_OCR_TIMEOUT_MS");

  const openaiApiKey = get("OPENAI_API_KEY");
  if (openaiApiKey) out.openaiApiKey = openaiApiKey;
  const openaiModel = get("OPENAI_MODEL");
  if (openaiModel) out.openaiModel = openaiModel;
  const anthropicApiKey = get("ANTHROPIC_API_KEY");
  if (anthropicApiKey) out.anthropicApiKey = anthropicApiKey;
  const anthropicModel = get("ANTHROPIC_MODEL");
  if (anthropicModel) out.anthropicModel = anthropicModel;
  const ollamaHost = get("OLLAMA_HOST");
  if (ollamaHost) out.ollamaHost = ollamaHost;
  const ollamaModel = get("OLLAMA_MODEL");
  if (ollamaModel) out.ollamaModel = ollamaModel;

  return out;
}

/** Later layers win. The result is frozen. */
export function resolveSettings(...layers: Partial<TexOcrSettings>[]): Readonly<TexOcrSettings> {
  let merged: TexOcrSettings = { ...DEFAULT_SETTINGS };
  for (const layer of layers) merged = { ...merged, ...layer };
  return Object.freeze(merged);
}

/** `env` supplies the PATH searched for the tesseract binary. */
export function buildEngine(settings: Readonly<TexOcrSettings>, env: NodeJS.ProcessEnv = process.env): OcrEngine {
  const s = settings;
  switch (s.engine) {
    case "tesseract":
      return new TesseractEngine({
        binaryPath: s.tesseractPath,
        pageSegMode: s.pageSegMode,
        timeoutMs: s.timeoutMs,
        env,
      });
    case "openai":
      return new OpenAIEngine(s.openaiApiKey, s.openaiModel, s.timeoutMs);
    case "anthropic":
      return new AnthropicEngine(s.anthropicApiKey, s.anthropicModel, s.timeoutMs);
    case "ollama":
      return new OllamaEngine(s.ollamaHost, s.ollamaModel, s.timeoutMs);
    case "sample":
      return new SampleTextEngine();
  }
}
