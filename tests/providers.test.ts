/**
 * Tests that each vision engine sends the transcription prompt and the image,
 * passes the language hint, and maps missing credentials and API errors to
 * OcrError kinds.
 */

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TRANSCRIPTION_PROMPT } from "../src/core/prompt.js";

// ── Anthropic mock ────────────────────────────────────────────────────────────

const mockAnthropicCreate = vi.hoisted(() =>
  vi.fn().mockResolvedValue({
    content: [{ type: "text", text: "ocr result\n" }],
  })
);

vi.mock("@anthropic-ai/sdk", () => ({
  default: vi.fn().mockImplementation(function () {
    return { messages: { create: mockAnthropicCreate } };
  }),
}));

// ── OpenAI mock ───────────────────────────────────────────────────────────────

const mockOpenAICreate = vi.hoisted(() =>
  vi.fn().mockResolvedValue({
    choices: [{ message: { content: "  ocr result  " } }],
  })
);

vi.mock("openai", () => ({
  default: vi.fn().mockImplementation(function () {
    return { chat: { completions: { create: mockOpenAICreate } } };
  }),
}));

// ── Imports (must come after vi.mock calls) ───────────────────────────────────

import OpenAI from "openai";
import { AnthropicEngine } from "../src/core/providers/anthropic.js";
import { OpenAIEngine } from "../src/core/providers/openai.js";
import { OllamaEngine } from "../src/core/providers/ollama.js";

// base64 of "fake"
const FAKE_B64 = "ZmFrZQ==";

let dir: string;
let png: string;
let jpg: string;
let bmp: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "tex-ocr-providers-"));
  png = join(dir, "page.png");
  jpg = join(dir, "page.jpg");
  bmp = join(dir, "page.bmp");
  for (const file of [png, jpg, bmp]) writeFileSync(file, "fake");
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ── Helpers ───────────────────────────────────────────────────────────────────

type Part = { type: string; text?: string; image_url?: { url: string } };

/** Returns the content parts of the OpenAI user message. */
function openAIUserParts(): Part[] {
  const call = mockOpenAICreate.mock.calls[0][0];
  const userMessage = call.messages.find((m: { role: string }) => m.role === "user");
  return userMessage.content;
}

function openAISystemPrompt(): string {
  const call = mockOpenAICreate.mock.calls[0][0];
  return call.messages.find((m: { role: string }) => m.role === "system").content;
}

// ── AnthropicEngine ───────────────────────────────────────────────────────────

describe("AnthropicEngine", () => {
  it("sends the system prompt and the image as base64", async () => {
    const engine = new AnthropicEngine("test-key", "claude-test");
    const text = await engine.recognize(png, "eng");

    const call = mockAnthropicCreate.mock.calls[0][0];
    expect(text).toBe("ocr result");
    expect(call.model).toBe("claude-test");
    expect(call.system).toBe(TRANSCRIPTION_PROMPT);
    expect(call.messages[0].content[0]).toEqual({
      type: "image",
      source: { type: "base64", media_type: "image/png", data: FAKE_B64 },
    });
  });

  it("adds the language hint for non-default languages", async () => {
    const engine = new AnthropicEngine("test-key", "claude-test");
    await engine.recognize(jpg, "ind");

    const content = mockAnthropicCreate.mock.calls[0][0].messages[0].content;
    expect(content[0].source.media_type).toBe("image/jpeg");
    expect(content[1].text).toBe(
      "Transcribe all text in the image above.\n\nLanguage (tesseract code): ind"
    );
  });

  it("is unavailable without an API key", async () => {
    const engine = new AnthropicEngine("", "claude-test");
    await expect(engine.recognize(png, "eng")).rejects.toMatchObject({ kind: "engine-unavailable" });
    expect(mockAnthropicCreate).not.toHaveBeenCalled();
  });

  it("wraps API errors as execution failures", async () => {
    mockAnthropicCreate.mockRejectedValueOnce(new Error("rate limited"));
    const engine = new AnthropicEngine("test-key", "claude-test");

    await expect(engine.recognize(png, "eng")).rejects.toMatchObject({
      kind: "execution-failure",
      message: "Anthropic request (claude-test) failed: rate limited",
    });
  });

  it("rejects formats the API cannot take inline", async () => {
    const engine = new AnthropicEngine("test-key", "claude-test");
    await expect(engine.recognize(bmp, "eng")).rejects.toMatchObject({
      kind: "execution-failure",
      message: `Vision engines do not accept .bmp images: ${bmp}`,
    });
  });
});

// ── OpenAIEngine ──────────────────────────────────────────────────────────────

describe("OpenAIEngine", () => {
  it("sends the system prompt and a data URL", async () => {
    const engine = new OpenAIEngine("test-key", "gpt-test");
    const text = await engine.recognize(png, "eng");

    expect(text).toBe("ocr result");
    expect(openAISystemPrompt()).toBe(TRANSCRIPTION_PROMPT);
    const parts = openAIUserParts();
    expect(parts[0].image_url?.url).toBe(`data:image/png;base64,${FAKE_B64}`);
    expect(parts.at(-1)?.text).toBe("Transcribe all text in the image above.");
  });

  it("adds the language hint for non-default languages", async () => {
    const engine = new OpenAIEngine("test-key", "gpt-test");
    await engine.recognize(png, "deu");

    expect(openAIUserParts().at(-1)?.text).toContain("Language (tesseract code): deu");
  });

  it("is unavailable without an API key", async () => {
    const engine = new OpenAIEngine("", "gpt-test");
    await expect(engine.recognize(png, "eng")).rejects.toMatchObject({
      kind: "engine-unavailable",
      message: "OPENAI_API_KEY is not set",
    });
    expect(mockOpenAICreate).not.toHaveBeenCalled();
  });

  it("returns an empty string when the model sends no content", async () => {
    mockOpenAICreate.mockResolvedValueOnce({ choices: [] });
    const engine = new OpenAIEngine("test-key", "gpt-test");
    expect(await engine.recognize(png, "eng")).toBe("");
  });
});

// ── OllamaEngine ──────────────────────────────────────────────────────────────

describe("OllamaEngine", () => {
  it("points the OpenAI client at the host's /v1 endpoint", async () => {
    const engine = new OllamaEngine("http://localhost:11434/", "llama3.2-vision");
    await engine.recognize(png, "eng");

    expect(OpenAI).toHaveBeenCalledWith(
      expect.objectContaining({ apiKey: "ollama", baseURL: "http://localhost:11434/v1" })
    );
    expect(openAISystemPrompt()).toBe(TRANSCRIPTION_PROMPT);
  });

  it("is unavailable without a host", async () => {
    const engine = new OllamaEngine("", "llama3.2-vision");
    await expect(engine.recognize(png, "eng")).rejects.toMatchObject({ kind: "engine-unavailable" });
  });
});
