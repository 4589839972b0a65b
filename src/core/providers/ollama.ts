import OpenAI from "openai";
import type { OcrEngine } from "./base.js";
import { buildOpenAIUserContent } from "./base.js";
import { TRANSCRIPTION_PROMPT } from "../prompt.js";
import { readImageBase64, toDataUrl } from "../image.js";
import { OcrError, toOcrError } from "../errors.js";

/** Talks to Ollama through its OpenAI-compatible endpoint. */
export class OllamaEngine implements OcrEngine {
  readonly name = "ollama";
  private client: OpenAI | null;
  private model: string;

  constructor(host: string, model: string, timeoutMs?: number) {
    this.client = host
      ? new OpenAI({
          apiKey: "ollama",
          baseURL: `${host.replace(/\/+$/, "")}/v1`,
          timeout: timeoutMs,
          maxRetries: 0,
        })
      : null;
    this.model = model;
  }

  async recognize(imagePath: string, language: string): Promise<string> {
    if (!this.client) throw new OcrError("engine-unavailable", "OLLAMA_HOST is not set");

    const dataUrl = toDataUrl(await readImageBase64(imagePath));
    const userContent = buildOpenAIUserContent(dataUrl, language);

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: TRANSCRIPTION_PROMPT },
          { role: "user", content: userContent },
        ],
      });
      return (response.choices[0]?.message?.content ?? "").trim();
    } catch (err) {
      throw toOcrError(err, `Ollama request (${this.model})`);
    }
  }
}
