import OpenAI from "openai";
import type { OcrEngine } from "./base.js";
import { buildOpenAIUserContent } from "./base.js";
import { TRANSCRIPTION_PROMPT } from "../prompt.js";
import { readImageBase64, toDataUrl } from "../image.js";
import { OcrError, toOcrError } from "../errors.js";

export class OpenAIEngine implements OcrEngine {
  readonly name = "openai";
  private client: OpenAI | null;
  private model: string;

  constructor(apiKey: string, model: string, timeoutMs?: number) {
    this.client = apiKey ? new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 }) : null;
    this.model = model;
  }

  async recognize(imagePath: string, language: string): Promise<string> {
    if (!this.client) throw new OcrError("engine-unavailable", "OPENAI_API_KEY is not set");

    const dataUrl = toDataUrl(await readImageBase64(imagePath));
    const userContent = buildOpenAIUserContent(dataUrl, language);

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: 4096,
        messages: [
          { role: "system", content: TRANSCRIPTION_PROMPT },
          { role: "user", content: userContent },
        ],
      });
      return (response.choices[0]?.message?.content ?? "").trim();
    } catch (err) {
      throw toOcrError(err, `OpenAI request (${this.model})`);
    }
  }
}
