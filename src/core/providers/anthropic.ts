import Anthropic from "@anthropic-ai/sdk";
import type { OcrEngine } from "./base.js";
import { buildUserText } from "./base.js";
import { TRANSCRIPTION_PROMPT } from "../prompt.js";
import { readImageBase64 } from "../image.js";
import { OcrError, toOcrError } from "../errors.js";

export class AnthropicEngine implements OcrEngine {
  readonly name = "anthropic";
  private client: Anthropic | null;
  private model: string;

  constructor(apiKey: string, model: string, timeoutMs?: number) {
    this.client = apiKey ? new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 }) : null;
    this.model = model;
  }

  async recognize(imagePath: string, language: string): Promise<string> {
    if (!this.client) throw new OcrError("engine-unavailable", "ANTHROPIC_API_KEY is not set");

    const { mime, base64 } = await readImageBase64(imagePath);
    const content: Anthropic.MessageParam["content"] = [
      { type: "image", source: { type: "base64", media_type: mime, data: base64 } },
      { type: "text", text: buildUserText(language) },
    ];

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 4096,
        system: TRANSCRIPTION_PROMPT,
        messages: [{ role: "user", content }],
      });
      const block = response.content[0];
      return block?.type === "text" ? block.text.trim() : "";
    } catch (err) {
      throw toOcrError(err, `Anthropic request (${this.model})`);
    }
  }
}
