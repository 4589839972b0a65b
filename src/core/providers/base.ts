export const DEFAULT_LANGUAGE = "eng";

export interface OcrEngine {
  readonly name: string;
  /** True for stand-ins whose output is not real recognition. */
  readonly placeholder?: boolean;
  recognize(imagePath: string, language: string): Promise<string>;
}

export function buildUserText(language: string): string {
  return language === DEFAULT_LANGUAGE
    ? "Transcribe all text in the image above."
    : `Transcribe all text in the image above.\n\nLanguage (tesseract code): ${language}`;
}

/** Build the user-turn content array for OpenAI-compatible APIs. */
export function buildOpenAIUserContent(imageDataUrl: string, language: string) {
  return [
    { type: "image_url" as const, image_url: { url: imageDataUrl, detail: "high" as const } },
    { type: "text" as const, text: buildUserText(language) },
  ];
}
