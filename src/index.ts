export { escapeLatex, createEscaper, LATEX_ESCAPES, type EscapeRule } from "./core/escape.js";
export {
  classifyLine,
  isDisplayMath,
  isInlineMath,
  mathCharRatio,
  DEFAULT_CLASSIFIER_RULES,
  MATH_FUNCTIONS,
  type ClassifierRules,
  type LineKind,
} from "./core/classify.js";
export { rewriteMath, REWRITE_RULES, type RewriteRule } from "./core/rewrite.js";
export {
  LatexConverter,
  convertToLatex,
  type ConvertedLine,
  type ConverterOptions,
  type DelimiterStyle,
} from "./core/converter.js";
export { wrapDocument, DEFAULT_AUTHOR, DEFAULT_TITLE, type DocumentOptions } from "./core/document.js";
export { OcrError, type OcrErrorKind } from "./core/errors.js";
export {
  recognizeImage,
  imageToLatex,
  type Recognition,
  type RecognizeOptions,
  type ImageToLatexOptions,
  type ImageToLatexResult,
} from "./core/ocr.js";
export { DEFAULT_LANGUAGE, type OcrEngine } from "./core/providers/base.js";
export { TesseractEngine, locateExecutable, type TesseractOptions } from "./core/providers/tesseract.js";
export { SampleTextEngine, SAMPLE_TEXT } from "./core/providers/sample.js";
export { OpenAIEngine } from "./core/providers/openai.js";
export { AnthropicEngine } from "./core/providers/anthropic.js";
export { OllamaEngine } from "./core/providers/ollama.js";
