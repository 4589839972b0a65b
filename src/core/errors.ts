export type OcrErrorKind = "engine-unavailable" | "execution-failure" | "invalid-input";

export class OcrError extends Error {
  readonly kind: OcrErrorKind;

  constructor(kind: OcrErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OcrError";
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Pass OcrErrors through; wrap anything else as an execution failure of `operation`. */
export function toOcrError(err: unknown, operation: string): OcrError {
  if (err instanceof OcrError) return err;
  return new OcrError("execution-failure", `${operation} failed: ${errorMessage(err)}`, { cause: err });
}
