export type FailureKind =
  | "MalformedContainer"
  | "AttachmentTooDeep"
  | "RenderingFailed"
  | "AssemblyFailed"
  | "Cancelled"
  | "IoFailed";

/**
 * A failure that ends the conversion of one file. Per-attachment problems are
 * not ConversionErrors; they are downgraded and reported as warnings.
 */
export class ConversionError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
    this.kind = kind;
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}

export function malformed(message: string): ConversionError {
  return new ConversionError("MalformedContainer", message);
}

/**
 * Renders any thrown value as a message. pdf-lib's PNG decoder throws plain
 * strings, so `instanceof Error` is not enough.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
