import { ConversionError, describeError, type FailureKind, isConversionError } from "../errors/index.js";
import type { ConversionStage } from "../types/index.js";

const STAGE_FAILURES: Record<ConversionStage, FailureKind> = {
  parsing: "MalformedContainer",
  rendering: "RenderingFailed",
  merging: "AssemblyFailed",
};

function isSystemError(error: unknown): error is Error & { code: string } {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Classifies anything thrown during a conversion. Filesystem errors are
 * IoFailed; other unknown errors take the kind of the stage they surfaced in.
 */
export function toConversionError(error: unknown, stage: ConversionStage): ConversionError {
  if (isConversionError(error)) return error;
  if (isSystemError(error)) {
    return new ConversionError("IoFailed", error.message, { cause: error });
  }
  return new ConversionError(STAGE_FAILURES[stage], describeError(error), { cause: error });
}
