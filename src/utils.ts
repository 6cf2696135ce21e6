import type { Dimensions } from "./types.js";
import { isImageBudgetError } from "./errors.js";

export function formatDimensions(size: Dimensions): string {
  return `${size.width}×${size.height}`;
}

/**
 * One-line description of a thrown value for tool responses. Pipeline
 * errors are prefixed with their code.
 */
export function describeError(error: unknown): string {
  if (isImageBudgetError(error)) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
