import { MalformedExpressionError } from "../core/errors.js";
import { compile } from "./expression.js";

export type ValidationResult =
  | { ok: true; warnings: readonly string[] }
  | { ok: false; error: MalformedExpressionError };

/**
 * Compiles the schedule and reports the first problem, without searching for fire times.
 */
export function validate(input: string): ValidationResult {
  try {
    const expression = compile(input);
    return { ok: true, warnings: expression.warnings };
  } catch (error: unknown) {
    if (error instanceof MalformedExpressionError) {
      return { ok: false, error };
    }
    throw error;
  }
}
