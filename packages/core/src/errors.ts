import type { AttemptRecord } from "./types.js";

export const GENERIC_GENERATION_FAILURE =
  "Couldn't generate a valid melody with the current constraints. Try relaxing key, mode, time signature or tempo, or regenerate.";

/**
 * Base class for failures a transport layer may report to end users.
 */
export class CompositionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CompositionError";
  }
}

/**
 * Invalid input or an operation applied to the wrong kind of score.
 * Raised immediately and never retried.
 */
export class StructuralError extends CompositionError {
  constructor(message: string) {
    super(message);
    this.name = "StructuralError";
  }
}

/**
 * The requested form cannot hold the lyrics (bar count too short, verse text
 * too long for the shared skeleton). Reseeding cannot help.
 */
export class ConstraintInfeasibleError extends CompositionError {
  readonly hint: string;

  constructor(message: string, hint: string) {
    super(`${message} ${hint}`);
    this.name = "ConstraintInfeasibleError";
    this.hint = hint;
  }
}

/**
 * Every attempt ended with fatal diagnostics. The message stays generic;
 * `history` keeps the per-attempt diagnostics for logs.
 */
export class GenerationExhaustedError extends CompositionError {
  readonly history: AttemptRecord[];

  constructor(history: AttemptRecord[]) {
    super(GENERIC_GENERATION_FAILURE);
    this.name = "GenerationExhaustedError";
    this.history = history;
  }
}

export function isUserFacingError(error: unknown): error is CompositionError {
  return error instanceof CompositionError;
}
