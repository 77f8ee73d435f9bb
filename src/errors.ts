/**
 * Error taxonomy shared by the model, the expression algebra and the
 * compilers. Every error exposes a stable {@link PlanningError.code} so callers
 * can branch on the failure category without parsing messages, plus optional
 * structured {@link PlanningError.details} describing the offending entity.
 */

/** Stable error codes grouped by category. */
export const ERROR_CODES = {
  USAGE: "E-PLANNING-USAGE",
  PROBLEM_DEFINITION: "E-PLANNING-PROBLEM-DEFINITION",
  UNSUPPORTED_PROBLEM: "E-PLANNING-UNSUPPORTED-PROBLEM",
  EXPRESSION: "E-PLANNING-EXPRESSION",
  TYPE: "E-PLANNING-TYPE",
  CONFLICTING_EFFECTS: "E-PLANNING-CONFLICTING-EFFECTS",
  DOCUMENT_EMPTY: "E-PLANNING-DOCUMENT-EMPTY",
  DOCUMENT_PARSE: "E-PLANNING-DOCUMENT-PARSE",
  DOCUMENT_INVALID: "E-PLANNING-DOCUMENT-INVALID",
  DOCUMENT_REFERENCE: "E-PLANNING-DOCUMENT-REFERENCE",
} as const;

/** Union of every stable error code emitted by the library. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Base class of every error raised by the library. */
export class PlanningError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, code: ErrorCode, details?: unknown) {
    super(message);
    this.name = "PlanningError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Raised on malformed calls: arity mismatches, unsupported compilation kinds,
 * map-back of an action the compiler never produced.
 */
export class UsageError extends PlanningError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.USAGE, details);
    this.name = "UsageError";
  }
}

/** Raised when the problem itself is semantically invalid for the requested operation. */
export class ProblemDefinitionError extends PlanningError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.PROBLEM_DEFINITION, details);
    this.name = "ProblemDefinitionError";
  }
}

/** Raised when a compiler meets a feature combination it cannot transform. */
export class UnsupportedProblemTypeError extends PlanningError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.UNSUPPORTED_PROBLEM, details);
    this.name = "UnsupportedProblemTypeError";
  }
}

/** Raised when an expression has a shape the current operation does not accept. */
export class ExpressionDefinitionError extends PlanningError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.EXPRESSION, details);
    this.name = "ExpressionDefinitionError";
  }
}

/** Raised when an expression is built from ill-typed operands. */
export class PlanningTypeError extends PlanningError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.TYPE, details);
    this.name = "PlanningTypeError";
  }
}

/**
 * Raised by the throwing effect insertion helpers. Speculative construction
 * uses `tryAddEffect` instead and never sees this error.
 */
export class ConflictingEffectsError extends PlanningError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.CONFLICTING_EFFECTS, details);
    this.name = "ConflictingEffectsError";
  }
}

/** Codes raised while loading a problem document. */
export type ProblemDocumentErrorCode =
  | typeof ERROR_CODES.DOCUMENT_EMPTY
  | typeof ERROR_CODES.DOCUMENT_PARSE
  | typeof ERROR_CODES.DOCUMENT_INVALID
  | typeof ERROR_CODES.DOCUMENT_REFERENCE;

/** Raised when a problem document cannot be parsed, validated or resolved. */
export class ProblemDocumentError extends PlanningError {
  constructor(message: string, code: ProblemDocumentErrorCode, details?: unknown) {
    super(message, code, details);
    this.name = "ProblemDocumentError";
  }
}
