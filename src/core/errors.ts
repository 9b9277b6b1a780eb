import type { FieldKind } from "../cron/field.js";

/**
 * Base error for the package.
 * The subclass name is copied into `name` automatically.
 */
export class AppError extends Error {
  /**
   * @param message error message
   * @param options standard error options such as `cause`
   */
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** Raised when a caller passes an unusable argument. */
export class InvalidArgumentError extends AppError {}

/** Generic runtime failure. */
export class RuntimeError extends AppError {}

/** Character range within the source expression, end exclusive. */
export interface Span {
  start: number;
  end: number;
}

export interface MalformedExpressionDetails {
  input: string;
  span?: Span;
  field?: FieldKind;
  fieldIndex?: number;
  token?: string;
}

/**
 * A schedule string that cannot be compiled.
 * Carries the offending field and its position in the input.
 */
export class MalformedExpressionError extends InvalidArgumentError {
  readonly input: string;
  readonly span?: Span;
  readonly field?: FieldKind;
  readonly fieldIndex?: number;
  readonly token?: string;

  constructor(
    message: string,
    details: MalformedExpressionDetails,
    options: ErrorOptions = {},
  ) {
    super(message, options);
    this.input = details.input;
    this.span = details.span;
    this.field = details.field;
    this.fieldIndex = details.fieldIndex;
    this.token = details.token;
  }

  /**
   * Renders the message with the input and a caret line under the offending span.
   */
  describe(): string {
    const header = `error: ${this.message}`;
    if (!this.span) {
      return header;
    }
    const padding = " ".repeat(this.span.start + 2);
    const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
    return `${header}\n  ${this.input}\n${padding}${underline}`;
  }
}

/** No fire time exists within the supported year range. */
export class ExhaustedError extends RuntimeError {}
