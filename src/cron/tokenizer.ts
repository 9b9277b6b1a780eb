import { MalformedExpressionError, type Span } from "../core/errors.js";
import {
  FIELD_KINDS,
  type FieldKind,
  MAX_FIELD_COUNT,
  MIN_FIELD_COUNT,
} from "./field.js";

const WILDCARD = "*";
const TERM_SEPARATOR = ",";
const WHITESPACE = /\S+/g;

/** One comma-separated piece of a field, e.g. `10-20/5`. */
export interface TermToken {
  text: string;
  span: Span;
}

export interface FieldToken {
  kind: FieldKind;
  index: number;
  text: string;
  span: Span;
  terms: TermToken[];
  /** True for a year field filled in because the input had six fields. */
  implicit: boolean;
}

export interface ExpressionTokens {
  input: string;
  fields: FieldToken[];
}

/**
 * Splits a schedule string into its positional fields and their comma-separated terms.
 * Six fields are accepted with the year defaulting to `*`.
 * @throws {MalformedExpressionError} on a wrong field count or an empty term
 */
export function tokenize(input: string): ExpressionTokens {
  const words = [...input.matchAll(WHITESPACE)].map((match) => ({
    text: match[0],
    start: match.index ?? 0,
  }));

  if (words.length === 0) {
    throw new MalformedExpressionError("Cron expression is empty", { input });
  }

  if (words.length < MIN_FIELD_COUNT || words.length > MAX_FIELD_COUNT) {
    const first = words[0];
    const last = words[words.length - 1];
    throw new MalformedExpressionError(
      `Cron expression must have ${MIN_FIELD_COUNT} or ${MAX_FIELD_COUNT} fields, got ${words.length}`,
      {
        input,
        span: { start: first.start, end: last.start + last.text.length },
      },
    );
  }

  const fields = FIELD_KINDS.map((kind, index): FieldToken => {
    const word = words[index];
    if (!word) {
      const end = input.trimEnd().length;
      return {
        kind,
        index,
        text: WILDCARD,
        span: { start: end, end },
        terms: [{ text: WILDCARD, span: { start: end, end } }],
        implicit: true,
      };
    }

    const span = { start: word.start, end: word.start + word.text.length };
    return {
      kind,
      index,
      text: word.text,
      span,
      terms: splitTerms(input, kind, index, word.text, word.start),
      implicit: false,
    };
  });

  return { input, fields };
}

function splitTerms(
  input: string,
  kind: FieldKind,
  index: number,
  text: string,
  offset: number,
): TermToken[] {
  const terms: TermToken[] = [];
  let start = 0;

  for (const piece of text.split(TERM_SEPARATOR)) {
    const span = { start: offset + start, end: offset + start + piece.length };
    if (piece.length === 0) {
      throw new MalformedExpressionError(`Empty value in ${kind} field`, {
        input,
        span: { start: span.start, end: span.start + 1 },
        field: kind,
        fieldIndex: index,
        token: text,
      });
    }
    terms.push({ text: piece, span });
    start += piece.length + TERM_SEPARATOR.length;
  }

  return terms;
}
