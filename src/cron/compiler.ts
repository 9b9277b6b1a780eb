import { MalformedExpressionError } from "../core/errors.js";
import { FIELD_SPECS, type FieldKind, type FieldSpec, SATURDAY } from "./field.js";
import type { FieldToken, TermToken } from "./tokenizer.js";

/** Sorted, duplicate-free values a field accepts. */
export interface ValueSet {
  readonly type: "values";
  readonly values: readonly number[];
}

/** `?`: the day field places no constraint of its own. */
export interface NoSpecificValue {
  readonly type: "noSpecificValue";
}

/** `L` or `L-n`: the last day of the month, less `offset` days. */
export interface LastDay {
  readonly type: "lastDay";
  readonly offset: number;
}

/** `LW`: the last Monday-Friday of the month. */
export interface LastWeekday {
  readonly type: "lastWeekday";
}

/** `nW`: the Monday-Friday nearest to `day`, without leaving the month. */
export interface NearestWeekday {
  readonly type: "nearestWeekday";
  readonly day: number;
}

/** `nL`: the last occurrence of a weekday in the month. */
export interface LastDayOfWeek {
  readonly type: "lastDayOfWeek";
  readonly dayOfWeek: number;
}

/** `n#k`: the k-th occurrence of a weekday in the month. */
export interface NthDayOfWeek {
  readonly type: "nthDayOfWeek";
  readonly dayOfWeek: number;
  readonly nth: number;
}

export type DayOfMonthConstraint =
  | ValueSet
  | NoSpecificValue
  | LastDay
  | LastWeekday
  | NearestWeekday;

export type DayOfWeekConstraint =
  | ValueSet
  | NoSpecificValue
  | LastDayOfWeek
  | NthDayOfWeek;

export type FieldConstraint = DayOfMonthConstraint | DayOfWeekConstraint;

const BASE_10 = 10;
const WILDCARD = "*";
const NO_SPECIFIC_VALUE = "?";
const LAST = "L";
const LAST_WEEKDAY = "LW";
const STEP_SEPARATOR = "/";
const RANGE_SEPARATOR = "-";
const SPECIAL_CHARACTERS = ["?", "L", "W", "#"] as const;
const MIN_STEP_VALUE = 1;
const MAX_LAST_DAY_OFFSET = 30;
const MIN_OCCURRENCE = 1;
const MAX_OCCURRENCE = 5;
const DIGITS = /^\d+$/;
const LETTERS = /^[A-Za-z]+$/;
const LAST_DAY_OFFSET = /^L-(\d+)$/;
const NEAREST_WEEKDAY = /^(\w+)W$/;
const LAST_DAY_OF_WEEK = /^(\w+)L$/;
const NTH_DAY_OF_WEEK = /^(\w+)#(\w+)$/;

/**
 * Compiles one field token, keeping the token for error details.
 */
class FieldCompiler {
  private readonly input: string;
  private readonly field: FieldToken;
  private readonly spec: FieldSpec;

  constructor(input: string, field: FieldToken) {
    this.input = input;
    this.field = field;
    this.spec = FIELD_SPECS[field.kind];
  }

  /** The whole field as a single term, upper-cased, or null for a comma list. */
  private get soleTerm(): { term: TermToken; text: string } | null {
    if (this.field.terms.length !== 1) {
      return null;
    }
    const term = this.field.terms[0];
    return { term, text: term.text.toUpperCase() };
  }

  compileValues(): ValueSet {
    const values = new Set<number>();
    for (const term of this.field.terms) {
      this.addTerm(term, values);
    }

    return {
      type: "values",
      values: Object.freeze(Array.from(values).sort((a, b) => a - b)),
    };
  }

  compileDayOfMonth(): DayOfMonthConstraint {
    const sole = this.soleTerm;
    if (!sole) {
      return this.compileValues();
    }
    const { term, text } = sole;

    if (text === NO_SPECIFIC_VALUE) {
      return { type: "noSpecificValue" };
    }
    if (text === LAST) {
      return { type: "lastDay", offset: 0 };
    }
    if (text === LAST_WEEKDAY) {
      return { type: "lastWeekday" };
    }

    const offset = LAST_DAY_OFFSET.exec(text);
    if (offset) {
      const value = parseInt(offset[1], BASE_10);
      if (value > MAX_LAST_DAY_OFFSET) {
        throw this.error(
          `Last day offset ${value} must be between 0 and ${MAX_LAST_DAY_OFFSET}`,
          term,
        );
      }
      return { type: "lastDay", offset: value };
    }

    const nearest = NEAREST_WEEKDAY.exec(text);
    if (nearest) {
      return { type: "nearestWeekday", day: this.parseValue(nearest[1], term) };
    }

    return this.compileValues();
  }

  compileDayOfWeek(): DayOfWeekConstraint {
    const sole = this.soleTerm;
    if (!sole) {
      return this.compileValues();
    }
    const { term, text } = sole;

    if (text === NO_SPECIFIC_VALUE) {
      return { type: "noSpecificValue" };
    }
    // a bare L is the last day of the week
    if (text === LAST) {
      return { type: "values", values: Object.freeze([SATURDAY]) };
    }

    const last = LAST_DAY_OF_WEEK.exec(text);
    if (last) {
      return { type: "lastDayOfWeek", dayOfWeek: this.parseValue(last[1], term) };
    }

    const nth = NTH_DAY_OF_WEEK.exec(text);
    if (nth) {
      const dayOfWeek = this.parseValue(nth[1], term);
      const occurrence = DIGITS.test(nth[2]) ? parseInt(nth[2], BASE_10) : NaN;
      if (
        Number.isNaN(occurrence) ||
        occurrence < MIN_OCCURRENCE ||
        occurrence > MAX_OCCURRENCE
      ) {
        throw this.error(
          `Occurrence '${nth[2]}' must be between ${MIN_OCCURRENCE} and ${MAX_OCCURRENCE}`,
          term,
        );
      }
      return { type: "nthDayOfWeek", dayOfWeek, nth: occurrence };
    }

    return this.compileValues();
  }

  /**
   * Adds the values of `*`, `a`, `a-b`, `a/b`, `*\/b` or `a-b/c` to the set.
   */
  private addTerm(term: TermToken, values: Set<number>): void {
    const parts = term.text.split(STEP_SEPARATOR);
    if (parts.length > 2) {
      throw this.error(`Invalid step expression '${term.text}'`, term);
    }

    const [base, step] = parts;
    const hasStep = parts.length === 2;
    const stepValue = hasStep ? this.parseStep(step, term) : MIN_STEP_VALUE;
    const { start, end } = this.parseBase(base, hasStep, term);

    for (let value = start; value <= end; value += stepValue) {
      values.add(value);
    }
  }

  private parseStep(step: string, term: TermToken): number {
    const value = DIGITS.test(step) ? parseInt(step, BASE_10) : NaN;
    if (Number.isNaN(value) || value < MIN_STEP_VALUE) {
      throw this.error(
        `Invalid step value '${step}' in ${this.field.kind} field`,
        term,
      );
    }
    return value;
  }

  private parseBase(
    base: string,
    hasStep: boolean,
    term: TermToken,
  ): { start: number; end: number } {
    if (base === WILDCARD) {
      return { start: this.spec.min, end: this.spec.max };
    }

    const bounds = base.split(RANGE_SEPARATOR);
    if (bounds.length > 2) {
      throw this.error(`Invalid range '${base}' in ${this.field.kind} field`, term);
    }
    if (bounds.length === 2) {
      const start = this.parseValue(bounds[0], term);
      const end = this.parseValue(bounds[1], term);
      if (start > end) {
        throw this.error(
          `Range '${base}' in ${this.field.kind} field must not run backwards`,
          term,
        );
      }
      return { start, end };
    }

    const value = this.parseValue(base, term);
    return { start: value, end: hasStep ? this.spec.max : value };
  }

  /**
   * Reads a number or a month/weekday name and checks it against the field range.
   */
  private parseValue(text: string, term: TermToken): number {
    const { kind } = this.field;
    let value: number;

    if (DIGITS.test(text)) {
      value = parseInt(text, BASE_10);
    } else if (this.spec.names && LETTERS.test(text)) {
      const named = this.spec.names.get(text.toUpperCase());
      if (named === undefined) {
        const label = kind === "month" ? "month" : "weekday";
        throw this.error(`Unknown ${label} name '${text}'`, term);
      }
      value = named;
    } else {
      throw this.invalidValue(text, term);
    }

    if (value < this.spec.min || value > this.spec.max) {
      throw this.error(
        `Value ${value} out of range for ${kind} field (${this.spec.min}-${this.spec.max})`,
        term,
      );
    }

    return value;
  }

  private invalidValue(text: string, term: TermToken): MalformedExpressionError {
    const { kind } = this.field;
    const upper = text.toUpperCase();
    const special = SPECIAL_CHARACTERS.find((character) =>
      upper.includes(character),
    );

    if (special === undefined) {
      return this.error(`Invalid value '${text}' in ${kind} field`, term);
    }
    if (this.spec.specials.has(special)) {
      return this.error(`'${special}' must be used alone in ${kind} field`, term);
    }
    return this.error(`Character '${special}' is not allowed in ${kind} field`, term);
  }

  private error(message: string, term: TermToken): MalformedExpressionError {
    return new MalformedExpressionError(message, {
      input: this.input,
      span: term.span,
      field: this.field.kind,
      fieldIndex: this.field.index,
      token: term.text,
    });
  }
}

/**
 * Compiles second, minute, hour, month or year.
 * @param input the whole schedule string, used in error details
 * @throws {MalformedExpressionError}
 */
export const compileValueField = (input: string, field: FieldToken): ValueSet =>
  new FieldCompiler(input, field).compileValues();

/** @throws {MalformedExpressionError} */
export const compileDayOfMonthField = (
  input: string,
  field: FieldToken,
): DayOfMonthConstraint => new FieldCompiler(input, field).compileDayOfMonth();

/** @throws {MalformedExpressionError} */
export const compileDayOfWeekField = (
  input: string,
  field: FieldToken,
): DayOfWeekConstraint => new FieldCompiler(input, field).compileDayOfWeek();

/** Whether the constraint accepts every value of its field. */
export function isFullRange(constraint: FieldConstraint, kind: FieldKind): boolean {
  if (constraint.type !== "values") {
    return false;
  }
  const { min, max } = FIELD_SPECS[kind];
  return constraint.values.length === max - min + 1;
}
