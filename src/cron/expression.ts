import {
  compileDayOfMonthField,
  compileDayOfWeekField,
  compileValueField,
  type DayOfMonthConstraint,
  type DayOfWeekConstraint,
  type FieldConstraint,
  isFullRange,
  type ValueSet,
} from "./compiler.js";
import { FIELD_KINDS, type FieldKind } from "./field.js";
import { tokenize } from "./tokenizer.js";

export interface ExpressionFields {
  readonly second: ValueSet;
  readonly minute: ValueSet;
  readonly hour: ValueSet;
  readonly dayOfMonth: DayOfMonthConstraint;
  readonly month: ValueSet;
  readonly dayOfWeek: DayOfWeekConstraint;
  readonly year: ValueSet;
}

/**
 * A compiled schedule. Instances are frozen and safe to share.
 */
export interface Expression {
  readonly source: string;
  readonly fields: ExpressionFields;
  /** Both day fields are restricted, so a date matching either one is accepted. */
  readonly dayFieldsAreOred: boolean;
  readonly dayOfMonthRestricted: boolean;
  readonly dayOfWeekRestricted: boolean;
  /** Soft-rule violations that did not stop compilation. */
  readonly warnings: readonly string[];
}

export const BOTH_DAYS_UNSPECIFIED_WARNING =
  "Both day-of-month and day-of-week are '?'; one of them should name the days to fire on";

export const NEITHER_DAY_UNSPECIFIED_WARNING =
  "Neither day-of-month nor day-of-week is '?'; when both name days, a date matching either one fires";

/**
 * A field is restricted unless it is `?` or a set covering its whole range.
 */
export function isRestricted(
  constraint: FieldConstraint,
  kind: FieldKind,
): boolean {
  return constraint.type !== "noSpecificValue" && !isFullRange(constraint, kind);
}

/**
 * Parses and compiles a schedule string.
 * @throws {MalformedExpressionError} on the first field that fails to compile
 */
export function compile(source: string): Expression {
  const [second, minute, hour, dayOfMonth, month, dayOfWeek, year] =
    tokenize(source).fields;

  const fields: ExpressionFields = Object.freeze({
    second: compileValueField(source, second),
    minute: compileValueField(source, minute),
    hour: compileValueField(source, hour),
    dayOfMonth: compileDayOfMonthField(source, dayOfMonth),
    month: compileValueField(source, month),
    dayOfWeek: compileDayOfWeekField(source, dayOfWeek),
    year: compileValueField(source, year),
  });

  const dayOfMonthRestricted = isRestricted(fields.dayOfMonth, "dayOfMonth");
  const dayOfWeekRestricted = isRestricted(fields.dayOfWeek, "dayOfWeek");
  const warnings: string[] = [];

  const dayOfMonthUnspecified = fields.dayOfMonth.type === "noSpecificValue";
  const dayOfWeekUnspecified = fields.dayOfWeek.type === "noSpecificValue";
  if (dayOfMonthUnspecified && dayOfWeekUnspecified) {
    warnings.push(BOTH_DAYS_UNSPECIFIED_WARNING);
  } else if (!dayOfMonthUnspecified && !dayOfWeekUnspecified) {
    warnings.push(NEITHER_DAY_UNSPECIFIED_WARNING);
  }

  return Object.freeze({
    source,
    fields,
    dayFieldsAreOred: dayOfMonthRestricted && dayOfWeekRestricted,
    dayOfMonthRestricted,
    dayOfWeekRestricted,
    warnings: Object.freeze(warnings),
  });
}

function constraintsEqual(a: FieldConstraint, b: FieldConstraint): boolean {
  switch (a.type) {
    case "values":
      return (
        b.type === "values" &&
        a.values.length === b.values.length &&
        a.values.every((value, index) => value === b.values[index])
      );
    case "noSpecificValue":
    case "lastWeekday":
      return b.type === a.type;
    case "lastDay":
      return b.type === "lastDay" && a.offset === b.offset;
    case "nearestWeekday":
      return b.type === "nearestWeekday" && a.day === b.day;
    case "lastDayOfWeek":
      return b.type === "lastDayOfWeek" && a.dayOfWeek === b.dayOfWeek;
    case "nthDayOfWeek":
      return (
        b.type === "nthDayOfWeek" &&
        a.dayOfWeek === b.dayOfWeek &&
        a.nth === b.nth
      );
  }
}

/** Compares two expressions by their compiled constraints, ignoring source text. */
export function expressionsEqual(a: Expression, b: Expression): boolean {
  return FIELD_KINDS.every((kind) =>
    constraintsEqual(a.fields[kind], b.fields[kind]),
  );
}
