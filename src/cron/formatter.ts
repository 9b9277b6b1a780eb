import {
  type FieldConstraint,
  isFullRange,
  type ValueSet,
} from "./compiler.js";
import type { Expression } from "./expression.js";
import { FIELD_KINDS, FIELD_SPECS, type FieldKind } from "./field.js";

const WILDCARD = "*";
const MIN_STEP_RUN = 3;
const MIN_RANGE_RUN = 3;
const MIN_STEP = 2;

/**
 * `start/step` when the values are an arithmetic run reaching the end of the field.
 */
function formatStepRun(values: readonly number[], kind: FieldKind): string | null {
  if (values.length < MIN_STEP_RUN) {
    return null;
  }
  const { min, max } = FIELD_SPECS[kind];
  const step = values[1] - values[0];
  const last = values[values.length - 1];
  if (step < MIN_STEP || last + step <= max) {
    return null;
  }
  for (let index = 1; index < values.length; index++) {
    if (values[index] - values[index - 1] !== step) {
      return null;
    }
  }
  return `${values[0] === min ? WILDCARD : values[0]}/${step}`;
}

function formatRuns(values: readonly number[]): string {
  const parts: string[] = [];
  let runStart = 0;

  for (let index = 1; index <= values.length; index++) {
    if (index < values.length && values[index] === values[index - 1] + 1) {
      continue;
    }
    const length = index - runStart;
    if (length >= MIN_RANGE_RUN) {
      parts.push(`${values[runStart]}-${values[index - 1]}`);
    } else {
      parts.push(...values.slice(runStart, index).map(String));
    }
    runStart = index;
  }

  return parts.join(",");
}

function formatValues(constraint: ValueSet, kind: FieldKind): string {
  if (isFullRange(constraint, kind)) {
    return WILDCARD;
  }
  return (
    formatStepRun(constraint.values, kind) ?? formatRuns(constraint.values)
  );
}

export function formatField(constraint: FieldConstraint, kind: FieldKind): string {
  switch (constraint.type) {
    case "values":
      return formatValues(constraint, kind);
    case "noSpecificValue":
      return "?";
    case "lastDay":
      return constraint.offset === 0 ? "L" : `L-${constraint.offset}`;
    case "lastWeekday":
      return "LW";
    case "nearestWeekday":
      return `${constraint.day}W`;
    case "lastDayOfWeek":
      return `${constraint.dayOfWeek}L`;
    case "nthDayOfWeek":
      return `${constraint.dayOfWeek}#${constraint.nth}`;
  }
}

/**
 * Canonical text of a compiled expression.
 * Names become numbers and the year is left out when it is unrestricted.
 */
export function format(expression: Expression): string {
  const parts = FIELD_KINDS.map((kind) =>
    formatField(expression.fields[kind], kind),
  );
  if (isFullRange(expression.fields.year, "year")) {
    parts.pop();
  }
  return parts.join(" ");
}
