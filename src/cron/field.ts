/**
 * Positional fields of a schedule string, in order.
 * Day-of-week uses 1 (Sunday) through 7 (Saturday).
 */
export const FIELD_KINDS = [
  "second",
  "minute",
  "hour",
  "dayOfMonth",
  "month",
  "dayOfWeek",
  "year",
] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

export interface FieldSpec {
  kind: FieldKind;
  min: number;
  max: number;
  /** Characters accepted beyond digits, names and `* , - /`. */
  specials: ReadonlySet<string>;
  /** Upper-case name to value, for fields that accept names. */
  names?: ReadonlyMap<string, number>;
}

const NO_SPECIALS: ReadonlySet<string> = new Set();

const MONTH_NAMES: ReadonlyMap<string, number> = new Map(
  ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"].map(
    (name, index) => [name, index + 1],
  ),
);

const WEEKDAY_NAMES: ReadonlyMap<string, number> = new Map(
  ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT"].map((name, index) => [
    name,
    index + 1,
  ]),
);

export const FIELD_SPECS: Readonly<Record<FieldKind, FieldSpec>> = {
  second: { kind: "second", min: 0, max: 59, specials: NO_SPECIALS },
  minute: { kind: "minute", min: 0, max: 59, specials: NO_SPECIALS },
  hour: { kind: "hour", min: 0, max: 23, specials: NO_SPECIALS },
  dayOfMonth: {
    kind: "dayOfMonth",
    min: 1,
    max: 31,
    specials: new Set(["?", "L", "W"]),
  },
  month: {
    kind: "month",
    min: 1,
    max: 12,
    specials: NO_SPECIALS,
    names: MONTH_NAMES,
  },
  dayOfWeek: {
    kind: "dayOfWeek",
    min: 1,
    max: 7,
    specials: new Set(["?", "L", "#"]),
    names: WEEKDAY_NAMES,
  },
  year: { kind: "year", min: 1970, max: 2099, specials: NO_SPECIALS },
};

export const MIN_YEAR = FIELD_SPECS.year.min;
export const MAX_YEAR = FIELD_SPECS.year.max;
export const SATURDAY = 7;

/** Field count without and with the optional year. */
export const MIN_FIELD_COUNT = 6;
export const MAX_FIELD_COUNT = FIELD_KINDS.length;

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

/** @param month 1-12 */
export const daysInMonth = (year: number, month: number): number =>
  month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];

/**
 * Weekday of a proleptic Gregorian date, 1 (Sunday) through 7 (Saturday).
 * Independent of any time zone.
 */
export const weekdayOf = (year: number, month: number, day: number): number =>
  new Date(Date.UTC(year, month - 1, day)).getUTCDay() + 1;
