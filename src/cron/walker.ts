import { TZDate } from "@date-fns/tz";
import type { DayOfMonthConstraint, DayOfWeekConstraint } from "./compiler.js";
import type { Expression } from "./expression.js";
import { daysInMonth, MAX_YEAR, MIN_YEAR, weekdayOf } from "./field.js";

export interface WalkOptions {
  /** IANA zone the schedule is read in. Defaults to the system zone. */
  timeZone?: string;
}

type Direction = "forward" | "backward";

type Unit = "year" | "month" | "day" | "hour" | "minute" | "second";

const PARENT_UNIT: Record<Exclude<Unit, "year">, Unit> = {
  month: "year",
  day: "month",
  hour: "day",
  minute: "hour",
  second: "minute",
};

const MILLISECONDS_PER_SECOND = 1_000;
const MILLISECONDS_PER_MINUTE = 60_000;
// wider than any DST shift, narrower than the gap between two transitions
const OFFSET_PROBE_WINDOW = 6 * 60 * MILLISECONDS_PER_MINUTE;
const SUNDAY = 1;
const SATURDAY = 7;
const DAYS_PER_WEEK = 7;

/**
 * Wall-clock components being walked towards a match. Months are 1-12.
 */
class CandidateInstant {
  constructor(
    public year: number,
    public month: number,
    public day: number,
    public hour: number,
    public minute: number,
    public second: number,
  ) {}

  static from(date: TZDate): CandidateInstant {
    return new CandidateInstant(
      date.getFullYear(),
      date.getMonth() + 1,
      date.getDate(),
      date.getHours(),
      date.getMinutes(),
      date.getSeconds(),
    );
  }

  /** Sets `unit` and moves every finer unit to its first value in the walk direction. */
  set(unit: Unit, value: number, direction: Direction): void {
    this[unit] = value;
    this.resetBelow(unit, direction);
  }

  /** Moves one `unit` in the walk direction, carrying into coarser units. */
  step(unit: Unit, direction: Direction): void {
    if (unit !== "year" && this.atEdge(unit, direction)) {
      this.step(PARENT_UNIT[unit], direction);
      return;
    }
    this[unit] += direction === "forward" ? 1 : -1;
    this.resetBelow(unit, direction);
  }

  static fromWallClock(wallClock: number): CandidateInstant {
    const date = new Date(wallClock);
    return new CandidateInstant(
      date.getUTCFullYear(),
      date.getUTCMonth() + 1,
      date.getUTCDate(),
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
    );
  }

  /** The components read as if they were UTC. */
  toWallClock(): number {
    return Date.UTC(
      this.year,
      this.month - 1,
      this.day,
      this.hour,
      this.minute,
      this.second,
    );
  }

  matchesComponents(date: TZDate): boolean {
    return (
      date.getFullYear() === this.year &&
      date.getMonth() + 1 === this.month &&
      date.getDate() === this.day &&
      date.getHours() === this.hour &&
      date.getMinutes() === this.minute &&
      date.getSeconds() === this.second
    );
  }

  private atEdge(unit: Exclude<Unit, "year">, direction: Direction): boolean {
    return direction === "forward"
      ? this[unit] === this.max(unit)
      : this[unit] === this.min(unit);
  }

  private resetBelow(unit: Unit, direction: Direction): void {
    const forward = direction === "forward";
    switch (unit) {
      case "year":
        this.month = forward ? 1 : 12;
      // falls through
      case "month":
        this.day = forward ? 1 : daysInMonth(this.year, this.month);
      // falls through
      case "day":
        this.hour = forward ? 0 : 23;
      // falls through
      case "hour":
        this.minute = forward ? 0 : 59;
      // falls through
      case "minute":
        this.second = forward ? 0 : 59;
      // falls through
      case "second":
        return;
    }
  }

  private min(unit: Exclude<Unit, "year">): number {
    return unit === "month" || unit === "day" ? 1 : 0;
  }

  private max(unit: Exclude<Unit, "year">): number {
    switch (unit) {
      case "month":
        return 12;
      case "day":
        return daysInMonth(this.year, this.month);
      case "hour":
        return 23;
      case "minute":
      case "second":
        return 59;
    }
  }
}

const inZone = (time: number, timeZone: string | undefined): TZDate =>
  timeZone === undefined ? new TZDate(time) : new TZDate(time, timeZone);

/** UTC offset in milliseconds, positive east of Greenwich. */
const offsetAt = (time: number, timeZone: string | undefined): number =>
  -(timeZone === undefined ? new Date(time) : new TZDate(time, timeZone))
    .getTimezoneOffset() * MILLISECONDS_PER_MINUTE;

/** Distinct offsets in effect within a few hours of `time`. */
const offsetsAround = (time: number, timeZone: string | undefined): number[] => [
  ...new Set([
    offsetAt(time - OFFSET_PROBE_WINDOW, timeZone),
    offsetAt(time, timeZone),
    offsetAt(time + OFFSET_PROBE_WINDOW, timeZone),
  ]),
];

/**
 * Instants showing the candidate's wall-clock time, ascending.
 * Empty inside a DST gap; two of them when the clock is set back.
 */
const instantsOf = (
  candidate: CandidateInstant,
  timeZone: string | undefined,
): number[] => {
  const wallClock = candidate.toWallClock();
  const estimate = wallClock - offsetAt(wallClock, timeZone);
  return offsetsAround(estimate, timeZone)
    .map((offset) => wallClock - offset)
    .filter((time) => candidate.matchesComponents(inZone(time, timeZone)))
    .sort((left, right) => left - right);
};

/**
 * Wall-clock time to start walking from, early (or late) enough that a
 * repeated hour after `start` is still visited.
 */
const startingWallClock = (
  start: number,
  direction: Direction,
  timeZone: string | undefined,
): number => {
  const offsets = offsetsAround(start, timeZone);
  return start + (direction === "forward" ? Math.min(...offsets) : Math.max(...offsets));
};

/**
 * First allowed value at or beyond `current` in the walk direction.
 */
const seek = (
  values: readonly number[],
  current: number,
  direction: Direction,
): number | undefined =>
  direction === "forward"
    ? values.find((value) => value >= current)
    : values.findLast((value) => value <= current);

const lastWeekdayOfMonth = (year: number, month: number): number => {
  const last = daysInMonth(year, month);
  const weekday = weekdayOf(year, month, last);
  if (weekday === SATURDAY) {
    return last - 1;
  }
  return weekday === SUNDAY ? last - 2 : last;
};

/**
 * Weekday nearest to `target`, staying inside the month; null when the month is too short.
 */
export const nearestWeekday = (
  year: number,
  month: number,
  target: number,
): number | null => {
  const last = daysInMonth(year, month);
  if (target > last) {
    return null;
  }
  const weekday = weekdayOf(year, month, target);
  if (weekday === SATURDAY) {
    return target === 1 ? target + 2 : target - 1;
  }
  if (weekday === SUNDAY) {
    return target === last ? target - 2 : target + 1;
  }
  return target;
};

function matchesDayOfMonth(
  constraint: DayOfMonthConstraint,
  year: number,
  month: number,
  day: number,
): boolean {
  switch (constraint.type) {
    case "values":
      return constraint.values.includes(day);
    case "noSpecificValue":
      return true;
    case "lastDay":
      return day === daysInMonth(year, month) - constraint.offset;
    case "lastWeekday":
      return day === lastWeekdayOfMonth(year, month);
    case "nearestWeekday":
      return day === nearestWeekday(year, month, constraint.day);
  }
}

function matchesDayOfWeek(
  constraint: DayOfWeekConstraint,
  year: number,
  month: number,
  day: number,
): boolean {
  const weekday = weekdayOf(year, month, day);
  switch (constraint.type) {
    case "values":
      return constraint.values.includes(weekday);
    case "noSpecificValue":
      return true;
    case "lastDayOfWeek":
      return (
        weekday === constraint.dayOfWeek &&
        day + DAYS_PER_WEEK > daysInMonth(year, month)
      );
    case "nthDayOfWeek":
      return (
        weekday === constraint.dayOfWeek &&
        Math.ceil(day / DAYS_PER_WEEK) === constraint.nth
      );
  }
}

/**
 * Combines the day fields: either may match when both are restricted,
 * otherwise only the restricted one counts.
 */
export function matchesDay(
  expression: Expression,
  year: number,
  month: number,
  day: number,
): boolean {
  const { dayOfMonth, dayOfWeek } = expression.fields;
  if (expression.dayFieldsAreOred) {
    return (
      matchesDayOfMonth(dayOfMonth, year, month, day) ||
      matchesDayOfWeek(dayOfWeek, year, month, day)
    );
  }
  if (expression.dayOfMonthRestricted) {
    return matchesDayOfMonth(dayOfMonth, year, month, day);
  }
  if (expression.dayOfWeekRestricted) {
    return matchesDayOfWeek(dayOfWeek, year, month, day);
  }
  return true;
}

/**
 * Walks the calendar from `start` (already one second past the reference)
 * until every field agrees, or the supported year range runs out.
 */
function walk(
  expression: Expression,
  reference: number,
  start: number,
  direction: Direction,
  timeZone: string | undefined,
): Date | null {
  const { fields } = expression;
  const candidate = CandidateInstant.fromWallClock(
    startingWallClock(start, direction, timeZone),
  );
  const timeUnits = [
    ["hour", fields.hour.values],
    ["minute", fields.minute.values],
    ["second", fields.second.values],
  ] as const;

  search: for (;;) {
    if (direction === "forward" ? candidate.year > MAX_YEAR : candidate.year < MIN_YEAR) {
      return null;
    }

    const year = seek(fields.year.values, candidate.year, direction);
    if (year === undefined) {
      return null;
    }
    if (year !== candidate.year) {
      candidate.set("year", year, direction);
      continue;
    }

    const month = seek(fields.month.values, candidate.month, direction);
    if (month === undefined) {
      candidate.step("year", direction);
      continue;
    }
    if (month !== candidate.month) {
      candidate.set("month", month, direction);
      continue;
    }

    if (!matchesDay(expression, candidate.year, candidate.month, candidate.day)) {
      candidate.step("day", direction);
      continue;
    }

    for (const [unit, values] of timeUnits) {
      const value = seek(values, candidate[unit], direction);
      if (value === undefined) {
        candidate.step(PARENT_UNIT[unit], direction);
        continue search;
      }
      if (value !== candidate[unit]) {
        candidate.set(unit, value, direction);
        continue search;
      }
    }

    const instants = instantsOf(candidate, timeZone);
    const time =
      direction === "forward"
        ? instants.find((instant) => instant > reference)
        : instants.findLast((instant) => instant < reference);
    if (time === undefined) {
      candidate.step("second", direction);
      continue;
    }

    return new Date(time);
  }
}

/**
 * Returns the earliest fire time strictly after `after`, or null when none exists before 2100.
 */
export function nextValidTime(
  expression: Expression,
  after: Date,
  options: WalkOptions = {},
): Date | null {
  const reference = after.getTime();
  const start =
    Math.floor(reference / MILLISECONDS_PER_SECOND) * MILLISECONDS_PER_SECOND +
    MILLISECONDS_PER_SECOND;
  return walk(expression, reference, start, "forward", options.timeZone);
}

/**
 * Returns the latest fire time strictly before `before`, or null when none exists from 1970.
 */
export function previousValidTime(
  expression: Expression,
  before: Date,
  options: WalkOptions = {},
): Date | null {
  const reference = before.getTime();
  const start =
    Math.ceil(reference / MILLISECONDS_PER_SECOND) * MILLISECONDS_PER_SECOND -
    MILLISECONDS_PER_SECOND;
  return walk(expression, reference, start, "backward", options.timeZone);
}

/**
 * Whether `instant` is itself a fire time. Instants with milliseconds never are.
 */
export function isSatisfiedBy(
  expression: Expression,
  instant: Date,
  options: WalkOptions = {},
): boolean {
  if (instant.getTime() % MILLISECONDS_PER_SECOND !== 0) {
    return false;
  }

  const { fields } = expression;
  const candidate = CandidateInstant.from(inZone(instant.getTime(), options.timeZone));

  return (
    fields.year.values.includes(candidate.year) &&
    fields.month.values.includes(candidate.month) &&
    matchesDay(expression, candidate.year, candidate.month, candidate.day) &&
    fields.hour.values.includes(candidate.hour) &&
    fields.minute.values.includes(candidate.minute) &&
    fields.second.values.includes(candidate.second)
  );
}
