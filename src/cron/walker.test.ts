import { TZDate } from "@date-fns/tz";
import { expect, test } from "vitest";
import { compile } from "./expression.js";
import {
  isSatisfiedBy,
  nearestWeekday,
  nextValidTime,
  previousValidTime,
} from "./walker.js";

const UTC = { timeZone: "UTC" };

const next = (expression: string, after: string): string | null =>
  nextValidTime(compile(expression), new Date(after), UTC)?.toISOString() ??
  null;

const previous = (expression: string, before: string): string | null =>
  previousValidTime(compile(expression), new Date(before), UTC)?.toISOString() ??
  null;

const chain = (expression: string, after: string, count: number): string[] => {
  const compiled = compile(expression);
  const times: string[] = [];
  let cursor = new Date(after);
  for (let index = 0; index < count; index++) {
    const found = nextValidTime(compiled, cursor, UTC);
    if (!found) {
      break;
    }
    times.push(found.toISOString());
    cursor = found;
  }
  return times;
};

test("nextValidTime fires on the first of the month", () => {
  expect(next("0 0 2 1 * ? *", "2020-04-16T00:00:00Z")).toBe(
    "2020-05-01T02:00:00.000Z",
  );
});

test("nextValidTime skips the weekend for MON-FRI", () => {
  // 2024-06-15 is a Saturday
  expect(next("0 15 10 ? * MON-FRI", "2024-06-15T12:00:00Z")).toBe(
    "2024-06-17T10:15:00.000Z",
  );
});

test("nextValidTime finds the last Friday of the month", () => {
  expect(next("0 15 10 ? * 6L", "2024-08-01T00:00:00Z")).toBe(
    "2024-08-30T10:15:00.000Z",
  );
  // May 2024 ends on a Friday
  expect(next("0 15 10 ? * 6L", "2024-05-20T00:00:00Z")).toBe(
    "2024-05-31T10:15:00.000Z",
  );
});

test("nextValidTime finds the third Friday and rolls over once it has passed", () => {
  expect(next("0 15 10 ? * 6#3", "2024-06-01T00:00:00Z")).toBe(
    "2024-06-21T10:15:00.000Z",
  );
  expect(next("0 15 10 ? * 6#3", "2024-06-21T10:15:00Z")).toBe(
    "2024-07-19T10:15:00.000Z",
  );
});

test("nextValidTime skips months without a fifth occurrence", () => {
  // June 2024 has four Fridays; the next fifth Friday falls on 2024-08-30
  expect(next("0 0 8 ? * 6#5", "2024-06-01T00:00:00Z")).toBe(
    "2024-08-30T08:00:00.000Z",
  );
});

test("nextValidTime handles leap days", () => {
  expect(next("0 0 12 29 2 ?", "2021-03-01T00:00:00Z")).toBe(
    "2024-02-29T12:00:00.000Z",
  );
});

test("nextValidTime resolves L, L-n and LW against the month length", () => {
  expect(next("0 0 0 L * ?", "2024-02-10T00:00:00Z")).toBe(
    "2024-02-29T00:00:00.000Z",
  );
  expect(next("0 0 0 L-2 * ?", "2023-02-01T00:00:00Z")).toBe(
    "2023-02-26T00:00:00.000Z",
  );
  // 2024-06-30 is a Sunday
  expect(next("0 0 18 LW * ?", "2024-06-01T00:00:00Z")).toBe(
    "2024-06-28T18:00:00.000Z",
  );
});

test("nextValidTime moves W to the nearest weekday inside the month", () => {
  // 2024-06-15 is a Saturday
  expect(next("0 0 9 15W * ?", "2024-06-01T00:00:00Z")).toBe(
    "2024-06-14T09:00:00.000Z",
  );
  // 2024-06-01 is a Saturday; Friday would be in May
  expect(next("0 0 9 1W * ?", "2024-05-31T12:00:00Z")).toBe(
    "2024-06-03T09:00:00.000Z",
  );
  // 2024-06-30 is a Sunday and the last day
  expect(next("0 0 9 30W * ?", "2024-06-20T00:00:00Z")).toBe(
    "2024-06-28T09:00:00.000Z",
  );
  // June has no 31st
  expect(next("0 0 9 31W * ?", "2024-06-01T00:00:00Z")).toBe(
    "2024-07-31T09:00:00.000Z",
  );
});

test("nextValidTime accepts either day field when both are restricted", () => {
  // Fridays in September 2024 fall on the 6th, 13th and 20th
  expect(chain("0 0 0 10 * 6", "2024-09-01T00:00:00Z", 3)).toEqual([
    "2024-09-06T00:00:00.000Z",
    "2024-09-10T00:00:00.000Z",
    "2024-09-13T00:00:00.000Z",
  ]);
});

test("nextValidTime never returns the reference instant", () => {
  expect(next("* * * * * ?", "2024-01-01T00:00:00.000Z")).toBe(
    "2024-01-01T00:00:01.000Z",
  );
  expect(next("* * * * * ?", "2024-01-01T00:00:00.500Z")).toBe(
    "2024-01-01T00:00:01.000Z",
  );
  expect(next("0 0 12 * * ?", "2024-01-01T12:00:00Z")).toBe(
    "2024-01-02T12:00:00.000Z",
  );
});

test("nextValidTime carries through every unit at a year boundary", () => {
  expect(next("*/20 * * * * ?", "2023-12-31T23:59:45Z")).toBe(
    "2024-01-01T00:00:00.000Z",
  );
});

test("nextValidTime honours the year field", () => {
  expect(next("0 0 0 1 1 ? 2030/5", "2024-01-01T00:00:00Z")).toBe(
    "2030-01-01T00:00:00.000Z",
  );
});

test("nextValidTime returns null once the supported years run out", () => {
  expect(next("0 0 0 1 1 ? 2020", "2020-06-01T00:00:00Z")).toBeNull();
  expect(next("0 0 0 30 2 ?", "2024-01-01T00:00:00Z")).toBeNull();
  expect(next("* * * * * ?", "2099-12-31T23:59:59Z")).toBeNull();
});

test("nextValidTime results chain in strictly increasing order and satisfy the expression", () => {
  const expressions = [
    "0 0/30 9-17 * * ?",
    "15 10 3 ? JAN,JUL MON#1",
    "0 0 0 LW * ?",
    "*/7 */13 * 1,15 * ?",
  ];

  for (const expression of expressions) {
    const compiled = compile(expression);
    let cursor = new Date("2024-01-01T00:00:00Z");
    for (let index = 0; index < 5; index++) {
      const found = nextValidTime(compiled, cursor, UTC);
      expect(found).not.toBeNull();
      if (!found) {
        break;
      }
      expect(found.getTime()).toBeGreaterThan(cursor.getTime());
      expect(isSatisfiedBy(compiled, found, UTC)).toBe(true);
      cursor = found;
    }
  }
});

test("nextValidTime walks wall-clock time in the requested zone", () => {
  // 09:00 in Tokyo is midnight UTC
  expect(
    nextValidTime(compile("0 0 9 * * ?"), new Date("2024-01-01T00:00:00Z"), {
      timeZone: "Asia/Tokyo",
    })?.toISOString(),
  ).toBe("2024-01-02T00:00:00.000Z");
});

test("nextValidTime skips wall-clock times removed by a DST change", () => {
  // 02:30 does not exist in New York on 2024-03-10
  expect(
    nextValidTime(compile("0 30 2 * * ?"), new Date("2024-03-10T05:00:00Z"), {
      timeZone: "America/New_York",
    })?.toISOString(),
  ).toBe("2024-03-11T06:30:00.000Z");
});

test("nextValidTime visits both passes of a repeated hour", () => {
  const newYork = { timeZone: "America/New_York" };
  const hourly = compile("0 0 * * * ?");
  const halfPastOne = compile("0 30 1 * * ?");

  // clocks go back from 02:00 EDT to 01:00 EST at 06:00Z on 2024-11-03
  expect(
    nextValidTime(hourly, new Date("2024-11-03T05:00:00Z"), newYork)?.toISOString(),
  ).toBe("2024-11-03T06:00:00.000Z");
  expect(isSatisfiedBy(hourly, new Date("2024-11-03T06:00:00Z"), newYork)).toBe(
    true,
  );
  expect(
    nextValidTime(halfPastOne, new Date("2024-11-03T05:45:00Z"), newYork)?.toISOString(),
  ).toBe("2024-11-03T06:30:00.000Z");
  expect(
    nextValidTime(hourly, new Date("2024-11-03T06:30:00Z"), newYork)?.toISOString(),
  ).toBe("2024-11-03T07:00:00.000Z");
});

test("nextValidTime starts from 1970 for earlier references", () => {
  expect(next("0 0 0 1 1 ?", "1965-06-01T00:00:00Z")).toBe(
    "1970-01-01T00:00:00.000Z",
  );
});

test("nextValidTime uses the system zone by default", () => {
  // 2024-01-13 is a Saturday
  const found = nextValidTime(
    compile("0 15 10 ? * MON-FRI"),
    new TZDate(2024, 0, 13, 12, 0, 0),
  );

  expect(found?.getTime()).toBe(new TZDate(2024, 0, 15, 10, 15, 0).getTime());
});

test("previousValidTime finds the previous third Friday", () => {
  expect(previous("0 15 10 ? * 6#3", "2024-07-01T00:00:00Z")).toBe(
    "2024-06-21T10:15:00.000Z",
  );
  expect(previous("0 15 10 ? * 6#3", "2024-06-21T10:15:00Z")).toBe(
    "2024-05-17T10:15:00.000Z",
  );
});

test("previousValidTime respects month length when walking back", () => {
  expect(previous("0 0 0 L * ?", "2024-03-15T00:00:00Z")).toBe(
    "2024-02-29T00:00:00.000Z",
  );
});

test("previousValidTime never returns the reference instant", () => {
  expect(previous("* * * * * ?", "2024-01-01T00:00:00.500Z")).toBe(
    "2024-01-01T00:00:00.000Z",
  );
  expect(previous("* * * * * ?", "2024-01-01T00:00:00.000Z")).toBe(
    "2023-12-31T23:59:59.000Z",
  );
});

test("previousValidTime carries backwards through a year boundary", () => {
  expect(previous("0 0 12 * * ?", "2024-01-01T00:00:00Z")).toBe(
    "2023-12-31T12:00:00.000Z",
  );
});

test("previousValidTime returns null before the supported years", () => {
  expect(previous("0 0 0 1 1 ? 1970", "1970-01-01T00:00:00Z")).toBeNull();
  expect(previous("0 0 0 1 1 ? 2050", "2024-01-01T00:00:00Z")).toBeNull();
});

test("previousValidTime starts from 2099 for later references", () => {
  expect(previous("0 0 0 * * ?", "2150-01-01T00:00:00Z")).toBe(
    "2099-12-31T00:00:00.000Z",
  );
});

test("previousValidTime visits the second pass of a repeated hour", () => {
  expect(
    previousValidTime(compile("0 0 * * * ?"), new Date("2024-11-03T06:30:00Z"), {
      timeZone: "America/New_York",
    })?.toISOString(),
  ).toBe("2024-11-03T06:00:00.000Z");
});

test("previousValidTime mirrors nextValidTime", () => {
  const compiled = compile("0 15 10 ? * 6L");
  const found = nextValidTime(compiled, new Date("2024-08-01T00:00:00Z"), UTC);
  expect(found).not.toBeNull();
  if (!found) {
    return;
  }
  const after = new Date(found.getTime() + 1_000);

  expect(previousValidTime(compiled, after, UTC)?.toISOString()).toBe(
    found.toISOString(),
  );
});

test("isSatisfiedBy checks each field of the instant", () => {
  const compiled = compile("0 15 10 ? * 6#3");

  expect(isSatisfiedBy(compiled, new Date("2024-06-21T10:15:00Z"), UTC)).toBe(
    true,
  );
  expect(isSatisfiedBy(compiled, new Date("2024-06-14T10:15:00Z"), UTC)).toBe(
    false,
  );
  expect(isSatisfiedBy(compiled, new Date("2024-06-21T10:16:00Z"), UTC)).toBe(
    false,
  );
});

test("isSatisfiedBy rejects instants with milliseconds", () => {
  expect(
    isSatisfiedBy(
      compile("* * * * * ?"),
      new Date("2024-06-21T10:15:00.001Z"),
      UTC,
    ),
  ).toBe(false);
});

test("isSatisfiedBy honours the year field", () => {
  const compiled = compile("0 0 0 1 1 ? 2025");

  expect(isSatisfiedBy(compiled, new Date("2025-01-01T00:00:00Z"), UTC)).toBe(
    true,
  );
  expect(isSatisfiedBy(compiled, new Date("2026-01-01T00:00:00Z"), UTC)).toBe(
    false,
  );
});

test("nearestWeekday stays inside the month", () => {
  // June 2024: the 1st is a Saturday and the 30th a Sunday
  expect(nearestWeekday(2024, 6, 1)).toBe(3);
  expect(nearestWeekday(2024, 6, 2)).toBe(3);
  expect(nearestWeekday(2024, 6, 15)).toBe(14);
  expect(nearestWeekday(2024, 6, 30)).toBe(28);
  expect(nearestWeekday(2024, 6, 12)).toBe(12);
  expect(nearestWeekday(2024, 6, 31)).toBeNull();
});
