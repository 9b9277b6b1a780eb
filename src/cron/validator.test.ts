import { expect, test } from "vitest";
import {
  BOTH_DAYS_UNSPECIFIED_WARNING,
  NEITHER_DAY_UNSPECIFIED_WARNING,
} from "./expression.js";
import { validate } from "./validator.js";

test("accepts well-formed expressions", () => {
  expect(validate("0 0 12 * * ?")).toEqual({ ok: true, warnings: [] });
  expect(validate("0 15 10 ? * 6L 2002-2006").ok).toBe(true);
});

test("five fields are not enough", () => {
  const result = validate("* * * * *");

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toBe(
      "Cron expression must have 6 or 7 fields, got 5",
    );
  }
});

test("reports the offending field and position", () => {
  const result = validate("0 0 25 * * ?");

  expect(result.ok).toBe(false);
  if (result.ok) {
    return;
  }
  expect(result.error.field).toBe("hour");
  expect(result.error.fieldIndex).toBe(2);
  expect(result.error.token).toBe("25");
  expect(result.error.describe()).toBe(
    "error: Value 25 out of range for hour field (0-23)\n  0 0 25 * * ?\n      ^^",
  );
});

test("reports the first failing field", () => {
  const result = validate("99 0 25 * * ?");

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.field).toBe("second");
  }
});

test("soft-rule violations are returned as warnings", () => {
  expect(validate("0 0 12 ? * ?")).toEqual({
    ok: true,
    warnings: [BOTH_DAYS_UNSPECIFIED_WARNING],
  });
  expect(validate("0 0 0 10 * 6")).toEqual({
    ok: true,
    warnings: [NEITHER_DAY_UNSPECIFIED_WARNING],
  });
});
