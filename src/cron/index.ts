export type {
  DayOfMonthConstraint,
  DayOfWeekConstraint,
  FieldConstraint,
  ValueSet,
} from "./compiler.js";
export { Cron, type CronOptions } from "./cron.js";
export {
  BOTH_DAYS_UNSPECIFIED_WARNING,
  compile,
  type Expression,
  type ExpressionFields,
  expressionsEqual,
  isRestricted,
  NEITHER_DAY_UNSPECIFIED_WARNING,
} from "./expression.js";
export { FIELD_KINDS, FIELD_SPECS, type FieldKind } from "./field.js";
export { format } from "./formatter.js";
export {
  createCronToolkit,
  CronToolkit,
  type CronToolkitOptions,
  type ToolkitLogger,
} from "./toolkit.js";
export {
  createCronToolkitFromEnv,
  ENV_PREFIX,
  loadToolkitOptions,
} from "./toolkit-options.js";
export { type ValidationResult, validate } from "./validator.js";
export {
  isSatisfiedBy,
  nextValidTime,
  previousValidTime,
  type WalkOptions,
} from "./walker.js";
