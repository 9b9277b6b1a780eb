import { TZDate } from "@date-fns/tz";
import { ExhaustedError } from "../core/index.js";
import { compile, type Expression, type ExpressionFields } from "./expression.js";
import { format } from "./formatter.js";
import {
  isSatisfiedBy,
  nextValidTime,
  previousValidTime,
  type WalkOptions,
} from "./walker.js";

export interface CronOptions {
  /** IANA zone the schedule is read in. Defaults to the system zone. */
  timeZone?: string;
}

/**
 * A compiled schedule bound to a time zone.
 * Fields: second minute hour dayOfMonth month dayOfWeek [year]
 */
export class Cron {
  private readonly expression: Expression;
  private readonly walkOptions: WalkOptions;

  /**
   * @throws {MalformedExpressionError} when the expression does not compile
   */
  constructor(expression: string | Expression, options: CronOptions = {}) {
    this.expression =
      typeof expression === "string" ? compile(expression) : expression;
    this.walkOptions = { timeZone: options.timeZone };
  }

  get timeZone(): string | undefined {
    return this.walkOptions.timeZone;
  }

  get source(): string {
    return this.expression.source;
  }

  /**
   * Returns true when the date is itself a fire time.
   */
  public matches(date: Date): boolean {
    return isSatisfiedBy(this.expression, date, this.walkOptions);
  }

  /**
   * Returns the first fire time strictly after the given date.
   * @throws {ExhaustedError} when the schedule never fires again within the supported years
   */
  public getNextExecution(after: Date = new TZDate()): Date {
    const next = nextValidTime(this.expression, after, this.walkOptions);
    if (!next) {
      throw new ExhaustedError(
        `No fire time after ${after.toISOString()} for "${this.expression.source}"`,
      );
    }
    return next;
  }

  /**
   * Returns the last fire time strictly before the given date.
   * @throws {ExhaustedError} when the schedule never fired within the supported years
   */
  public getPreviousExecution(before: Date = new TZDate()): Date {
    const previous = previousValidTime(this.expression, before, this.walkOptions);
    if (!previous) {
      throw new ExhaustedError(
        `No fire time before ${before.toISOString()} for "${this.expression.source}"`,
      );
    }
    return previous;
  }

  /**
   * Returns the compiled constraint of every field.
   */
  public getFields(): ExpressionFields {
    return this.expression.fields;
  }

  public getExpression(): Expression {
    return this.expression;
  }

  /** Canonical form of the schedule. */
  public toString(): string {
    return format(this.expression);
  }
}
