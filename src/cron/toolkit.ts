import {
  ExhaustedError,
  InvalidArgumentError,
  Logger,
  MalformedExpressionError,
  RuntimeError,
} from "../core/index.js";
import { DEFAULT_DATE_TIME_PATTERN, formatDateTime } from "../utils/date-format.js";
import { compile, type Expression } from "./expression.js";
import { format } from "./formatter.js";
import { validate } from "./validator.js";
import {
  isSatisfiedBy,
  nextValidTime,
  previousValidTime,
  type WalkOptions,
} from "./walker.js";

export interface ToolkitLogger {
  warning(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface CronToolkitOptions {
  /** IANA zone schedules are read in. Defaults to the system zone. */
  timeZone?: string;
  /** date-fns pattern for the `*Str` variants. */
  dateFormat?: string;
  /** Compiled expressions kept by text; 0 disables the cache. */
  cacheSize?: number;
  logger?: ToolkitLogger;
  /** Clock used when no reference instant is passed. */
  now?: () => Date;
}

export const DEFAULT_CACHE_SIZE = 64;
const MIN_COUNT = 1;

/**
 * String-in, Date-out helpers over the cron engine.
 * Compiled expressions are cached by their text in least-recently-used order.
 */
export class CronToolkit {
  private readonly cache = new Map<string, Expression>();
  private readonly cacheSize: number;
  private readonly walkOptions: WalkOptions;
  private readonly dateFormat: string;
  private readonly logger: ToolkitLogger;
  private readonly now: () => Date;

  constructor(options: CronToolkitOptions = {}) {
    const cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
    if (!Number.isInteger(cacheSize) || cacheSize < 0) {
      throw new InvalidArgumentError(
        `cacheSize must be a non-negative integer, got ${cacheSize}`,
      );
    }
    this.cacheSize = cacheSize;
    this.walkOptions = { timeZone: options.timeZone };
    this.dateFormat = options.dateFormat ?? DEFAULT_DATE_TIME_PATTERN;
    this.logger =
      options.logger ?? new Logger({ level: "warning" }).child({ component: "cron" });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Compiles through the cache.
   * @throws {MalformedExpressionError}
   */
  public compile(text: string): Expression {
    const cached = this.cache.get(text);
    if (cached) {
      this.cache.delete(text);
      this.cache.set(text, cached);
      return cached;
    }

    const expression = compile(text);
    if (this.cacheSize > 0) {
      if (this.cache.size >= this.cacheSize) {
        const oldest = this.cache.keys().next();
        if (!oldest.done) {
          this.cache.delete(oldest.value);
        }
      }
      this.cache.set(text, expression);
    }
    return expression;
  }

  public get cachedExpressionCount(): number {
    return this.cache.size;
  }

  public isValidExpression(text: string): boolean {
    const result = validate(text);
    if (!result.ok) {
      this.logger.debug("Invalid cron expression", {
        expression: text,
        field: result.error.field,
        reason: result.error.message,
      });
      return false;
    }
    for (const warning of result.warnings) {
      this.logger.warning(warning, { expression: text });
    }
    return true;
  }

  /**
   * Returns the canonical form of the expression.
   * @throws {RuntimeError} when the expression is malformed; the parse error is the cause
   */
  public formatExpression(text: string): string {
    try {
      return format(this.compile(text));
    } catch (error: unknown) {
      if (error instanceof MalformedExpressionError) {
        throw new RuntimeError(error.message, { cause: error });
      }
      throw error;
    }
  }

  /**
   * @throws {ExhaustedError} when there is no fire time after `from`
   */
  public getNextTime(text: string, from: Date = this.now()): Date {
    const next = nextValidTime(this.compile(text), from, this.walkOptions);
    if (!next) {
      throw new ExhaustedError(
        `No fire time after ${from.toISOString()} for "${text}"`,
      );
    }
    return next;
  }

  /**
   * Returns up to `count` consecutive fire times; the list ends early when the schedule runs out.
   * @throws {InvalidArgumentError} when `count` is not a positive integer
   */
  public getNextTimeList(text: string, count: number): Date[];
  public getNextTimeList(text: string, from: Date | undefined, count: number): Date[];
  public getNextTimeList(
    text: string,
    fromOrCount: Date | number | undefined,
    maybeCount?: number,
  ): Date[] {
    const count = typeof fromOrCount === "number" ? fromOrCount : maybeCount;
    const from = fromOrCount instanceof Date ? fromOrCount : this.now();

    if (count === undefined || !Number.isInteger(count) || count < MIN_COUNT) {
      throw new InvalidArgumentError(
        `count must be an integer of at least ${MIN_COUNT}, got ${count}`,
      );
    }

    const expression = this.compile(text);
    const times: Date[] = [];
    let cursor = from;

    while (times.length < count) {
      const next = nextValidTime(expression, cursor, this.walkOptions);
      if (!next) {
        this.logger.notice("Cron schedule exhausted before the requested count", {
          expression: text,
          requested: count,
          found: times.length,
        });
        break;
      }
      times.push(next);
      cursor = next;
    }

    return times;
  }

  /**
   * Returns the last fire time strictly before `from`, found by walking backwards.
   * @throws {ExhaustedError} when the schedule never fired since 1970
   */
  public getLastTime(text: string, from: Date = this.now()): Date {
    const previous = previousValidTime(this.compile(text), from, this.walkOptions);
    if (!previous) {
      throw new ExhaustedError(
        `No fire time before ${from.toISOString()} for "${text}"`,
      );
    }
    return previous;
  }

  public isSatisfiedBy(text: string, instant: Date): boolean {
    return isSatisfiedBy(this.compile(text), instant, this.walkOptions);
  }

  public getNextTimeStr(text: string, from?: Date): string {
    return this.formatDateTime(this.getNextTime(text, from));
  }

  public getNextTimeStrList(text: string, count: number): string[];
  public getNextTimeStrList(
    text: string,
    from: Date | undefined,
    count: number,
  ): string[];
  public getNextTimeStrList(
    text: string,
    fromOrCount: Date | number | undefined,
    maybeCount?: number,
  ): string[] {
    const times =
      typeof fromOrCount === "number"
        ? this.getNextTimeList(text, fromOrCount)
        : this.getNextTimeList(text, fromOrCount, maybeCount ?? Number.NaN);
    return times.map((time) => this.formatDateTime(time));
  }

  public getLastTimeStr(text: string, from?: Date): string {
    return this.formatDateTime(this.getLastTime(text, from));
  }

  /** Formats with the toolkit's pattern and zone. */
  public formatDateTime(instant: Date): string {
    return formatDateTime(instant, this.dateFormat, this.walkOptions.timeZone);
  }
}

export const createCronToolkit = (options: CronToolkitOptions = {}): CronToolkit =>
  new CronToolkit(options);
