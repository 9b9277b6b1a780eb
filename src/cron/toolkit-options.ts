import { Config, InvalidArgumentError, isLogLevel, Logger } from "../core/index.js";
import { type CronToolkit, type CronToolkitOptions, createCronToolkit } from "./toolkit.js";

export const ENV_PREFIX = "CRONWALK_";

const TIME_ZONE_KEY = "TIME_ZONE";
const DATE_FORMAT_KEY = "DATE_FORMAT";
const CACHE_SIZE_KEY = "CACHE_SIZE";
const LOG_LEVEL_KEY = "LOG_LEVEL";

const assertTimeZone = (timeZone: string): void => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch (error: unknown) {
    throw new InvalidArgumentError(`Unknown time zone: ${timeZone}`, {
      cause: error,
    });
  }
};

/**
 * Reads toolkit settings from a config store.
 * Keys: TIME_ZONE, DATE_FORMAT, CACHE_SIZE, LOG_LEVEL.
 * @throws {InvalidArgumentError} when a value has the wrong type or is out of range
 */
export function loadToolkitOptions(config: Config): CronToolkitOptions {
  const options: CronToolkitOptions = {};

  const timeZone = config.getString(TIME_ZONE_KEY);
  if (timeZone !== undefined) {
    assertTimeZone(timeZone);
    options.timeZone = timeZone;
  }

  const dateFormat = config.getString(DATE_FORMAT_KEY);
  if (dateFormat !== undefined) {
    options.dateFormat = dateFormat;
  }

  const cacheSize = config.getNumber(CACHE_SIZE_KEY);
  if (cacheSize !== undefined) {
    if (!Number.isInteger(cacheSize) || cacheSize < 0) {
      throw new InvalidArgumentError(
        `${CACHE_SIZE_KEY} must be a non-negative integer, got ${cacheSize}`,
      );
    }
    options.cacheSize = cacheSize;
  }

  const level = config.getString(LOG_LEVEL_KEY);
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new InvalidArgumentError(`Unknown log level: ${level}`);
    }
    options.logger = new Logger({ level }).child({ component: "cron" });
  }

  return options;
}

/**
 * Builds a toolkit from `CRONWALK_*` environment variables.
 */
export function createCronToolkitFromEnv(
  env: Record<string, string | undefined> = process.env,
): CronToolkit {
  const config = new Config();
  config.loadFromEnv({ prefix: ENV_PREFIX, env });
  return createCronToolkit(loadToolkitOptions(config));
}
