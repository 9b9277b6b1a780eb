export * from "./core/index.js";
export * from "./cron/index.js";
export {
  DEFAULT_DATE_TIME_PATTERN,
  formatDateTime,
} from "./utils/date-format.js";
