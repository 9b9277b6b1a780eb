export { Config, type ConfigValue, createConfig } from "./config.js";
export {
  AppError,
  ExhaustedError,
  InvalidArgumentError,
  MalformedExpressionError,
  RuntimeError,
  type Span,
} from "./errors.js";
export {
  createLogger,
  isLogLevel,
  LOG_LEVEL,
  type LogEntry,
  Logger,
  type LogLevel,
  type LogSink,
} from "./logger.js";
