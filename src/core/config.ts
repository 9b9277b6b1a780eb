import { InvalidArgumentError } from "./errors.js";

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;
const EMPTY_PREFIX = "";

export type ConfigValue = string | number;

export interface EnvLoadOptions {
  prefix?: string;
  parseNumbers?: boolean;
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

/**
 * Key/value settings store.
 * Values come from code or from environment variables and are read back through typed getters.
 */
export class Config {
  private readonly store = new Map<string, ConfigValue>();

  /**
   * Stores a value, replacing any previous one.
   * @param key setting name
   * @param value setting value
   */
  set(key: string, value: ConfigValue): void {
    this.store.set(key, value);
  }

  /**
   * @param key setting name
   * @returns the stored value, or undefined when the key is absent
   */
  get(key: string): ConfigValue | undefined {
    return this.store.get(key);
  }

  /**
   * Copies matching environment variables into the store, with the prefix stripped from each key.
   * Numeric looking values become numbers unless `parseNumbers` is false.
   * @param options prefix, parsing and source of the variables
   */
  loadFromEnv(options: EnvLoadOptions = {}): void {
    const prefix = options.prefix ?? EMPTY_PREFIX;
    const parseNumbers = options.parseNumbers ?? true;
    const env = options.env ?? process.env;

    for (const [key, value] of Object.entries(env)) {
      if (!key.startsWith(prefix) || value === undefined) {
        continue;
      }

      const normalizedKey = prefix ? key.slice(prefix.length) : key;
      this.set(normalizedKey, this.parseEnvValue(value, parseNumbers));
    }
  }

  /**
   * @param key setting name
   * @param fallback returned when the key is absent
   * @throws {InvalidArgumentError} when the stored value is not a string
   */
  getString(key: string, fallback?: string): string | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return fallback;
    }
    if (typeof value === "string") {
      return value;
    }
    throw new InvalidArgumentError(`Config value for ${key} is not a string`);
  }

  /**
   * Numeric strings are accepted as well as numbers.
   * @param key setting name
   * @param fallback returned when the key is absent
   * @throws {InvalidArgumentError} when the value cannot be read as a finite number
   */
  getNumber(key: string, fallback?: number): number | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return fallback;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === "string" && NUMBER_PATTERN.test(value)) {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    throw new InvalidArgumentError(`Config value for ${key} is not a number`);
  }

  /**
   * Converts an environment string to a number when asked and it looks like one.
   * @param value raw variable value
   * @param parseNumbers whether numeric text is converted
   */
  private parseEnvValue(value: string, parseNumbers: boolean): ConfigValue {
    if (parseNumbers && NUMBER_PATTERN.test(value)) {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }

    return value;
  }
}

/**
 * Factory for an empty `Config`.
 */
export const createConfig = (): Config => new Config();
