import { Env } from "./models/Env";
import { Logger, logLevels, type LoggerOptions } from "./models/Logger";
import {
  printStrategies,
  type LogLevels,
  type PrintStrategy,
} from "./models/LogPrinter";

export const ENV_LOG_LEVEL = "ORDERED_LIST_LOG_LEVEL";
export const ENV_LOG_STRATEGY = "ORDERED_LIST_LOG_STRATEGY";
export const ENV_LOG_BUFFER = "ORDERED_LIST_LOG_BUFFER";
export const ENV_NO_COLOR = "NO_COLOR";

export const defaultLoggerOptions: Readonly<LoggerOptions> = Object.freeze({
  printThreshold: "info",
  printStrategy: "pretty",
  bufferLogs: false,
});

function isLogLevel(value: string): value is LogLevels {
  return logLevels.some((level) => level === value);
}

function isPrintStrategy(value: string): value is PrintStrategy {
  return printStrategies.some((strategy) => strategy === value);
}

function createEnv(source?: Record<string, string | undefined>): Env {
  return new Env(source)
    .set(ENV_LOG_LEVEL, {
      cast: "string",
      defaultValue: defaultLoggerOptions.printThreshold ?? "none",
    })
    .set(ENV_LOG_STRATEGY, {
      cast: "string",
      defaultValue: defaultLoggerOptions.printStrategy,
    })
    .set(ENV_LOG_BUFFER, {
      cast: "boolean",
      defaultValue: defaultLoggerOptions.bufferLogs,
    });
}

/**
 * Reads logger settings from the environment.
 * Unknown levels or strategies fall back to the defaults; `none` as level
 * disables printing.
 */
export function loadLoggerConfig(
  source?: Record<string, string | undefined>,
): LoggerOptions {
  const env = createEnv(source);

  const level = (env.string(ENV_LOG_LEVEL) ?? "").trim().toLowerCase();
  const strategy = (env.string(ENV_LOG_STRATEGY) ?? "").trim().toLowerCase();

  const options: LoggerOptions = {
    printThreshold:
      level === "none"
        ? null
        : isLogLevel(level)
          ? level
          : defaultLoggerOptions.printThreshold,
    printStrategy: isPrintStrategy(strategy)
      ? strategy
      : defaultLoggerOptions.printStrategy,
    bufferLogs:
      env.boolean(ENV_LOG_BUFFER) ?? defaultLoggerOptions.bufferLogs,
  };

  if (env.string(ENV_NO_COLOR)) {
    options.useColors = false;
  }

  return options;
}

/**
 * Builds a Logger from the environment, with explicit overrides on top.
 */
export function createLogger(
  overrides: Partial<LoggerOptions> = {},
  source?: Record<string, string | undefined>,
): Logger {
  return new Logger({ ...loadLoggerConfig(source), ...overrides });
}
