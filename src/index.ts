import { error as errorFn } from "./definers/builders/error";

// Single namespace holding the builder entry points
export const r = Object.freeze({
  error: errorFn,
});

export * as definitions from "./defs";
export * from "./models";
export * as Errors from "./errors";
export {
  ListError,
  ErrorHelper,
  defineError,
  isErrorHelper,
} from "./definers/defineError";
export { createLogger, loadLoggerConfig, defaultLoggerOptions } from "./config";
export { toBoolean } from "./tools/toBoolean";

// Re-export types at the package root so consumer declaration emits can reference them directly
export type * from "./defs";
