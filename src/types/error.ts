import { symbolError } from "./symbols";
import type { IValidationSchema } from "./utilities";
import type { IErrorMeta } from "./meta";
import type { ListError } from "../definers/defineError";

export type DefaultErrorType = Record<string, unknown>;

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Advice appended to the stringified error, explaining how to fix it.
   */
  remediation?: string | ((data: TData) => string);
  /**
   * Validate error data on throw(). If provided, data is parsed first.
   */
  dataSchema?: IValidationSchema<TData>;
  meta?: IErrorMeta;
}

/**
 * Runtime helper returned by defineError()/error().build().
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique id, also used as the thrown error's name */
  id: string;
  /** Throw a typed error with the given data */
  throw(data: TData): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is ListError<TData>;
  /** Brand symbol for runtime detection */
  [symbolError]: true;
}
