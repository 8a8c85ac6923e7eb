import { defineError, type ErrorHelper } from "../defineError";
import type { DefaultErrorType, IErrorDefinition } from "../../types/error";
import type { IErrorMeta } from "../../types/meta";
import type { IValidationSchema } from "../../types/utilities";

/**
 * Fluent, immutable builder for error helpers. Every step returns a new
 * builder; the one it was called on keeps its definition.
 */
export class ErrorBuilder<TData extends DefaultErrorType = DefaultErrorType> {
  private readonly definition: Readonly<IErrorDefinition<TData>>;

  constructor(definition: IErrorDefinition<TData>) {
    this.definition = Object.freeze({ ...definition });
    Object.freeze(this);
  }

  private with(patch: Partial<IErrorDefinition<TData>>): ErrorBuilder<TData> {
    return new ErrorBuilder<TData>({ ...this.definition, ...patch });
  }

  /** Validates data on `throw()`; the parsed value is what gets thrown. */
  dataSchema(schema: IValidationSchema<TData>): ErrorBuilder<TData> {
    return this.with({ dataSchema: schema });
  }

  schema(schema: IValidationSchema<TData>): ErrorBuilder<TData> {
    return this.dataSchema(schema);
  }

  format(fn: (data: TData) => string): ErrorBuilder<TData> {
    return this.with({ format: fn });
  }

  remediation(advice: string | ((data: TData) => string)): ErrorBuilder<TData> {
    return this.with({ remediation: advice });
  }

  meta(meta: IErrorMeta): ErrorBuilder<TData> {
    return this.with({ meta: Object.freeze({ ...meta }) });
  }

  build(): Readonly<ErrorHelper<TData>> {
    return Object.freeze(defineError<TData>(this.definition));
  }
}

export function error<TData extends DefaultErrorType = DefaultErrorType>(
  id: string,
): ErrorBuilder<TData> {
  return new ErrorBuilder<TData>({ id, meta: {} });
}
