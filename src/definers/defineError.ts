import type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
} from "../types/error";
import { symbolError } from "../types/symbols";

export class ListError<
  TData extends DefaultErrorType = DefaultErrorType,
> extends Error {
  public readonly data: TData;
  public readonly remediation?: string;

  constructor(
    public readonly id: string,
    message: string,
    data: TData,
    remediation?: string,
  ) {
    super(message);
    this.data = data;
    this.name = id;
    this.remediation = remediation;
  }

  override toString(): string {
    if (!this.remediation) {
      return this.message;
    }
    return `${this.message}\n\nRemediation: ${this.remediation}`;
  }
}

function defaultMessage(id: string, data: DefaultErrorType): string {
  return typeof data.message === "string" ? data.message : `Error: ${id}`;
}

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  [symbolError] = true as const;
  constructor(private readonly definition: IErrorDefinition<TData>) {}

  get id(): string {
    return this.definition.id;
  }

  get meta() {
    return this.definition.meta ?? {};
  }

  throw(data: TData): never {
    const { id, dataSchema, format, remediation } = this.definition;
    const parsed = dataSchema ? dataSchema.parse(data) : data;
    const message = format ? format(parsed) : defaultMessage(id, parsed);
    const advice =
      typeof remediation === "function" ? remediation(parsed) : remediation;
    throw new ListError(id, message, parsed, advice);
  }

  is(error: unknown): error is ListError<TData> {
    return error instanceof ListError && error.id === this.definition.id;
  }
}

/**
 * Create a new error helper from a plain definition.
 * Prefer the fluent `error(id)` builder for new errors.
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
) {
  return new ErrorHelper<TData>(definition);
}

export function isErrorHelper(value: unknown): value is IErrorHelper {
  return (
    typeof value === "object" &&
    value !== null &&
    symbolError in value &&
    value[symbolError] === true
  );
}
