/**
 * Common metadata you can attach to error definitions.
 * Useful for docs and tooling that lists the errors a package can raise.
 */
export interface IMeta {
  title?: string;
  description?: string;
}

export interface IErrorMeta extends IMeta {}
