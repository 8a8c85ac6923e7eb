/**
 * Minimal validation contract. Any library exposing a compatible `parse()`
 * (zod, yup adapters, hand-written guards) can be plugged in.
 */
export interface IValidationSchema<T = unknown> {
  /**
   * Parse and validate the input data.
   * Should throw an error if validation fails.
   * Can transform the data if the schema supports transformations.
   */
  parse(input: unknown): T;
}
