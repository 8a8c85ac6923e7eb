export type EnvCastType = "string" | "boolean";

export type EnvValue = string | boolean;

export interface EnvVariableOptions {
  /** How the string value coming from process.env should be cast */
  cast?: EnvCastType;
  /** Default value returned when the variable is not set or cannot be cast */
  defaultValue?: EnvValue;
}

type EnvSource = Record<string, string | undefined>;

function castValue(
  raw: string | undefined,
  cast: EnvCastType | undefined,
): EnvValue | undefined {
  if (raw === undefined) return undefined;

  switch (cast) {
    case "boolean":
      return ["1", "true", "yes", "y"].includes(raw.trim().toLowerCase());
    case "string":
    default:
      return raw;
  }
}

/**
 * Typed view over environment variables.
 *
 * Variables may be registered with a cast and a default; the typed getters
 * return `undefined` (or the fallback) when the value has a different type.
 */
export class Env {
  private registry: Map<string, EnvVariableOptions> = new Map();

  constructor(private readonly source: EnvSource = process.env) {}

  /**
   * Register an environment variable with optional metadata (default value & casting).
   */
  set(key: string, options: EnvVariableOptions): this {
    this.registry.set(key, options);
    return this;
  }

  /**
   * Retrieve a value applying casting & default value logic.
   * Priority: cast env value -> registered default -> `fallback`.
   */
  get(key: string, fallback?: EnvValue): EnvValue | undefined {
    const registered = this.registry.get(key);
    const casted = castValue(this.source[key], registered?.cast);

    if (casted !== undefined) {
      return casted;
    }

    if (registered && registered.defaultValue !== undefined) {
      return registered.defaultValue;
    }

    return fallback;
  }

  string(key: string, fallback?: string): string | undefined {
    const value = this.get(key, fallback);
    return typeof value === "string" ? value : fallback;
  }

  boolean(key: string, fallback?: boolean): boolean | undefined {
    const value = this.get(key, fallback);
    return typeof value === "boolean" ? value : fallback;
  }
}
