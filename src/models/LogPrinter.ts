export type PrintStrategy = "pretty" | "plain" | "json";

export const printStrategies: ReadonlyArray<PrintStrategy> = [
  "pretty",
  "plain",
  "json",
];

export type LogLevels =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "critical";

export interface PrintableLog {
  level: LogLevels;
  source?: string;
  message: unknown;
  timestamp: Date;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
  context?: Record<string, unknown>;
}

type Writer = (line: string) => void;

const LEVEL_COLORS: Readonly<Record<LogLevels, string>> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  critical: "\x1b[35m",
};
const RESET = "\x1b[0m";

/**
 * JSON for log payloads. Repeated objects print as "[Circular]", bigints as
 * strings.
 */
export function toLogJson(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(value, (_key, val: unknown) => {
      if (typeof val === "bigint") return val.toString();
      if (typeof val === "function") return "[Function]";
      if (typeof val === "object" && val !== null) {
        if (seen.has(val)) return "[Circular]";
        seen.add(val);
      }
      return val;
    });
  } catch {
    return String(value);
  }
}

/**
 * Renders one log per line: `HH:MM:SS.mmm LEVEL [source] message extras`,
 * or the whole record as JSON.
 */
export class LogPrinter {
  private readonly strategy: PrintStrategy;
  private readonly colored: boolean;

  constructor(options: { strategy: PrintStrategy; useColors: boolean }) {
    this.strategy = options.strategy;
    this.colored = options.strategy === "pretty" && options.useColors;
  }

  public print(log: PrintableLog): void {
    if (this.strategy === "json") {
      LogPrinter.writers.log(toLogJson(log));
      return;
    }
    this.pickWriter(log.level)(this.formatLine(log));
  }

  private formatLine(log: PrintableLog): string {
    const { level, source, message, timestamp, error, data, context } = log;
    const time = timestamp.toISOString().slice(11, 23);
    const label = level.toUpperCase().padEnd(8);
    const parts = [
      time,
      this.colored ? `${LEVEL_COLORS[level]}${label}${RESET}` : label,
    ];

    if (source) parts.push(`[${source}]`);
    parts.push(typeof message === "string" ? message : toLogJson(message));

    if (error) parts.push(`error=${error.name}: ${error.message}`);
    if (data && Object.keys(data).length > 0) {
      parts.push(`data=${toLogJson(data)}`);
    }
    if (context && Object.keys(context).length > 0) {
      parts.push(`context=${toLogJson(context)}`);
    }
    return parts.join(" ");
  }

  private pickWriter(level: LogLevels): Writer {
    const toError =
      level === "warn" || level === "error" || level === "critical";
    return toError ? LogPrinter.writers.error : LogPrinter.writers.log;
  }

  private static defaultWriters(): { log: Writer; error: Writer } {
    return {
      // eslint-disable-next-line no-console
      log: (line) => console.log(line),
      // eslint-disable-next-line no-console
      error: (line) => console.error(line),
    };
  }

  private static writers = LogPrinter.defaultWriters();

  public static setWriters(writers: Partial<{ log: Writer; error: Writer }>) {
    LogPrinter.writers = { ...LogPrinter.writers, ...writers };
  }

  public static resetWriters() {
    LogPrinter.writers = LogPrinter.defaultWriters();
  }
}
