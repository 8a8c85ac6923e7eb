import {
  LogPrinter,
  type LogLevels,
  type PrintableLog,
  type PrintStrategy,
} from "./LogPrinter";

export const logLevels: ReadonlyArray<LogLevels> = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "critical",
];

export interface ILogInfo {
  source?: string;
  error?: unknown;
  data?: Record<string, unknown>;
  [key: string]: unknown;
}

export type ILog = PrintableLog;

export type LogListener = (log: ILog) => void;

export interface LoggerOptions {
  printThreshold: null | LogLevels;
  printStrategy: PrintStrategy;
  bufferLogs: boolean;
  useColors?: boolean;
}

/**
 * Structured, synchronous logger.
 *
 * Logs below `printThreshold` are still delivered to listeners; a `null`
 * threshold disables printing entirely. With `bufferLogs`, everything is held
 * back until `lock()` is called.
 */
export class Logger {
  private printThreshold: null | LogLevels;
  private printStrategy: PrintStrategy;
  private bufferLogs: boolean;
  private buffer: ILog[] = [];
  private boundContext: Record<string, unknown> = {};
  private isLocked: boolean = false;
  private useColors: boolean;
  private printer: LogPrinter;
  private source?: string;
  // Children created through with() delegate buffering, listeners and printing here
  private rootLogger?: Logger;
  public localListeners: LogListener[] = [];

  public static Severity: Readonly<Record<LogLevels, number>> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    critical: 5,
  };

  constructor(
    options: LoggerOptions,
    boundContext: Record<string, unknown> = {},
    source?: string,
    printer?: LogPrinter,
  ) {
    this.boundContext = { ...boundContext };
    this.printThreshold = options.printThreshold;
    this.printStrategy = options.printStrategy;
    this.bufferLogs = options.bufferLogs;
    this.useColors =
      typeof options.useColors === "boolean"
        ? options.useColors
        : this.detectColorSupport();

    this.source = source;

    this.printer =
      printer ??
      new LogPrinter({
        strategy: this.printStrategy,
        useColors: this.useColors,
      });
  }

  private detectColorSupport(): boolean {
    // Respect NO_COLOR convention
    if (process.env.NO_COLOR) return false;
    return !!process.stdout && !!process.stdout.isTTY;
  }

  /**
   * Creates a new logger instance with additional bound context
   */
  public with({
    source,
    additionalContext: context,
  }: {
    source?: string;
    additionalContext?: Record<string, unknown>;
  }): Logger {
    const child = new Logger(
      {
        printThreshold: this.printThreshold,
        printStrategy: this.printStrategy,
        bufferLogs: this.bufferLogs,
        useColors: this.useColors,
      },
      { ...this.boundContext, ...context },
      source ?? this.source,
      this.printer,
    );
    child.rootLogger = this.rootLogger ?? this;
    return child;
  }

  public log(level: LogLevels, message: unknown, logInfo: ILogInfo = {}) {
    const { source, error, data, ...context } = logInfo;

    const log: ILog = {
      level,
      message,
      source: source || this.source,
      timestamp: new Date(),
      error: error ? this.extractErrorInfo(error) : undefined,
      data: data || undefined,
      context: { ...this.boundContext, ...context },
    };

    const root = this.rootLogger ?? this;

    if (root.bufferLogs) {
      root.buffer.push(log);
      return;
    }

    root.triggerLogListeners(log);

    if (root.canPrint(level)) {
      root.printer.print(log);
    }
  }

  private extractErrorInfo(error: unknown): NonNullable<ILog["error"]> {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return {
      name: "UnknownError",
      message: String(error),
    };
  }

  public info(message: unknown, logInfo?: ILogInfo) {
    this.log("info", message, logInfo);
  }

  public error(message: unknown, logInfo?: ILogInfo) {
    this.log("error", message, logInfo);
  }

  public warn(message: unknown, logInfo?: ILogInfo) {
    this.log("warn", message, logInfo);
  }

  public debug(message: unknown, logInfo?: ILogInfo) {
    this.log("debug", message, logInfo);
  }

  public trace(message: unknown, logInfo?: ILogInfo) {
    this.log("trace", message, logInfo);
  }

  public critical(message: unknown, logInfo?: ILogInfo) {
    this.log("critical", message, logInfo);
  }

  /**
   * Direct print for tests and advanced scenarios. Delegates to LogPrinter.
   */
  public print(log: ILog) {
    this.printer.print(log);
  }

  /**
   * @param listener - A listener that will be triggered for every log.
   */
  public onLog(listener: LogListener) {
    if (this.rootLogger && this.rootLogger !== this) {
      this.rootLogger.onLog(listener);
    } else {
      this.localListeners.push(listener);
    }
  }

  /**
   * Releases buffered logs (listeners first, then printing) and stops
   * buffering. Calling it again is a no-op.
   */
  public lock() {
    const root = this.rootLogger ?? this;
    if (root.isLocked) {
      return;
    }

    if (root.bufferLogs) {
      for (const log of root.buffer) {
        root.triggerLogListeners(log);
      }
      for (const log of root.buffer) {
        if (root.canPrint(log.level)) {
          root.printer.print(log);
        }
      }
    }
    root.bufferLogs = false;
    root.buffer = [];
    root.isLocked = true;
  }

  private canPrint(level: LogLevels): boolean {
    if (this.printThreshold === null) {
      return false;
    }

    return Logger.Severity[level] >= Logger.Severity[this.printThreshold];
  }

  private triggerLogListeners(log: ILog) {
    for (const listener of this.localListeners) {
      try {
        listener(log);
      } catch (error) {
        // A failing listener must not break the caller that logged
        this.print({
          level: "error",
          message: "Error in log listener",
          timestamp: new Date(),
          error: {
            name: "ListenerError",
            message: error instanceof Error ? error.message : String(error),
          },
        });
      }
    }
  }
}
