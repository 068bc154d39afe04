import { loadRuntimeConfig, type LogThreshold } from "./config/runtime.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Ordering used to compare a level against the configured threshold. */
const LEVEL_WEIGHT: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogThreshold;
  /** Receives each serialised JSON line. Defaults to stdout. */
  readonly sink?: (line: string) => void;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Clock override, mostly for tests. */
  readonly now?: () => Date;
}

/**
 * Structured logger that emits one JSON line per entry. Entries below the
 * configured threshold are discarded before any serialisation work happens.
 */
export class StructuredLogger {
  readonly level: LogThreshold;
  private readonly sink: (line: string) => void;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.sink = options.sink ?? ((line) => process.stdout.write(line));
    this.entryListener = options.onEntry;
    this.now = options.now ?? (() => new Date());
  }

  /** Whether an entry at {@link level} would be emitted. */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    this.sink(`${JSON.stringify(entry)}\n`);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
  }
}

/** Builds a logger whose threshold comes from the runtime configuration. */
export function createLogger(options: Omit<LoggerOptions, "level"> = {}): StructuredLogger {
  return new StructuredLogger({ ...options, level: loadRuntimeConfig().logLevel });
}
