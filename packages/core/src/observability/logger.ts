import type { CorrelationContext, LogCategory, LogEntry, LogLevel } from "./types.js";

export type LoggerConfig = {
  minLevel: LogLevel;
  /** Writes debug/info to stdout and warn/error to stderr */
  console: boolean;
  handler?: (entry: LogEntry) => void;
};

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

type RenumberedLabel = { oldLabel: string; newLabel: string };

/** One console line: time, level, category, message, then context and data. */
export function formatEntry(entry: LogEntry): string {
  const { docId, opId } = entry.context;
  const parts = [
    entry.timestamp,
    entry.level.toUpperCase().padEnd(5),
    `[${entry.category}]`,
    entry.message,
  ];
  if (docId) {
    parts.push(`doc=${docId}`);
  }
  if (opId) {
    parts.push(`op=${opId}`);
  }
  if (entry.data) {
    parts.push(JSON.stringify(entry.data));
  }
  if (entry.error) {
    parts.push(entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`);
  }
  return parts.join(" ");
}

export class NumbermarkLogger {
  private readonly config: LoggerConfig;
  private readonly context: Partial<CorrelationContext>;

  constructor(config: Partial<LoggerConfig> = {}, context: Partial<CorrelationContext> = {}) {
    this.config = {
      minLevel: config.minLevel ?? "info",
      console: config.console ?? true,
      handler: config.handler,
    };
    this.context = context;
  }

  /** A logger sharing this one's output that stamps extra context on entries. */
  child(context: Partial<CorrelationContext>): NumbermarkLogger {
    const defined = Object.fromEntries(
      Object.entries(context).filter(([, value]) => value !== undefined)
    );
    return new NumbermarkLogger(this.config, { ...this.context, ...defined });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.config.minLevel];
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log("debug", category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log("info", category, message, data);
  }

  warn(
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    this.log("warn", category, message, data, error);
  }

  error(
    category: LogCategory,
    message: string,
    error?: Error,
    data?: Record<string, unknown>
  ): void {
    this.log("error", category, message, data, error);
  }

  logRenumber(
    direction: "advance" | "decrease",
    fromLabel: string,
    changes: readonly RenumberedLabel[]
  ): void {
    this.debug("store", `Renumber ${direction} from #${fromLabel}: ${changes.length} changed`, {
      direction,
      fromLabel,
      changes: changes.map((change) => `${change.oldLabel}->${change.newLabel}`),
    });
  }

  logSurfaceMiss(annotationId: string, label: string, reason: string): void {
    this.warn("surface", `No mark found for #${label}`, { annotationId, label, reason });
  }

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      context: { ...this.context },
      data,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    };
    this.config.handler?.(entry);
    if (this.config.console) {
      const stream = level === "warn" || level === "error" ? process.stderr : process.stdout;
      stream.write(`${formatEntry(entry)}\n`);
    }
  }
}

let defaultLogger: NumbermarkLogger | undefined;

/** Process-wide fallback for components constructed without a logger. */
export function getLogger(): NumbermarkLogger {
  if (!defaultLogger) {
    defaultLogger = new NumbermarkLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: NumbermarkLogger): void {
  defaultLogger = logger;
}
