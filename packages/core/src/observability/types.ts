/**
 * Observability types
 *
 * Structured log entries emitted by the numbering engine and its collaborators.
 */

/** Correlation context attached to every entry of a logger and its children */
export type CorrelationContext = {
  /** Document the session is bound to (usually the file path) */
  docId: string;
  /** Session ID, one per opened document */
  sessionId: string;
  /** Operation ID, unique per user-visible action */
  opId: string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogCategory =
  | "store"
  | "history"
  | "session"
  | "catalog"
  | "surface"
  | "persistence"
  | "cli";

/** Structured log entry */
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context: Partial<CorrelationContext>;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};
