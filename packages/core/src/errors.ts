export type NumbermarkErrorCode =
  | "INVALID_LABEL"
  | "INVALID_STYLE"
  | "INVALID_ANNOTATION"
  | "INVALID_DELTA"
  | "SERIALIZATION_FAILED"
  | "INVALID_CONFIG"
  | "HISTORY_REENTRANT"
  | "PAGE_OUT_OF_RANGE";

type NumbermarkErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

export class NumbermarkError extends Error {
  readonly code: NumbermarkErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: NumbermarkErrorCode, message: string, options: NumbermarkErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "NumbermarkError";
    this.code = code;
    this.context = options.context;
  }
}

/**
 * Raised when a label does not match `<main>[.<sub>][p]`.
 * Callers validate before they mutate, so a thrown InvalidLabelError never
 * leaves a store half-updated.
 */
export class InvalidLabelError extends NumbermarkError {
  readonly label: string;

  constructor(label: string, reason: string) {
    super("INVALID_LABEL", `Invalid label "${label}": ${reason}`, { context: { label } });
    this.name = "InvalidLabelError";
    this.label = label;
  }
}

export { InvalidLabelError as ParseError };

export class SerializationError extends NumbermarkError {
  constructor(message: string, options: NumbermarkErrorOptions = {}) {
    super("SERIALIZATION_FAILED", message, options);
    this.name = "SerializationError";
  }
}

export function isNumbermarkError(error: unknown): error is NumbermarkError {
  return error instanceof NumbermarkError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
