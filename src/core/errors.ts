export type EngineErrorCode =
  | "INVALID_INPUT"
  | "UNSUPPORTED_CHAIN"
  | "NOT_A_CONTRACT"
  | "BATCH_LIMIT"
  | "DEADLINE_EXCEEDED"
  | "UPSTREAM";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.code = code;
  }
}

export class DeadlineExceededError extends EngineError {
  constructor(operation: string) {
    super("DEADLINE_EXCEEDED", `${operation} timed out`);
    this.name = "DeadlineExceededError";
  }
}

export function isEngineError(e: unknown, code?: EngineErrorCode): e is EngineError {
  return e instanceof EngineError && (code === undefined || e.code === code);
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
