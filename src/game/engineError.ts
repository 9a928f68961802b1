export type EngineErrorCode = "INVALID_MOVE" | "NO_LEGAL_MOVE" | "INVALID_CONFIGURATION";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
