export type EngineErrorCode =
  | "NO_HAND_LOADED"
  | "NOT_YOUR_TURN"
  | "CANNOT_CHECK"
  | "INVALID_RAISE"
  | "RAISE_TOO_SMALL"
  | "ALREADY_FOLDED"
  | "HAND_OVER"
  | "ROUND_NOT_SETTLED";

/** Rule violation reported by the engine; `code` travels to the core unchanged. */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string = code) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
