/**
 * Error codes for level generation.
 *
 * Only `CONFIG_INVALID` and `GENERATION_EXHAUSTED` ever reach a caller of
 * `generateLevel`; the others end a single attempt and trigger a retry.
 */
export type LevelErrorCode =
  | "CONFIG_INVALID"
  | "PLACEMENT_EXHAUSTED"
  | "DISCONNECTED_LEVEL"
  | "CARVING_BLOCKED"
  | "VALIDATION_FAILED"
  | "GENERATION_EXHAUSTED";

/**
 * Unified error type for level generation.
 *
 * @example
 * ```typescript
 * const error = LevelError.placementExhausted(
 *   "100 placements in a row failed",
 *   { rooms: 3, coverage: 0.21 },
 * );
 * ```
 */
export class LevelError extends Error {
  readonly name = "LevelError";

  constructor(
    public readonly code: LevelErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LevelError);
    }
  }

  static configInvalid(message: string, details?: Record<string, unknown>): LevelError {
    return new LevelError("CONFIG_INVALID", message, details);
  }

  static placementExhausted(message: string, details?: Record<string, unknown>): LevelError {
    return new LevelError("PLACEMENT_EXHAUSTED", message, details);
  }

  static disconnectedLevel(message: string, details?: Record<string, unknown>): LevelError {
    return new LevelError("DISCONNECTED_LEVEL", message, details);
  }

  static carvingBlocked(message: string, details?: Record<string, unknown>): LevelError {
    return new LevelError("CARVING_BLOCKED", message, details);
  }

  static validationFailed(message: string, details?: Record<string, unknown>): LevelError {
    return new LevelError("VALIDATION_FAILED", message, details);
  }

  static generationExhausted(message: string, details?: Record<string, unknown>): LevelError {
    return new LevelError("GENERATION_EXHAUSTED", message, details);
  }

  /**
   * Check if an unknown error is a LevelError.
   */
  static isLevelError(error: unknown): error is LevelError {
    return error instanceof LevelError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: LevelErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
