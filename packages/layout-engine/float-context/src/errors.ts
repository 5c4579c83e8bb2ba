export type FloatPlacementErrorCode = 'INVALID_WIDTH' | 'INVALID_DIMENSIONS' | 'INVALID_OPTIONS';

/**
 * Structured error thrown for requests the float context cannot accept.
 *
 * Match on `error.code`. A rejected request never changes the context's state.
 */
export class FloatPlacementError extends Error {
  readonly code: FloatPlacementErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: FloatPlacementErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'FloatPlacementError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, FloatPlacementError.prototype);
  }
}
