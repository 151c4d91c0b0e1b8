/**
 * Error codes for programmer errors raised by editors, the registry and the grid.
 */
export enum EditorErrorCode {
  EDITOR_NOT_FOUND = 'EDITOR_NOT_FOUND',
  INVALID_EDITOR_NAME = 'INVALID_EDITOR_NAME',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  DUPLICATE_CONTROL_ID = 'DUPLICATE_CONTROL_ID',
  INVALID_STATE = 'INVALID_STATE',
  PROPERTY_NOT_FOUND = 'PROPERTY_NOT_FOUND',
  DUPLICATE_PROPERTY = 'DUPLICATE_PROPERTY',
  ALREADY_ATTACHED = 'ALREADY_ATTACHED'
}

/**
 * Error class for precondition violations.
 *
 * Construction failures and unsupported operations are not reported through
 * this class: the former return an empty ControlSet, the latter are no-ops.
 */
export class EditorError extends Error {
  constructor(
    message: string,
    public readonly code: EditorErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'EditorError';
  }
}
