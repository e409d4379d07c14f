export type CorrelationErrorCode =
  | 'SCOPE_ALREADY_RELEASED'
  | 'SCOPE_NOT_ACTIVE'
  | 'CAPTURE_NOT_INITIALIZED';

export class CorrelationError extends Error {
  constructor(
    readonly code: CorrelationErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'CorrelationError';
  }
}
