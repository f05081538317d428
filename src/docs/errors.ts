/**
 * Docs error types
 * Validation failures never reach the network; service failures carry the
 * HTTP status and the name of the operation that failed.
 */

const BOUNDARY_MESSAGE_PATTERN = /must be less than the end index/i;

export class DocsValidationError extends Error {
  readonly code = 400;

  constructor(message: string) {
    super(message);
    this.name = 'DocsValidationError';
  }
}

export class DocsServiceError extends Error {
  readonly code: number;
  readonly operation: string;

  constructor(operation: string, message: string, code: number, options?: { cause?: unknown }) {
    super(`${operation} failed: ${message}`, options);
    this.name = 'DocsServiceError';
    this.operation = operation;
    this.code = code;
  }
}

/**
 * Shape of errors thrown by googleapis (GaxiosError) and by test fakes
 */
interface ApiErrorLike {
  code?: number | string;
  status?: number;
  message?: string;
  response?: { status?: number };
}

function isApiErrorLike(error: unknown): error is ApiErrorLike {
  return typeof error === 'object' && error !== null;
}

/**
 * HTTP status of a service error, 500 when none is recorded
 */
export function getErrorCode(error: unknown): number {
  if (!isApiErrorLike(error)) return 500;
  if (typeof error.code === 'number') return error.code;
  if (typeof error.code === 'string' && /^\d+$/.test(error.code)) return parseInt(error.code, 10);
  return error.response?.status ?? error.status ?? 500;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isApiErrorLike(error) && typeof error.message === 'string') return error.message;
  return String(error);
}

/**
 * True when the service rejected an insertion index that is not strictly
 * less than the segment's end index.
 *
 * The service exposes no dedicated error code for this, so the 400 status is
 * paired with the message it reports.
 */
export function isBoundaryError(error: unknown): boolean {
  if (error instanceof DocsValidationError) return false;
  const code = getErrorCode(error);
  if (code !== 400) return false;
  return BOUNDARY_MESSAGE_PATTERN.test(getErrorMessage(error));
}

/**
 * Wrap a service failure with the failing operation's name. Validation
 * errors and already-wrapped errors pass through unchanged.
 */
export function wrapServiceError(operation: string, error: unknown): Error {
  if (error instanceof DocsValidationError || error instanceof DocsServiceError) {
    return error;
  }
  return new DocsServiceError(operation, getErrorMessage(error), getErrorCode(error), { cause: error });
}
