export type CodepaneErrorCode =
  | 'transport'
  | 'http_status'
  | 'decode'
  | 'session_busy'
  | 'persistence'
  | 'credential'
  | 'invalid_state';

export interface CodepaneError extends Error {
  code: CodepaneErrorCode;
  retryable: boolean;
  status: number;
}

/** Status reported for failures that never reached the server. */
export const LOCAL_ERROR_STATUS = 500;

export function makeCodepaneError(
  message: string,
  code: CodepaneErrorCode,
  retryable: boolean,
  status: number = LOCAL_ERROR_STATUS,
): CodepaneError {
  const error = new Error(message) as CodepaneError;
  error.name = 'CodepaneError';
  error.code = code;
  error.retryable = retryable;
  error.status = status;
  return error;
}

export function isCodepaneError(value: unknown): value is CodepaneError {
  return (
    value instanceof Error &&
    typeof (value as Partial<CodepaneError>).code === 'string' &&
    typeof (value as Partial<CodepaneError>).status === 'number'
  );
}

export function toCodepaneError(error: unknown, fallbackCode: CodepaneErrorCode = 'transport'): CodepaneError {
  if (isCodepaneError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return makeCodepaneError(message, fallbackCode, false);
}
