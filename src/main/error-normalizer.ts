export type ApiErrorCode =
  | 'VALIDATION_ERROR'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'NO_DEVICES'
  | 'FILE_SYSTEM_ERROR'
  | 'STORE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

export interface ApiError {
  error: {
    code: ApiErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function toApiError(code: ApiErrorCode, message: string, details?: Record<string, unknown>): ApiError {
  return { error: { code, message, details } };
}

export function ok<T>(data: T): { data: T } {
  return { data };
}

export interface RequestBodyError {
  status: number;
  message: string;
  /** Underlying failure, for the log */
  detail: string;
}

/**
 * Map an error raised by express.json while reading a request body. Anything else,
 * including server-side failures, returns null.
 */
export function describeRequestBodyError(err: unknown): RequestBodyError | null {
  if (!(err instanceof Error) || !('status' in err) || typeof err.status !== 'number') return null;
  if (err.status < 400 || err.status >= 500) return null;

  const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
  switch (type) {
    case 'entity.too.large':
      return { status: 413, message: 'Payload too large', detail: err.message };
    case 'entity.parse.failed':
      return { status: 400, message: 'Invalid JSON', detail: err.message };
    case 'encoding.unsupported':
    case 'charset.unsupported':
      return { status: 415, message: err.message, detail: err.message };
  }
  // zlib failures reach us untyped, carrying zlib's own code
  if ('code' in err && typeof err.code === 'string' && err.code.startsWith('Z_')) {
    return { status: 400, message: 'Failed to decompress gzip payload.', detail: err.message };
  }
  return { status: err.status, message: 'Invalid request body', detail: err.message };
}
