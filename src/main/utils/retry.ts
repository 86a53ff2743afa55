/*
 * Retry helper for transient I/O errors, with a fixed delay between attempts.
 */

type RetryOptions = {
  attempts?: number;
  /** Delay between attempts */
  delayMs?: number;
  isRetriable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms | 0)));
}

// Codes that describe a missing or forbidden target rather than a momentary condition
const PERMANENT_FS_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'EACCES', 'EPERM', 'EROFS']);

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

export function isTransientFsError(err: unknown): boolean {
  if (err instanceof SyntaxError) return true;
  const code = errorCode(err);
  if (code === undefined) return false;
  return !PERMANENT_FS_CODES.has(code);
}

export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.floor(opts?.attempts ?? 3));
  const delayMs = Math.max(0, Math.floor(opts?.delayMs ?? 100));
  const isRetriable = opts?.isRetriable ?? isTransientFsError;

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      let shouldRetry = false;
      try {
        shouldRetry = isRetriable(err);
      } catch {
        shouldRetry = false;
      }
      if (!shouldRetry || attempt === attempts) {
        throw err;
      }
      opts?.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
  // Should be unreachable
  throw lastError;
}

export type { RetryOptions };
