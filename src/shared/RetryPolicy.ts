import { ChatLedgerError } from '../domain/errors/DomainErrors.js';

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
  /** 中止時不再等待重試 */
  signal?: AbortSignal;
}

/** 預設：只重試 classification 為 retryable 的 domain 錯誤 */
export function isRetryableError(err: unknown): boolean {
  return err instanceof ChatLedgerError && err.classification === 'retryable';
}

/**
 * 帶指數退避和 jitter 的重試策略
 * 總嘗試次數 = 1（初始） + maxRetries
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const isRetryable = opts.isRetryable ?? isRetryableError;
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (attempt < opts.maxRetries && isRetryable(err)) {
        const delay = opts.baseDelayMs * Math.pow(2, attempt) + Math.random() * opts.baseDelayMs;
        opts.onRetry?.(attempt + 1, err);
        await sleep(delay, opts.signal);
      } else {
        throw err;
      }
    }
  }

  throw lastError;
}
