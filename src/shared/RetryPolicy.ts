import { WorktrailError } from '../domain/errors/DomainErrors.js';

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** 單次等待上限；未設定則不封頂 */
  maxDelayMs?: number;
  /** 預設：classification 為 retryable 的 WorktrailError */
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof WorktrailError && err.classification === 'retryable';
}

/** 第 attempt 次重試（從 0 起算）前的等待毫秒數 */
export function backoffDelay(attempt: number, opts: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>): number {
  const delay = opts.baseDelayMs * Math.pow(2, attempt) + Math.random() * opts.baseDelayMs;
  return opts.maxDelayMs !== undefined ? Math.min(delay, opts.maxDelayMs) : delay;
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
  const sleep = opts.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (attempt < opts.maxRetries && isRetryable(err)) {
        const delay = backoffDelay(attempt, opts);
        opts.onRetry?.(attempt + 1, err, delay);
        await sleep(delay);
      } else {
        throw err;
      }
    }
  }

  throw lastError;
}
