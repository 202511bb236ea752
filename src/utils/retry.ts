import { logger } from './logger.js';
import { OperationAborted } from '../errors.js';

export class NonRetryableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'NonRetryableError';
  }
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  label?: string;
  signal?: AbortSignal;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) { reject(new OperationAborted('sleep')); return; }
    const timer = setTimeout(() => { signal?.removeEventListener('abort', onAbort); resolve(); }, ms);
    const onAbort = () => { clearTimeout(timer); reject(new OperationAborted('sleep')); };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw new OperationAborted(operation);
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 1_000, backoffFactor = 2, label = 'operation', signal,
    isRetryable = (e) => !(e instanceof NonRetryableError) && !(e instanceof OperationAborted), onRetry } = opts;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    throwIfAborted(signal, label);
    try { return await fn(attempt); }
    catch (err) {
      lastErr = err;
      if (!isRetryable(err) || attempt === maxAttempts) throw err;
      const delay = baseDelayMs * Math.pow(backoffFactor, attempt - 1);
      logger.warn(`Retry ${label} ${attempt}/${maxAttempts} in ${delay}ms`, { error: String(err) });
      onRetry?.(attempt, err);
      await sleep(delay, signal);
    }
  }
  throw lastErr;
}

/**
 * Runs `fn` with a signal that fires on the caller's abort or after `timeoutMs`,
 * whichever comes first. Rejects with OperationAborted in both cases.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  throwIfAborted(parent, label);
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => { timedOut = true; controller.abort(); }, timeoutMs);
  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => {
      reject(new OperationAborted(label, timedOut ? `timed out after ${timeoutMs}ms` : 'aborted'));
    }, { once: true });
  });
  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
