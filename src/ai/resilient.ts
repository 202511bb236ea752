/**
 * Wraps a provider with a per-call timeout and retries with backoff. Once the
 * attempts run out the caller sees ModelUnavailable, which every consumer
 * treats as a cue to degrade rather than fail.
 */
import { MODEL } from '../config.js';
import { ModelUnavailable, OperationAborted, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError, withRetry, withTimeout } from '../utils/retry.js';
import type { GenerateRequest, LanguageModel } from './model.js';

export interface ResilienceOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
}

export class ResilientModel implements LanguageModel {
  readonly name: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(private readonly inner: LanguageModel, opts: ResilienceOptions = {}) {
    this.name = inner.name;
    this.timeoutMs = opts.timeoutMs ?? MODEL.timeoutMs;
    this.maxAttempts = opts.maxAttempts ?? MODEL.maxAttempts;
    this.retryDelayMs = opts.retryDelayMs ?? MODEL.retryDelayMs;
  }

  private async call<T>(op: string, signal: AbortSignal | undefined, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withRetry(
        () => withTimeout(fn, this.timeoutMs, `${this.name} ${op}`, signal),
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryDelayMs,
          label: `${this.name} ${op}`,
          signal,
          isRetryable: (err) =>
            !(err instanceof NonRetryableError) &&
            !(err instanceof ModelUnavailable) &&
            !(err instanceof OperationAborted && signal?.aborted === true),
        },
      );
    } catch (err) {
      // The caller's own cancellation propagates as is.
      if (err instanceof OperationAborted && signal?.aborted) throw err;
      if (err instanceof ModelUnavailable) throw err;
      logger.warn('Model call failed', { provider: this.name, op, error: describeError(err) });
      throw new ModelUnavailable(this.name, describeError(err), { cause: err });
    }
  }

  generate(req: GenerateRequest): Promise<string> {
    return this.call('generate', req.signal, (signal) => this.inner.generate({ ...req, signal }));
  }

  embed(text: string, signal?: AbortSignal): Promise<number[]> {
    return this.call('embed', signal, (s) => this.inner.embed(text, s));
  }
}
