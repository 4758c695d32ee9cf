import {
  AuthError,
  ExhaustedError,
  HttpStatusError,
  RateLimitExceededError,
  SyncError,
  describeError,
} from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { Semaphore } from "./semaphore";

const log = createChildLogger("governor");

export interface GovernorOptions {
  /** Simultaneous in-flight requests. */
  maxConcurrency: number;
  /** Total attempts per request, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Wraps outbound calls with a concurrency cap and retry policy.
 *
 * - 429, 5xx, network faults and undecodable bodies are retried with
 *   exponential backoff plus jitter, or after the server's Retry-After hint.
 * - Other 4xx fail straight away.
 * - An auth rejection is re-signed once (fresh timestamp and nonce), then surfaced.
 *
 * A permit is held only while a request is in flight, never across a backoff.
 */
export class RequestGovernor {
  private readonly semaphore: Semaphore;
  private readonly options: Required<GovernorOptions>;

  constructor(options: GovernorOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.options = {
      sleep: defaultSleep,
      random: Math.random,
      ...options,
    };
    this.semaphore = new Semaphore(options.maxConcurrency);
  }

  get concurrency(): number {
    return this.semaphore.max;
  }

  async execute<T>(request: () => Promise<T>, label = "request"): Promise<T> {
    const { maxAttempts } = this.options;
    let reSigned = false;
    let lastError: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        return await this.semaphore.withPermit(request);
      } catch (error) {
        lastError = error;
      }

      if (lastError instanceof AuthError) {
        if (reSigned) throw lastError;
        reSigned = true;
        log.warn("Auth rejected, re-signing once", { label, attempt: attempt + 1 });
        continue;
      }

      if (!(lastError instanceof SyncError) || !lastError.retryable) {
        throw lastError;
      }

      if (attempt === maxAttempts - 1) break;

      const retryAfterMs = lastError instanceof HttpStatusError ? lastError.retryAfterMs : null;
      const delay = this.delayFor(attempt, retryAfterMs);
      log.warn("Retrying after transient failure", {
        label,
        attempt: attempt + 1,
        maxAttempts,
        delayMs: delay,
        error: describeError(lastError),
      });
      await this.options.sleep(delay);
    }

    if (lastError instanceof AuthError) throw lastError;

    log.error("Retries exhausted", { label, attempts: maxAttempts, error: describeError(lastError) });
    if (lastError instanceof HttpStatusError && lastError.status === 429) {
      throw new RateLimitExceededError(maxAttempts, lastError);
    }
    throw new ExhaustedError(maxAttempts, lastError);
  }

  /** Retry-After wins when present; otherwise base * 2^attempt plus up to one base of jitter. */
  delayFor(attempt: number, retryAfterMs: number | null = null): number {
    const { baseDelayMs, maxDelayMs, random } = this.options;
    if (retryAfterMs !== null) {
      return Math.min(retryAfterMs, maxDelayMs);
    }
    const exponential = baseDelayMs * 2 ** attempt;
    const jitter = Math.floor(random() * baseDelayMs);
    return Math.min(exponential + jitter, maxDelayMs);
  }
}
