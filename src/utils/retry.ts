import logger from "./logger";

export interface RetryOptions {
  maxRetries: number;
  delayMs?: number;
  exponentialBackoff?: boolean;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    delayMs = 1000,
    exponentialBackoff = true,
    shouldRetry = () => true,
    onRetry,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));

      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = exponentialBackoff ? delayMs * Math.pow(2, attempt) : delayMs;

      logger.warn(
        `Attempt ${attempt + 1}/${maxRetries + 1} failed. Retrying in ${delay}ms...`,
        { error: error.message },
      );

      if (onRetry) {
        onRetry(error, attempt + 1);
      }

      await sleep(delay);
    }
  }
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Reject with the error from `onTimeout` if the promise has not settled
 * within `ms`
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Rate limiter using token bucket algorithm
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private maxTokens: number,
    private refillRate: number, // tokens per second
  ) {
    this.tokens = maxTokens;
    this.lastRefill = Date.now();
  }

  async waitForToken(): Promise<void> {
    for (;;) {
      this.refill();

      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }

      // Wait for next token
      await sleep(1000 / this.refillRate);
    }
  }

  private refill(): void {
    const now = Date.now();
    const timePassed = (now - this.lastRefill) / 1000;

    this.tokens = Math.min(this.maxTokens, this.tokens + timePassed * this.refillRate);
    this.lastRefill = now;
  }
}
