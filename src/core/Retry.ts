import pRetry, { type Options as PRetryOptions } from "p-retry";
import type { BackoffStrategy } from "../types/Workflow.js";

/**
 * Retry configuration.
 */
export interface RetryOptions {
  /** Maximum number of retries after the first attempt (default: 0) */
  maxRetries?: number;
  /** Delay before each retry in ms; base delay for exponential backoff (default: 0) */
  delayMs?: number;
  /** fixed: every retry waits delayMs; exponential: delayMs * 2^(n-1) */
  backoff?: BackoffStrategy;
  /** Upper bound for exponential delays (default: 30000) */
  maxDelayMs?: number;
  /** Aborts pending retries */
  signal?: AbortSignal;
  /** Error filter: return true to retry, false to abort */
  shouldRetry?: (error: Error) => boolean;
  /** Callback on each retry attempt */
  onRetry?: (error: Error, attempt: number) => void;
}

/**
 * Error kinds that should NOT be retried (deterministic failures).
 */
const NON_RETRYABLE_ERRORS = new Set([
  "tool-not-found",
  "input-invalid",
  "unbound-input",
  "cancelled",
]);

export type TaggedError = Error & { kind: string; details?: unknown };

/**
 * Narrow an unknown error to one carrying a `kind` tag.
 */
export function isTaggedError(error: unknown): error is TaggedError {
  return error instanceof Error && "kind" in error && typeof error.kind === "string";
}

/**
 * Determine if an error is retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (isTaggedError(error) && NON_RETRYABLE_ERRORS.has(error.kind)) {
    return false;
  }
  return true;
}

/**
 * Execute a function with retry logic. Delays are never randomized so that
 * replays of the same workflow wait the same amount of time.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 0,
    delayMs = 0,
    backoff = "fixed",
    maxDelayMs = 30_000,
    signal,
    shouldRetry,
    onRetry,
  } = options;

  if (maxRetries <= 0) {
    return fn(1);
  }

  const pRetryOptions: PRetryOptions = {
    retries: maxRetries,
    minTimeout: delayMs,
    maxTimeout: backoff === "fixed" ? delayMs : Math.max(delayMs, maxDelayMs),
    factor: backoff === "fixed" ? 1 : 2,
    randomize: false,
    signal,
    onFailedAttempt: (error) => {
      if (shouldRetry && !shouldRetry(error)) {
        throw error; // Abort retry
      }

      if (!isRetryable(error)) {
        throw error; // Non-retryable error kind
      }

      if (error.retriesLeft > 0) {
        onRetry?.(error, error.attemptNumber);
      }
    },
  };

  return pRetry(fn, pRetryOptions);
}

/**
 * Create a tagged error with a kind field for retry classification.
 */
export function createTaggedError(
  kind: string,
  message: string,
  details?: unknown,
): TaggedError {
  return Object.assign(new Error(message), { kind, details });
}
