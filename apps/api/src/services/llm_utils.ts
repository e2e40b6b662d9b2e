/**
 * Shared LLM Utilities
 *
 * Retry with exponential backoff and a per-attempt timeout for chat
 * completion calls.
 *
 * Used by: oracle/llm_oracle
 */

import { errorMessage } from "./errors.js";

// =============================================================================
// Retry with Exponential Backoff
// =============================================================================

export interface RetryConfig {
  /** Max number of retries (default: 4) */
  maxRetries?: number;
  /** Base delay in ms (default: 1000) */
  baseDelay?: number;
  /** Maximum delay in ms (default: 60000) */
  maxDelay?: number;
  /** Abort an attempt after this many ms; 0 disables (default: 30000) */
  timeoutMs?: number;
}

const DEFAULT_RETRY: Required<RetryConfig> = {
  maxRetries: 4,
  baseDelay: 1000,
  maxDelay: 60000,
  timeoutMs: 30000,
};

const RETRYABLE_STATUS = new Set([429, 503]);

/**
 * Fetch with automatic retry on 429 (rate limit), 503 (overloaded),
 * timeouts and network failures. Respects the Retry-After header.
 *
 * Non-retryable responses are returned as-is; the last retryable response is
 * returned once retries run out. A network failure on the last attempt is
 * rethrown.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  config: RetryConfig = {}
): Promise<Response> {
  const opts = { ...DEFAULT_RETRY, ...config };

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    let response: Response;
    try {
      response = await fetchWithTimeout(url, init, opts.timeoutMs);
    } catch (error) {
      if (attempt === opts.maxRetries) {
        throw error;
      }
      const delay = backoffDelay(attempt, opts);
      console.warn(
        `[LLM] Network error on attempt ${attempt + 1}/${opts.maxRetries + 1}: ` +
        `${errorMessage(error)}. Retrying in ${Math.round(delay / 1000)}s...`
      );
      await sleep(delay);
      continue;
    }

    if (response.ok || !RETRYABLE_STATUS.has(response.status)) {
      return response;
    }

    if (attempt === opts.maxRetries) {
      return response;
    }

    let delay = backoffDelay(attempt, opts);

    const retryAfter = response.headers.get("Retry-After");
    if (retryAfter) {
      const retrySeconds = parseInt(retryAfter, 10);
      if (!isNaN(retrySeconds)) {
        delay = Math.min(retrySeconds * 1000, opts.maxDelay);
      }
    }

    console.log(
      `[LLM] ${response.status} on attempt ${attempt + 1}/${opts.maxRetries + 1}. ` +
      `Retrying in ${Math.round(delay / 1000)}s...`
    );
    await sleep(delay);
  }

  // Should never reach here, but TypeScript needs it
  throw new Error("Retry loop exhausted");
}

/**
 * Race the request against a timer; when the timer wins the request is
 * aborted and the attempt rejects.
 */
async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  if (timeoutMs <= 0) {
    return fetch(url, init);
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new Error(`Request timed out after ${timeoutMs}ms`);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fetch(url, { ...init, signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function backoffDelay(attempt: number, opts: Required<RetryConfig>): number {
  return Math.min(opts.baseDelay * Math.pow(2, attempt), opts.maxDelay);
}

// =============================================================================
// Helpers
// =============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
