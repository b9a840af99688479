/**
 * Retry & Error Detection
 *
 * Decides whether a model request failure is transient and retries it
 * with exponential backoff, honoring small Retry-After hints.
 */

import { createComponentLogger } from "#logging.js";
import type {
  ILLMClient,
  LLMMessage,
  LLMRequestOptions,
  LLMResponse,
} from "#llm/types.js";

const log = createComponentLogger("llm.retry");

// ============================================
// RETRYABLE ERROR DETECTION
// ============================================

/** HTTP status codes that indicate a transient/retryable failure */
const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

/** Error message patterns that indicate a transient/retryable failure */
const RETRYABLE_PATTERNS = [
  "rate limit",
  "too many requests",
  "fetch failed",
  "econnrefused",
  "econnreset",
  "enotfound",
  "network",
  "timeout",
  "timed out",
  "socket hang up",
  "aborted",
];

export function isRetryableError(error: unknown): boolean {
  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();

  for (const code of RETRYABLE_STATUS_CODES) {
    if (new RegExp(`(^|\\D)${code}(\\D|$)`).test(msg)) return true;
  }

  for (const pattern of RETRYABLE_PATTERNS) {
    if (msg.includes(pattern)) return true;
  }

  return false;
}

/**
 * Extract a Retry-After delay from an error message, in ms.
 * Returns 0 when absent or above 30 seconds.
 */
export function extractRetryAfterMs(error: unknown): number {
  const msg = error instanceof Error ? error.message : String(error);
  const match = msg.match(/retry[- ]after:?\s*(\d+)/i);
  if (match) {
    const seconds = parseInt(match[1], 10);
    return seconds <= 30 ? seconds * 1000 : 0;
  }
  return 0;
}

// ============================================
// RETRY EXECUTION
// ============================================

export interface RetryOptions {
  /** Total attempts including the first (default 3) */
  maxAttempts?: number;
  /** First backoff delay, doubled on each retry (default 500ms) */
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Call `client.chat`, retrying transient failures. Non-retryable errors and
 * the last failure are rethrown unchanged.
 */
export async function chatWithRetry(
  client: ILLMClient,
  messages: LLMMessage[],
  options: LLMRequestOptions | undefined,
  retry: RetryOptions = {},
): Promise<LLMResponse> {
  const maxAttempts = Math.max(1, retry.maxAttempts ?? 3);
  const baseDelayMs = retry.baseDelayMs ?? 500;
  const sleep = retry.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await client.chat(messages, options);
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryableError(error)) throw error;

      const delay = Math.max(extractRetryAfterMs(error), baseDelayMs * 2 ** (attempt - 1));
      log.warn("Model request failed with retryable error, retrying", {
        provider: client.provider,
        attempt,
        delayMs: delay,
        error: error instanceof Error ? error.message.substring(0, 200) : String(error),
      });
      await sleep(delay);
    }
  }
}

/**
 * ILLMClient wrapper that routes every chat call through chatWithRetry.
 */
export class RetryingLLMClient implements ILLMClient {
  provider: string;
  private inner: ILLMClient;
  private retry: RetryOptions;

  constructor(inner: ILLMClient, retry: RetryOptions = {}) {
    this.inner = inner;
    this.provider = inner.provider;
    this.retry = retry;
  }

  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    return chatWithRetry(this.inner, messages, options, this.retry);
  }
}
