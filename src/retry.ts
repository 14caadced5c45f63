/**
 * Retry utilities for Azure Resource Manager and Microsoft Graph calls.
 *
 * Exponential backoff with jitter, honouring Retry-After when the service
 * sends one. Only transient failures are retried; anything else surfaces
 * on the first attempt.
 */

import type { AzureRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "ServiceTimeout",
  "RetryableError",
  "RequestRateTooLarge",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "econnreset",
  "etimedout",
  "network error",
  "fetch failed",
];

// =============================================================================
// Error field access
// =============================================================================

/** First non-nullish value among `keys` on an object-shaped error. */
export function readErrorField(error: unknown, ...keys: string[]): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  for (const key of keys) {
    if (!(key in error)) continue;
    const value: unknown = Reflect.get(error, key);
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function readString(error: unknown, ...keys: string[]): string {
  const value = readErrorField(error, ...keys);
  return typeof value === "string" ? value : "";
}

function readNumber(error: unknown, ...keys: string[]): number {
  const value = readErrorField(error, ...keys);
  return typeof value === "number" ? value : 0;
}

// =============================================================================
// Error Checking
// =============================================================================

/**
 * Determine whether an Azure error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  const code = readString(error, "code", "Code");
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const statusCode = readNumber(error, "statusCode", "status");
  if (statusCode === 429) return true;
  if (statusCode >= 500 && statusCode < 600) return true;

  const message = readString(error, "message").toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Extract Retry-After from an error response, in ms.
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  const headers = readErrorField(error, "headers");
  if (typeof headers !== "object" || headers === null) return null;

  const retryAfter = readString(headers, "retry-after", "Retry-After");
  if (!retryAfter) return null;

  // Either delta-seconds or an HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

export function resolveRetryConfig(options?: AzureRetryOptions): RetryConfig {
  return {
    maxAttempts: options?.maxAttempts ?? AZURE_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };
}

/**
 * Execute a function with Azure-specific retry logic.
 */
export async function withAzureRetry<T>(
  fn: () => Promise<T>,
  options?: AzureRetryOptions,
): Promise<T> {
  const config = resolveRetryConfig(options);

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAzureError(error)) break;

      const retryAfterMs = getAzureRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = retryAfterMs;
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure or Graph error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = readString(error, "code");
  const message = readString(error, "message") || "Unknown error";
  const statusCode = readErrorField(error, "statusCode");

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (typeof statusCode === "number" || (typeof statusCode === "string" && statusCode)) {
    parts.push(`(HTTP ${statusCode})`);
  }
  parts.push(message);

  return parts.join(" ");
}
