/**
 * Shared option types used across the Azure managers and the provisioning steps.
 */

// =============================================================================
// Retry
// =============================================================================

export type AzureRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

// =============================================================================
// Propagation polling
// =============================================================================

/**
 * Bounds for polling an eventually-consistent directory until a freshly
 * created object becomes visible.
 */
export type PropagationWaitOptions = {
  /** Delay before the second check. Doubles after every miss. */
  initialDelayMs: number;
  /** Upper bound for a single delay. */
  maxDelayMs: number;
  /** Total time budget across all checks. */
  maxWaitMs: number;
};

// =============================================================================
// Credential methods
// =============================================================================

export type AzureCredentialMethod = "cli" | "browser" | "device-code";

export const CREDENTIAL_METHODS: readonly AzureCredentialMethod[] = ["cli", "browser", "device-code"];
