/**
 * Propagation waits for eventually-consistent directory writes.
 *
 * Entra ID and the ARM authorization store do not guarantee read-after-write:
 * a service principal or role definition that was just created can be
 * missing from the next list call. Instead of a fixed sleep, callers poll the
 * same existence check they use for idempotence, backing off exponentially
 * until the object shows up or the time budget runs out.
 */

import type { PropagationWaitOptions } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type PropagationWaitResult = {
  visible: boolean;
  attempts: number;
  elapsedMs: number;
};

export type PropagationWaitHooks = {
  /** Called after each miss with the delay before the next check. */
  onMiss?: (attempt: number, nextDelayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export const SERVICE_PRINCIPAL_WAIT_DEFAULTS: PropagationWaitOptions = {
  initialDelayMs: 2_000,
  maxDelayMs: 15_000,
  maxWaitMs: 120_000,
};

export const ROLE_DEFINITION_CREATE_WAIT_DEFAULTS: PropagationWaitOptions = {
  initialDelayMs: 2_000,
  maxDelayMs: 15_000,
  maxWaitMs: 60_000,
};

export const ROLE_DEFINITION_UPDATE_WAIT_DEFAULTS: PropagationWaitOptions = {
  initialDelayMs: 1_000,
  maxDelayMs: 10_000,
  maxWaitMs: 30_000,
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// =============================================================================
// Polling Waiter
// =============================================================================

/**
 * Poll `check` until it reports true or `maxWaitMs` elapses.
 *
 * The first check runs immediately. Delays start at `initialDelayMs`, double
 * after every miss up to `maxDelayMs`, and the last delay is clipped so the
 * final check lands on the deadline.
 */
export async function waitForPropagation(
  check: () => Promise<boolean>,
  options: PropagationWaitOptions,
  hooks: PropagationWaitHooks = {},
): Promise<PropagationWaitResult> {
  const sleep = hooks.sleep ?? defaultSleep;
  const now = hooks.now ?? Date.now;

  const start = now();
  let delayMs = options.initialDelayMs;
  let attempts = 0;

  for (;;) {
    attempts++;
    if (await check()) {
      return { visible: true, attempts, elapsedMs: now() - start };
    }

    const elapsedMs = now() - start;
    const remainingMs = options.maxWaitMs - elapsedMs;
    if (remainingMs <= 0) {
      return { visible: false, attempts, elapsedMs };
    }

    const nextDelayMs = Math.min(delayMs, remainingMs);
    hooks.onMiss?.(attempts, nextDelayMs);
    await sleep(nextDelayMs);
    delayMs = Math.min(delayMs * 2, options.maxDelayMs);
  }
}
