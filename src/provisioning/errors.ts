import { formatErrorMessage } from "../retry.js";
import type { ProvisioningStep } from "./types.js";

/**
 * A failure that ends the run. Role and permission steps never raise it.
 */
export class ProvisioningError extends Error {
  readonly step: ProvisioningStep;

  constructor(step: ProvisioningStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProvisioningError";
    this.step = step;
  }
}

/**
 * Run `fn`, turning anything it throws into a ProvisioningError for `step`.
 */
export async function fatalStep<T>(step: ProvisioningStep, label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ProvisioningError) throw error;
    throw new ProvisioningError(step, `${label}: ${formatErrorMessage(error)}`, { cause: error });
  }
}
