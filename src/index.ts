export { onboardCommand, createAzureServices } from "./commands/onboard.js";
export type { OnboardDeps, OnboardOptions, OnboardServiceFactory } from "./commands/onboard.js";
export { ConfigError, configSchema, getDefaultConfig, loadConfig } from "./config.js";
export type { ConfigFlags, LoadConfigOptions, OnboardingConfig } from "./config.js";
export * from "./constants.js";
export * from "./credentials/index.js";
export * from "./graph/index.js";
export * from "./iam/index.js";
export * from "./logging/index.js";
export * from "./prompts/index.js";
export * from "./provisioning/index.js";
export * from "./subscriptions/index.js";
export { waitForPropagation } from "./progress.js";
export { formatErrorMessage, withAzureRetry } from "./retry.js";
export type { AzureCredentialMethod, AzureRetryOptions, PropagationWaitOptions } from "./types.js";
