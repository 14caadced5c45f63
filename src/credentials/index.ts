export {
  ARM_SCOPE,
  AzureCredentialsManager,
  CredentialError,
  createCredentialsManager,
} from "./manager.js";

export type {
  AzureCLISession,
  AzureSession,
  CredentialsManagerOptions,
  CredentialResolutionResult,
} from "./manager.js";
