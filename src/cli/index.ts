export { AzureCLIWrapper, createCLIWrapper } from "./wrapper.js";

export type { AzureCLIOptions, AzureCLIResult, AzureCLIConfig, AzureCLIAccount } from "./wrapper.js";
