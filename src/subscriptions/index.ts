export { AzureSubscriptionManager, createSubscriptionManager } from "./manager.js";
export type { AzureSubscription, TenantInfo } from "./types.js";
