/**
 * Azure Subscriptions type definitions
 */

export type AzureSubscription = {
  subscriptionId: string;
  displayName: string;
  /** Enabled, Warned, PastDue, Disabled or Deleted. */
  state: string;
  tenantId: string;
};

export type TenantInfo = {
  tenantId: string;
  displayName?: string;
  defaultDomain?: string;
  domains: string[];
  tenantCategory?: string;
};
