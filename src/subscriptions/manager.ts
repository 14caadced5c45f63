/**
 * Azure Subscription Manager
 *
 * Lists the tenants the operator can reach and the subscriptions inside one
 * of them, via @azure/arm-subscriptions.
 */

import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { withAzureRetry } from "../retry.js";
import type { AzureSubscription, TenantInfo } from "./types.js";

export class AzureSubscriptionManager {
  private credentialsManager: AzureCredentialsManager;
  private retryOptions?: AzureRetryOptions;

  constructor(credentialsManager: AzureCredentialsManager, retryOptions?: AzureRetryOptions) {
    this.credentialsManager = credentialsManager;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { SubscriptionClient } = await import("@azure/arm-subscriptions");
    const { credential } = await this.credentialsManager.getCredential();
    return new SubscriptionClient(credential);
  }

  async listTenants(): Promise<TenantInfo[]> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      const results: TenantInfo[] = [];
      for await (const t of client.tenants.list()) {
        if (!t.tenantId) continue;
        results.push({
          tenantId: t.tenantId,
          displayName: t.displayName,
          defaultDomain: t.defaultDomain,
          domains: t.domains ?? [],
          tenantCategory: t.tenantCategory,
        });
      }
      return results;
    }, this.retryOptions);
  }

  /**
   * Subscriptions belonging to `tenantId`, in the order the service returns them.
   * The credentials manager should already be pinned to that tenant.
   */
  async listSubscriptions(tenantId: string): Promise<AzureSubscription[]> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      const wanted = tenantId.toLowerCase();
      const results: AzureSubscription[] = [];
      for await (const s of client.subscriptions.list()) {
        if (!s.subscriptionId) continue;
        if (s.tenantId && s.tenantId.toLowerCase() !== wanted) continue;
        results.push({
          subscriptionId: s.subscriptionId,
          displayName: s.displayName ?? s.subscriptionId,
          state: s.state ?? "Enabled",
          tenantId: s.tenantId ?? tenantId,
        });
      }
      return results;
    }, this.retryOptions);
  }
}

export function createSubscriptionManager(
  credentialsManager: AzureCredentialsManager,
  retryOptions?: AzureRetryOptions
): AzureSubscriptionManager {
  return new AzureSubscriptionManager(credentialsManager, retryOptions);
}
