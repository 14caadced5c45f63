/**
 * Azure IAM / RBAC Manager
 *
 * Role definitions and role assignments via @azure/arm-authorization. Scopes
 * may be subscription paths or tenant-level provider paths such as
 * `/providers/Microsoft.Capacity`.
 */

import { randomUUID } from "node:crypto";
import type { RoleDefinition as SdkRoleDefinition, RoleAssignment as SdkRoleAssignment } from "@azure/arm-authorization";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { withAzureRetry } from "../retry.js";
import type { CustomRoleInput, RoleAssignment, RoleDefinition } from "./types.js";

// =============================================================================
// Scope helpers
// =============================================================================

export function subscriptionScope(subscriptionId: string): string {
  return `/subscriptions/${subscriptionId}`;
}

/** Subscription id a scope lives under, if any. */
export function subscriptionOfScope(scope: string): string | undefined {
  return /^\/subscriptions\/([^/]+)/i.exec(scope)?.[1];
}

/** Trailing GUID of a role definition id, lowercased. */
export function roleDefinitionGuid(roleDefinitionId: string): string {
  const segments = roleDefinitionId.split("/").filter(Boolean);
  return (segments[segments.length - 1] ?? "").toLowerCase();
}

/**
 * Role definition id as ARM expects it for an assignment at `scope`.
 */
export function roleDefinitionIdForScope(scope: string, guid: string): string {
  const subscriptionId = subscriptionOfScope(scope);
  const prefix = subscriptionId ? subscriptionScope(subscriptionId) : "";
  return `${prefix}/providers/Microsoft.Authorization/roleDefinitions/${guid}`;
}

function sameScope(a: string, b: string): boolean {
  const normalize = (scope: string) => scope.replace(/\/+$/, "").toLowerCase();
  return normalize(a) === normalize(b);
}

function quoteODataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function toRoleDefinition(rd: SdkRoleDefinition): RoleDefinition {
  return {
    id: rd.id ?? "",
    name: rd.name ?? "",
    roleName: rd.roleName ?? "",
    description: rd.description,
    roleType: rd.roleType ?? "",
    permissions: (rd.permissions ?? []).map((p) => ({
      actions: p.actions ?? [],
      notActions: p.notActions ?? [],
      dataActions: p.dataActions ?? [],
      notDataActions: p.notDataActions ?? [],
    })),
    assignableScopes: rd.assignableScopes ?? [],
  };
}

function toRoleAssignment(ra: SdkRoleAssignment): RoleAssignment {
  return {
    id: ra.id ?? "",
    name: ra.name ?? "",
    principalId: ra.principalId ?? "",
    principalType: ra.principalType,
    roleDefinitionId: ra.roleDefinitionId ?? "",
    scope: ra.scope ?? "",
    createdOn: ra.createdOn?.toISOString(),
  };
}

// =============================================================================
// IAM Manager
// =============================================================================

export class AzureIAMManager {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId?: string;
  private retryOptions?: AzureRetryOptions;

  constructor(
    credentialsManager: AzureCredentialsManager,
    subscriptionId?: string,
    retryOptions?: AzureRetryOptions
  ) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  /**
   * Subscription the client binds to for scopes outside any subscription.
   */
  useSubscription(subscriptionId: string): void {
    this.subscriptionId = subscriptionId;
  }

  private async getAuthClient(scope: string) {
    const subscriptionId = subscriptionOfScope(scope) ?? this.subscriptionId;
    if (!subscriptionId) {
      throw new Error(`No subscription available to address scope ${scope}`);
    }
    const { AuthorizationManagementClient } = await import("@azure/arm-authorization");
    const { credential } = await this.credentialsManager.getCredential();
    return new AuthorizationManagementClient(credential, subscriptionId);
  }

  /**
   * Role definition named `roleName` that is assignable at `scope`.
   */
  async findRoleDefinition(scope: string, roleName: string): Promise<RoleDefinition | undefined> {
    return withAzureRetry(async () => {
      const client = await this.getAuthClient(scope);
      const filter = `roleName eq ${quoteODataString(roleName)}`;
      for await (const rd of client.roleDefinitions.list(scope, { filter })) {
        if (rd.roleName === roleName) return toRoleDefinition(rd);
      }
      return undefined;
    }, this.retryOptions);
  }

  /**
   * Custom role named `roleName` reachable from any of `scopes`.
   */
  async findCustomRole(roleName: string, scopes: readonly string[]): Promise<RoleDefinition | undefined> {
    for (const scope of scopes) {
      const role = await this.findRoleDefinition(scope, roleName);
      if (role && role.roleType === "CustomRole") return role;
    }
    return undefined;
  }

  /**
   * Assignment of the role to the principal made exactly at `scope`.
   * Inherited assignments from parent scopes do not count.
   */
  async findRoleAssignment(
    scope: string,
    principalId: string,
    roleDefinitionId: string
  ): Promise<RoleAssignment | undefined> {
    return withAzureRetry(async () => {
      const client = await this.getAuthClient(scope);
      const wantedRole = roleDefinitionGuid(roleDefinitionId);
      const filter = `principalId eq ${quoteODataString(principalId)}`;
      for await (const ra of client.roleAssignments.listForScope(scope, { filter })) {
        if (ra.principalId !== principalId) continue;
        if (roleDefinitionGuid(ra.roleDefinitionId ?? "") !== wantedRole) continue;
        if (!sameScope(ra.scope ?? "", scope)) continue;
        return toRoleAssignment(ra);
      }
      return undefined;
    }, this.retryOptions);
  }

  async createRoleAssignment(
    scope: string,
    principalId: string,
    roleDefinitionId: string
  ): Promise<RoleAssignment> {
    const assignmentName = randomUUID();
    return withAzureRetry(async () => {
      const client = await this.getAuthClient(scope);
      const result = await client.roleAssignments.create(scope, assignmentName, {
        principalId,
        roleDefinitionId: roleDefinitionIdForScope(scope, roleDefinitionGuid(roleDefinitionId)),
        principalType: "ServicePrincipal",
      });
      return toRoleAssignment(result);
    }, this.retryOptions);
  }

  /**
   * Create a custom role whose only assignable scope is `scope`.
   */
  async createCustomRole(input: CustomRoleInput, scope: string): Promise<RoleDefinition> {
    const roleId = randomUUID();
    return withAzureRetry(async () => {
      const client = await this.getAuthClient(scope);
      const result = await client.roleDefinitions.createOrUpdate(scope, roleId, {
        roleName: input.roleName,
        description: input.description,
        roleType: "CustomRole",
        permissions: [{ actions: [...input.actions], notActions: [] }],
        assignableScopes: [scope],
      });
      return toRoleDefinition(result);
    }, this.retryOptions);
  }

  /**
   * Append `scope` to the role's assignable scopes. Existing scopes are kept.
   */
  async addAssignableScope(role: RoleDefinition, scope: string): Promise<RoleDefinition> {
    if (role.assignableScopes.some((existing) => sameScope(existing, scope))) return role;

    const homeScope = role.assignableScopes[0] ?? scope;
    return withAzureRetry(async () => {
      const client = await this.getAuthClient(homeScope);
      const result = await client.roleDefinitions.createOrUpdate(homeScope, role.name, {
        roleName: role.roleName,
        description: role.description,
        roleType: role.roleType,
        permissions: role.permissions,
        assignableScopes: [...role.assignableScopes, scope],
      });
      return toRoleDefinition(result);
    }, this.retryOptions);
  }
}

export function createIAMManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId?: string,
  retryOptions?: AzureRetryOptions
): AzureIAMManager {
  return new AzureIAMManager(credentialsManager, subscriptionId, retryOptions);
}
