/**
 * Provisioning type definitions
 *
 * The orchestrator talks to Azure through the ports below. The Azure managers
 * satisfy them structurally; tests substitute an in-memory tenant.
 */

import type { AzureSession } from "../credentials/index.js";
import type {
  AppRoleAssignment,
  GraphApplication,
  GraphServicePrincipal,
  PasswordCredential,
  PasswordCredentialSecret,
} from "../graph/index.js";
import type { CustomRoleInput, RoleAssignment, RoleDefinition } from "../iam/index.js";
import type { OnboardingLogger } from "../logging/index.js";
import type { Prompter } from "../prompts/index.js";
import type { AzureSubscription, TenantInfo } from "../subscriptions/index.js";
import type { PropagationWaitOptions } from "../types.js";

// =============================================================================
// Ports
// =============================================================================

export interface SessionProvider {
  signIn(): Promise<AzureSession>;
  switchAccount(): Promise<AzureSession>;
  useTenant(tenantId: string): void;
}

export interface TenantDirectory {
  listTenants(): Promise<TenantInfo[]>;
  listSubscriptions(tenantId: string): Promise<AzureSubscription[]>;
}

export interface RoleAuthority {
  useSubscription(subscriptionId: string): void;
  findRoleDefinition(scope: string, roleName: string): Promise<RoleDefinition | undefined>;
  findCustomRole(roleName: string, scopes: readonly string[]): Promise<RoleDefinition | undefined>;
  findRoleAssignment(scope: string, principalId: string, roleDefinitionId: string): Promise<RoleAssignment | undefined>;
  createRoleAssignment(scope: string, principalId: string, roleDefinitionId: string): Promise<RoleAssignment>;
  createCustomRole(input: CustomRoleInput, scope: string): Promise<RoleDefinition>;
  addAssignableScope(role: RoleDefinition, scope: string): Promise<RoleDefinition>;
}

export interface ApplicationDirectory {
  findApplication(displayName: string): Promise<GraphApplication | undefined>;
  createApplication(displayName: string): Promise<GraphApplication>;
  findServicePrincipal(appId: string): Promise<GraphServicePrincipal | undefined>;
  createServicePrincipal(appId: string): Promise<GraphServicePrincipal>;
  listPasswordCredentials(applicationObjectId: string): Promise<PasswordCredential[]>;
  addPassword(applicationObjectId: string, displayName: string, endDateTime: Date): Promise<PasswordCredentialSecret>;
  findAppRoleAssignment(principalId: string, resourceId: string, appRoleId: string): Promise<AppRoleAssignment | undefined>;
  createAppRoleAssignment(principalId: string, resourceId: string, appRoleId: string): Promise<AppRoleAssignment>;
  close(): void;
}

export type ProvisioningServices = {
  session: SessionProvider;
  tenants: TenantDirectory;
  roles: RoleAuthority;
  directory: ApplicationDirectory;
  prompter: Prompter;
  logger: OnboardingLogger;
};

// =============================================================================
// Settings
// =============================================================================

export type ProvisioningSettings = {
  secretValidityMonths: number;
  maskSecrets: boolean;
  propagation: {
    servicePrincipal: PropagationWaitOptions;
    roleDefinitionCreate: PropagationWaitOptions;
    roleDefinitionUpdate: PropagationWaitOptions;
  };
  now: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

// =============================================================================
// Run state
// =============================================================================

export type ProvisioningStep =
  | "authenticate"
  | "select-tenant"
  | "select-subscriptions"
  | "application"
  | "credential";

export type ApplicationIdentity = {
  displayName: string;
  objectId: string;
  clientId: string;
  servicePrincipalId: string;
};

export type IssuedSecret = {
  /** The secret, or the reuse sentinel when an existing one was kept. */
  value: string;
  expiresAt?: Date;
  isNew: boolean;
};

export type RunContext = {
  session: AzureSession;
  tenant: TenantInfo;
  subscriptions: AzureSubscription[];
  application: ApplicationIdentity;
  secret: IssuedSecret;
};

export type AssignmentTally = {
  created: number;
  existing: number;
  failed: number;
};

export type StepOutcome = "created" | "existing" | "failed" | "skipped";

export type RunSummary = {
  tenantId: string;
  clientId: string;
  applicationName: string;
  secret: IssuedSecret;
  reader: AssignmentTally;
  reservationsReader: StepOutcome;
  savingsPlanReader: StepOutcome;
  graphPermission: StepOutcome;
  /** Null when the operator declined the optional write access. */
  customRole: AssignmentTally | null;
};

export type OnboardingResult =
  | { status: "completed"; summary: RunSummary }
  | { status: "cancelled" };
