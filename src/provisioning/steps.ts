/**
 * Provisioning steps.
 *
 * Identity and credential steps are fatal and raise ProvisioningError. Role
 * and permission steps log the failure with a manual fix and return, so the
 * run carries on.
 */

import {
  GRAPH_APPLICATION_READ_ROLE,
  MICROSOFT_GRAPH_APP_ID,
  READER_ROLE_NAME,
  REUSED_SECRET_SENTINEL,
  SECRET_DISPLAY_NAME,
  SPOTTO_APP_DISPLAY_NAME,
  SPOTTO_CUSTOM_ROLE_ACTIONS,
  SPOTTO_CUSTOM_ROLE_DESCRIPTION,
  SPOTTO_CUSTOM_ROLE_NAME,
} from "../constants.js";
import type { AzureSession } from "../credentials/index.js";
import type { RoleDefinition } from "../iam/index.js";
import { roleDefinitionIdForScope, subscriptionScope } from "../iam/index.js";
import { parseSubscriptionSelection, parseTenantChoice, toValidator } from "../prompts/index.js";
import { waitForPropagation } from "../progress.js";
import { formatErrorMessage } from "../retry.js";
import type { AzureSubscription, TenantInfo } from "../subscriptions/index.js";
import type { PropagationWaitOptions } from "../types.js";
import { ProvisioningError, fatalStep } from "./errors.js";
import type {
  ApplicationIdentity,
  AssignmentTally,
  IssuedSecret,
  ProvisioningServices,
  ProvisioningSettings,
  RunContext,
  StepOutcome,
} from "./types.js";
import { ensure } from "./upsert.js";

// =============================================================================
// Helpers
// =============================================================================

export function emptyTally(): AssignmentTally {
  return { created: 0, existing: 0, failed: 0 };
}

/**
 * Same day-of-month `months` later, in UTC, clamped to the last day of a
 * shorter target month.
 */
export function addMonths(date: Date, months: number): Date {
  const result = new Date(date.getTime());
  result.setUTCDate(1);
  result.setUTCMonth(result.getUTCMonth() + months);
  const lastDay = new Date(Date.UTC(result.getUTCFullYear(), result.getUTCMonth() + 1, 0)).getUTCDate();
  result.setUTCDate(Math.min(date.getUTCDate(), lastDay));
  return result;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function describeTenant(tenant: TenantInfo): string {
  const name = tenant.displayName ?? tenant.defaultDomain ?? tenant.tenantId;
  const domain = tenant.defaultDomain ?? tenant.domains[0];
  return domain && domain !== name ? `${name} (${domain}) ${tenant.tenantId}` : `${name} ${tenant.tenantId}`;
}

async function waitUntilVisible(
  services: ProvisioningServices,
  settings: ProvisioningSettings,
  what: string,
  check: () => Promise<boolean>,
  options: PropagationWaitOptions,
): Promise<void> {
  const { logger } = services;
  const result = await waitForPropagation(check, options, {
    sleep: settings.sleep,
    now: () => settings.now().getTime(),
    onMiss: (attempt, nextDelayMs) =>
      logger.debug(`${what} not visible yet (check ${attempt}); next check in ${nextDelayMs}ms`),
  });
  if (result.visible) {
    logger.debug(`${what} visible after ${result.attempts} check(s)`);
  } else {
    logger.warn(`${what} still not visible after ${Math.round(result.elapsedMs / 1000)}s; continuing anyway`);
  }
}

async function requireRole(services: ProvisioningServices, scope: string, roleName: string): Promise<RoleDefinition> {
  const role = await services.roles.findRoleDefinition(scope, roleName);
  if (!role) {
    throw new Error(`Role "${roleName}" was not found at ${scope}`);
  }
  return role;
}

// =============================================================================
// Session and selection
// =============================================================================

export async function authenticate(services: ProvisioningServices): Promise<AzureSession> {
  const { session, prompter, logger } = services;
  return fatalStep("authenticate", "Sign-in failed", async () => {
    let current = await session.signIn();
    logger.info(`Signed in as ${current.account}`);

    if (await prompter.confirm(`Use a different account than ${current.account}?`, { default: false })) {
      current = await session.switchAccount();
      logger.info(`Signed in as ${current.account}`);
    }
    return current;
  });
}

export async function selectTenant(services: ProvisioningServices): Promise<TenantInfo> {
  const { tenants, session, prompter, logger } = services;

  const available = await fatalStep("select-tenant", "Could not list tenants", () => tenants.listTenants());
  if (available.length === 0) {
    throw new ProvisioningError("select-tenant", "The signed-in account has no accessible tenants");
  }

  let tenant: TenantInfo;
  if (available.length === 1) {
    tenant = available[0];
    logger.info(`Using tenant ${describeTenant(tenant)}`);
  } else {
    logger.heading("Available tenants:");
    available.forEach((t, i) => logger.info(`  ${i + 1}. ${describeTenant(t)}`));
    const parse = (input: string) => parseTenantChoice(input, available.length);
    const answer = await prompter.input(`Select a tenant (1-${available.length})`, { validate: toValidator(parse) });
    const choice = parse(answer);
    if (!choice.ok) {
      throw new ProvisioningError("select-tenant", choice.error);
    }
    tenant = available[choice.value];
    logger.info(`Using tenant ${describeTenant(tenant)}`);
  }

  session.useTenant(tenant.tenantId);
  return tenant;
}

export async function selectSubscriptions(
  services: ProvisioningServices,
  tenant: TenantInfo,
): Promise<AzureSubscription[]> {
  const { tenants, roles, prompter, logger } = services;

  const available = await fatalStep("select-subscriptions", "Could not list subscriptions", () =>
    tenants.listSubscriptions(tenant.tenantId),
  );
  if (available.length === 0) {
    throw new ProvisioningError("select-subscriptions", `Tenant ${tenant.tenantId} has no subscriptions`);
  }

  logger.heading("Available subscriptions:");
  available.forEach((s, i) => logger.info(`  ${i + 1}. ${s.displayName} (${s.subscriptionId}) [${s.state}]`));

  const parse = (input: string) => parseSubscriptionSelection(input, available.length);
  const answer = await prompter.input('Select subscriptions ("all" or comma-separated numbers, e.g. 1,3)', {
    validate: toValidator(parse),
  });
  const selection = parse(answer);
  if (!selection.ok) {
    throw new ProvisioningError("select-subscriptions", selection.error);
  }

  const selected = selection.value.map((i) => available[i]);
  logger.info(`Selected ${selected.length} subscription(s): ${selected.map((s) => s.displayName).join(", ")}`);
  roles.useSubscription(selected[0].subscriptionId);
  return selected;
}

// =============================================================================
// Application identity
// =============================================================================

export async function ensureApplicationIdentity(
  services: ProvisioningServices,
  settings: ProvisioningSettings,
): Promise<ApplicationIdentity> {
  const { directory, logger } = services;

  return fatalStep("application", `Could not set up the ${SPOTTO_APP_DISPLAY_NAME} application`, async () => {
    const app = await ensure({
      find: () => directory.findApplication(SPOTTO_APP_DISPLAY_NAME),
      create: () => directory.createApplication(SPOTTO_APP_DISPLAY_NAME),
    });
    logger.success(
      app.status === "created"
        ? `Created application ${SPOTTO_APP_DISPLAY_NAME} (${app.value.appId})`
        : `Found application ${SPOTTO_APP_DISPLAY_NAME} (${app.value.appId})`,
    );

    const appId = app.value.appId;
    const principal = await ensure({
      find: () => directory.findServicePrincipal(appId),
      create: () => directory.createServicePrincipal(appId),
    });

    if (principal.status === "created") {
      logger.success(`Created service principal ${principal.value.id}`);
      await waitUntilVisible(
        services,
        settings,
        "Service principal",
        async () => (await directory.findServicePrincipal(appId)) !== undefined,
        settings.propagation.servicePrincipal,
      );
    } else {
      logger.info(`Found service principal ${principal.value.id}`);
    }

    return {
      displayName: SPOTTO_APP_DISPLAY_NAME,
      objectId: app.value.id,
      clientId: appId,
      servicePrincipalId: principal.value.id,
    };
  });
}

// =============================================================================
// Client secret
// =============================================================================

export async function issueCredential(
  services: ProvisioningServices,
  settings: ProvisioningSettings,
  application: ApplicationIdentity,
): Promise<IssuedSecret> {
  const { directory, prompter, logger } = services;

  return fatalStep("credential", "Could not issue a client secret", async () => {
    const now = settings.now();
    const existing = await directory.listPasswordCredentials(application.objectId);
    const activeExpiries = existing
      .map((c) => (c.endDateTime ? new Date(c.endDateTime) : undefined))
      .filter((d): d is Date => d !== undefined && d.getTime() > now.getTime());

    if (activeExpiries.length > 0) {
      const latest = new Date(Math.max(...activeExpiries.map((d) => d.getTime())));
      logger.info(`${application.displayName} has ${activeExpiries.length} active client secret(s); the latest expires ${formatDate(latest)}`);
      const reuse = await prompter.confirm("Reuse the existing client secret? (No creates a new one)", { default: true });
      if (reuse) {
        logger.info("Keeping the existing client secret");
        return { value: REUSED_SECRET_SENTINEL, expiresAt: latest, isNew: false };
      }
    }

    const requestedExpiry = addMonths(now, settings.secretValidityMonths);
    const created = await directory.addPassword(application.objectId, SECRET_DISPLAY_NAME, requestedExpiry);
    if (settings.maskSecrets) {
      logger.maskInTranscript(created.secretText);
    }
    const expiresAt = created.endDateTime ? new Date(created.endDateTime) : requestedExpiry;
    logger.success(`Created a client secret valid until ${formatDate(expiresAt)}`);
    return { value: created.secretText, expiresAt, isNew: true };
  });
}

// =============================================================================
// Role assignments
// =============================================================================

function remediation(context: RunContext, roleName: string, scope: string): string {
  const { application } = context;
  return `Assign "${roleName}" to ${application.displayName} (client ID ${application.clientId}) at ${scope} manually, or rerun onboarding.`;
}

/**
 * Reader on every selected subscription. A failure on one subscription does
 * not stop the others.
 */
export async function assignReaderRoles(services: ProvisioningServices, context: RunContext): Promise<AssignmentTally> {
  const { roles, logger } = services;
  const principalId = context.application.servicePrincipalId;
  const tally = emptyTally();

  logger.heading(`Assigning ${READER_ROLE_NAME} on ${context.subscriptions.length} subscription(s)`);
  for (const subscription of context.subscriptions) {
    const scope = subscriptionScope(subscription.subscriptionId);
    try {
      const role = await requireRole(services, scope, READER_ROLE_NAME);
      const result = await ensure({
        find: () => roles.findRoleAssignment(scope, principalId, role.id),
        create: () => roles.createRoleAssignment(scope, principalId, role.id),
      });
      tally[result.status]++;
      logger.info(`  ${subscription.displayName}: ${result.status === "created" ? "assigned" : "already assigned"}`);
    } catch (error) {
      tally.failed++;
      logger.error(`  ${subscription.displayName}: ${formatErrorMessage(error)}`);
      logger.warn(`  ${remediation(context, READER_ROLE_NAME, scope)}`);
    }
  }
  logger.info(`${READER_ROLE_NAME}: ${tally.created} created, ${tally.existing} existing, ${tally.failed} failed`);
  return tally;
}

/**
 * A built-in role at a tenant-level provider scope.
 */
export async function assignTenantRole(
  services: ProvisioningServices,
  context: RunContext,
  roleName: string,
  scope: string,
): Promise<StepOutcome> {
  const { roles, logger } = services;
  const principalId = context.application.servicePrincipalId;

  try {
    const role = await requireRole(services, scope, roleName);
    const result = await ensure({
      find: () => roles.findRoleAssignment(scope, principalId, role.id),
      create: () => roles.createRoleAssignment(scope, principalId, role.id),
    });
    if (result.status === "created") {
      logger.success(`Assigned ${roleName} at ${scope}`);
    } else {
      logger.info(`${roleName} at ${scope} is already assigned`);
    }
    return result.status;
  } catch (error) {
    logger.error(`Could not assign ${roleName} at ${scope}: ${formatErrorMessage(error)}`);
    logger.warn(remediation(context, roleName, scope));
    return "failed";
  }
}

// =============================================================================
// Graph permission
// =============================================================================

/**
 * Grant Application.Read.All on Microsoft Graph to the service principal.
 * The Graph session is closed whatever the outcome.
 */
export async function grantGraphPermission(services: ProvisioningServices, context: RunContext): Promise<StepOutcome> {
  const { directory, logger } = services;
  const principalId = context.application.servicePrincipalId;

  try {
    const graph = await directory.findServicePrincipal(MICROSOFT_GRAPH_APP_ID);
    if (!graph) {
      throw new Error("The Microsoft Graph service principal was not found in this tenant");
    }
    const appRole = (graph.appRoles ?? []).find(
      (r) =>
        r.value === GRAPH_APPLICATION_READ_ROLE &&
        r.isEnabled !== false &&
        (r.allowedMemberTypes === undefined || r.allowedMemberTypes.includes("Application")),
    );
    if (!appRole) {
      throw new Error(`Microsoft Graph does not expose the ${GRAPH_APPLICATION_READ_ROLE} application role`);
    }

    const result = await ensure({
      find: () => directory.findAppRoleAssignment(principalId, graph.id, appRole.id),
      create: () => directory.createAppRoleAssignment(principalId, graph.id, appRole.id),
    });
    if (result.status === "created") {
      logger.success(`Granted Microsoft Graph ${GRAPH_APPLICATION_READ_ROLE}`);
    } else {
      logger.info(`Microsoft Graph ${GRAPH_APPLICATION_READ_ROLE} is already granted`);
    }
    return result.status;
  } catch (error) {
    logger.error(`Could not grant Microsoft Graph ${GRAPH_APPLICATION_READ_ROLE}: ${formatErrorMessage(error)}`);
    logger.warn(
      `Add the ${GRAPH_APPLICATION_READ_ROLE} application permission to ${context.application.displayName} and grant admin consent in the Entra admin center.`,
    );
    return "failed";
  } finally {
    directory.close();
  }
}

// =============================================================================
// Optional write access
// =============================================================================

function hasScope(role: RoleDefinition, scope: string): boolean {
  const wanted = scope.toLowerCase();
  return role.assignableScopes.some((s) => s.toLowerCase() === wanted);
}

/**
 * The custom role, wherever it is assignable in the tenant. Selected
 * subscriptions are searched first.
 */
async function findWriteRole(services: ProvisioningServices, context: RunContext): Promise<RoleDefinition | undefined> {
  const selected = context.subscriptions.map((s) => s.subscriptionId);
  const all = await services.tenants.listSubscriptions(context.tenant.tenantId);
  const others = all.map((s) => s.subscriptionId).filter((id) => !selected.includes(id));
  return services.roles.findCustomRole(SPOTTO_CUSTOM_ROLE_NAME, [...selected, ...others].map(subscriptionScope));
}

/**
 * Ask for the optional write access. When granted, make sure the custom role
 * is assignable at every selected subscription and assign it there.
 */
export async function grantWriteAccess(
  services: ProvisioningServices,
  settings: ProvisioningSettings,
  context: RunContext,
): Promise<AssignmentTally | null> {
  const { roles, prompter, logger } = services;

  const accepted = await prompter.confirm(
    `Grant ${context.application.displayName} optional write access (Advisor configuration and suppressions, storage inventory policies)?`,
    { default: false },
  );
  if (!accepted) {
    logger.info("Skipping optional write access");
    return null;
  }

  const principalId = context.application.servicePrincipalId;
  const tally = emptyTally();
  let role: RoleDefinition | undefined;
  let looked = false;

  logger.heading(`Assigning ${SPOTTO_CUSTOM_ROLE_NAME} on ${context.subscriptions.length} subscription(s)`);
  for (const subscription of context.subscriptions) {
    const scope = subscriptionScope(subscription.subscriptionId);
    try {
      if (!looked) {
        role = await findWriteRole(services, context);
        looked = true;
      }

      if (!role) {
        role = await roles.createCustomRole(
          { roleName: SPOTTO_CUSTOM_ROLE_NAME, description: SPOTTO_CUSTOM_ROLE_DESCRIPTION, actions: SPOTTO_CUSTOM_ROLE_ACTIONS },
          scope,
        );
        logger.success(`Created role ${SPOTTO_CUSTOM_ROLE_NAME}`);
        await waitUntilVisible(
          services,
          settings,
          `Role ${SPOTTO_CUSTOM_ROLE_NAME}`,
          async () => (await roles.findRoleDefinition(scope, SPOTTO_CUSTOM_ROLE_NAME)) !== undefined,
          settings.propagation.roleDefinitionCreate,
        );
      } else if (!hasScope(role, scope)) {
        role = await roles.addAssignableScope(role, scope);
        logger.info(`Made ${SPOTTO_CUSTOM_ROLE_NAME} assignable in ${subscription.displayName}`);
        await waitUntilVisible(
          services,
          settings,
          `Role ${SPOTTO_CUSTOM_ROLE_NAME} in ${subscription.displayName}`,
          async () => {
            const visible = await roles.findRoleDefinition(scope, SPOTTO_CUSTOM_ROLE_NAME);
            return visible !== undefined && hasScope(visible, scope);
          },
          settings.propagation.roleDefinitionUpdate,
        );
      }

      const roleDefinitionId = roleDefinitionIdForScope(scope, role.name);
      const result = await ensure({
        find: () => roles.findRoleAssignment(scope, principalId, roleDefinitionId),
        create: () => roles.createRoleAssignment(scope, principalId, roleDefinitionId),
      });
      tally[result.status]++;
      logger.info(`  ${subscription.displayName}: ${result.status === "created" ? "assigned" : "already assigned"}`);
    } catch (error) {
      tally.failed++;
      logger.error(`  ${subscription.displayName}: ${formatErrorMessage(error)}`);
      logger.warn(`  ${remediation(context, SPOTTO_CUSTOM_ROLE_NAME, scope)}`);
    }
  }
  logger.info(`${SPOTTO_CUSTOM_ROLE_NAME}: ${tally.created} created, ${tally.existing} existing, ${tally.failed} failed`);
  return tally;
}
