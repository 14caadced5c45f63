/**
 * Onboarding Orchestrator
 *
 * Runs the provisioning steps in their fixed order and reports the outcome.
 * Fatal steps throw ProvisioningError; everything after the credential step
 * records its outcome and lets the run finish.
 */

import {
  RESERVATIONS_READER_ROLE_NAME,
  RESERVATIONS_SCOPE,
  SAVINGS_PLAN_READER_ROLE_NAME,
  SAVINGS_PLAN_SCOPE,
  SPOTTO_APP_DISPLAY_NAME,
} from "../constants.js";
import {
  assignReaderRoles,
  assignTenantRole,
  authenticate,
  ensureApplicationIdentity,
  grantGraphPermission,
  grantWriteAccess,
  issueCredential,
  selectSubscriptions,
  selectTenant,
} from "./steps.js";
import { printSummary } from "./summary.js";
import type { OnboardingResult, ProvisioningServices, ProvisioningSettings, RunContext, RunSummary } from "./types.js";

const INTRO = [
  `This will set up the ${SPOTTO_APP_DISPLAY_NAME} application in your Azure tenant:`,
  "  - create or reuse the application, its service principal and a client secret",
  "  - assign Reader on the subscriptions you select",
  `  - assign ${RESERVATIONS_READER_ROLE_NAME} and ${SAVINGS_PLAN_READER_ROLE_NAME} at tenant level`,
  "  - grant Microsoft Graph Application.Read.All",
  "  - optionally grant a small set of write permissions",
];

export async function runOnboarding(
  services: ProvisioningServices,
  settings: ProvisioningSettings,
): Promise<OnboardingResult> {
  const { prompter, logger } = services;

  logger.heading(`${SPOTTO_APP_DISPLAY_NAME} Azure onboarding`);
  for (const line of INTRO) logger.info(line);

  if (!(await prompter.confirm("Continue?", { default: true }))) {
    logger.info("Cancelled. Nothing was changed.");
    return { status: "cancelled" };
  }

  const session = await authenticate(services);
  const tenant = await selectTenant(services);
  const subscriptions = await selectSubscriptions(services, tenant);
  const application = await ensureApplicationIdentity(services, settings);
  const secret = await issueCredential(services, settings, application);

  const context: RunContext = { session, tenant, subscriptions, application, secret };

  const reader = await assignReaderRoles(services, context);
  const reservationsReader = await assignTenantRole(services, context, RESERVATIONS_READER_ROLE_NAME, RESERVATIONS_SCOPE);
  const savingsPlanReader = await assignTenantRole(services, context, SAVINGS_PLAN_READER_ROLE_NAME, SAVINGS_PLAN_SCOPE);
  const graphPermission = await grantGraphPermission(services, context);
  const customRole = await grantWriteAccess(services, settings, context);

  const summary: RunSummary = {
    tenantId: tenant.tenantId,
    clientId: application.clientId,
    applicationName: application.displayName,
    secret,
    reader,
    reservationsReader,
    savingsPlanReader,
    graphPermission,
    customRole,
  };
  printSummary(logger, summary);

  return { status: "completed", summary };
}
