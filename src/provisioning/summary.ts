/**
 * End-of-run report: per-step counts, then the values the Spotto platform
 * needs to connect.
 */

import {
  GRAPH_APPLICATION_READ_ROLE,
  READER_ROLE_NAME,
  RESERVATIONS_READER_ROLE_NAME,
  SAVINGS_PLAN_READER_ROLE_NAME,
  SPOTTO_CUSTOM_ROLE_NAME,
} from "../constants.js";
import type { OnboardingLogger } from "../logging/index.js";
import { formatDate } from "./steps.js";
import type { AssignmentTally, RunSummary } from "./types.js";

export const ONE_TIME_SECRET_WARNING =
  "Copy the client secret now. It is shown only once and cannot be retrieved later.";

function formatTally(tally: AssignmentTally): string {
  return `${tally.created} created, ${tally.existing} existing, ${tally.failed} failed`;
}

export function formatSummary(summary: RunSummary): { results: string[]; credentials: string[] } {
  return {
    results: [
      `${READER_ROLE_NAME}: ${formatTally(summary.reader)}`,
      `${RESERVATIONS_READER_ROLE_NAME}: ${summary.reservationsReader}`,
      `${SAVINGS_PLAN_READER_ROLE_NAME}: ${summary.savingsPlanReader}`,
      `Microsoft Graph ${GRAPH_APPLICATION_READ_ROLE}: ${summary.graphPermission}`,
      `${SPOTTO_CUSTOM_ROLE_NAME}: ${summary.customRole ? formatTally(summary.customRole) : "skipped"}`,
    ],
    credentials: [
      `Client ID:     ${summary.clientId}`,
      `Tenant ID:     ${summary.tenantId}`,
      `Client secret: ${summary.secret.value}`,
      `Secret expiry: ${summary.secret.expiresAt ? formatDate(summary.secret.expiresAt) : "unknown"}`,
    ],
  };
}

export function printSummary(logger: OnboardingLogger, summary: RunSummary): void {
  const { results, credentials } = formatSummary(summary);

  logger.heading("Onboarding results");
  for (const line of results) logger.info(`  ${line}`);

  logger.heading(`${summary.applicationName} connection details`);
  for (const line of credentials) logger.success(`  ${line}`);

  if (summary.secret.isNew) {
    logger.warn(ONE_TIME_SECRET_WARNING);
  }
}
