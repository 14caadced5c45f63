/**
 * Fixed identifiers the Spotto platform expects to find in an onboarded tenant.
 * Changing any of these breaks the platform's lookups.
 */

export const SPOTTO_APP_DISPLAY_NAME = "Spotto AI";

export const SPOTTO_CUSTOM_ROLE_NAME = "Spotto AI Write Access";

export const SPOTTO_CUSTOM_ROLE_DESCRIPTION =
  "Lets Spotto AI manage Advisor recommendation suppressions and storage inventory policies.";

export const SPOTTO_CUSTOM_ROLE_ACTIONS: readonly string[] = [
  "Microsoft.Advisor/configurations/write",
  "Microsoft.Advisor/recommendations/suppressions/write",
  "Microsoft.Advisor/recommendations/suppressions/delete",
  "Microsoft.Storage/storageAccounts/inventoryPolicies/read",
  "Microsoft.Storage/storageAccounts/inventoryPolicies/write",
];

export const READER_ROLE_NAME = "Reader";

export const RESERVATIONS_READER_ROLE_NAME = "Reservations Reader";
export const RESERVATIONS_SCOPE = "/providers/Microsoft.Capacity";

export const SAVINGS_PLAN_READER_ROLE_NAME = "Savings plan Reader";
export const SAVINGS_PLAN_SCOPE = "/providers/Microsoft.BillingBenefits";

/** Well-known appId of the Microsoft Graph service principal in every tenant. */
export const MICROSOFT_GRAPH_APP_ID = "00000003-0000-0000-c000-000000000000";
export const GRAPH_APPLICATION_READ_ROLE = "Application.Read.All";

/** Reported in place of a secret the directory will not disclose again. */
export const REUSED_SECRET_SENTINEL = "<existing secret - value cannot be retrieved>";

export const SECRET_DISPLAY_NAME = "Spotto AI onboarding";
