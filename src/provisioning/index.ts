export { runOnboarding } from "./orchestrator.js";
export { ProvisioningError, fatalStep } from "./errors.js";
export { ensure } from "./upsert.js";
export type { EnsureResult, EnsureStatus } from "./upsert.js";
export {
  addMonths,
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
export { ONE_TIME_SECRET_WARNING, formatSummary, printSummary } from "./summary.js";
export type {
  ApplicationDirectory,
  ApplicationIdentity,
  AssignmentTally,
  IssuedSecret,
  OnboardingResult,
  ProvisioningServices,
  ProvisioningSettings,
  ProvisioningStep,
  RoleAuthority,
  RunContext,
  RunSummary,
  SessionProvider,
  StepOutcome,
  TenantDirectory,
} from "./types.js";
