export {
  AzureIAMManager,
  createIAMManager,
  roleDefinitionGuid,
  roleDefinitionIdForScope,
  subscriptionOfScope,
  subscriptionScope,
} from "./manager.js";
export type { RoleDefinition, RoleAssignment, CustomRoleInput } from "./types.js";
