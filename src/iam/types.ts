/**
 * Azure IAM / RBAC type definitions
 */

export type RoleDefinition = {
  /** Fully qualified resource id, prefixed by the scope it was read at. */
  id: string;
  /** The role definition GUID. */
  name: string;
  roleName: string;
  description?: string;
  roleType: string;
  permissions: Array<{
    actions: string[];
    notActions: string[];
    dataActions: string[];
    notDataActions: string[];
  }>;
  assignableScopes: string[];
};

export type RoleAssignment = {
  id: string;
  name: string;
  principalId: string;
  principalType?: string;
  roleDefinitionId: string;
  scope: string;
  createdOn?: string;
};

export type CustomRoleInput = {
  roleName: string;
  description: string;
  actions: readonly string[];
};
