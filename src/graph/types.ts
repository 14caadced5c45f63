/**
 * Microsoft Graph type definitions
 *
 * Response shapes are TypeBox schemas; every Graph payload is checked against
 * them before it reaches the provisioning steps.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

const Nullable = <T extends TSchema>(schema: T) => Type.Optional(Type.Union([schema, Type.Null()]));

export const GraphApplicationSchema = Type.Object({
  id: Type.String(),
  appId: Type.String(),
  displayName: Nullable(Type.String()),
});

export const PasswordCredentialSchema = Type.Object({
  keyId: Type.String(),
  displayName: Nullable(Type.String()),
  hint: Nullable(Type.String()),
  endDateTime: Nullable(Type.String()),
});

export const PasswordCredentialSecretSchema = Type.Intersect([
  PasswordCredentialSchema,
  Type.Object({ secretText: Type.String() }),
]);

export const ApplicationPasswordsSchema = Type.Object({
  passwordCredentials: Type.Array(PasswordCredentialSchema),
});

export const AppRoleSchema = Type.Object({
  id: Type.String(),
  value: Nullable(Type.String()),
  isEnabled: Type.Optional(Type.Boolean()),
  allowedMemberTypes: Type.Optional(Type.Array(Type.String())),
});

export const GraphServicePrincipalSchema = Type.Object({
  id: Type.String(),
  appId: Type.String(),
  displayName: Nullable(Type.String()),
  appRoles: Type.Optional(Type.Array(AppRoleSchema)),
});

export const AppRoleAssignmentSchema = Type.Object({
  id: Type.String(),
  principalId: Type.String(),
  resourceId: Type.String(),
  appRoleId: Type.String(),
});

/** A page of a Graph collection. Items are checked one by one. */
export const GraphPageSchema = Type.Object({
  value: Type.Array(Type.Unknown()),
  "@odata.nextLink": Type.Optional(Type.String()),
});

export const GraphErrorBodySchema = Type.Object({
  error: Type.Object({
    code: Type.Optional(Type.String()),
    message: Type.Optional(Type.String()),
  }),
});

export type GraphApplication = Static<typeof GraphApplicationSchema>;
export type PasswordCredential = Static<typeof PasswordCredentialSchema>;
export type PasswordCredentialSecret = Static<typeof PasswordCredentialSecretSchema>;
export type AppRole = Static<typeof AppRoleSchema>;
export type GraphServicePrincipal = Static<typeof GraphServicePrincipalSchema>;
export type GraphPageBody = Static<typeof GraphPageSchema>;
export type AppRoleAssignment = Static<typeof AppRoleAssignmentSchema>;
