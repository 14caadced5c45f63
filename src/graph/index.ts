export {
  AzureGraphManager,
  GraphRequestError,
  GRAPH_BASE_URL,
  GRAPH_SCOPE,
  createGraphManager,
} from "./manager.js";
export type { GraphManagerOptions } from "./manager.js";
export type {
  AppRole,
  AppRoleAssignment,
  GraphApplication,
  GraphServicePrincipal,
  PasswordCredential,
  PasswordCredentialSecret,
} from "./types.js";
