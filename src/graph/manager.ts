/**
 * Microsoft Graph Manager
 *
 * Application registrations, service principals, client secrets and
 * app-role grants through the Graph v1.0 REST API, authenticated with the
 * run's TokenCredential.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { withAzureRetry } from "../retry.js";
import {
  AppRoleAssignmentSchema,
  ApplicationPasswordsSchema,
  GraphApplicationSchema,
  GraphErrorBodySchema,
  GraphPageSchema,
  GraphServicePrincipalSchema,
  PasswordCredentialSecretSchema,
  type AppRoleAssignment,
  type GraphPageBody,
  type GraphApplication,
  type GraphServicePrincipal,
  type PasswordCredential,
  type PasswordCredentialSecret,
} from "./types.js";

export const GRAPH_SCOPE = "https://graph.microsoft.com/.default";
export const GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";

const TOKEN_REFRESH_MARGIN_MS = 60_000;

// =============================================================================
// Errors
// =============================================================================

export class GraphRequestError extends Error {
  readonly statusCode: number;
  readonly code?: string;
  readonly headers: Record<string, string>;

  constructor(message: string, statusCode: number, code?: string, headers: Record<string, string> = {}) {
    super(message);
    this.name = "GraphRequestError";
    this.statusCode = statusCode;
    this.code = code;
    this.headers = headers;
  }
}

function quoteODataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function query(filter: string, select?: string): string {
  const params = [`$filter=${encodeURIComponent(filter)}`];
  if (select) params.push(`$select=${select}`);
  return `?${params.join("&")}`;
}

// =============================================================================
// Graph Manager
// =============================================================================

export type GraphManagerOptions = {
  baseUrl?: string;
  retryOptions?: AzureRetryOptions;
};

export class AzureGraphManager {
  private credentialsManager: AzureCredentialsManager;
  private baseUrl: string;
  private retryOptions?: AzureRetryOptions;
  private token: { value: string; expiresOnTimestamp: number } | null = null;

  constructor(credentialsManager: AzureCredentialsManager, options: GraphManagerOptions = {}) {
    this.credentialsManager = credentialsManager;
    this.baseUrl = options.baseUrl ?? GRAPH_BASE_URL;
    this.retryOptions = options.retryOptions;
  }

  // ---------------------------------------------------------------------------
  // Applications
  // ---------------------------------------------------------------------------

  async findApplication(displayName: string): Promise<GraphApplication | undefined> {
    const filter = `displayName eq ${quoteODataString(displayName)}`;
    const apps = await this.list(`/applications${query(filter, "id,appId,displayName")}`, GraphApplicationSchema);
    return apps[0];
  }

  /** Single-tenant application registration. */
  async createApplication(displayName: string): Promise<GraphApplication> {
    return this.send("POST", "/applications", GraphApplicationSchema, {
      displayName,
      signInAudience: "AzureADMyOrg",
    });
  }

  async listPasswordCredentials(applicationObjectId: string): Promise<PasswordCredential[]> {
    const app = await this.send(
      "GET",
      `/applications/${applicationObjectId}?$select=passwordCredentials`,
      ApplicationPasswordsSchema,
    );
    return app.passwordCredentials;
  }

  /**
   * Mint a client secret. `secretText` is only ever returned by this call.
   */
  async addPassword(applicationObjectId: string, displayName: string, endDateTime: Date): Promise<PasswordCredentialSecret> {
    return this.send("POST", `/applications/${applicationObjectId}/addPassword`, PasswordCredentialSecretSchema, {
      passwordCredential: { displayName, endDateTime: endDateTime.toISOString() },
    });
  }

  // ---------------------------------------------------------------------------
  // Service principals
  // ---------------------------------------------------------------------------

  async findServicePrincipal(appId: string): Promise<GraphServicePrincipal | undefined> {
    const filter = `appId eq ${quoteODataString(appId)}`;
    const principals = await this.list(
      `/servicePrincipals${query(filter, "id,appId,displayName,appRoles")}`,
      GraphServicePrincipalSchema,
    );
    return principals[0];
  }

  async createServicePrincipal(appId: string): Promise<GraphServicePrincipal> {
    return this.send("POST", "/servicePrincipals", GraphServicePrincipalSchema, { appId });
  }

  // ---------------------------------------------------------------------------
  // App role assignments
  // ---------------------------------------------------------------------------

  async findAppRoleAssignment(
    principalId: string,
    resourceId: string,
    appRoleId: string,
  ): Promise<AppRoleAssignment | undefined> {
    const assignments = await this.list(
      `/servicePrincipals/${principalId}/appRoleAssignments`,
      AppRoleAssignmentSchema,
    );
    return assignments.find((a) => a.resourceId === resourceId && a.appRoleId === appRoleId);
  }

  async createAppRoleAssignment(principalId: string, resourceId: string, appRoleId: string): Promise<AppRoleAssignment> {
    return this.send("POST", `/servicePrincipals/${principalId}/appRoleAssignments`, AppRoleAssignmentSchema, {
      principalId,
      resourceId,
      appRoleId,
    });
  }

  /**
   * Drop the cached Graph token. Later calls fetch a new one.
   */
  close(): void {
    this.token = null;
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  private async getToken(): Promise<string> {
    if (this.token && this.token.expiresOnTimestamp - TOKEN_REFRESH_MARGIN_MS > Date.now()) {
      return this.token.value;
    }
    const { credential } = await this.credentialsManager.getCredential();
    const accessToken = await credential.getToken(GRAPH_SCOPE);
    if (!accessToken) {
      throw new Error("Could not acquire a Microsoft Graph access token");
    }
    this.token = { value: accessToken.token, expiresOnTimestamp: accessToken.expiresOnTimestamp };
    return accessToken.token;
  }

  /**
   * Every item of a collection, following `@odata.nextLink` across pages.
   */
  private async list<T extends TSchema>(path: string, item: T): Promise<Static<T>[]> {
    const results: Static<T>[] = [];
    let next: string | undefined = `${this.baseUrl}${path}`;
    while (next) {
      const page: GraphPageBody = await this.request("GET", next, GraphPageSchema);
      for (const entry of page.value) {
        if (!Value.Check(item, entry)) {
          throw new Error(`Unexpected Microsoft Graph collection item from ${path}`);
        }
        results.push(entry);
      }
      next = page["@odata.nextLink"];
    }
    return results;
  }

  private async send<T extends TSchema>(method: string, path: string, schema: T, body?: unknown): Promise<Static<T>> {
    return this.request(method, `${this.baseUrl}${path}`, schema, body);
  }

  /**
   * GETs are retried on transient failures. Writes are sent once: a POST
   * that timed out may still have been committed.
   */
  private async request<T extends TSchema>(method: string, url: string, schema: T, body?: unknown): Promise<Static<T>> {
    const attempt = () => this.requestOnce(method, url, schema, body);
    return method === "GET" ? withAzureRetry(attempt, this.retryOptions) : attempt();
  }

  private async requestOnce<T extends TSchema>(method: string, url: string, schema: T, body?: unknown): Promise<Static<T>> {
    const token = await this.getToken();
    const response = await fetch(url, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const text = await response.text();

    if (!response.ok) {
      const payload = parseJson(text);
      const detail: { code?: string; message?: string } = Value.Check(GraphErrorBodySchema, payload) ? payload.error : {};
      throw new GraphRequestError(
        detail.message ?? `Microsoft Graph ${method} failed: ${response.status} ${response.statusText}`,
        response.status,
        detail.code,
        Object.fromEntries(response.headers.entries()),
      );
    }

    const payload = parseJson(text);
    if (!Value.Check(schema, payload)) {
      const first = Value.Errors(schema, payload).First();
      const where = first ? `${first.path || "/"}: ${first.message}` : "invalid payload";
      throw new Error(`Unexpected Microsoft Graph response for ${method} ${url} (${where})`);
    }
    return payload;
  }
}

/** Parsed body, or undefined when it is empty or not JSON. */
function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function createGraphManager(
  credentialsManager: AzureCredentialsManager,
  options?: GraphManagerOptions,
): AzureGraphManager {
  return new AzureGraphManager(credentialsManager, options);
}
