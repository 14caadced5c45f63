/**
 * Microsoft Graph Manager unit tests
 *
 * Uses fetch-based REST API, not an Azure SDK package.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureGraphManager, GraphRequestError } from "./manager.js";
import type { AzureCredentialsManager } from "../credentials/manager.js";

const mockGetToken = vi.fn();
const mockCreds = {
  getCredential: vi.fn().mockResolvedValue({ credential: { getToken: mockGetToken }, method: "cli" }),
} as unknown as AzureCredentialsManager;

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    headers: new Headers(headers),
    text: async () => (body === undefined ? "" : JSON.stringify(body)),
  };
}

function textResponse(status: number, text: string) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    headers: new Headers(),
    text: async () => text,
  };
}

describe("AzureGraphManager", () => {
  let mgr: AzureGraphManager;
  const fetchSpy = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    globalThis.fetch = fetchSpy;
    mockGetToken.mockResolvedValue({ token: "test-token", expiresOnTimestamp: Date.now() + 3_600_000 });
    mgr = new AzureGraphManager(mockCreds, { retryOptions: { maxAttempts: 1, minDelayMs: 0, maxDelayMs: 0 } });
  });

  describe("applications", () => {
    it("finds an application by display name", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(200, { value: [{ id: "obj-1", appId: "app-1", displayName: "Spotto AI" }] }));

      const app = await mgr.findApplication("Spotto AI");
      expect(app).toEqual({ id: "obj-1", appId: "app-1", displayName: "Spotto AI" });
      expect(fetchSpy).toHaveBeenCalledWith(
        "https://graph.microsoft.com/v1.0/applications?$filter=displayName%20eq%20'Spotto%20AI'&$select=id,appId,displayName",
        expect.objectContaining({
          method: "GET",
          headers: expect.objectContaining({ Authorization: "Bearer test-token" }),
        }),
      );
      expect(mockGetToken).toHaveBeenCalledWith("https://graph.microsoft.com/.default");
    });

    it("returns undefined when no application matches", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(200, { value: [] }));
      expect(await mgr.findApplication("Spotto AI")).toBeUndefined();
    });

    it("creates a single-tenant application", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(201, { id: "obj-1", appId: "app-1", displayName: "Spotto AI" }));

      await mgr.createApplication("Spotto AI");
      const [, init] = fetchSpy.mock.calls[0];
      expect(init.method).toBe("POST");
      expect(JSON.parse(init.body)).toEqual({ displayName: "Spotto AI", signInAudience: "AzureADMyOrg" });
    });

    it("mints a password with the requested expiry", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(200, {
        keyId: "key-1", displayName: "Spotto AI onboarding", hint: "abc", endDateTime: "2027-10-19T00:00:00Z", secretText: "test-secret",
      }));

      const secret = await mgr.addPassword("obj-1", "Spotto AI onboarding", new Date("2027-10-19T00:00:00Z"));
      expect(secret.secretText).toBe("test-secret");
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe("https://graph.microsoft.com/v1.0/applications/obj-1/addPassword");
      expect(JSON.parse(init.body)).toEqual({
        passwordCredential: { displayName: "Spotto AI onboarding", endDateTime: "2027-10-19T00:00:00.000Z" },
      });
    });

    it("lists password credentials with null fields", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(200, {
        passwordCredentials: [{ keyId: "key-1", displayName: null, hint: null, endDateTime: "2027-01-01T00:00:00Z" }],
      }));
      const creds = await mgr.listPasswordCredentials("obj-1");
      expect(creds).toHaveLength(1);
      expect(creds[0].endDateTime).toBe("2027-01-01T00:00:00Z");
    });
  });

  describe("service principals", () => {
    it("follows next links across pages", async () => {
      fetchSpy
        .mockResolvedValueOnce(jsonResponse(200, { value: [], "@odata.nextLink": "https://graph.microsoft.com/v1.0/next-page" }))
        .mockResolvedValueOnce(jsonResponse(200, { value: [{ id: "sp-1", appId: "app-1", displayName: "Spotto AI" }] }));

      const sp = await mgr.findServicePrincipal("app-1");
      expect(sp?.id).toBe("sp-1");
      expect(fetchSpy).toHaveBeenCalledTimes(2);
      expect(fetchSpy.mock.calls[1][0]).toBe("https://graph.microsoft.com/v1.0/next-page");
    });

    it("rejects malformed collection items", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(200, { value: [{ id: 42 }] }));
      await expect(mgr.findServicePrincipal("app-1")).rejects.toThrow("Unexpected Microsoft Graph collection item");
    });
  });

  describe("app role assignments", () => {
    it("matches on resource and role", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(200, {
        value: [
          { id: "ara-1", principalId: "sp-1", resourceId: "graph-sp", appRoleId: "other-role" },
          { id: "ara-2", principalId: "sp-1", resourceId: "graph-sp", appRoleId: "role-1" },
        ],
      }));
      const found = await mgr.findAppRoleAssignment("sp-1", "graph-sp", "role-1");
      expect(found?.id).toBe("ara-2");
    });

    it("creates an assignment", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(201, { id: "ara-3", principalId: "sp-1", resourceId: "graph-sp", appRoleId: "role-1" }));
      const created = await mgr.createAppRoleAssignment("sp-1", "graph-sp", "role-1");
      expect(created.id).toBe("ara-3");
      expect(JSON.parse(fetchSpy.mock.calls[0][1].body)).toEqual({ principalId: "sp-1", resourceId: "graph-sp", appRoleId: "role-1" });
    });
  });

  describe("errors", () => {
    it("raises GraphRequestError with the Graph error body", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(403, { error: { code: "Authorization_RequestDenied", message: "Insufficient privileges" } }));

      const error = await mgr.findApplication("Spotto AI").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(GraphRequestError);
      expect(error).toMatchObject({ statusCode: 403, code: "Authorization_RequestDenied", message: "Insufficient privileges" });
    });

    it("retries throttled requests", async () => {
      mgr = new AzureGraphManager(mockCreds, { retryOptions: { maxAttempts: 2, minDelayMs: 1, maxDelayMs: 1 } });
      fetchSpy
        .mockResolvedValueOnce(jsonResponse(429, undefined, { "retry-after": "0" }))
        .mockResolvedValueOnce(jsonResponse(200, { value: [] }));

      expect(await mgr.findApplication("Spotto AI")).toBeUndefined();
      expect(fetchSpy).toHaveBeenCalledTimes(2);
    });

    it("sends a create once when the service answers 503", async () => {
      mgr = new AzureGraphManager(mockCreds, { retryOptions: { maxAttempts: 3, minDelayMs: 1, maxDelayMs: 1 } });
      fetchSpy
        .mockResolvedValueOnce(jsonResponse(503, { error: { code: "ServiceUnavailable", message: "Try again" } }))
        .mockResolvedValueOnce(jsonResponse(201, { id: "obj-1", appId: "app-1", displayName: "Spotto AI" }));

      await expect(mgr.createApplication("Spotto AI")).rejects.toMatchObject({ statusCode: 503, code: "ServiceUnavailable" });
      expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it("does not resend a password request after a connection reset", async () => {
      mgr = new AzureGraphManager(mockCreds, { retryOptions: { maxAttempts: 3, minDelayMs: 1, maxDelayMs: 1 } });
      fetchSpy
        .mockRejectedValueOnce(new Error("fetch failed"))
        .mockResolvedValueOnce(jsonResponse(200, { keyId: "key-1", secretText: "test-secret", endDateTime: "2027-10-19T00:00:00Z" }));

      await expect(mgr.addPassword("obj-1", "Spotto AI onboarding", new Date("2027-10-19T00:00:00Z"))).rejects.toThrow(
        "fetch failed",
      );
      expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it("reports the HTTP status when the error body is not JSON", async () => {
      fetchSpy.mockResolvedValue(textResponse(502, "<html>Bad Gateway</html>"));

      const error = await mgr.findApplication("Spotto AI").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(GraphRequestError);
      expect(error).toMatchObject({ statusCode: 502, message: "Microsoft Graph GET failed: 502 Error" });
    });

    it("rejects a successful response that is not JSON", async () => {
      fetchSpy.mockResolvedValue(textResponse(200, "<html>ok</html>"));

      await expect(mgr.createServicePrincipal("app-1")).rejects.toThrow(
        "Unexpected Microsoft Graph response for POST https://graph.microsoft.com/v1.0/servicePrincipals",
      );
    });

    it("fails without a token", async () => {
      mockGetToken.mockResolvedValue(null);
      await expect(mgr.findApplication("Spotto AI")).rejects.toThrow("Could not acquire a Microsoft Graph access token");
    });
  });

  describe("close", () => {
    it("drops the cached token", async () => {
      fetchSpy.mockResolvedValue(jsonResponse(200, { value: [] }));
      await mgr.findApplication("Spotto AI");
      await mgr.findApplication("Spotto AI");
      expect(mockGetToken).toHaveBeenCalledTimes(1);

      mgr.close();
      await mgr.findApplication("Spotto AI");
      expect(mockGetToken).toHaveBeenCalledTimes(2);
    });
  });
});
