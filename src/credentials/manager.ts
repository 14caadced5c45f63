/**
 * Azure Credentials Manager
 *
 * Owns the operator's sign-in for the run. The `cli` method reuses (or starts)
 * an Azure CLI session; `browser` and `device-code` authenticate through
 * @azure/identity directly. Once a tenant is chosen every credential handed out
 * is pinned to it.
 */

import type { AuthenticationRecord, TokenCredential } from "@azure/identity";
import type { AzureCLIWrapper } from "../cli/wrapper.js";
import type { AzureCredentialMethod } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export const ARM_SCOPE = "https://management.azure.com/.default";

/** The parts of the az wrapper a CLI session needs. */
export type AzureCLISession = Pick<AzureCLIWrapper, "isAvailable" | "getAccount" | "login">;

export type CredentialsManagerOptions = {
  credentialMethod?: AzureCredentialMethod;
  tenantId?: string;
  cli?: AzureCLISession;
  /** Receives the device-code instructions for the operator. */
  onDeviceCode?: (message: string) => void;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  tenantId?: string;
};

export type AzureSession = {
  /** Signed-in principal, usually a user principal name. */
  account: string;
  /** Home tenant of the sign-in. */
  tenantId: string;
  method: AzureCredentialMethod;
};

export class CredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CredentialError";
  }
}

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private cache = new Map<string, { credential: TokenCredential; expiresAt: number }>();
  private ttlMs: number;

  constructor(ttlMs = 3_600_000) {
    this.ttlMs = ttlMs;
  }

  get(key: string): TokenCredential | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.credential;
  }

  set(key: string, credential: TokenCredential): void {
    this.cache.set(key, {
      credential,
      expiresAt: Date.now() + this.ttlMs,
    });
  }

  clear(): void {
    this.cache.clear();
  }
}

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private method: AzureCredentialMethod;
  private tenantId?: string;
  private cli?: AzureCLISession;
  private onDeviceCode?: (message: string) => void;
  private cache = new CredentialCache();
  private record?: AuthenticationRecord;

  constructor(options: CredentialsManagerOptions = {}) {
    this.method = options.credentialMethod ?? "cli";
    this.tenantId = options.tenantId;
    this.cli = options.cli;
    this.onDeviceCode = options.onDeviceCode;
  }

  getMethod(): AzureCredentialMethod {
    return this.method;
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  /**
   * Reuse the current session if there is one, otherwise sign in interactively.
   */
  async signIn(): Promise<AzureSession> {
    if (this.method === "cli") {
      const cli = await this.requireCli();
      const existing = await cli.getAccount();
      if (existing) return this.toCliSession(existing.user?.name ?? existing.id, existing.tenantId);
      return this.cliLogin(cli);
    }
    return this.authenticate();
  }

  /**
   * Discard the current sign-in and authenticate again, typically as another account.
   */
  async switchAccount(): Promise<AzureSession> {
    this.clearCache();
    this.tenantId = undefined;
    if (this.method === "cli") {
      return this.cliLogin(await this.requireCli());
    }
    this.record = undefined;
    return this.authenticate();
  }

  /**
   * Pin later credentials to `tenantId`.
   */
  useTenant(tenantId: string): void {
    if (this.tenantId === tenantId) return;
    this.tenantId = tenantId;
    this.clearCache();
  }

  /**
   * Get a TokenCredential for the configured method and current tenant.
   */
  async getCredential(): Promise<CredentialResolutionResult> {
    const cacheKey = `${this.method}:${this.tenantId ?? ""}`;

    const cached = this.cache.get(cacheKey);
    if (cached) {
      return { credential: cached, method: this.method, tenantId: this.tenantId };
    }

    const credential = await this.createCredential();
    this.cache.set(cacheKey, credential);
    return { credential, method: this.method, tenantId: this.tenantId };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async requireCli(): Promise<AzureCLISession> {
    if (!this.cli) {
      const { createCLIWrapper } = await import("../cli/wrapper.js");
      this.cli = createCLIWrapper();
    }
    if (!(await this.cli.isAvailable())) {
      throw new CredentialError(
        "Azure CLI (az) was not found. Install it from https://aka.ms/azure-cli or rerun with --auth browser.",
      );
    }
    return this.cli;
  }

  private async cliLogin(cli: AzureCLISession): Promise<AzureSession> {
    const result = await cli.login(this.tenantId);
    if (!result.success) {
      throw new CredentialError(`az login failed: ${result.stderr.trim()}`);
    }
    const account = await cli.getAccount();
    if (!account) {
      throw new CredentialError("az login completed but no account is signed in");
    }
    return this.toCliSession(account.user?.name ?? account.id, account.tenantId);
  }

  private toCliSession(account: string, tenantId: string): AzureSession {
    return { account, tenantId, method: "cli" };
  }

  private async authenticate(): Promise<AzureSession> {
    const credential = await this.createCredential();
    if (!("authenticate" in credential)) {
      throw new CredentialError(`Credential method "${this.method}" cannot sign in interactively`);
    }
    const record = await credential.authenticate(ARM_SCOPE);
    if (!record) {
      throw new CredentialError("Sign-in did not return an account");
    }
    this.record = record;
    this.cache.set(`${this.method}:${this.tenantId ?? ""}`, credential);
    return { account: record.username, tenantId: record.tenantId, method: this.method };
  }

  private async createCredential() {
    const identity = await import("@azure/identity");

    switch (this.method) {
      case "browser":
        return new identity.InteractiveBrowserCredential({
          tenantId: this.tenantId,
          authenticationRecord: this.record,
        });

      case "device-code":
        return new identity.DeviceCodeCredential({
          tenantId: this.tenantId,
          authenticationRecord: this.record,
          userPromptCallback: (info) => this.onDeviceCode?.(info.message),
        });

      case "cli":
      default:
        return new identity.AzureCliCredential({ tenantId: this.tenantId });
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}
