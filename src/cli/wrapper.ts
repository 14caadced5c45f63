/**
 * Azure CLI Wrapper
 *
 * Wraps the `az` CLI for the session handling the SDK credentials rely on:
 * checking the CLI is installed, reading the signed-in account, and running
 * an interactive `az login`.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readErrorField } from "../retry.js";

const execFileAsync = promisify(execFile);

// =============================================================================
// Types
// =============================================================================

export type AzureCLIOptions = {
  /** Path to az CLI binary. */
  azPath?: string;
  /** Timeout in ms for ordinary commands. */
  timeoutMs?: number;
  /** Timeout in ms for `az login`, which waits on the operator. */
  loginTimeoutMs?: number;
};

export type AzureCLIResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  parsed?: unknown;
};

export type AzureCLIConfig = {
  azPath: string;
  defaultArgs: string[];
  timeoutMs: number;
  loginTimeoutMs: number;
};

const AzureCLIAccountSchema = Type.Object({
  id: Type.String(),
  name: Type.Optional(Type.String()),
  tenantId: Type.String(),
  user: Type.Optional(Type.Object({ name: Type.String(), type: Type.Optional(Type.String()) })),
});

export type AzureCLIAccount = Static<typeof AzureCLIAccountSchema>;

// =============================================================================
// AzureCLIWrapper
// =============================================================================

export class AzureCLIWrapper {
  private config: AzureCLIConfig;

  constructor(options?: AzureCLIOptions) {
    this.config = {
      azPath: options?.azPath ?? "az",
      defaultArgs: ["--output", "json"],
      timeoutMs: options?.timeoutMs ?? 60_000,
      loginTimeoutMs: options?.loginTimeoutMs ?? 600_000,
    };
  }

  /**
   * Execute an az CLI command.
   */
  async execute(args: string[], timeoutMs = this.config.timeoutMs): Promise<AzureCLIResult> {
    const fullArgs = [...args, ...this.config.defaultArgs];

    try {
      const { stdout, stderr } = await execFileAsync(this.config.azPath, fullArgs, {
        timeout: timeoutMs,
        env: process.env,
      });

      let parsed: unknown;
      try {
        parsed = JSON.parse(stdout);
      } catch {
        // Not JSON output, that's okay
      }

      return { success: true, stdout, stderr, exitCode: 0, parsed };
    } catch (error) {
      const stderr = readErrorField(error, "stderr");
      const message = readErrorField(error, "message");
      const code = readErrorField(error, "code");
      return {
        success: false,
        stdout: "",
        stderr:
          (typeof stderr === "string" && stderr) || (typeof message === "string" && message) || "Unknown error",
        exitCode: typeof code === "number" ? code : 1,
      };
    }
  }

  /**
   * Check if az CLI is installed and available.
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.execute(["version"]);
    return result.success;
  }

  /**
   * The signed-in account, or null when there is no CLI session.
   */
  async getAccount(): Promise<AzureCLIAccount | null> {
    const result = await this.execute(["account", "show"]);
    if (!result.success || !Value.Check(AzureCLIAccountSchema, result.parsed)) return null;
    return result.parsed;
  }

  /**
   * Run an interactive `az login`, optionally pinned to a tenant.
   */
  async login(tenantId?: string): Promise<AzureCLIResult> {
    const args = ["login", "--allow-no-subscriptions"];
    if (tenantId) args.push("--tenant", tenantId);
    return this.execute(args, this.config.loginTimeoutMs);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCLIWrapper(options?: AzureCLIOptions): AzureCLIWrapper {
  return new AzureCLIWrapper(options);
}
