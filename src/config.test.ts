import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, getDefaultConfig, loadConfig } from "./config.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "spotto-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const path = join(dir, "onboarding.json");
    writeFileSync(path, typeof content === "string" ? content : JSON.stringify(content));
    return path;
  }

  function configError(fn: () => unknown): ConfigError {
    try {
      fn();
    } catch (error) {
      if (error instanceof ConfigError) return error;
      throw error;
    }
    throw new Error("expected a ConfigError");
  }

  it("returns the defaults when nothing overrides them", () => {
    const config = loadConfig({ env: {} });
    expect(config).toEqual(getDefaultConfig());
    expect(config.credentialMethod).toBe("cli");
    expect(config.logDir).toBe("logs");
    expect(config.secretValidityMonths).toBe(12);
    expect(config.pauseOnExit).toBe(true);
    expect(config.transcript.maskSecrets).toBe(true);
    expect(config.propagation.servicePrincipal).toEqual({ initialDelayMs: 2000, maxDelayMs: 15000, maxWaitMs: 120000 });
  });

  it("merges nested values from the config file", () => {
    const configPath = writeConfig({ propagation: { servicePrincipal: { maxWaitMs: 5000 } }, secretValidityMonths: 6 });
    const config = loadConfig({ configPath, env: {} });
    expect(config.propagation.servicePrincipal).toEqual({ initialDelayMs: 2000, maxDelayMs: 15000, maxWaitMs: 5000 });
    expect(config.propagation.roleDefinitionUpdate).toEqual({ initialDelayMs: 1000, maxDelayMs: 10000, maxWaitMs: 30000 });
    expect(config.secretValidityMonths).toBe(6);
  });

  it("lets the environment override the file and flags override both", () => {
    const configPath = writeConfig({ credentialMethod: "browser", logDir: "file-logs" });
    const config = loadConfig({
      configPath,
      env: { SPOTTO_AUTH_METHOD: "cli", SPOTTO_LOG_DIR: "env-logs" },
      flags: { auth: "device-code" },
    });
    expect(config.credentialMethod).toBe("device-code");
    expect(config.logDir).toBe("env-logs");
  });

  it("only turns pausing off from the flag", () => {
    expect(loadConfig({ env: {}, flags: { pause: false } }).pauseOnExit).toBe(false);
    const configPath = writeConfig({ pauseOnExit: false });
    expect(loadConfig({ configPath, env: {}, flags: { pause: true } }).pauseOnExit).toBe(false);
  });

  it("rejects an unknown sign-in method", () => {
    const error = configError(() => loadConfig({ env: {}, flags: { auth: "password" } }));
    expect(error.message.startsWith("Invalid configuration")).toBe(true);
    expect(error.issues.some((issue) => issue.startsWith("/credentialMethod:"))).toBe(true);
  });

  it("rejects a secret lifetime above two years", () => {
    const configPath = writeConfig({ secretValidityMonths: 36 });
    const error = configError(() => loadConfig({ configPath, env: {} }));
    expect(error.issues.some((issue) => issue.startsWith("/secretValidityMonths:"))).toBe(true);
  });

  it("rejects unknown keys", () => {
    const configPath = writeConfig({ colour: "blue" });
    const error = configError(() => loadConfig({ configPath, env: {} }));
    expect(error.issues.some((issue) => issue.startsWith("/colour:"))).toBe(true);
  });

  it("reports malformed and missing files", () => {
    const malformed = writeConfig("{ not json");
    expect(configError(() => loadConfig({ configPath: malformed, env: {} })).message).toContain(
      `Config file ${malformed} is not valid JSON`,
    );

    const missing = join(dir, "missing.json");
    expect(configError(() => loadConfig({ configPath: missing, env: {} })).message).toContain(
      `Could not read config file ${missing}`,
    );

    const notAnObject = writeConfig([1, 2]);
    expect(configError(() => loadConfig({ configPath: notAnObject, env: {} })).message).toBe(
      `Config file ${notAnObject} must contain a JSON object`,
    );
  });
});
