/**
 * Onboarding configuration schema (TypeBox) and loader.
 *
 * Precedence, lowest first: defaults, the JSON file given with --config,
 * environment variables, command-line flags.
 */

import { readFileSync } from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  ROLE_DEFINITION_CREATE_WAIT_DEFAULTS,
  ROLE_DEFINITION_UPDATE_WAIT_DEFAULTS,
  SERVICE_PRINCIPAL_WAIT_DEFAULTS,
} from "./progress.js";
import { AZURE_RETRY_DEFAULTS } from "./retry.js";

const propagationSchema = Type.Object(
  {
    initialDelayMs: Type.Integer({ minimum: 0 }),
    maxDelayMs: Type.Integer({ minimum: 0 }),
    maxWaitMs: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export const configSchema = Type.Object(
  {
    credentialMethod: Type.Union([Type.Literal("cli"), Type.Literal("browser"), Type.Literal("device-code")], {
      description: "Sign-in method: cli | browser | device-code",
    }),
    logDir: Type.String({ minLength: 1, description: "Directory for run transcripts" }),
    secretValidityMonths: Type.Integer({ minimum: 1, maximum: 24, description: "Lifetime of a new client secret" }),
    pauseOnExit: Type.Boolean({ description: "Wait for Enter before exiting" }),
    transcript: Type.Object(
      {
        maskSecrets: Type.Boolean({ description: "Replace the new client secret with [REDACTED] in transcripts" }),
      },
      { additionalProperties: false },
    ),
    retry: Type.Object(
      {
        maxAttempts: Type.Integer({ minimum: 1 }),
        minDelayMs: Type.Integer({ minimum: 0 }),
        maxDelayMs: Type.Integer({ minimum: 0 }),
      },
      { additionalProperties: false },
    ),
    propagation: Type.Object(
      {
        servicePrincipal: propagationSchema,
        roleDefinitionCreate: propagationSchema,
        roleDefinitionUpdate: propagationSchema,
      },
      { additionalProperties: false },
    ),
  },
  { additionalProperties: false },
);

export type OnboardingConfig = Static<typeof configSchema>;

export function getDefaultConfig(): OnboardingConfig {
  return {
    credentialMethod: "cli",
    logDir: "logs",
    secretValidityMonths: 12,
    pauseOnExit: true,
    transcript: { maskSecrets: true },
    retry: {
      maxAttempts: AZURE_RETRY_DEFAULTS.maxAttempts,
      minDelayMs: AZURE_RETRY_DEFAULTS.minDelayMs,
      maxDelayMs: AZURE_RETRY_DEFAULTS.maxDelayMs,
    },
    propagation: {
      servicePrincipal: { ...SERVICE_PRINCIPAL_WAIT_DEFAULTS },
      roleDefinitionCreate: { ...ROLE_DEFINITION_CREATE_WAIT_DEFAULTS },
      roleDefinitionUpdate: { ...ROLE_DEFINITION_UPDATE_WAIT_DEFAULTS },
    },
  };
}

// =============================================================================
// Loading
// =============================================================================

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  ${i}`).join("\n")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type ConfigFlags = {
  auth?: string;
  logDir?: string;
  /** commander sets this to false for --no-pause. */
  pause?: boolean;
};

export type LoadConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  flags?: ConfigFlags;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function merge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) return override;
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = key in base ? merge(base[key], value) : value;
  }
  return result;
}

function readConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Could not read config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function overridesFrom(env: NodeJS.ProcessEnv, flags: ConfigFlags): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.SPOTTO_AUTH_METHOD) overrides.credentialMethod = env.SPOTTO_AUTH_METHOD;
  if (env.SPOTTO_LOG_DIR) overrides.logDir = env.SPOTTO_LOG_DIR;
  if (flags.auth) overrides.credentialMethod = flags.auth;
  if (flags.logDir) overrides.logDir = flags.logDir;
  if (flags.pause === false) overrides.pauseOnExit = false;
  return overrides;
}

/**
 * Resolve the run configuration. Throws ConfigError listing every schema
 * violation of the merged result.
 */
export function loadConfig(options: LoadConfigOptions = {}): OnboardingConfig {
  let merged: unknown = getDefaultConfig();
  if (options.configPath) {
    const fromFile = readConfigFile(options.configPath);
    if (!isPlainObject(fromFile)) {
      throw new ConfigError(`Config file ${options.configPath} must contain a JSON object`);
    }
    merged = merge(merged, fromFile);
  }
  merged = merge(merged, overridesFrom(options.env ?? process.env, options.flags ?? {}));

  if (!Value.Check(configSchema, merged)) {
    const issues = [...Value.Errors(configSchema, merged)].map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }
  return merged;
}
