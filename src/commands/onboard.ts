import { ConfigError, loadConfig, type OnboardingConfig } from "../config.js";
import { createCredentialsManager } from "../credentials/index.js";
import { createGraphManager } from "../graph/index.js";
import { createIAMManager } from "../iam/index.js";
import { createOnboardingLogger, type ConsoleSink, type OnboardingLogger } from "../logging/index.js";
import { createPrompter } from "../prompts/index.js";
import { ProvisioningError, runOnboarding, type ProvisioningServices } from "../provisioning/index.js";
import { formatErrorMessage } from "../retry.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { createSubscriptionManager } from "../subscriptions/index.js";

export type OnboardOptions = {
  auth?: string;
  config?: string;
  logDir?: string;
  /** false when --no-pause was given. */
  pause?: boolean;
};

export type OnboardServiceFactory = (
  config: OnboardingConfig,
  logger: OnboardingLogger,
) => Omit<ProvisioningServices, "logger">;

export type OnboardDeps = {
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  colors?: boolean;
  sink?: ConsoleSink;
  createServices?: OnboardServiceFactory;
};

export function createAzureServices(
  config: OnboardingConfig,
  logger: OnboardingLogger,
): Omit<ProvisioningServices, "logger"> {
  const credentials = createCredentialsManager({
    credentialMethod: config.credentialMethod,
    onDeviceCode: (message) => logger.info(message),
  });
  return {
    session: credentials,
    tenants: createSubscriptionManager(credentials, config.retry),
    roles: createIAMManager(credentials, undefined, config.retry),
    directory: createGraphManager(credentials, { retryOptions: config.retry }),
    prompter: createPrompter(logger),
  };
}

export async function onboardCommand(
  opts: OnboardOptions,
  runtime: RuntimeEnv = defaultRuntime,
  deps: OnboardDeps = {},
): Promise<void> {
  let config: OnboardingConfig;
  try {
    config = loadConfig({
      configPath: opts.config,
      env: deps.env,
      flags: { auth: opts.auth, logDir: opts.logDir, pause: opts.pause },
    });
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    runtime.error(error.message);
    runtime.exit(1);
    return;
  }

  const now = deps.now ?? (() => new Date());
  const { logger, transcriptPath } = createOnboardingLogger({
    logDir: config.logDir,
    colors: deps.colors,
    sink: deps.sink,
    now,
  });
  const services = (deps.createServices ?? createAzureServices)(config, logger);

  let exitCode = 0;
  try {
    await runOnboarding(
      { ...services, logger },
      {
        secretValidityMonths: config.secretValidityMonths,
        maskSecrets: config.transcript.maskSecrets,
        propagation: config.propagation,
        now,
      },
    );
  } catch (error) {
    exitCode = 1;
    if (error instanceof ProvisioningError) {
      logger.fatal(error.message, { step: error.step });
    } else {
      logger.fatal(`Onboarding failed: ${formatErrorMessage(error)}`);
    }
  }

  logger.muted(`Transcript saved to ${transcriptPath}`);
  try {
    if (config.pauseOnExit) await services.prompter.pause("Press Enter to exit");
  } finally {
    await logger.close();
  }

  if (exitCode !== 0) runtime.exit(exitCode);
}
