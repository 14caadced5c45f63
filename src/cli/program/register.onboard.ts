import { Command } from "commander";

import { onboardCommand, type OnboardOptions } from "../../commands/onboard.js";
import { SPOTTO_APP_DISPLAY_NAME } from "../../constants.js";
import { defaultRuntime, runCommandWithRuntime, type RuntimeEnv } from "../../runtime.js";
import { theme } from "../../theme.js";
import { CREDENTIAL_METHODS } from "../../types.js";
import { VERSION } from "../../version.js";

export function registerOnboardCommand(program: Command, runtime: RuntimeEnv = defaultRuntime): Command {
  return program
    .description(`Connect an Azure tenant to ${SPOTTO_APP_DISPLAY_NAME} with read-only access`)
    .addHelpText(
      "after",
      () => `\n${theme.muted("Environment:")} SPOTTO_AUTH_METHOD, SPOTTO_LOG_DIR\n`,
    )
    .option("--auth <method>", `Sign-in method: ${CREDENTIAL_METHODS.join(" | ")} (default: cli)`)
    .option("--config <file>", "JSON file with onboarding settings")
    .option("--log-dir <dir>", "Directory for run transcripts (default: ./logs)")
    .option("--no-pause", "Exit without waiting for Enter")
    .action(async (opts: OnboardOptions) => {
      await runCommandWithRuntime(runtime, async () => {
        await onboardCommand(opts, runtime);
      });
    });
}

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command().name("spotto-azure-onboard").version(VERSION);
  return registerOnboardCommand(program, runtime);
}
