/**
 * Operator prompts.
 *
 * Provisioning steps ask questions through the `Prompter` port; the inquirer
 * implementation below is what the CLI wires in. Every question and answer is
 * written to the transcript at trace level.
 */

import inquirer from "inquirer";
import type { OnboardingLogger } from "../logging/index.js";

/** Returns `true` to accept the answer, or a message explaining why it was rejected. */
export type AnswerValidator = (value: string) => true | string;

export interface Prompter {
  confirm(message: string, options?: { default?: boolean }): Promise<boolean>;
  /** Asks until `validate` accepts the answer. */
  input(message: string, options?: { validate?: AnswerValidator; default?: string }): Promise<string>;
  /** Blocks until the operator presses Enter. */
  pause(message: string): Promise<void>;
}

export class InquirerPrompter implements Prompter {
  private logger: OnboardingLogger;

  constructor(logger: OnboardingLogger) {
    this.logger = logger.child("prompt");
  }

  async confirm(message: string, options?: { default?: boolean }): Promise<boolean> {
    this.logger.trace(`? ${message}`);
    const { answer } = await inquirer.prompt<{ answer: boolean }>([
      { type: "confirm", name: "answer", message, default: options?.default ?? false },
    ]);
    this.logger.trace(`> ${answer ? "yes" : "no"}`);
    return answer;
  }

  async input(message: string, options?: { validate?: AnswerValidator; default?: string }): Promise<string> {
    const validate = options?.validate;
    this.logger.trace(`? ${message}`);
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: "input",
        name: "answer",
        message,
        default: options?.default,
        validate: (value: string) => {
          if (!validate) return true;
          const verdict = validate(value);
          if (verdict !== true) this.logger.trace(`> ${value} (rejected: ${verdict})`);
          return verdict;
        },
      },
    ]);
    this.logger.trace(`> ${answer}`);
    return answer;
  }

  async pause(message: string): Promise<void> {
    this.logger.trace(`? ${message}`);
    await inquirer.prompt<{ answer: string }>([{ type: "input", name: "answer", message }]);
  }
}

export function createPrompter(logger: OnboardingLogger): Prompter {
  return new InquirerPrompter(logger);
}
