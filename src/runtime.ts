/**
 * Process-level effects the command needs, injectable for tests.
 */

export type RuntimeEnv = {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args) => console.log(...args),
  error: (...args) => console.error(...args),
  exit: (code) => {
    process.exitCode = code;
  },
};

/**
 * Run a command body; anything it throws is printed and becomes exit code 1.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    runtime.error(error instanceof Error ? error.message : String(error));
    runtime.exit(1);
  }
}
