import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeAzureTenant, ScriptedPrompter, TEST_START } from "../provisioning/test-helpers.js";
import type { RuntimeEnv } from "../runtime.js";
import { onboardCommand, type OnboardDeps } from "./onboard.js";

type Harness = {
  runtime: RuntimeEnv & { exit: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };
  console: { log: string[]; warn: string[]; error: string[] };
  prompter: ScriptedPrompter;
  deps: OnboardDeps;
};

function harness(fake: FakeAzureTenant, answers: Array<string | boolean>): Harness {
  const prompter = new ScriptedPrompter(answers);
  const output = { log: [] as string[], warn: [] as string[], error: [] as string[] };
  return {
    runtime: { log: vi.fn(), error: vi.fn(), exit: vi.fn() },
    console: output,
    prompter,
    deps: {
      env: {},
      now: () => new Date(TEST_START),
      colors: false,
      sink: {
        log: (line) => output.log.push(line),
        warn: (line) => output.warn.push(line),
        error: (line) => output.error.push(line),
      },
      createServices: () => ({ session: fake, tenants: fake, roles: fake, directory: fake, prompter }),
    },
  };
}

describe("onboardCommand", () => {
  let logDir: string;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), "spotto-onboard-"));
  });

  afterEach(() => {
    rmSync(logDir, { recursive: true, force: true });
  });

  function transcript(): { path: string; text: string } {
    const files = readdirSync(logDir);
    expect(files).toHaveLength(1);
    const path = join(logDir, files[0] ?? "");
    return { path, text: readFileSync(path, "utf8") };
  }

  it("onboards and writes a masked transcript", async () => {
    const fake = new FakeAzureTenant();
    const h = harness(fake, [true, false, "all", false]);

    await onboardCommand({ logDir }, h.runtime, h.deps);

    expect(h.runtime.exit).not.toHaveBeenCalled();
    expect(h.console.log).toContain("  Client secret: test-secret-3");
    expect(h.prompter.asked.at(-1)).toBe("Press Enter to exit");

    const { path, text } = transcript();
    expect(path.endsWith(".log")).toBe(true);
    expect(text).toContain("  Client secret: [REDACTED]");
    expect(text).not.toContain("test-secret-3");
    expect(text).toContain(`Transcript saved to ${path}`);
    expect(text.startsWith(`${TEST_START} INFO  [onboarding]`)).toBe(true);
  });

  it("skips the exit pause with --no-pause", async () => {
    const h = harness(new FakeAzureTenant(), [true, false, "all", false]);

    await onboardCommand({ logDir, pause: false }, h.runtime, h.deps);

    expect(h.prompter.asked).not.toContain("Press Enter to exit");
    expect(h.runtime.exit).not.toHaveBeenCalled();
  });

  it("exits with 1 when a fatal step fails", async () => {
    const h = harness(new FakeAzureTenant({ tenants: [] }), [true, false]);

    await onboardCommand({ logDir, pause: false }, h.runtime, h.deps);

    expect(h.console.error).toEqual(["The signed-in account has no accessible tenants"]);
    expect(h.runtime.exit).toHaveBeenCalledWith(1);
    expect(transcript().text).toContain("FATAL [onboarding] The signed-in account has no accessible tenants");
  });

  it("reports unexpected errors as fatal", async () => {
    const h = harness(new FakeAzureTenant(), []);

    await onboardCommand({ logDir, pause: false }, h.runtime, h.deps);

    expect(h.console.error).toEqual(['Onboarding failed: No scripted answer left for "Continue?"']);
    expect(h.runtime.exit).toHaveBeenCalledWith(1);
  });

  it("exits with 0 when the operator cancels", async () => {
    const fake = new FakeAzureTenant();
    const h = harness(fake, [false]);

    await onboardCommand({ logDir, pause: false }, h.runtime, h.deps);

    expect(h.runtime.exit).not.toHaveBeenCalled();
    expect(fake.mutations).toEqual([]);
    expect(h.console.log).toContain("Cancelled. Nothing was changed.");
  });

  it("rejects invalid configuration before signing in", async () => {
    const fake = new FakeAzureTenant();
    const h = harness(fake, []);

    await onboardCommand({ logDir, auth: "password" }, h.runtime, h.deps);

    expect(h.runtime.error).toHaveBeenCalledTimes(1);
    expect(String(h.runtime.error.mock.calls[0]?.[0])).toMatch(/^Invalid configuration\n {2}\/credentialMethod: /);
    expect(h.runtime.exit).toHaveBeenCalledWith(1);
    expect(fake.signIns).toBe(0);
    expect(readdirSync(logDir)).toEqual([]);
  });
});
