import { beforeEach, describe, expect, it, vi } from "vitest";

const onboardCommand = vi.hoisted(() => vi.fn());

vi.mock("../../commands/onboard.js", () => ({ onboardCommand }));

import { buildProgram } from "./register.onboard.js";

function runtime() {
  return { log: vi.fn(), error: vi.fn(), exit: vi.fn() };
}

describe("buildProgram", () => {
  beforeEach(() => {
    onboardCommand.mockReset();
  });

  it("passes flags through to the onboarding command", async () => {
    const rt = runtime();
    await buildProgram(rt).parseAsync(["--auth", "browser", "--log-dir", "transcripts", "--no-pause"], { from: "user" });

    expect(onboardCommand).toHaveBeenCalledWith(
      expect.objectContaining({ auth: "browser", logDir: "transcripts", pause: false }),
      rt,
    );
  });

  it("pauses by default", async () => {
    const rt = runtime();
    await buildProgram(rt).parseAsync([], { from: "user" });

    expect(onboardCommand).toHaveBeenCalledWith(expect.objectContaining({ pause: true }), rt);
  });

  it("turns a thrown error into exit code 1", async () => {
    onboardCommand.mockRejectedValue(new Error("logs directory is read-only"));
    const rt = runtime();
    await buildProgram(rt).parseAsync(["--config", "onboarding.json"], { from: "user" });

    expect(rt.error).toHaveBeenCalledWith("logs directory is read-only");
    expect(rt.exit).toHaveBeenCalledWith(1);
  });
});
