/**
 * Onboarding Logging Tests
 */

import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi } from "vitest";
import {
  ConsoleTransport,
  FileTransport,
  OnboardingLoggerImpl,
  createConsoleFormatter,
  createOnboardingLogger,
  createTranscriptFormatter,
  shouldLog,
  transcriptFileName,
  type LogEntry,
} from "./logger.js";

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: new Date("2026-03-04T05:06:07.000Z"),
    level: "info",
    subsystem: "onboarding",
    message: "hello",
    tone: "plain",
    ...overrides,
  };
}

function sink() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("shouldLog", () => {
  it("compares against the minimum level", () => {
    expect(shouldLog("error", "info")).toBe(true);
    expect(shouldLog("info", "info")).toBe(true);
    expect(shouldLog("trace", "info")).toBe(false);
    expect(shouldLog("trace", "trace")).toBe(true);
  });
});

describe("formatters", () => {
  it("transcript lines carry timestamp, level and subsystem", () => {
    const format = createTranscriptFormatter();
    expect(format(entry({ level: "warn", message: "careful" }))).toBe(
      "2026-03-04T05:06:07.000Z WARN  [onboarding] careful",
    );
    expect(format(entry({ metadata: { subscriptionId: "sub-1" } }))).toBe(
      '2026-03-04T05:06:07.000Z INFO  [onboarding] hello {"subscriptionId":"sub-1"}',
    );
  });

  it("console output is the bare message without colours", () => {
    const format = createConsoleFormatter({ colors: false });
    expect(format(entry({ tone: "success", message: "done" }))).toBe("done");
  });

  it("colours errors over tones", () => {
    const format = createConsoleFormatter({ colors: true });
    expect(format(entry({ level: "error", tone: "success", message: "bad" }))).toBe("\x1b[31mbad\x1b[0m");
    expect(format(entry({ tone: "success", message: "ok" }))).toBe("\x1b[32mok\x1b[0m");
  });
});

describe("ConsoleTransport", () => {
  it("routes by level and drops entries below the threshold", () => {
    const out = sink();
    const transport = new ConsoleTransport({ sink: out, formatter: createConsoleFormatter({ colors: false }) });

    transport.write(entry({ level: "trace", message: "answer: y" }));
    transport.write(entry({ level: "info", message: "info line" }));
    transport.write(entry({ level: "warn", message: "warn line" }));
    transport.write(entry({ level: "error", message: "error line" }));

    expect(out.log).toHaveBeenCalledTimes(1);
    expect(out.log).toHaveBeenCalledWith("info line");
    expect(out.warn).toHaveBeenCalledWith("warn line");
    expect(out.error).toHaveBeenCalledWith("error line");
  });
});

describe("FileTransport", () => {
  it("appends formatted lines and masks registered literals", async () => {
    const dir = mkdtempSync(join(tmpdir(), "onboarding-log-"));
    const filePath = join(dir, "nested", "run.log");
    const transport = new FileTransport({ filePath, bufferSize: 1 });

    transport.write(entry({ message: "first" }));
    transport.mask("test-secret");
    transport.write(entry({ level: "trace", message: "Secret: test-secret" }));
    await transport.close();

    expect(readFileSync(filePath, "utf8")).toBe(
      "2026-03-04T05:06:07.000Z INFO  [onboarding] first\n" +
        "2026-03-04T05:06:07.000Z TRACE [onboarding] Secret: [REDACTED]\n",
    );
  });

  it("masks lines that are still buffered", async () => {
    const dir = mkdtempSync(join(tmpdir(), "onboarding-log-"));
    const filePath = join(dir, "run.log");
    const transport = new FileTransport({ filePath });

    transport.write(entry({ message: "value test-secret" }));
    transport.mask("test-secret");
    await transport.close();

    expect(readFileSync(filePath, "utf8")).toBe("2026-03-04T05:06:07.000Z INFO  [onboarding] value [REDACTED]\n");
  });
});

describe("OnboardingLoggerImpl", () => {
  it("child loggers share transports and extend the subsystem", () => {
    const write = vi.fn();
    const logger = new OnboardingLoggerImpl({
      subsystem: "onboarding",
      transports: [{ name: "memory", write }],
      now: () => new Date("2026-03-04T05:06:07.000Z"),
    });

    logger.child("iam").success("assigned");

    expect(write).toHaveBeenCalledWith({
      timestamp: new Date("2026-03-04T05:06:07.000Z"),
      level: "info",
      subsystem: "onboarding/iam",
      message: "assigned",
      tone: "success",
      metadata: undefined,
    });
  });
});

describe("createOnboardingLogger", () => {
  it("names the transcript after the run start time", () => {
    expect(transcriptFileName(new Date(2026, 0, 2, 3, 4, 5))).toBe("spotto-onboarding-20260102-030405.log");
  });

  it("writes console lines to the transcript and keeps prompts out of the console", async () => {
    const dir = mkdtempSync(join(tmpdir(), "onboarding-log-"));
    const out = sink();
    const { logger, transcriptPath } = createOnboardingLogger({
      logDir: dir,
      colors: false,
      sink: out,
      now: () => new Date(2026, 0, 2, 3, 4, 5),
    });

    logger.info("Signed in");
    logger.trace("? Continue? > yes");
    await logger.close();

    expect(transcriptPath).toBe(join(dir, "spotto-onboarding-20260102-030405.log"));
    expect(out.log).toHaveBeenCalledTimes(1);
    const lines = readFileSync(transcriptPath, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/INFO  \[onboarding\] Signed in$/);
    expect(lines[1]).toMatch(/TRACE \[onboarding\] \? Continue\? > yes$/);
  });
});
