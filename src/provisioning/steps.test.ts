import { describe, it, expect } from "vitest";
import { addMonths, formatDate } from "./steps.js";

describe("addMonths", () => {
  it("keeps the day of month and time of day", () => {
    expect(addMonths(new Date("2026-10-19T12:00:00.000Z"), 12).toISOString()).toBe("2027-10-19T12:00:00.000Z");
  });

  it("clamps a leap day to the end of February", () => {
    expect(addMonths(new Date("2028-02-29T10:30:00.000Z"), 12).toISOString()).toBe("2029-02-28T10:30:00.000Z");
  });

  it("clamps month ends into shorter months", () => {
    expect(formatDate(addMonths(new Date("2026-01-31T00:00:00.000Z"), 1))).toBe("2026-02-28");
    expect(formatDate(addMonths(new Date("2026-08-31T00:00:00.000Z"), 1))).toBe("2026-09-30");
    expect(formatDate(addMonths(new Date("2027-12-31T23:59:59.000Z"), 2))).toBe("2028-02-29");
  });
});
