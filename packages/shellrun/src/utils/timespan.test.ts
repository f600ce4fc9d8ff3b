import { describe, expect, it } from "vitest";
import { formatTimeSpan } from "./timespan.js";

describe("formatTimeSpan", () => {
  it("renders whole seconds without a fraction", () => {
    expect(formatTimeSpan(0)).toBe("00:00:00");
    expect(formatTimeSpan(30_000)).toBe("00:00:30");
    expect(formatTimeSpan(600_000)).toBe("00:10:00");
    expect(formatTimeSpan(3_725_000)).toBe("01:02:05");
  });

  it("adds milliseconds when present", () => {
    expect(formatTimeSpan(5)).toBe("00:00:00.005");
    expect(formatTimeSpan(1_500)).toBe("00:00:01.500");
  });

  it("rounds fractional milliseconds", () => {
    expect(formatTimeSpan(1.6)).toBe("00:00:00.002");
  });

  it("prefixes whole days", () => {
    expect(formatTimeSpan(90_061_000)).toBe("1.01:01:01");
  });

  it("keeps the sign of negative durations", () => {
    expect(formatTimeSpan(-5)).toBe("-00:00:00.005");
  });
});
