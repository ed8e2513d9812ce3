/**
 * @file Specs: status formatting
 */
import { formatUtilization, statusLine, usageBar } from "./format";

const stats = { capacity: 8, available: 6, leased: 2, timeoutMs: 3000, poisoned: false };

describe("cli/ui/format", () => {
  it("formats utilization", () => {
    expect(formatUtilization(stats)).toBe("25.0%");
    expect(formatUtilization({ ...stats, capacity: 3, leased: 1 })).toBe("33.3%");
  });
  it("draws a usage bar", () => {
    expect(usageBar(stats, 8)).toBe("[##------]");
    expect(usageBar({ ...stats, leased: 8, available: 0 }, 4)).toBe("[####]");
  });
  it("summarizes in one line", () => {
    expect(statusLine(stats)).toBe("2/8 leased, 6 available (25.0%)");
    expect(statusLine({ ...stats, poisoned: true })).toBe("2/8 leased, 6 available (25.0%), last known before poisoning");
  });
});
