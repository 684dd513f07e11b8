import { describe, expect, it } from "vitest";
import { formatDuration, summaryLines } from "./helpers.js";

describe("formatDuration", () => {
  it("formats seconds, minutes and hours", () => {
    expect(formatDuration(5000)).toBe("5s");
    expect(formatDuration(125000)).toBe("2m 5s");
    expect(formatDuration(3725000)).toBe("1h 2m 5s");
  });
});

describe("summaryLines", () => {
  it("boxes the run statistics", () => {
    const lines = summaryLines(
      {
        processed: 3,
        packagesWithDocs: 2,
        totalPages: 3,
        failures: [{ packageName: "broken", message: "boom" }],
      },
      65000,
    );

    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe(`╔${"═".repeat(50)}╗`);
    expect(lines[1]).toBe(`║ ${"PROCESSING SUMMARY".padEnd(48)} ║`);
    expect(lines[3]).toBe(`║ ${"Total packages processed: 3".padEnd(48)} ║`);
    expect(lines[6]).toBe(`║ ${"Failed packages: 1".padEnd(48)} ║`);
    expect(lines[7]).toBe(`║ ${"Duration: 1m 5s".padEnd(48)} ║`);
    expect(lines[8]).toBe(`╚${"═".repeat(50)}╝`);
  });
});
