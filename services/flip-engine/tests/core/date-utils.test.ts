import { describe, expect, it } from "vitest";

import { addMonths, parseDate, projectSaleDate, toIsoDate } from "../../src/core/date-utils.js";

describe("date-utils", () => {
  it("parses ISO dates at UTC midnight", () => {
    const date = parseDate("2026-01-18");

    expect(date.zoneName).toBe("UTC");
    expect(toIsoDate(date)).toBe("2026-01-18");
    expect(date.hour).toBe(0);
  });

  it("rejects invalid dates", () => {
    expect(() => parseDate("2026-13-40")).toThrow("Invalid ISO date: 2026-13-40");
  });

  it("adds whole months only", () => {
    expect(toIsoDate(addMonths(parseDate("2026-01-31"), 1))).toBe("2026-02-28");
    expect(() => addMonths(parseDate("2026-01-31"), 1.5)).toThrow("months must be an integer");
  });

  it("projects the sale date, rounding partial months up", () => {
    const start = parseDate("2026-01-18");

    expect(toIsoDate(projectSaleDate(start, 5))).toBe("2026-06-18");
    expect(toIsoDate(projectSaleDate(start, 5.5))).toBe("2026-07-18");
    expect(toIsoDate(projectSaleDate(start, 0))).toBe("2026-01-18");
  });
});
