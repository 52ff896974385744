import { describe, expect, it } from "vitest";
import { centuryBounds, parseDateRanges } from "./dates";

describe("parseDateRanges", () => {
  it("parses a single year with an unstated end", () => {
    expect(parseDateRanges("(1675)")).toEqual({
      periods: [{ startYear: 1675, endYear: null, periodNotes: null, periodOrder: 0 }],
      earliestYear: 1675,
      latestYear: 1675,
    });
  });

  it("parses an explicit range", () => {
    expect(parseDateRanges("(1864 - 1871)")).toEqual({
      periods: [{ startYear: 1864, endYear: 1871, periodNotes: null, periodOrder: 0 }],
      earliestYear: 1864,
      latestYear: 1871,
    });
  });

  it("accepts en-dashes without spacing", () => {
    const result = parseDateRanges("1812–1815");
    expect(result.periods[0]).toMatchObject({ startYear: 1812, endYear: 1815 });
  });

  it("keeps comma-separated segments in source order", () => {
    const result = parseDateRanges("(1775, 1811 - 1814, 1898 - 1899)");
    expect(result.periods).toEqual([
      { startYear: 1775, endYear: null, periodNotes: null, periodOrder: 0 },
      { startYear: 1811, endYear: 1814, periodNotes: null, periodOrder: 1 },
      { startYear: 1898, endYear: 1899, periodNotes: null, periodOrder: 2 },
    ]);
    expect(result.earliestYear).toBe(1775);
    expect(result.latestYear).toBe(1899);
  });

  it("marks open ranges as having an unknown end", () => {
    const result = parseDateRanges("(1864 - unknown)");
    expect(result.periods).toEqual([
      { startYear: 1864, endYear: null, periodNotes: "End year unknown", periodOrder: 0 },
    ]);
    expect(result.latestYear).toBe(1864);
  });

  it("records both candidates of an ambiguous slash date", () => {
    const result = parseDateRanges("(1845/1854)");
    expect(result.periods).toEqual([
      { startYear: null, endYear: 1854, periodNotes: "Ambiguous: 1845/1854", periodOrder: 0 },
    ]);
    expect(result.earliestYear).toBe(1845);
    expect(result.latestYear).toBe(1854);
  });

  it("reads a range before a trailing slash alternative", () => {
    const result = parseDateRanges("1837 - 1845/1854");
    expect(result.periods).toEqual([
      { startYear: 1837, endYear: 1845, periodNotes: null, periodOrder: 0 },
    ]);
  });

  it("flags circa years as approximate", () => {
    const result = parseDateRanges("ca. 1750, c. 1760, circa 1770");
    expect(result.periods.map((period) => [period.startYear, period.periodNotes])).toEqual([
      [1750, "Approximate date"],
      [1760, "Approximate date"],
      [1770, "Approximate date"],
    ]);
    expect(result.periods.every((period) => period.endYear === null)).toBe(true);
  });

  it("expands century phrases", () => {
    const result = parseDateRanges("18th century");
    expect(result.periods).toEqual([
      { startYear: 1700, endYear: 1799, periodNotes: "18th century", periodOrder: 0 },
    ]);
    expect(result.earliestYear).toBe(1700);
    expect(result.latestYear).toBe(1799);
  });

  it("keeps unparsed segments as note-only periods", () => {
    const result = parseDateRanges("(unknown, 1790)");
    expect(result.periods).toEqual([
      { startYear: null, endYear: null, periodNotes: "Unparsed: unknown", periodOrder: 0 },
      { startYear: 1790, endYear: null, periodNotes: null, periodOrder: 1 },
    ]);
    expect(result.earliestYear).toBe(1790);
    expect(result.latestYear).toBe(1790);
  });

  it("returns null bounds when nothing numeric was found", () => {
    expect(parseDateRanges("(date unknown)")).toEqual({
      periods: [{ startYear: null, endYear: null, periodNotes: "Unparsed: date unknown", periodOrder: 0 }],
      earliestYear: null,
      latestYear: null,
    });
  });

  it("returns no periods for empty input", () => {
    expect(parseDateRanges("")).toEqual({ periods: [], earliestYear: null, latestYear: null });
    expect(parseDateRanges("( )")).toEqual({ periods: [], earliestYear: null, latestYear: null });
  });

  it("numbers periods contiguously when segments are empty", () => {
    const result = parseDateRanges("1700, , 1750");
    expect(result.periods.map((period) => period.periodOrder)).toEqual([0, 1]);
  });

  it("is idempotent", () => {
    const input = "(1775, 1811 - 1814, 18th century, ca. 1750)";
    expect(parseDateRanges(input)).toEqual(parseDateRanges(input));
  });
});

describe("centuryBounds", () => {
  it("covers the hundred years of the century", () => {
    expect(centuryBounds(17)).toEqual({ start: 1600, end: 1699 });
  });
});
