import { describe, expect, it } from "vitest";
import { extractNationalities, flagWindow, lookupFlag } from "./nationality";

describe("extractNationalities", () => {
  it("preserves first-seen order and drops duplicates", () => {
    const html =
      '<img src="britishflag.gif"> <img src="usaflag.gif"> <img src="britishflag.gif">';
    expect(extractNationalities(html)).toEqual(["Great Britain", "United States"]);
  });

  it("distinguishes variant digits and ignores case", () => {
    const html = '<IMG SRC="images/USAFLAG1.GIF"><img src="/flags/frenchflag.png">';
    expect(extractNationalities(html)).toEqual([
      "United States (Colonial/Revolutionary)",
      "France",
    ]);
  });

  it("ignores images outside the vocabulary", () => {
    const html = '<img src="pirateflag.gif"><img src="spacer.gif"><img src="dutchflag.gif">';
    expect(extractNationalities(html)).toEqual(["Netherlands"]);
  });

  it("returns an empty list without flags", () => {
    expect(extractNationalities("")).toEqual([]);
    expect(extractNationalities("<p>No flags here.</p>")).toEqual([]);
  });
});

describe("lookupFlag", () => {
  it("resolves tokens case-insensitively", () => {
    expect(lookupFlag("SpanishFlag")).toBe("Spain");
    expect(lookupFlag("klingonflag")).toBeUndefined();
  });

  it("ignores inherited object keys", () => {
    expect(lookupFlag("constructor")).toBeUndefined();
    expect(lookupFlag("toString")).toBeUndefined();
  });
});

describe("flagWindow", () => {
  it("returns the markup around the first occurrence", () => {
    const html = `${"x".repeat(150)}Fort Test${"y".repeat(150)}`;
    const window = flagWindow(html, "Fort Test", 10);
    expect(window).toBe(`${"x".repeat(10)}Fort Test${"y".repeat(1)}`);
  });

  it("returns an empty string when the name is absent", () => {
    expect(flagWindow("<p>Fort Other</p>", "Fort Test")).toBe("");
  });
});
