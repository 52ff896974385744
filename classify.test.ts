import { describe, expect, it } from "vitest";
import { classifyFortType } from "./classify";

describe("classifyFortType", () => {
  it("prefers specific types over the generic fort keyword", () => {
    expect(classifyFortType("Fort Blockhouse", "")).toBe("blockhouse");
    expect(classifyFortType("Fort Hill", "A stone redoubt guarded the ford.")).toBe("redoubt");
  });

  it("checks batteries before everything else", () => {
    expect(classifyFortType("Battery Park", "A stockade and barracks stood behind the guns.")).toBe("battery");
  });

  it("does not read campaign as a camp", () => {
    expect(classifyFortType("Fort Lee", "Used during the campaign of 1776.")).toBe("fort");
    expect(classifyFortType("Camp Reed", "A training ground.")).toBe("camp");
  });

  it("recognizes trading posts and magazines", () => {
    expect(classifyFortType("Post Vincennes", "A French fur trading station.")).toBe("trading post");
    expect(classifyFortType("Old Store", "Served as a powder magazine.")).toBe("powder house");
  });

  it("defaults to fort when nothing matches", () => {
    expect(classifyFortType("Kaskaskia", "")).toBe("fort");
    expect(classifyFortType("", "")).toBe("fort");
  });

  it("is case-insensitive", () => {
    expect(classifyFortType("GARRISON HOUSE OF JOHN SMITH", "")).toBe("garrison");
  });
});
