import { describe, expect, it } from "vitest";
import { BURPEE_STYLE_LADDER, CATEGORY_ROTATION, MICRODOSE_CATEGORIES, hoursBetween } from "./rules";
import type { BurpeeStyle } from "./types";

describe("CATEGORY_ROTATION", () => {
  it("cycles through every category and returns to the start", () => {
    let category = MICRODOSE_CATEGORIES[0];
    const visited = [category];
    for (let i = 0; i < MICRODOSE_CATEGORIES.length; i++) {
      category = CATEGORY_ROTATION[category];
      visited.push(category);
    }
    expect(visited).toEqual(["vo2", "gtg", "mobility", "vo2"]);
  });
});

describe("BURPEE_STYLE_LADDER", () => {
  it("climbs from four-count to seal with decreasing reset reps", () => {
    const styles: BurpeeStyle[] = ["four_count"];
    const resets: number[] = [];
    let step = BURPEE_STYLE_LADDER.four_count;
    while (step) {
      styles.push(step.next);
      resets.push(step.resetReps);
      step = BURPEE_STYLE_LADDER[step.next];
    }
    expect(styles).toEqual(["four_count", "six_count", "six_count_two_pump", "seal"]);
    expect(resets).toEqual([6, 5, 4]);
  });
});

describe("hoursBetween", () => {
  it("returns fractional hours", () => {
    expect(hoursBetween(new Date("2026-02-11T09:30:00.000Z"), new Date("2026-02-11T12:00:00.000Z"))).toBe(2.5);
  });
});
