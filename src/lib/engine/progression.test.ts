import { describe, expect, it } from "vitest";
import { getDefaultCatalog } from "./catalog";
import {
  increaseIntensity,
  resolveProgressionRule,
  seedProgression,
  upgradeBurpee,
  upgradeKettlebellSwing,
  upgradePullup,
} from "./progression";
import { DEFAULT_PROGRESSION_CONFIG } from "./rules";
import { NOW_ISO } from "./test-utils";
import { createDefaultUserState, type BurpeeStyle, type ProgressionState } from "./types";

const catalog = getDefaultCatalog();
const now = new Date(NOW_ISO);

function burpeeState(reps: number, style: BurpeeStyle, level = 0): ProgressionState {
  return { reps, style: { type: "burpee", style }, level, lastUpgraded: null };
}

describe("upgradeBurpee", () => {
  it("adds a rep below the ceiling", () => {
    expect(upgradeBurpee(burpeeState(3, "four_count", 2), 10, now)).toEqual({
      state: { reps: 4, style: { type: "burpee", style: "four_count" }, level: 3, lastUpgraded: now },
      upgraded: true,
    });
  });

  it("climbs the style ladder at the ceiling and resets reps", () => {
    const first = upgradeBurpee(burpeeState(10, "four_count", 7), 10, now);
    expect(first.state).toEqual({
      reps: 6,
      style: { type: "burpee", style: "six_count" },
      level: 8,
      lastUpgraded: now,
    });

    const second = upgradeBurpee({ ...first.state, reps: 10 }, 10, now);
    expect(second.state.style).toEqual({ type: "burpee", style: "six_count_two_pump" });
    expect(second.state.reps).toBe(5);

    const third = upgradeBurpee({ ...second.state, reps: 10 }, 10, now);
    expect(third.state.style).toEqual({ type: "burpee", style: "seal" });
    expect(third.state.reps).toBe(4);
    expect(third.state.level).toBe(10);
  });

  it("does nothing at seal on the ceiling", () => {
    const state = burpeeState(10, "seal", 12);
    expect(upgradeBurpee(state, 10, now)).toEqual({ state, upgraded: false });
  });

  it("clamps seal reps above the ceiling without levelling up", () => {
    const result = upgradeBurpee(burpeeState(12, "seal", 12), 10, now);
    expect(result.upgraded).toBe(false);
    expect(result.state.reps).toBe(10);
    expect(result.state.level).toBe(12);
    expect(result.state.lastUpgraded).toBeNull();
  });
});

describe("upgradeKettlebellSwing", () => {
  it("derives reps from the base and level", () => {
    const result = upgradeKettlebellSwing({ reps: 7, style: { type: "none" }, level: 2, lastUpgraded: null }, 5, 15, now);
    expect(result.state.reps).toBe(8);
    expect(result.state.level).toBe(3);
  });

  it("caps reps at the maximum", () => {
    const result = upgradeKettlebellSwing({ reps: 14, style: { type: "none" }, level: 12, lastUpgraded: null }, 5, 15, now);
    expect(result.state.reps).toBe(15);
    expect(result.upgraded).toBe(true);
  });

  it("does nothing at the maximum", () => {
    const state: ProgressionState = { reps: 15, style: { type: "none" }, level: 10, lastUpgraded: null };
    expect(upgradeKettlebellSwing(state, 5, 15, now)).toEqual({ state, upgraded: false });
  });
});

describe("upgradePullup", () => {
  it("adds a rep and keeps the band", () => {
    const result = upgradePullup({ reps: 3, style: { type: "band", band: "red" }, level: 0, lastUpgraded: null }, 8, now);
    expect(result.state).toEqual({ reps: 4, style: { type: "band", band: "red" }, level: 1, lastUpgraded: now });
  });

  it("does nothing at the maximum", () => {
    const state: ProgressionState = { reps: 8, style: { type: "band", band: null }, level: 5, lastUpgraded: null };
    expect(upgradePullup(state, 8, now).upgraded).toBe(false);
  });
});

describe("resolveProgressionRule", () => {
  it("maps definitions to their movement's rule", () => {
    expect(resolveProgressionRule(catalog, "emom_burpee_5m")).toBe("burpee");
    expect(resolveProgressionRule(catalog, "emom_kb_swing_5m")).toBe("kettlebell_swing");
    expect(resolveProgressionRule(catalog, "gtg_pullup_band")).toBe("pullup");
    expect(resolveProgressionRule(catalog, "mobility_hip_cars")).toBeNull();
    expect(resolveProgressionRule(catalog, "missing")).toBeNull();
  });
});

describe("increaseIntensity", () => {
  it("seeds a missing burpee entry from the definition defaults before upgrading", () => {
    const result = increaseIntensity(catalog, "emom_burpee_5m", createDefaultUserState(), DEFAULT_PROGRESSION_CONFIG, now);

    expect(result.upgraded).toBe(true);
    expect(result.progression).toEqual({
      reps: 4,
      style: { type: "burpee", style: "four_count" },
      level: 1,
      lastUpgraded: now,
    });
    expect(result.userState.progressions.emom_burpee_5m).toEqual(result.progression);
  });

  it("steps kettlebell swings from the definition's default reps", () => {
    const first = increaseIntensity(catalog, "emom_kb_swing_5m", createDefaultUserState(), DEFAULT_PROGRESSION_CONFIG, now);
    const second = increaseIntensity(catalog, "emom_kb_swing_5m", first.userState, DEFAULT_PROGRESSION_CONFIG, now);

    expect(first.progression?.reps).toBe(6);
    expect(second.progression?.reps).toBe(7);
    expect(second.progression?.level).toBe(2);
  });

  it("respects the configured pull-up maximum", () => {
    const config = { ...DEFAULT_PROGRESSION_CONFIG, pullupMaxReps: 3 };
    const result = increaseIntensity(catalog, "gtg_pullup_band", createDefaultUserState(), config, now);

    expect(result.upgraded).toBe(false);
    expect(result.progression).toEqual({ reps: 3, style: { type: "band", band: "red" }, level: 0, lastUpgraded: null });
  });

  it("leaves mobility drills and unknown ids alone", () => {
    const state = createDefaultUserState();
    for (const id of ["mobility_hip_cars", "missing"]) {
      const result = increaseIntensity(catalog, id, state, DEFAULT_PROGRESSION_CONFIG, now);
      expect(result).toEqual({ userState: state, upgraded: false, progression: null });
      expect(result.userState).toBe(state);
    }
  });

  it("does not mutate the input state", () => {
    const state = createDefaultUserState();
    state.progressions.emom_burpee_5m = burpeeState(10, "four_count", 7);
    const snapshot = JSON.stringify(state);

    const result = increaseIntensity(catalog, "emom_burpee_5m", state, DEFAULT_PROGRESSION_CONFIG, now);

    expect(JSON.stringify(state)).toBe(snapshot);
    expect(result.userState.progressions.emom_burpee_5m.style).toEqual({ type: "burpee", style: "six_count" });
  });
});

describe("seedProgression", () => {
  it("creates a level-0 entry at the defaults", () => {
    const seeded = seedProgression(catalog, "emom_kb_swing_5m", createDefaultUserState());
    expect(seeded.progressions.emom_kb_swing_5m).toEqual({
      reps: 5,
      style: { type: "none" },
      level: 0,
      lastUpgraded: null,
    });
  });

  it("keeps an existing entry", () => {
    const state = createDefaultUserState();
    state.progressions.emom_burpee_5m = burpeeState(8, "six_count", 9);
    expect(seedProgression(catalog, "emom_burpee_5m", state)).toBe(state);
  });

  it("skips definitions without progression", () => {
    const state = createDefaultUserState();
    expect(seedProgression(catalog, "mobility_shoulder_cars", state)).toBe(state);
  });
});
