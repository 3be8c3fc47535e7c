import { describe, it, expect } from "vitest";
import { InvalidRecordError } from "../utils/errors";
import { loadComparisonSettings } from "./settings";

describe("loadComparisonSettings", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadComparisonSettings({})).toEqual({
      tournaments: 20,
      players: 12,
      rounds: 5,
      seed: 1,
      weights: { fide: 0.7, quality: 0.3 },
      tieThreshold: 0.01,
    });
  });

  it("reads numbers from strings", () => {
    const settings = loadComparisonSettings({
      COMPARE_TOURNAMENTS: "3",
      COMPARE_PLAYERS: "9",
      COMPARE_ROUNDS: "4",
      COMPARE_SEED: "42",
      FIDE_WEIGHT: "1",
      QUALITY_WEIGHT: "0",
      TIE_THRESHOLD: "0.05",
      PATH: "/usr/bin",
    });
    expect(settings).toEqual({
      tournaments: 3,
      players: 9,
      rounds: 4,
      seed: 42,
      weights: { fide: 1, quality: 0 },
      tieThreshold: 0.05,
    });
  });

  it("treats empty values as unset", () => {
    expect(loadComparisonSettings({ COMPARE_PLAYERS: "", COMPARE_SEED: "  " }).players).toBe(12);
  });

  it("rejects malformed values", () => {
    expect(() => loadComparisonSettings({ COMPARE_PLAYERS: "many" })).toThrow(InvalidRecordError);
    expect(() => loadComparisonSettings({ COMPARE_TOURNAMENTS: "0" })).toThrow(
      InvalidRecordError,
    );
  });

  it("needs fewer rounds than players", () => {
    expect(() => loadComparisonSettings({ COMPARE_PLAYERS: "4", COMPARE_ROUNDS: "4" })).toThrow(
      "COMPARE_ROUNDS: COMPARE_ROUNDS must be lower than COMPARE_PLAYERS",
    );
  });

  it("needs a positive weight", () => {
    expect(() => loadComparisonSettings({ FIDE_WEIGHT: "0", QUALITY_WEIGHT: "0" })).toThrow(
      "FIDE_WEIGHT and QUALITY_WEIGHT cannot both be 0",
    );
  });
});
