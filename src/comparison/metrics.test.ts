import { describe, it, expect } from "vitest";
import { PlayerRegistry } from "../utils/playerRegistry";
import { createMatchResult } from "../utils/records";
import { applyResults } from "../utils/resultRecorder";
import { createTournamentConfig } from "../utils/tournamentConfig";
import { buildPairingResult } from "../utils/tournamentUtils";
import { evaluatePairing, fideScore, overallScore, qualityScore } from "./metrics";

const config = createTournamentConfig({ totalRounds: 3 });

/** P1..P4 rated 2000, 1900, 1800, 1700. */
function fourPlayers(): PlayerRegistry {
  const registry = new PlayerRegistry();
  for (let i = 1; i <= 4; i++) {
    registry.register({ id: `P${i}`, name: `Player ${i}`, rating: 2100 - i * 100 });
  }
  return registry;
}

/** Round 1 P1-P3 and P4-P2, both drawn. */
function afterDrawnRound(): PlayerRegistry {
  const registry = fourPlayers();
  applyResults(
    registry,
    buildPairingResult(
      1,
      [
        { whiteId: "P1", blackId: "P3" },
        { whiteId: "P4", blackId: "P2" },
      ],
      null,
    ),
    [createMatchResult("P1", "P3", 0.5), createMatchResult("P4", "P2", 0.5)],
    config,
  );
  return registry;
}

describe("pairing metrics", () => {
  it("scores a clean first round", () => {
    const snapshot = fourPlayers().snapshot();
    const pairing = buildPairingResult(
      1,
      [
        { whiteId: "P1", blackId: "P3" },
        { whiteId: "P4", blackId: "P2" },
      ],
      null,
    );
    const evaluation = evaluatePairing(pairing, snapshot, config);
    expect(evaluation.quality).toBeCloseTo(0.925, 10);
    expect(evaluation.fide).toBe(1);
    expect(evaluation.overall).toBeCloseTo(0.9775, 10);
    expect(evaluation.violations).toEqual({});
  });

  it("zeroes the rule score for rematches", () => {
    const snapshot = afterDrawnRound().snapshot();
    const pairing = buildPairingResult(
      2,
      [
        { whiteId: "P3", blackId: "P1" },
        { whiteId: "P2", blackId: "P4" },
      ],
      null,
    );
    const evaluation = evaluatePairing(pairing, snapshot, config);
    expect(evaluation.quality).toBeCloseTo(0.575, 10);
    expect(evaluation.fide).toBe(0);
    expect(evaluation.violations).toEqual({ rematch: 2 });
  });

  it("counts unmet colour preferences", () => {
    const snapshot = afterDrawnRound().snapshot();
    const pairing = buildPairingResult(
      2,
      [
        { whiteId: "P1", blackId: "P4" },
        { whiteId: "P2", blackId: "P3" },
      ],
      null,
    );
    expect(fideScore(pairing, snapshot, config)).toBeCloseTo(4 / 6, 10);
    expect(qualityScore(pairing, snapshot)).toBeCloseTo(0.825, 10);
    expect(evaluatePairing(pairing, snapshot, config).violations).toEqual({
      colourPreference: 2,
    });
  });

  it("reports a missing bye and the player left out", () => {
    const registry = new PlayerRegistry();
    registry.register({ id: "A", name: "A", rating: 1500 });
    registry.register({ id: "B", name: "B", rating: 1500 });
    registry.register({ id: "C", name: "C", rating: 1500 });
    const pairing = buildPairingResult(1, [{ whiteId: "A", blackId: "B" }], null);
    const evaluation = evaluatePairing(pairing, registry.snapshot(), config);
    expect(evaluation.fide).toBe(0);
    expect(evaluation.violations).toEqual({ missingBye: 1, missingPlayer: 1 });
  });

  it("stays in range for pairings naming unknown players", () => {
    const registry = new PlayerRegistry();
    registry.register({ id: "A", name: "A", rating: 1500 });
    registry.register({ id: "B", name: "B", rating: 1500 });
    const pairing = buildPairingResult(1, [{ whiteId: "A", blackId: "Z" }], null);
    const evaluation = evaluatePairing(pairing, registry.snapshot(), config);
    expect(evaluation.quality).toBeCloseTo(1, 10);
    expect(evaluation.fide).toBe(0);
    expect(evaluation.violations).toEqual({ unknownPlayer: 1, missingPlayer: 1 });
  });

  it("flags a bye that skips the lowest score", () => {
    const registry = new PlayerRegistry();
    registry.register({ id: "A", name: "A", rating: 1500 });
    registry.register({ id: "B", name: "B", rating: 1500 });
    registry.register({ id: "C", name: "C", rating: 1500 });
    applyResults(
      registry,
      buildPairingResult(1, [{ whiteId: "A", blackId: "B" }], "C"),
      [createMatchResult("A", "B", 1)],
      config,
    );
    const pairing = buildPairingResult(2, [{ whiteId: "C", blackId: "B" }], "A");
    const evaluation = evaluatePairing(pairing, registry.snapshot(), config);
    expect(evaluation.fide).toBe(0);
    expect(evaluation.violations).toEqual({
      colourPreference: 1,
      scoreMismatch: 1,
      byeNotLowest: 1,
    });
  });
});

describe("overallScore", () => {
  it("weights the rule score above quality by default", () => {
    expect(overallScore(0.5, 1)).toBeCloseTo(0.85, 10);
  });

  it("normalizes weights", () => {
    expect(overallScore(0.5, 1, { fide: 2, quality: 2 })).toBeCloseTo(0.75, 10);
  });

  it("averages when the weights are zero", () => {
    expect(overallScore(0.4, 0.8, { fide: 0, quality: 0 })).toBeCloseTo(0.6, 10);
  });
});
