import { describe, it, expect } from "vitest";
import { InsufficientSamplesError, PairingInfeasibleError } from "../utils/errors";
import { PlayerRegistry } from "../utils/playerRegistry";
import { createTournamentConfig } from "../utils/tournamentConfig";
import {
  compare,
  dutchEngine,
  monradEngine,
  type ComparisonResult,
  type PairingEngine,
  type TournamentState,
} from "./pairingComparison";
import {
  median,
  requireValue,
  RunningStats,
  sizeCategory,
  summarize,
  summarizeValues,
} from "./statistics";

describe("RunningStats", () => {
  it("summarizes a small sample", () => {
    const summary = summarizeValues([0.8, 0.9, 1.0]);
    expect(summary.count).toBe(3);
    expect(requireValue(summary.mean, "mean")).toBeCloseTo(0.9, 10);
    expect(requireValue(summary.variance, "variance")).toBeCloseTo(0.01, 10);
    expect(requireValue(summary.stddev, "stddev")).toBeCloseTo(0.1, 10);
    expect(summary.min).toEqual({ status: "ok", value: 0.8 });
    expect(summary.max).toEqual({ status: "ok", value: 1.0 });
    const ci = requireValue(summary.ci95, "ci95");
    expect(ci.low).toBeCloseTo(0.78684, 5);
    expect(ci.high).toBeCloseTo(1.01316, 5);
  });

  it("marks statistics that need more samples", () => {
    const empty = summarizeValues([]);
    expect(empty.count).toBe(0);
    expect(empty.mean).toEqual({ status: "insufficientSamples", required: 1, actual: 0 });
    expect(empty.min).toEqual({ status: "insufficientSamples", required: 1, actual: 0 });

    const single = summarizeValues([0.5]);
    expect(single.mean).toEqual({ status: "ok", value: 0.5 });
    expect(single.variance).toEqual({ status: "insufficientSamples", required: 2, actual: 1 });
    expect(single.ci95).toEqual({ status: "insufficientSamples", required: 2, actual: 1 });
  });

  it("throws when a missing value is required", () => {
    const empty = summarizeValues([]);
    expect(() => requireValue(empty.mean, "mean")).toThrow(InsufficientSamplesError);
    expect(() => requireValue(empty.mean, "mean")).toThrow(
      "Not enough samples for mean [required=1 actual=0]",
    );
  });

  it("stays accurate for values with a large offset", () => {
    const stats = new RunningStats();
    for (let i = 0; i < 10_000; i++) stats.push(1_000_000 + (i % 2));
    expect(requireValue(stats.mean(), "mean")).toBeCloseTo(1_000_000.5, 6);
    expect(requireValue(stats.variance(), "variance")).toBeCloseTo((0.25 * 10_000) / 9_999, 6);
  });
});

describe("summarize", () => {
  function state(players = 4): TournamentState {
    const registry = new PlayerRegistry();
    for (let i = 1; i <= players; i++) {
      registry.register({ id: `P${i}`, name: `Player ${i}`, rating: 2100 - i * 100 });
    }
    return {
      tournamentId: "T1",
      snapshot: registry.snapshot(),
      config: createTournamentConfig({ totalRounds: 3 }),
      roundNumber: 1,
    };
  }

  const broken: PairingEngine = {
    name: "broken",
    pair() {
      throw new PairingInfeasibleError("No pairing avoids a rematch");
    },
  };

  function results(): ComparisonResult[] {
    return [
      compare(state(), dutchEngine, monradEngine),
      compare(state(), dutchEngine, dutchEngine),
      compare(state(), broken, dutchEngine),
    ];
  }

  it("counts wins, ties and undecided rounds", () => {
    const summary = summarize(results());
    expect(summary.comparisons).toBe(3);
    expect(summary.wins).toEqual({ a: 0, b: 1, ties: 1, undecided: 1 });
    expect(summary.scoreDifference.count).toBe(2);
    expect(requireValue(summary.scoreDifference.mean, "mean")).toBeCloseTo(-0.005625, 10);
  });

  it("keeps failures out of the score averages", () => {
    const summary = summarize(results());
    expect(summary.a.engine).toBe("dutch");
    expect(summary.a.rounds).toBe(3);
    expect(summary.a.failures).toBe(1);
    expect(summary.a.failureKinds).toEqual({ PairingInfeasible: 1 });
    expect(summary.a.metrics.overall.count).toBe(2);
    expect(summary.a.elapsedMs.count).toBe(3);
    expect(summary.b.engine).toBe("monrad");
    expect(summary.b.failures).toBe(0);
    expect(summary.b.metrics.fide.count).toBe(3);
    expect(summary.b.violations).toEqual({});
  });

  it("summarizes divergence", () => {
    const summary = summarize(results());
    expect(summary.divergence.compared).toBe(2);
    expect(summary.divergence.identicalRounds).toBe(1);
    expect(requireValue(summary.divergence.divergentPairs.mean, "mean")).toBe(2);
    expect(summary.divergence.byeDivergences).toBe(0);
    expect(summary.byRound).toHaveLength(1);
    expect(summary.byRound[0]?.comparisons).toBe(3);
    expect(summary.byRound[0]?.divergentPairs).toEqual({ status: "ok", value: 2 });
  });

  it("handles an empty run", () => {
    const summary = summarize([]);
    expect(summary.comparisons).toBe(0);
    expect(summary.a.metrics.overall.mean.status).toBe("insufficientSamples");
    expect(summary.byRound).toEqual([]);
  });

  it("reports win rates over every comparison", () => {
    const summary = summarize(results());
    expect(summary.rates.a).toEqual({ status: "ok", value: 0 });
    expect(requireValue(summary.rates.b, "rate")).toBeCloseTo(1 / 3, 10);
    expect(requireValue(summary.rates.ties, "rate")).toBeCloseTo(1 / 3, 10);
    expect(requireValue(summary.medianScoreDifference, "median")).toBeCloseTo(-0.005625, 10);
    expect(summarize([]).rates.a).toEqual({ status: "insufficientSamples", required: 1, actual: 0 });
  });

  it("withholds significance and confidence below the sample minimum", () => {
    const summary = summarize(results());
    expect(summary.significance).toEqual({ status: "insufficientSamples", required: 30, actual: 3 });
    expect(summary.confidence).toEqual({ status: "insufficientSamples", required: 30, actual: 3 });
  });

  it("estimates significance and confidence once enough rounds are in", () => {
    // monrad scores higher on this field, so it wins twice as engine A
    const summary = summarize(
      [
        compare(state(), monradEngine, dutchEngine),
        compare(state(), monradEngine, dutchEngine),
        compare(state(), dutchEngine, dutchEngine),
      ],
      { minSignificanceSamples: 3 },
    );
    expect(summary.wins).toEqual({ a: 2, b: 0, ties: 1, undecided: 0 });
    expect(requireValue(summary.significance, "significance")).toBeCloseTo(1 / 3, 10);
    expect(requireValue(summary.confidence, "confidence")).toBeCloseTo(0.5 + 1 / 18, 10);
  });

  it("breaks results down by tournament size", () => {
    const summary = summarize([...results(), compare(state(20), dutchEngine, dutchEngine)]);
    expect(summary.bySize.map((s) => [s.size, s.comparisons])).toEqual([
      ["small", 3],
      ["medium", 1],
    ]);
    expect(summary.bySize[0]?.wins).toEqual({ a: 0, b: 1, ties: 1, undecided: 1 });
    expect(summary.bySize[1]?.wins).toEqual({ a: 0, b: 0, ties: 1, undecided: 0 });
    expect(summary.bySize[1]?.rates.ties).toEqual({ status: "ok", value: 1 });
  });
});

describe("median", () => {
  it("takes the middle value or the mean of the middle two", () => {
    expect(median([3, 1, 2])).toEqual({ status: "ok", value: 2 });
    expect(median([4, 1, 3, 2])).toEqual({ status: "ok", value: 2.5 });
    expect(median([])).toEqual({ status: "insufficientSamples", required: 1, actual: 0 });
  });
});

describe("sizeCategory", () => {
  it("splits at 16 and 32 players", () => {
    expect([8, 16, 17, 32, 33].map(sizeCategory)).toEqual([
      "small",
      "small",
      "medium",
      "medium",
      "large",
    ]);
  });
});
