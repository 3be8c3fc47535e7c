import { describe, it, expect } from "vitest";
import type { ByeOpponentPolicy, TiebreakKind } from "../types/tournament";
import { PlayerNotFoundError } from "./errors";
import { PlayerRegistry } from "./playerRegistry";
import { createMatchResult } from "./records";
import { applyResults } from "./resultRecorder";
import { calculateTiebreak, computeTiebreaks, rankStandings, roundTiebreak } from "./tieBreaking";
import { createTournamentConfig } from "./tournamentConfig";
import { buildPairingResult } from "./tournamentUtils";

const config = createTournamentConfig({ totalRounds: 2 });

/**
 * Round 1: A beats C, B beats D (B with black).
 * Round 2: B and A draw, C beats D.
 * Final scores A 1.5, B 1.5, C 1, D 0.
 */
function twoRounds(): PlayerRegistry {
  const registry = new PlayerRegistry();
  registry.register({ id: "A", name: "A", rating: 1800 });
  registry.register({ id: "B", name: "B", rating: 1700 });
  registry.register({ id: "C", name: "C", rating: 1600 });
  registry.register({ id: "D", name: "D", rating: 1500 });
  applyResults(
    registry,
    buildPairingResult(
      1,
      [
        { whiteId: "A", blackId: "C" },
        { whiteId: "D", blackId: "B" },
      ],
      null,
    ),
    [createMatchResult("A", "C", 1), createMatchResult("D", "B", 0)],
    config,
  );
  applyResults(
    registry,
    buildPairingResult(
      2,
      [
        { whiteId: "B", blackId: "A" },
        { whiteId: "C", blackId: "D" },
      ],
      null,
    ),
    [createMatchResult("B", "A", 0.5), createMatchResult("C", "D", 1)],
    config,
  );
  return registry;
}

function tiebreakOf(registry: PlayerRegistry, kind: TiebreakKind, id: string): number {
  const byId = new Map(registry.list().map((p) => [p.id, p]));
  return calculateTiebreak(kind, registry.require(id), byId, { kind: "ownScore" });
}

describe("calculateTiebreak", () => {
  const registry = twoRounds();

  const expectations: Array<[TiebreakKind, number[]]> = [
    ["buchholz", [2.5, 1.5, 1.5, 2.5]],
    ["buchholzCut1", [1.5, 1.5, 1.5, 1.5]],
    ["buchholzMedian1", [0, 0, 0, 0]],
    ["modifiedMedian", [1.5, 1.5, 0, 1]],
    ["sonnebornBerger", [1.75, 0.75, 0, 0]],
    ["progressive", [2.5, 2.5, 1, 0]],
    ["cumulativeOpponents", [3.5, 2.5, 2.5, 3.5]],
    ["wins", [1, 1, 1, 0]],
    ["gamesWon", [1, 1, 1, 0]],
    ["blackGames", [1, 1, 1, 1]],
    ["blackWins", [0, 1, 0, 0]],
    ["directEncounter", [0.5, 0.5, 0, 0]],
    ["averageRatingOfOpponents", [1650, 1650, 1650, 1650]],
  ];

  it.each(expectations)("computes %s", (kind, expected) => {
    expect(["A", "B", "C", "D"].map((id) => tiebreakOf(registry, kind, id))).toEqual(expected);
  });

  it("throws for an opponent missing from the lookup", () => {
    const player = registry.require("A");
    expect(() =>
      calculateTiebreak("buchholz", player, new Map([["A", player]]), { kind: "ownScore" }),
    ).toThrow(PlayerNotFoundError);
  });
});

describe("bye opponent policy", () => {
  function withBye(): PlayerRegistry {
    const registry = new PlayerRegistry();
    registry.register({ id: "A", name: "A", rating: 1800 });
    registry.register({ id: "B", name: "B", rating: 1700 });
    registry.register({ id: "C", name: "C", rating: 1600 });
    applyResults(
      registry,
      buildPairingResult(1, [{ whiteId: "A", blackId: "B" }], "C"),
      [createMatchResult("A", "B", 1)],
      createTournamentConfig({ totalRounds: 3 }),
    );
    return registry;
  }

  const policies: Array<[ByeOpponentPolicy, number]> = [
    [{ kind: "exclude" }, 0],
    [{ kind: "ownScore" }, 1],
    [{ kind: "fixed", score: 0.5 }, 0.5],
  ];

  it.each(policies)("scores a bye under %o", (policy, expected) => {
    const registry = withBye();
    const byId = new Map(registry.list().map((p) => [p.id, p]));
    expect(calculateTiebreak("buchholz", registry.require("C"), byId, policy)).toBe(expected);
  });

  it("counts a full-point bye as a win but not as a game won", () => {
    const registry = withBye();
    const byId = new Map(registry.list().map((p) => [p.id, p]));
    const policy: ByeOpponentPolicy = { kind: "ownScore" };
    expect(calculateTiebreak("wins", registry.require("C"), byId, policy)).toBe(1);
    expect(calculateTiebreak("gamesWon", registry.require("C"), byId, policy)).toBe(0);
    expect(calculateTiebreak("cumulativeOpponents", registry.require("C"), byId, policy)).toBe(0);
  });

  it("weights the virtual opponent by the bye points", () => {
    const registry = withBye();
    const byId = new Map(registry.list().map((p) => [p.id, p]));
    expect(
      calculateTiebreak("sonnebornBerger", registry.require("C"), byId, { kind: "fixed", score: 2 }),
    ).toBe(2);
  });
});

describe("directEncounter", () => {
  /**
   * Round 1: B beats A, C and D draw.
   * Round 2: A beats C with black, D beats B.
   * Final scores D 1.5, A 1, B 1, C 0.5.
   */
  function headToHead(): PlayerRegistry {
    const registry = new PlayerRegistry();
    registry.register({ id: "A", name: "A", rating: 1800 });
    registry.register({ id: "B", name: "B", rating: 1700 });
    registry.register({ id: "C", name: "C", rating: 1600 });
    registry.register({ id: "D", name: "D", rating: 1500 });
    applyResults(
      registry,
      buildPairingResult(
        1,
        [
          { whiteId: "A", blackId: "B" },
          { whiteId: "C", blackId: "D" },
        ],
        null,
      ),
      [createMatchResult("A", "B", 0), createMatchResult("C", "D", 0.5)],
      config,
    );
    applyResults(
      registry,
      buildPairingResult(
        2,
        [
          { whiteId: "C", blackId: "A" },
          { whiteId: "D", blackId: "B" },
        ],
        null,
      ),
      [createMatchResult("C", "A", 0), createMatchResult("D", "B", 1)],
      config,
    );
    return registry;
  }

  it("counts only points taken from players on the same score", () => {
    const registry = headToHead();
    expect(["A", "B", "C", "D"].map((id) => tiebreakOf(registry, "directEncounter", id))).toEqual(
      [0, 1, 0, 0],
    );
    expect(tiebreakOf(registry, "blackWins", "A")).toBe(1);
  });

  it("puts the winner of the game between tied players first", () => {
    const standings = rankStandings(headToHead().snapshot(), {
      tiebreaks: ["directEncounter"],
      byeOpponentPolicy: { kind: "ownScore" },
    });
    expect(standings.map((row) => row.player.id)).toEqual(["D", "B", "A", "C"]);
  });
});

describe("computeTiebreaks", () => {
  it("returns values in the configured order", () => {
    const registry = twoRounds();
    const values = computeTiebreaks(registry.snapshot(), {
      tiebreaks: ["sonnebornBerger", "buchholz"],
      byeOpponentPolicy: { kind: "ownScore" },
    });
    expect(values.get("A")).toEqual([1.75, 2.5]);
    expect(values.get("D")).toEqual([0, 2.5]);
  });
});

describe("rankStandings", () => {
  it("orders by score, then tiebreaks", () => {
    const standings = rankStandings(twoRounds().snapshot(), config);
    expect(standings.map((row) => [row.rank, row.player.id, row.score])).toEqual([
      [1, "A", 1.5],
      [2, "B", 1.5],
      [3, "C", 1],
      [4, "D", 0],
    ]);
    expect(standings[0]?.tiebreaks).toEqual([1.5, 2.5, 1.75, 2.5, 1]);
    expect(Object.isFrozen(standings[0])).toBe(true);
  });

  it("falls back to rating with unrated players last, then id", () => {
    const registry = new PlayerRegistry();
    registry.register({ id: "a", name: "a", rating: 1500 });
    registry.register({ id: "b", name: "b" });
    registry.register({ id: "c", name: "c", rating: 1600 });
    registry.register({ id: "d", name: "d", rating: 1500 });
    const standings = rankStandings(registry.snapshot(), {
      tiebreaks: [],
      byeOpponentPolicy: { kind: "ownScore" },
    });
    expect(standings.map((row) => row.player.id)).toEqual(["c", "a", "d", "b"]);
  });

  it("orders ids by code unit, so equivalent spellings keep one order", () => {
    const decomposed = "e\u0301";
    const composed = "\u00e9";
    for (const ids of [
      [composed, decomposed],
      [decomposed, composed],
    ]) {
      const registry = new PlayerRegistry();
      for (const id of ids) registry.register({ id, name: id });
      const standings = rankStandings(registry.snapshot(), {
        tiebreaks: [],
        byeOpponentPolicy: { kind: "ownScore" },
      });
      expect(standings.map((row) => row.player.id)).toEqual([decomposed, composed]);
    }
  });
});

describe("roundTiebreak", () => {
  it("rounds to four decimal places", () => {
    expect(roundTiebreak(0.1 + 0.2)).toBe(0.3);
    expect(roundTiebreak(1650.333333)).toBe(1650.3333);
    expect(roundTiebreak(2.00004)).toBe(2);
    expect(roundTiebreak(2.00006)).toBe(2.0001);
  });
});
