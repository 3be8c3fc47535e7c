/**
 * Seeded random tournaments for engine comparison runs.
 *
 * Each round both engines pair the same state; the tournament then
 * advances with engine A's pairing and rating-weighted random results.
 * If engine A fails, that tournament stops there.
 */

import type { MatchResult, TournamentConfig } from "../types/tournament";
import { debugLog } from "../utils/debug";
import { PlayerRegistry } from "../utils/playerRegistry";
import { createMatchResult } from "../utils/records";
import { applyResults } from "../utils/resultRecorder";
import { createTournamentConfig, type TournamentConfigInput } from "../utils/tournamentConfig";
import {
  compare,
  dutchEngine,
  monradEngine,
  type CompareOptions,
  type ComparisonResult,
  type PairingEngine,
} from "./pairingComparison";

/**
 * Deterministic RNG (so runs are reproducible)
 */
export function mulberry32(seed: number): () => number {
  return function rng() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const DRAW_RATE = 0.2;
const MIN_RATING = 1200;
const RATING_SPREAD = 1200;

/** Elo expectation for white, split into win / draw / loss. */
export function simulateGame(
  whiteRating: number | null,
  blackRating: number | null,
  rng: () => number,
): 0 | 0.5 | 1 {
  const diff = (blackRating ?? MIN_RATING) - (whiteRating ?? MIN_RATING);
  const expected = 1 / (1 + Math.pow(10, diff / 400));
  const roll = rng();
  if (roll < DRAW_RATE) return 0.5;
  return (roll - DRAW_RATE) / (1 - DRAW_RATE) < expected ? 1 : 0;
}

export interface SimulationOptions {
  tournaments: number;
  players: number;
  rounds: number;
  seed: number;
  engineA?: PairingEngine;
  engineB?: PairingEngine;
  config?: Omit<TournamentConfigInput, "totalRounds">;
  compare?: CompareOptions;
}

export function simulateTournament(
  tournamentId: string,
  options: SimulationOptions,
  rng: () => number,
): ComparisonResult[] {
  const engineA = options.engineA ?? dutchEngine;
  const engineB = options.engineB ?? monradEngine;
  const config: TournamentConfig = createTournamentConfig({
    ...options.config,
    totalRounds: options.rounds,
  });

  const registry = new PlayerRegistry();
  for (let i = 1; i <= options.players; i++) {
    registry.register({
      id: `P${String(i).padStart(2, "0")}`,
      name: `Player ${i}`,
      rating: MIN_RATING + Math.floor(rng() * RATING_SPREAD),
    });
  }

  const results: ComparisonResult[] = [];
  for (let round = 1; round <= options.rounds; round++) {
    const snapshot = registry.snapshot();
    const comparison = compare(
      { tournamentId, snapshot, config, roundNumber: round },
      engineA,
      engineB,
      options.compare,
    );
    results.push(comparison);

    if (comparison.a.status !== "ok") {
      debugLog(`[${tournamentId}] stopped at round ${round}: ${comparison.a.message}`);
      break;
    }
    const pairing = comparison.a.pairing;
    const matchResults: MatchResult[] = pairing.pairings.map((board) =>
      createMatchResult(
        board.whiteId,
        board.blackId,
        simulateGame(
          registry.require(board.whiteId).rating,
          registry.require(board.blackId).rating,
          rng,
        ),
      ),
    );
    applyResults(registry, pairing, matchResults, config);
  }
  return results;
}

export function simulateComparisons(options: SimulationOptions): ComparisonResult[] {
  const results: ComparisonResult[] = [];
  for (let t = 0; t < options.tournaments; t++) {
    const rng = mulberry32(options.seed + t);
    results.push(...simulateTournament(`T${t + 1}`, options, rng));
  }
  return results;
}
