/**
 * Runs two pairing engines over the same tournament state and reports
 * where they differ. Each engine gets its own clone of the snapshot, and
 * an engine failure is recorded, never rethrown.
 */

import { performance } from "node:perf_hooks";
import type {
  BoardPairing,
  PairingResult,
  RegistrySnapshot,
  TournamentConfig,
} from "../types/tournament";
import { debugLog } from "../utils/debug";
import { isTournamentEngineError } from "../utils/errors";
import { pairMonradRound } from "../utils/monradPairing";
import { cloneSnapshot } from "../utils/playerRegistry";
import { pairRound } from "../utils/tournamentPairing";
import {
  DEFAULT_SCORE_WEIGHTS,
  evaluatePairing,
  type PairingEvaluation,
  type ScoreWeights,
} from "./metrics";

export interface PairingEngine {
  readonly name: string;
  pair(snapshot: RegistrySnapshot, config: TournamentConfig, round: number): PairingResult;
}

export const dutchEngine: PairingEngine = { name: "dutch", pair: pairRound };
export const monradEngine: PairingEngine = { name: "monrad", pair: pairMonradRound };

export interface TournamentState {
  readonly tournamentId: string;
  readonly snapshot: RegistrySnapshot;
  readonly config: TournamentConfig;
  readonly roundNumber: number;
}

export type EngineOutcome =
  | {
      readonly status: "ok";
      readonly engine: string;
      readonly pairing: PairingResult;
      readonly metrics: PairingEvaluation;
      readonly elapsedMs: number;
    }
  | {
      readonly status: "failed";
      readonly engine: string;
      readonly errorKind: string;
      readonly message: string;
      readonly elapsedMs: number;
    };

export interface ColourDivergence {
  readonly players: readonly [string, string];
  readonly whiteInA: string;
  readonly whiteInB: string;
}

export interface Divergence {
  readonly matchingPairs: number;
  readonly onlyInA: readonly (readonly [string, string])[];
  readonly onlyInB: readonly (readonly [string, string])[];
  readonly colourDivergent: readonly ColourDivergence[];
  readonly byeDivergent: boolean;
}

export type Winner = "a" | "b" | "tie";

export interface ComparisonResult {
  readonly tournamentId: string;
  readonly round: number;
  /** active players in the round */
  readonly players: number;
  readonly a: EngineOutcome;
  readonly b: EngineOutcome;
  /** null when either engine failed */
  readonly divergence: Divergence | null;
  readonly winner: Winner | null;
  /** overall(a) - overall(b), null when either engine failed */
  readonly scoreDifference: number | null;
}

export interface CompareOptions {
  readonly weights?: ScoreWeights;
  readonly tieThreshold?: number;
}

export const DEFAULT_TIE_THRESHOLD = 0.01;

function runEngine(
  engine: PairingEngine,
  state: TournamentState,
  weights: ScoreWeights,
): EngineOutcome {
  const snapshot = cloneSnapshot(state.snapshot);
  const start = performance.now();
  try {
    const pairing = engine.pair(snapshot, state.config, state.roundNumber);
    const elapsedMs = performance.now() - start;
    return {
      status: "ok",
      engine: engine.name,
      pairing,
      metrics: evaluatePairing(pairing, state.snapshot, state.config, weights),
      elapsedMs,
    };
  } catch (error) {
    const elapsedMs = performance.now() - start;
    const errorKind = isTournamentEngineError(error)
      ? error.kind
      : error instanceof Error
        ? error.name
        : "Unknown";
    const message = error instanceof Error ? error.message : String(error);
    debugLog(`[${state.tournamentId} R${state.roundNumber}] ${engine.name} failed: ${message}`);
    return { status: "failed", engine: engine.name, errorKind, message, elapsedMs };
  }
}

function unorderedKey(p: BoardPairing): string {
  return [p.whiteId, p.blackId].sort().join("|");
}

function unorderedPair(p: BoardPairing): readonly [string, string] {
  const [x, y] = [p.whiteId, p.blackId].sort();
  return [x ?? p.whiteId, y ?? p.blackId];
}

/** Symmetric difference of unordered pairs, colours on shared pairs, and the bye. */
export function diffPairings(a: PairingResult, b: PairingResult): Divergence {
  const inB = new Map(b.pairings.map((p) => [unorderedKey(p), p]));
  const inA = new Set(a.pairings.map(unorderedKey));

  let matchingPairs = 0;
  const onlyInA: (readonly [string, string])[] = [];
  const colourDivergent: ColourDivergence[] = [];
  for (const pa of a.pairings) {
    const pb = inB.get(unorderedKey(pa));
    if (!pb) {
      onlyInA.push(unorderedPair(pa));
      continue;
    }
    matchingPairs++;
    if (pa.whiteId !== pb.whiteId) {
      colourDivergent.push({
        players: unorderedPair(pa),
        whiteInA: pa.whiteId,
        whiteInB: pb.whiteId,
      });
    }
  }
  const onlyInB = b.pairings.filter((p) => !inA.has(unorderedKey(p))).map(unorderedPair);

  return Object.freeze({
    matchingPairs,
    onlyInA: Object.freeze(onlyInA),
    onlyInB: Object.freeze(onlyInB),
    colourDivergent: Object.freeze(colourDivergent),
    byeDivergent: a.byePlayerId !== b.byePlayerId,
  });
}

export function divergentPairCount(divergence: Divergence): number {
  return divergence.onlyInA.length + divergence.onlyInB.length;
}

export function compare(
  state: TournamentState,
  engineA: PairingEngine,
  engineB: PairingEngine,
  options: CompareOptions = {},
): ComparisonResult {
  const weights = options.weights ?? DEFAULT_SCORE_WEIGHTS;
  const tieThreshold = options.tieThreshold ?? DEFAULT_TIE_THRESHOLD;
  const a = runEngine(engineA, state, weights);
  const b = runEngine(engineB, state, weights);

  let divergence: Divergence | null = null;
  let winner: Winner | null = null;
  let scoreDifference: number | null = null;
  if (a.status === "ok" && b.status === "ok") {
    divergence = diffPairings(a.pairing, b.pairing);
    scoreDifference = a.metrics.overall - b.metrics.overall;
    if (Math.abs(scoreDifference) <= tieThreshold) winner = "tie";
    else winner = scoreDifference > 0 ? "a" : "b";
  }

  return Object.freeze({
    tournamentId: state.tournamentId,
    round: state.roundNumber,
    players: state.snapshot.players.filter((p) => p.active).length,
    a: Object.freeze(a),
    b: Object.freeze(b),
    divergence,
    winner,
    scoreDifference,
  });
}
