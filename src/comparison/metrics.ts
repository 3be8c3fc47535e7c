/**
 * Pairing metrics. All functions here are pure and total: any input,
 * however broken, yields a score in [0, 1] rather than an error.
 */

import type {
  PairingResult,
  Player,
  RegistrySnapshot,
  TournamentConfig,
} from "../types/tournament";
import { colourPreference } from "../utils/colourAllocation";
import { havePlayedBefore } from "../utils/tournamentUtils";

export const QUALITY_WEIGHTS = {
  rematch: 0.35,
  scoreGroup: 0.3,
  colour: 0.2,
  ratingGap: 0.15,
} as const;

/** Rating difference at which the rating-gap component reaches zero. */
export const RATING_GAP_SCALE = 400;

export interface ScoreWeights {
  readonly fide: number;
  readonly quality: number;
}

export const DEFAULT_SCORE_WEIGHTS: ScoreWeights = { fide: 0.7, quality: 0.3 };

export const HARD_VIOLATIONS = [
  "unknownPlayer",
  "inactivePlayer",
  "duplicatePlayer",
  "missingPlayer",
  "selfPairing",
  "rematch",
  "unexpectedBye",
  "missingBye",
  "repeatBye",
] as const;

export const SOFT_VIOLATIONS = [
  "colourPreference",
  "absoluteColour",
  "scoreMismatch",
  "byeNotLowest",
] as const;

export type HardViolation = (typeof HARD_VIOLATIONS)[number];
export type SoftViolation = (typeof SOFT_VIOLATIONS)[number];
export type ViolationCode = HardViolation | SoftViolation;
export type ViolationCounts = Partial<Record<ViolationCode, number>>;

export interface PairingEvaluation {
  readonly quality: number;
  readonly fide: number;
  readonly overall: number;
  readonly violations: Readonly<ViolationCounts>;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function count(counts: ViolationCounts, code: ViolationCode): void {
  counts[code] = (counts[code] ?? 0) + 1;
}

interface ResolvedPair {
  white: Player;
  black: Player;
}

function resolvePairs(pairing: PairingResult, byId: ReadonlyMap<string, Player>): ResolvedPair[] {
  const pairs: ResolvedPair[] = [];
  for (const p of pairing.pairings) {
    const white = byId.get(p.whiteId);
    const black = byId.get(p.blackId);
    if (white && black && white.id !== black.id) pairs.push({ white, black });
  }
  return pairs;
}

/**
 * Weighted blend of rematch avoidance, score-group closeness, colour
 * preference satisfaction and rating-gap closeness. A component with
 * nothing to measure scores 1.
 */
export function qualityScore(pairing: PairingResult, snapshot: RegistrySnapshot): number {
  const byId = new Map(snapshot.players.map((p) => [p.id, p]));
  const pairs = resolvePairs(pairing, byId);

  const rematch = mean(pairs.map(({ white, black }) => (havePlayedBefore(white, black) ? 0 : 1)));
  const scoreGap = mean(pairs.map(({ white, black }) => Math.abs(white.score - black.score)));
  const colour = mean(
    pairs.flatMap(({ white, black }) => {
      const satisfied: number[] = [];
      const pw = colourPreference(white).colour;
      const pb = colourPreference(black).colour;
      if (pw !== null) satisfied.push(pw === "white" ? 1 : 0);
      if (pb !== null) satisfied.push(pb === "black" ? 1 : 0);
      return satisfied;
    }),
  );
  const ratingGap = mean(
    pairs.flatMap(({ white, black }) =>
      white.rating !== null && black.rating !== null
        ? [Math.max(0, 1 - Math.abs(white.rating - black.rating) / RATING_GAP_SCALE)]
        : [],
    ),
  );

  return clamp01(
    QUALITY_WEIGHTS.rematch * (rematch ?? 1) +
      QUALITY_WEIGHTS.scoreGroup * (scoreGap === null ? 1 : Math.max(0, 1 - scoreGap)) +
      QUALITY_WEIGHTS.colour * (colour ?? 1) +
      QUALITY_WEIGHTS.ratingGap * (ratingGap ?? 1),
  );
}

function hardViolations(pairing: PairingResult, snapshot: RegistrySnapshot): ViolationCounts {
  const byId = new Map(snapshot.players.map((p) => [p.id, p]));
  const counts: ViolationCounts = {};
  const seen = new Set<string>();

  const visit = (id: string): Player | undefined => {
    const player = byId.get(id);
    if (!player) count(counts, "unknownPlayer");
    else if (!player.active) count(counts, "inactivePlayer");
    if (seen.has(id)) count(counts, "duplicatePlayer");
    seen.add(id);
    return player;
  };

  for (const p of pairing.pairings) {
    if (p.whiteId === p.blackId) {
      count(counts, "selfPairing");
      visit(p.whiteId);
      continue;
    }
    const white = visit(p.whiteId);
    const black = visit(p.blackId);
    if (white && black && havePlayedBefore(white, black)) count(counts, "rematch");
  }

  const active = snapshot.players.filter((p) => p.active);
  if (pairing.byePlayerId !== null) {
    const bye = visit(pairing.byePlayerId);
    if (active.length % 2 === 0) count(counts, "unexpectedBye");
    if (bye && bye.byesReceived > 0) count(counts, "repeatBye");
  } else if (active.length % 2 === 1) {
    count(counts, "missingBye");
  }
  for (const player of active) {
    if (!seen.has(player.id)) count(counts, "missingPlayer");
  }
  return counts;
}

interface SoftResult {
  checks: number;
  counts: ViolationCounts;
}

function softViolations(
  pairing: PairingResult,
  snapshot: RegistrySnapshot,
  config: Pick<TournamentConfig, "colourPolicy">,
): SoftResult {
  const byId = new Map(snapshot.players.map((p) => [p.id, p]));
  const counts: ViolationCounts = {};
  let checks = 0;

  for (const { white, black } of resolvePairs(pairing, byId)) {
    for (const [player, given] of [
      [white, "white"],
      [black, "black"],
    ] as const) {
      const pref = colourPreference(player, config.colourPolicy);
      if (pref.colour === null) continue;
      checks++;
      if (pref.colour !== given) count(counts, "colourPreference");
      if (pref.strength === "absolute") {
        checks++;
        if (pref.colour !== given) count(counts, "absoluteColour");
      }
    }
    checks++;
    if (white.score !== black.score) count(counts, "scoreMismatch");
  }

  const bye = pairing.byePlayerId === null ? undefined : byId.get(pairing.byePlayerId);
  if (bye) {
    const eligible = snapshot.players.filter((p) => p.active && p.byesReceived === 0);
    const lowest = Math.min(...eligible.map((p) => p.score));
    checks++;
    if (bye.score > lowest) count(counts, "byeNotLowest");
  }
  return { checks, counts };
}

function totalCount(counts: ViolationCounts): number {
  return Object.values(counts).reduce((s, v) => s + (v ?? 0), 0);
}

/**
 * 0 when any hard rule is broken, otherwise the fraction of soft checks
 * (colour preferences, absolute colours, same-score pairs, bye to the
 * lowest eligible score) that pass.
 */
export function fideScore(
  pairing: PairingResult,
  snapshot: RegistrySnapshot,
  config: Pick<TournamentConfig, "colourPolicy">,
): number {
  if (totalCount(hardViolations(pairing, snapshot)) > 0) return 0;
  const soft = softViolations(pairing, snapshot, config);
  if (soft.checks === 0) return 1;
  return clamp01((soft.checks - totalCount(soft.counts)) / soft.checks);
}

/** Weighted blend; weights are normalized so they need not sum to 1. */
export function overallScore(
  quality: number,
  fide: number,
  weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS,
): number {
  const total = weights.fide + weights.quality;
  if (!(total > 0)) return clamp01((quality + fide) / 2);
  return clamp01((fide * weights.fide + quality * weights.quality) / total);
}

export function evaluatePairing(
  pairing: PairingResult,
  snapshot: RegistrySnapshot,
  config: Pick<TournamentConfig, "colourPolicy">,
  weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS,
): PairingEvaluation {
  const quality = qualityScore(pairing, snapshot);
  const fide = fideScore(pairing, snapshot, config);
  const hard = hardViolations(pairing, snapshot);
  const violations =
    totalCount(hard) > 0 ? hard : softViolations(pairing, snapshot, config).counts;
  return Object.freeze({
    quality,
    fide,
    overall: overallScore(quality, fide, weights),
    violations: Object.freeze(violations),
  });
}
