/**
 * Helpers shared by both pairing engines.
 */

import type {
  BoardPairing,
  PairingDecisionLog,
  PairingResult,
  Player,
  RegistrySnapshot,
  TournamentConfig,
} from "../types/tournament";
import { InvalidTournamentStateError, PairingInfeasibleError, assert } from "./errors";

/** Null ratings sort below every real rating. */
function ratingValue(player: Player): number {
  return player.rating ?? -1;
}

/** Code-unit order; distinct ids never compare equal. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Pairing order: score desc, rating desc when seeding by rating, then id.
 * The index in this order is the player's rank for the round.
 */
export function comparePlayersForPairing(
  a: Player,
  b: Player,
  ratingSeeding: boolean,
): number {
  if (a.score !== b.score) return b.score - a.score;
  if (ratingSeeding) {
    const diff = ratingValue(b) - ratingValue(a);
    if (diff !== 0) return diff;
  }
  return compareIds(a.id, b.id);
}

export function rankPlayers(
  players: readonly Player[],
  config: Pick<TournamentConfig, "ratingSeeding">,
): Player[] {
  return players
    .filter((p) => p.active)
    .sort((a, b) => comparePlayersForPairing(a, b, config.ratingSeeding));
}

export function havePlayedBefore(a: Player, b: Player): boolean {
  return a.history.some((entry) => entry.opponentId === b.id);
}

/**
 * Players who may receive the bye, best candidate first: no previous bye,
 * then lowest score, lowest rating and lowest rank.
 */
export function byeCandidates(ranked: readonly Player[]): Player[] {
  const rank = new Map(ranked.map((p, i) => [p.id, i]));
  return ranked
    .filter((p) => p.byesReceived === 0)
    .sort((a, b) => {
      if (a.score !== b.score) return a.score - b.score;
      const diff = ratingValue(a) - ratingValue(b);
      if (diff !== 0) return diff;
      return (rank.get(b.id) ?? 0) - (rank.get(a.id) ?? 0);
    });
}

/** Checks shared by both engines before any search starts. */
export function checkPairingPreconditions(
  snapshot: RegistrySnapshot,
  config: TournamentConfig,
  roundNumber: number,
): void {
  if (!Number.isInteger(roundNumber) || roundNumber < 1 || roundNumber > config.totalRounds) {
    throw new InvalidTournamentStateError("Round number out of range", {
      round: roundNumber,
      totalRounds: config.totalRounds,
    });
  }
  if (roundNumber !== snapshot.roundsCompleted + 1) {
    throw new InvalidTournamentStateError("Round is not the next round to pair", {
      round: roundNumber,
      roundsCompleted: snapshot.roundsCompleted,
    });
  }
  const active = snapshot.players.filter((p) => p.active).length;
  if (active < 2) {
    throw new PairingInfeasibleError("At least two active players are needed", {
      round: roundNumber,
      players: active,
    });
  }
}

export interface UncolouredPair {
  readonly higher: Player;
  readonly lower: Player;
}

/** Board order: higher top score, then higher score sum, then best rank. */
export function sortBoards(
  pairs: UncolouredPair[],
  rank: ReadonlyMap<string, number>,
): UncolouredPair[] {
  const rankOf = (p: Player) => rank.get(p.id) ?? Number.MAX_SAFE_INTEGER;
  return [...pairs].sort((a, b) => {
    const topA = Math.max(a.higher.score, a.lower.score);
    const topB = Math.max(b.higher.score, b.lower.score);
    if (topA !== topB) return topB - topA;
    const sumA = a.higher.score + a.lower.score;
    const sumB = b.higher.score + b.lower.score;
    if (sumA !== sumB) return sumB - sumA;
    return (
      Math.min(rankOf(a.higher), rankOf(a.lower)) -
      Math.min(rankOf(b.higher), rankOf(b.lower))
    );
  });
}

export function pairingId(round: number, board: number): string {
  return `R${round}.B${board}`;
}

export function buildPairingResult(
  round: number,
  pairings: BoardPairing[],
  byePlayerId: string | null,
  decisionLog?: PairingDecisionLog,
): PairingResult {
  return Object.freeze({
    round,
    pairings: Object.freeze(pairings.map((p) => Object.freeze({ ...p }))),
    byePlayerId,
    pairingIds: Object.freeze(pairings.map((_, i) => pairingId(round, i + 1))),
    ...(decisionLog ? { decisionLog: Object.freeze(decisionLog) } : {}),
  });
}

/**
 * Every active player exactly once, no rematch, a bye only for odd counts.
 * A failure here means an engine bug, never bad input.
 */
export function roundLevelInvariantCheck(
  result: PairingResult,
  ranked: readonly Player[],
): void {
  const byId = new Map(ranked.map((p) => [p.id, p]));
  const used = new Set<string>();
  const ids = result.pairings.flatMap((p) => [p.whiteId, p.blackId]);
  if (result.byePlayerId !== null) ids.push(result.byePlayerId);
  for (const id of ids) {
    assert(byId.has(id), "Pairing contains a player who is not active", {
      round: result.round,
      playerId: id,
    });
    assert(!used.has(id), "Player paired twice", { round: result.round, playerId: id });
    used.add(id);
  }
  assert(used.size === ranked.length, "Round invariant violated: player missing", {
    round: result.round,
    used: used.size,
    players: ranked.length,
  });
  assert(
    (result.byePlayerId !== null) === (ranked.length % 2 === 1),
    "Invalid bye count",
    { round: result.round, players: ranked.length },
  );
  for (const pairing of result.pairings) {
    const white = byId.get(pairing.whiteId);
    const black = byId.get(pairing.blackId);
    assert(
      white && black && !havePlayedBefore(white, black),
      "Rematch in pairing",
      { round: result.round, whiteId: pairing.whiteId, blackId: pairing.blackId },
    );
  }
}
