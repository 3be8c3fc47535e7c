/**
 * Tiebreak calculation and final standings.
 *
 * Opponent-based criteria read every opponent's current score. Rounds
 * without an opponent (byes, absences) enter them through the configured
 * ByeOpponentPolicy.
 *
 * Criteria:
 * - buchholz: sum of opponent scores
 * - buchholzCut1: buchholz minus the lowest value
 * - buchholzMedian1: buchholz minus the highest and the lowest
 * - modifiedMedian: USCF median; above 50% drop the lowest, below drop the
 *   highest, at exactly 50% drop both
 * - sonnebornBerger: opponent scores weighted by the points taken from them
 * - progressive: sum of the running score after each round
 * - cumulativeOpponents: sum of the opponents' progressive scores
 * - wins: rounds scored as a win, byes included
 * - gamesWon: games won over the board
 * - blackGames: games played with black
 * - blackWins: games won with black
 * - directEncounter: points taken from players on the same score
 * - averageRatingOfOpponents: mean rating of rated opponents
 */

import type {
  ByeOpponentPolicy,
  Player,
  RegistrySnapshot,
  TiebreakKind,
  TournamentConfig,
} from "../types/tournament";
import { PlayerNotFoundError } from "./errors";
import { compareIds } from "./tournamentUtils";

/** Decimal places tiebreak values are rounded to before they are compared. */
const TIEBREAK_PRECISION = 4;

export function roundTiebreak(value: number): number {
  const factor = 10 ** TIEBREAK_PRECISION;
  return Math.round(value * factor) / factor;
}

export interface StandingRow {
  readonly rank: number;
  readonly player: Player;
  readonly score: number;
  readonly tiebreaks: readonly number[];
}

interface OpponentValue {
  value: number;
  points: number;
}

function virtualOpponentScore(player: Player, policy: ByeOpponentPolicy): number | null {
  switch (policy.kind) {
    case "exclude":
      return null;
    case "ownScore":
      return player.score;
    case "fixed":
      return policy.score;
  }
}

function opponentValues(
  player: Player,
  byId: ReadonlyMap<string, Player>,
  policy: ByeOpponentPolicy,
): OpponentValue[] {
  const values: OpponentValue[] = [];
  for (const entry of player.history) {
    if (entry.opponentId !== null) {
      const opponent = byId.get(entry.opponentId);
      if (!opponent) throw new PlayerNotFoundError(entry.opponentId);
      values.push({ value: opponent.score, points: entry.points });
      continue;
    }
    const virtual = virtualOpponentScore(player, policy);
    if (virtual !== null) values.push({ value: virtual, points: entry.points });
  }
  return values;
}

function sum(values: number[]): number {
  return values.reduce((total, v) => total + v, 0);
}

function sortedAscending(values: OpponentValue[]): number[] {
  return values.map((v) => v.value).sort((a, b) => a - b);
}

function modifiedMedian(player: Player, values: OpponentValue[]): number {
  const sorted = sortedAscending(values);
  if (sorted.length <= 1) return sum(sorted);

  const games = player.history.filter((e) => e.kind === "game");
  if (games.length === 0) return sum(sorted);
  const percentage = sum(games.map((e) => e.points)) / games.length;

  if (percentage > 0.5) return sum(sorted.slice(1));
  if (percentage < 0.5) return sum(sorted.slice(0, -1));
  return sum(sorted.slice(1, -1));
}

function progressiveScore(player: Player): number {
  let running = 0;
  let total = 0;
  for (const entry of player.history) {
    running += entry.points;
    total += running;
  }
  return total;
}

function cumulativeOpponents(player: Player, byId: ReadonlyMap<string, Player>): number {
  let total = 0;
  for (const entry of player.history) {
    if (entry.opponentId === null) continue;
    const opponent = byId.get(entry.opponentId);
    if (!opponent) throw new PlayerNotFoundError(entry.opponentId);
    total += progressiveScore(opponent);
  }
  return total;
}

function directEncounter(player: Player, byId: ReadonlyMap<string, Player>): number {
  let total = 0;
  for (const entry of player.history) {
    if (entry.opponentId === null) continue;
    const opponent = byId.get(entry.opponentId);
    if (!opponent) throw new PlayerNotFoundError(entry.opponentId);
    if (opponent.score === player.score) total += entry.points;
  }
  return total;
}

function averageRatingOfOpponents(
  player: Player,
  byId: ReadonlyMap<string, Player>,
): number {
  const ratings: number[] = [];
  for (const entry of player.history) {
    if (entry.opponentId === null) continue;
    const rating = byId.get(entry.opponentId)?.rating;
    if (rating !== null && rating !== undefined) ratings.push(rating);
  }
  return ratings.length > 0 ? sum(ratings) / ratings.length : 0;
}

export function calculateTiebreak(
  kind: TiebreakKind,
  player: Player,
  byId: ReadonlyMap<string, Player>,
  policy: ByeOpponentPolicy,
): number {
  const values = opponentValues(player, byId, policy);
  switch (kind) {
    case "buchholz":
      return sum(values.map((v) => v.value));
    case "buchholzCut1":
      return sum(sortedAscending(values).slice(1));
    case "buchholzMedian1":
      return sum(sortedAscending(values).slice(1, -1));
    case "modifiedMedian":
      return modifiedMedian(player, values);
    case "sonnebornBerger":
      return sum(values.map((v) => v.value * v.points));
    case "progressive":
      return progressiveScore(player);
    case "cumulativeOpponents":
      return cumulativeOpponents(player, byId);
    case "wins":
      return player.history.filter((e) => e.points === 1).length;
    case "gamesWon":
      return player.history.filter((e) => e.kind === "game" && e.points === 1).length;
    case "blackGames":
      return player.history.filter((e) => e.kind === "game" && e.colour === "black").length;
    case "blackWins":
      return player.history.filter(
        (e) => e.kind === "game" && e.colour === "black" && e.points === 1,
      ).length;
    case "directEncounter":
      return directEncounter(player, byId);
    case "averageRatingOfOpponents":
      return averageRatingOfOpponents(player, byId);
  }
}

/** Tiebreak values per player id, in `config.tiebreaks` order. */
export function computeTiebreaks(
  snapshot: RegistrySnapshot,
  config: Pick<TournamentConfig, "tiebreaks" | "byeOpponentPolicy">,
): Map<string, number[]> {
  const byId = new Map(snapshot.players.map((p) => [p.id, p]));
  const result = new Map<string, number[]>();
  for (const player of snapshot.players) {
    result.set(
      player.id,
      config.tiebreaks.map((kind) =>
        calculateTiebreak(kind, player, byId, config.byeOpponentPolicy),
      ),
    );
  }
  return result;
}

/**
 * Final standings in a strict total order:
 * 1. Score (descending)
 * 2. Each configured tiebreak in turn (descending, rounded to four places)
 * 3. Rating (descending, unrated last)
 * 4. Player id (ascending)
 */
export function rankStandings(
  snapshot: RegistrySnapshot,
  config: Pick<TournamentConfig, "tiebreaks" | "byeOpponentPolicy">,
): StandingRow[] {
  const tiebreaks = computeTiebreaks(snapshot, config);
  const rows = snapshot.players.map((player) => ({
    player,
    score: player.score,
    tiebreaks: (tiebreaks.get(player.id) ?? []).map(roundTiebreak),
  }));

  rows.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;

    for (let i = 0; i < Math.max(a.tiebreaks.length, b.tiebreaks.length); i++) {
      const diff = (b.tiebreaks[i] ?? 0) - (a.tiebreaks[i] ?? 0);
      if (diff !== 0) return diff;
    }

    const ra = a.player.rating ?? -1;
    const rb = b.player.rating ?? -1;
    if (ra !== rb) return rb - ra;

    return compareIds(a.player.id, b.player.id);
  });

  return rows.map((row, i) =>
    Object.freeze({ rank: i + 1, ...row, tiebreaks: Object.freeze(row.tiebreaks) }),
  );
}
