/**
 * Monrad pairing: the reference engine the Swiss engine is compared against.
 *
 * Same ranking, bye to the lowest-ranked eligible player, then the
 * top unpaired player meets the next player down the list they have not
 * played. Backtracks when the tail of the list cannot be completed.
 * No score brackets and no colour constraints on who meets whom; colours
 * come from the shared allocator.
 */

import type { PairingResult, Player, RegistrySnapshot, TournamentConfig } from "../types/tournament";
import { allocateColours } from "./colourAllocation";
import { debugLog } from "./debug";
import { PairingInfeasibleError } from "./errors";
import {
  buildPairingResult,
  checkPairingPreconditions,
  havePlayedBefore,
  rankPlayers,
  roundLevelInvariantCheck,
  sortBoards,
  type UncolouredPair,
} from "./tournamentUtils";

const MAX_BACKTRACK_NODES = 100_000;

export function pairMonradRound(
  snapshot: RegistrySnapshot,
  config: TournamentConfig,
  roundNumber: number,
): PairingResult {
  checkPairingPreconditions(snapshot, config, roundNumber);
  const ranked = rankPlayers(snapshot.players, config);
  const rank = new Map(ranked.map((p, i) => [p.id, i]));

  let bye: Player | null = null;
  if (ranked.length % 2 === 1) {
    bye = [...ranked].reverse().find((p) => p.byesReceived === 0) ?? null;
    if (!bye) {
      throw new PairingInfeasibleError("No player is eligible for the bye", {
        round: roundNumber,
        players: ranked.length,
      });
    }
  }
  const byeId = bye?.id ?? null;
  const pool = ranked.filter((p) => p.id !== byeId);

  let nodes = 0;
  const recurse = (remaining: Player[]): UncolouredPair[] | null => {
    nodes++;
    if (nodes > MAX_BACKTRACK_NODES) {
      throw new PairingInfeasibleError("Monrad search exhausted its node budget", {
        round: roundNumber,
        nodes: MAX_BACKTRACK_NODES,
      });
    }
    const [first, ...rest] = remaining;
    if (!first) return [];
    for (const opponent of rest) {
      if (havePlayedBefore(first, opponent)) continue;
      const sub = recurse(rest.filter((p) => p.id !== opponent.id));
      if (sub) return [{ higher: first, lower: opponent }, ...sub];
    }
    return null;
  };

  const pairs = recurse(pool);
  if (!pairs) {
    throw new PairingInfeasibleError("No pairing avoids a rematch", {
      round: roundNumber,
      players: ranked.length,
    });
  }

  const boards = sortBoards(pairs, rank).map(({ higher, lower }, i) =>
    allocateColours(higher, lower, i, config),
  );
  const result = buildPairingResult(roundNumber, boards, byeId);
  roundLevelInvariantCheck(result, ranked);
  debugLog(`[Round ${roundNumber}] Monrad pairing: ${boards.length} boards, ${nodes} nodes`);
  return result;
}
