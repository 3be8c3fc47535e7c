/**
 * Applies a round's results to the registry.
 *
 * All validation happens before anything is written: a mismatch throws
 * ResultMismatchError and the registry is exactly as it was.
 */

import type {
  MatchResult,
  PairingResult,
  Player,
  RoundData,
  RoundEntry,
  TournamentConfig,
} from "../types/tournament";
import { debugLog } from "./debug";
import { ResultMismatchError } from "./errors";
import type { PlayerRegistry } from "./playerRegistry";
import { blackScore, repeatedPlayerId } from "./records";
import { isGameScore } from "./validation";

function pairKey(whiteId: string, blackId: string): string {
  return `${whiteId}\u0000${blackId}`;
}

function validateResults(
  registry: PlayerRegistry,
  pairing: PairingResult,
  results: readonly MatchResult[],
): void {
  const round = pairing.round;
  if (round !== registry.roundsCompleted + 1) {
    throw new ResultMismatchError("Results are not for the next round", {
      round,
      roundsCompleted: registry.roundsCompleted,
    });
  }

  const repeated = repeatedPlayerId(pairing);
  if (repeated !== null) {
    throw new ResultMismatchError("Pairing places a player more than once", {
      round,
      playerId: repeated,
    });
  }

  const expected = new Set<string>();
  for (const p of pairing.pairings) {
    for (const id of [p.whiteId, p.blackId]) {
      if (!registry.get(id)) {
        throw new ResultMismatchError("Pairing references an unknown player", {
          round,
          playerId: id,
        });
      }
    }
    expected.add(pairKey(p.whiteId, p.blackId));
  }
  if (pairing.byePlayerId !== null && !registry.get(pairing.byePlayerId)) {
    throw new ResultMismatchError("Bye references an unknown player", {
      round,
      playerId: pairing.byePlayerId,
    });
  }

  const seen = new Set<string>();
  for (const result of results) {
    const key = pairKey(result.whiteId, result.blackId);
    if (!expected.has(key)) {
      throw new ResultMismatchError("Result does not match any board", {
        round,
        whiteId: result.whiteId,
        blackId: result.blackId,
      });
    }
    if (seen.has(key)) {
      throw new ResultMismatchError("Board has more than one result", {
        round,
        whiteId: result.whiteId,
        blackId: result.blackId,
      });
    }
    if (!isGameScore(result.whiteScore)) {
      throw new ResultMismatchError("Score must be 0, 0.5 or 1", {
        round,
        whiteId: result.whiteId,
        whiteScore: result.whiteScore,
      });
    }
    seen.add(key);
  }
  if (seen.size !== expected.size) {
    throw new ResultMismatchError("Missing results", {
      round,
      expected: expected.size,
      received: seen.size,
    });
  }
}

function appendEntry(player: Player, entry: RoundEntry): Player {
  return Object.freeze({
    ...player,
    score: player.score + entry.points,
    history: Object.freeze([...player.history, Object.freeze(entry)]),
    byesReceived: player.byesReceived + (entry.kind === "bye" ? 1 : 0),
  });
}

/**
 * Validate and commit one round. Every registered player gets exactly one
 * new history entry: their game, the bye, or an absence (0 points) for
 * anyone left out of the pairing.
 */
export function applyResults(
  registry: PlayerRegistry,
  pairing: PairingResult,
  results: readonly MatchResult[],
  config: Pick<TournamentConfig, "byePoints">,
): PlayerRegistry {
  validateResults(registry, pairing, results);
  const round = pairing.round;
  const entries = new Map<string, RoundEntry>();

  for (const result of results) {
    entries.set(result.whiteId, {
      round,
      kind: "game",
      opponentId: result.blackId,
      colour: "white",
      points: result.whiteScore,
    });
    entries.set(result.blackId, {
      round,
      kind: "game",
      opponentId: result.whiteId,
      colour: "black",
      points: blackScore(result),
    });
  }
  if (pairing.byePlayerId !== null) {
    entries.set(pairing.byePlayerId, {
      round,
      kind: "bye",
      opponentId: null,
      colour: null,
      points: config.byePoints,
    });
  }

  const updated = new Map<string, Player>();
  for (const player of registry.list()) {
    const entry: RoundEntry = entries.get(player.id) ?? {
      round,
      kind: "absent",
      opponentId: null,
      colour: null,
      points: 0,
    };
    updated.set(player.id, appendEntry(player, entry));
  }

  const roundData: RoundData = Object.freeze({
    round,
    pairing,
    results: Object.freeze(results.map((r) => Object.freeze({ ...r }))),
  });
  registry.commitRound(roundData, updated);
  debugLog(`[Round ${round}] recorded ${results.length} results`);
  return registry;
}

/** Remove the last committed round from every player at once. */
export function undoLastRound(registry: PlayerRegistry): RoundData {
  const restored = new Map<string, Player>();
  for (const player of registry.list()) {
    const last = player.history[player.history.length - 1];
    if (!last) {
      // revertRound reports the missing round
      restored.set(player.id, player);
      continue;
    }
    restored.set(
      player.id,
      Object.freeze({
        ...player,
        score: player.score - last.points,
        history: Object.freeze(player.history.slice(0, -1)),
        byesReceived: player.byesReceived - (last.kind === "bye" ? 1 : 0),
      }),
    );
  }
  const removed = registry.revertRound(restored);
  debugLog(`[Round ${removed.round}] undone`);
  return removed;
}
