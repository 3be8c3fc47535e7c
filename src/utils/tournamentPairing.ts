/**
 * Swiss pairing (score brackets with backtracking floats).
 *
 * - Players ranked by score, then rating (when seeding by rating), then id.
 * - Score groups are paired top-down. A bracket is the group plus any
 *   players floated into it; an odd or unpairable bracket floats players
 *   down, lowest-ranked residents first and incoming floaters last.
 * - Within a bracket the top half meets the bottom half; alternatives are
 *   searched before floating more players.
 * - Rematches are never allowed. Two players needing the same absolute
 *   colour are kept apart unless no pairing exists otherwise.
 * - Bye: no previous bye, then lowest score, lowest rating, lowest rank.
 * - Deterministic: identical snapshots always give identical pairings.
 */

import type {
  FloatDecision,
  PairingResult,
  Player,
  RegistrySnapshot,
  TournamentConfig,
} from "../types/tournament";
import { absoluteColourConflict, allocateColours } from "./colourAllocation";
import { debugGroup } from "./debug";
import { PairingInfeasibleError } from "./errors";
import {
  buildPairingResult,
  byeCandidates,
  checkPairingPreconditions,
  havePlayedBefore,
  rankPlayers,
  roundLevelInvariantCheck,
  sortBoards,
  type UncolouredPair,
} from "./tournamentUtils";

/** Upper bound on search steps for one round, across every pass. */
export const MAX_SEARCH_NODES = 200_000;

type ColourMode = "strict" | "relaxed";

class SearchBudget {
  nodes = 0;

  constructor(private readonly round: number) {}

  tick(): void {
    this.nodes++;
    if (this.nodes > MAX_SEARCH_NODES) {
      throw new PairingInfeasibleError("Pairing search exhausted its node budget", {
        round: this.round,
        nodes: MAX_SEARCH_NODES,
      });
    }
  }
}

interface BracketSolution {
  pairs: UncolouredPair[];
  floats: FloatDecision[];
}

export function groupByScore(ranked: readonly Player[]): Player[][] {
  const groups: Player[][] = [];
  let current: Player[] = [];
  for (const player of ranked) {
    const head = current[0];
    if (head && head.score !== player.score) {
      groups.push(current);
      current = [];
    }
    current.push(player);
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

function* combinations<T>(items: readonly T[], k: number, start = 0): Generator<T[]> {
  if (k === 0) {
    yield [];
    return;
  }
  for (let i = start; i <= items.length - k; i++) {
    const head = items[i];
    if (head === undefined) continue;
    for (const tail of combinations(items, k - 1, i + 1)) yield [head, ...tail];
  }
}

class SwissSearch {
  private readonly rank: Map<string, number>;
  private readonly bracketCache = new Map<string, UncolouredPair[] | null>();
  private readonly solveCache = new Map<string, BracketSolution | null>();

  constructor(
    ranked: readonly Player[],
    private readonly mode: ColourMode,
    private readonly budget: SearchBudget,
  ) {
    this.rank = new Map(ranked.map((p, i) => [p.id, i]));
  }

  private rankOf(player: Player): number {
    return this.rank.get(player.id) ?? Number.MAX_SAFE_INTEGER;
  }

  private byRank(players: Player[]): Player[] {
    return [...players].sort((a, b) => this.rankOf(a) - this.rankOf(b));
  }

  compatible(a: Player, b: Player): boolean {
    if (havePlayedBefore(a, b)) return false;
    return this.mode === "relaxed" || !absoluteColourConflict(a, b);
  }

  /**
   * Pair a rank-ordered bracket completely, or return null. The first
   * player tries the top of the bottom half first, then further down, then
   * back up through the top half.
   */
  pairBracket(players: Player[]): UncolouredPair[] | null {
    const key = players.map((p) => p.id).join(",");
    const cached = this.bracketCache.get(key);
    if (cached !== undefined) return cached;
    const pairs = this.searchBracket(players);
    this.bracketCache.set(key, pairs);
    return pairs;
  }

  private searchBracket(players: Player[]): UncolouredPair[] | null {
    this.budget.tick();
    const [first, ...rest] = players;
    if (!first) return [];
    if (players.length % 2 === 1) return null;
    if (players.some((p) => players.every((q) => q === p || !this.compatible(p, q)))) {
      return null;
    }
    const half = Math.floor(players.length / 2);
    const order: number[] = [];
    for (let i = half; i < players.length; i++) order.push(i);
    for (let i = half - 1; i >= 1; i--) order.push(i);

    for (const index of order) {
      const opponent = players[index];
      if (!opponent || !this.compatible(first, opponent)) continue;
      const remaining = rest.filter((p) => p.id !== opponent.id);
      const sub = this.pairBracket(remaining);
      if (sub) return [{ higher: first, lower: opponent }, ...sub];
    }
    return null;
  }

  solve(groups: Player[][], index: number, incoming: Player[]): BracketSolution | null {
    const key = `${index}|${incoming.map((p) => p.id).sort().join(",")}`;
    const cached = this.solveCache.get(key);
    if (cached !== undefined) return cached;
    const solution = this.solveBracket(groups, index, incoming);
    this.solveCache.set(key, solution);
    return solution;
  }

  private solveBracket(
    groups: Player[][],
    index: number,
    incoming: Player[],
  ): BracketSolution | null {
    this.budget.tick();
    const residents = groups[index] ?? [];
    const bracket = this.byRank([...incoming, ...residents]);
    const score = residents[0]?.score ?? incoming[0]?.score ?? 0;

    if (index >= groups.length - 1) {
      const pairs = this.pairBracket(bracket);
      return pairs ? { pairs, floats: [] } : null;
    }

    // float candidates: residents lowest-ranked first, then incoming floaters
    const candidates = [
      ...this.byRank(residents).reverse(),
      ...this.byRank(incoming).reverse(),
    ];
    const parity = bracket.length % 2;

    for (let k = parity; k <= bracket.length; k += 2) {
      for (const floaters of combinations(candidates, k)) {
        this.budget.tick();
        const floating = new Set(floaters.map((p) => p.id));
        const staying = bracket.filter((p) => !floating.has(p.id));
        const pairs = this.pairBracket(staying);
        if (!pairs) continue;
        const below = this.solve(groups, index + 1, floaters);
        if (!below) continue;
        const reason =
          k === parity && parity === 1
            ? `odd bracket at score ${score}`
            : `bracket at score ${score} could not be paired`;
        return {
          pairs: [...pairs, ...below.pairs],
          floats: [
            ...floaters.map((p) => ({ playerId: p.id, fromScore: p.score, reason })),
            ...below.floats,
          ],
        };
      }
    }
    return null;
  }
}

/**
 * Pair one round. Throws PairingInfeasibleError when no rule-compliant
 * pairing exists (no bye candidate, rematches unavoidable, or the search
 * budget is spent).
 */
export function pairRound(
  snapshot: RegistrySnapshot,
  config: TournamentConfig,
  roundNumber: number,
): PairingResult {
  checkPairingPreconditions(snapshot, config, roundNumber);
  const ranked = rankPlayers(snapshot.players, config);
  const rank = new Map(ranked.map((p, i) => [p.id, i]));
  const budget = new SearchBudget(roundNumber);

  const odd = ranked.length % 2 === 1;
  const byeOptions: (Player | null)[] = odd ? byeCandidates(ranked) : [null];
  if (byeOptions.length === 0) {
    throw new PairingInfeasibleError("No player is eligible for the bye", {
      round: roundNumber,
      players: ranked.length,
    });
  }

  const modes: ColourMode[] = ["strict", "relaxed"];
  for (const mode of modes) {
    for (const bye of byeOptions) {
      const search = new SwissSearch(ranked, mode, budget);
      const pool = bye ? ranked.filter((p) => p.id !== bye.id) : ranked;
      const solution = search.solve(groupByScore(pool), 0, []);
      if (!solution) continue;

      const boards = sortBoards(solution.pairs, rank).map(({ higher, lower }, i) =>
        allocateColours(higher, lower, i, config),
      );
      const byeReason = bye
        ? `lowest eligible player (score ${bye.score}, rating ${bye.rating ?? "unrated"})`
        : undefined;
      const result = buildPairingResult(roundNumber, boards, bye?.id ?? null, {
        ...(byeReason ? { byeReason } : {}),
        floats: Object.freeze(solution.floats),
        colourRelaxed: mode === "relaxed",
        searchNodes: budget.nodes,
      });
      roundLevelInvariantCheck(result, ranked);
      logDecisions(result);
      return result;
    }
  }

  throw new PairingInfeasibleError("No pairing avoids a rematch", {
    round: roundNumber,
    players: ranked.length,
  });
}

function logDecisions(result: PairingResult): void {
  const log = result.decisionLog;
  if (!log) return;
  const lines: string[] = [];
  if (result.byePlayerId) lines.push(`Bye: ${result.byePlayerId} (${log.byeReason ?? ""})`);
  if (log.floats.length > 0) {
    lines.push("Floats:");
    for (const f of log.floats) lines.push(`  ${f.playerId} from ${f.fromScore}: ${f.reason}`);
  }
  if (log.colourRelaxed) lines.push("Absolute colour constraints relaxed");
  lines.push(`Search nodes: ${log.searchNodes}`);
  debugGroup(`[Round ${result.round}] Pairing Decisions`, lines);
}
