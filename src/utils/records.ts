/**
 * Serializable forms of the engine's records.
 *
 * The persistence layer decides how these are stored; this module only fixes
 * their shape and validates anything coming back in.
 */

import { z } from "zod";
import type {
  GameScore,
  MatchResult,
  PairingResult,
  Player,
  RoundEntry,
  TournamentConfig,
} from "../types/tournament";
import { InvalidRecordError } from "./errors";
import { createTournamentConfig, tournamentConfigSchema } from "./tournamentConfig";
import { parseRecord } from "./validation";

const gameScoreSchema = z.union([z.literal(0), z.literal(0.5), z.literal(1)]);
const colourSchema = z.enum(["white", "black"]);

export const matchResultSchema = z
  .object({
    whiteId: z.string().min(1),
    blackId: z.string().min(1),
    whiteScore: gameScoreSchema,
  })
  .strict()
  .refine((r) => r.whiteId !== r.blackId, "a player cannot play themselves");

export const roundEntrySchema = z.object({
  round: z.number().int().positive(),
  kind: z.enum(["game", "bye", "absent"]),
  opponentId: z.string().min(1).nullable(),
  colour: colourSchema.nullable(),
  points: z.number().min(0).max(1),
});

export const playerRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  rating: z.number().int().nonnegative().nullable(),
  score: z.number().min(0),
  history: z.array(roundEntrySchema),
  byesReceived: z.number().int().nonnegative(),
  active: z.boolean().default(true),
  profile: z
    .object({
      federation: z.string().min(1),
      fideId: z.number().int().positive().optional(),
      title: z.string().min(1).optional(),
    })
    .optional(),
});

export const pairingResultSchema = z.object({
  round: z.number().int().positive(),
  pairings: z.array(
    z.object({ whiteId: z.string().min(1), blackId: z.string().min(1) }),
  ),
  byePlayerId: z.string().min(1).nullable(),
  pairingIds: z.array(z.string().min(1)),
});

export type MatchResultRecord = z.input<typeof matchResultSchema>;
export type PlayerRecord = z.input<typeof playerRecordSchema>;
export type PairingResultRecord = z.input<typeof pairingResultSchema>;
export type TournamentConfigRecord = z.input<typeof tournamentConfigSchema>;

// ---------------------------------------------------------------------------
// MatchResult
// ---------------------------------------------------------------------------

export function createMatchResult(
  whiteId: string,
  blackId: string,
  whiteScore: number,
): MatchResult {
  return parseMatchResult({ whiteId, blackId, whiteScore });
}

/** Black's score is always derived from white's, never stored. */
export function blackScore(result: MatchResult): GameScore {
  if (result.whiteScore === 1) return 0;
  if (result.whiteScore === 0) return 1;
  return 0.5;
}

export function matchResultToRecord(result: MatchResult): MatchResultRecord {
  return {
    whiteId: result.whiteId,
    blackId: result.blackId,
    whiteScore: result.whiteScore,
  };
}

export function parseMatchResult(data: unknown): MatchResult {
  const parsed = parseRecord(matchResultSchema, data, "match result");
  return Object.freeze({
    whiteId: parsed.whiteId,
    blackId: parsed.blackId,
    whiteScore: parsed.whiteScore,
  });
}

// ---------------------------------------------------------------------------
// Player
// ---------------------------------------------------------------------------

export function playerToRecord(player: Player): PlayerRecord {
  return {
    id: player.id,
    name: player.name,
    rating: player.rating,
    score: player.score,
    history: player.history.map((entry) => ({ ...entry })),
    byesReceived: player.byesReceived,
    active: player.active,
    ...(player.profile ? { profile: { ...player.profile } } : {}),
  };
}

function checkHistory(id: string, history: readonly RoundEntry[]): string[] {
  const issues: string[] = [];
  history.forEach((entry, index) => {
    if (entry.round !== index + 1) {
      issues.push(`${id}: history entry ${index} is for round ${entry.round}`);
    }
    if (entry.kind === "game") {
      if (entry.opponentId === null || entry.colour === null) {
        issues.push(`${id}: round ${entry.round} game has no opponent or colour`);
      }
      if (entry.points !== 0 && entry.points !== 0.5 && entry.points !== 1) {
        issues.push(`${id}: round ${entry.round} has invalid points ${entry.points}`);
      }
    } else if (entry.opponentId !== null || entry.colour !== null) {
      issues.push(`${id}: round ${entry.round} ${entry.kind} has an opponent`);
    }
  });
  return issues;
}

/**
 * Rebuild a Player from its record. Derived fields must agree with the
 * history: score with the point sum, byesReceived with the bye count.
 */
export function parsePlayerRecord(data: unknown): Player {
  const parsed = parseRecord(playerRecordSchema, data, "player record");
  const history: RoundEntry[] = parsed.history.map((entry) =>
    Object.freeze({ ...entry }),
  );
  const issues = checkHistory(parsed.id, history);

  const pointSum = history.reduce((sum, entry) => sum + entry.points, 0);
  if (pointSum !== parsed.score) {
    issues.push(`${parsed.id}: score ${parsed.score} does not match history ${pointSum}`);
  }
  const byes = history.filter((entry) => entry.kind === "bye").length;
  if (byes !== parsed.byesReceived) {
    issues.push(
      `${parsed.id}: byesReceived ${parsed.byesReceived} does not match history ${byes}`,
    );
  }
  if (issues.length > 0) throw new InvalidRecordError("player record", issues);

  return Object.freeze({
    id: parsed.id,
    name: parsed.name,
    rating: parsed.rating,
    score: parsed.score,
    history: Object.freeze(history),
    byesReceived: parsed.byesReceived,
    active: parsed.active,
    ...(parsed.profile ? { profile: Object.freeze({ ...parsed.profile }) } : {}),
  });
}

// ---------------------------------------------------------------------------
// PairingResult
// ---------------------------------------------------------------------------

export function pairingResultToRecord(result: PairingResult): PairingResultRecord {
  return {
    round: result.round,
    pairings: result.pairings.map((p) => ({ whiteId: p.whiteId, blackId: p.blackId })),
    byePlayerId: result.byePlayerId,
    pairingIds: [...result.pairingIds],
  };
}

/**
 * First id that appears more than once across the boards and the bye, or
 * null. A self-pairing counts as a repeat.
 */
export function repeatedPlayerId(
  pairing: Pick<PairingResult, "pairings" | "byePlayerId">,
): string | null {
  const seen = new Set<string>();
  const ids = pairing.pairings.flatMap((p) => [p.whiteId, p.blackId]);
  if (pairing.byePlayerId !== null) ids.push(pairing.byePlayerId);
  for (const id of ids) {
    if (seen.has(id)) return id;
    seen.add(id);
  }
  return null;
}

export function parsePairingResult(data: unknown): PairingResult {
  const parsed = parseRecord(pairingResultSchema, data, "pairing result");
  if (parsed.pairingIds.length !== parsed.pairings.length) {
    throw new InvalidRecordError("pairing result", [
      `pairingIds has ${parsed.pairingIds.length} entries for ${parsed.pairings.length} pairings`,
    ]);
  }
  const repeated = repeatedPlayerId(parsed);
  if (repeated !== null) {
    throw new InvalidRecordError("pairing result", [`player ${repeated} appears twice`]);
  }
  return Object.freeze({
    round: parsed.round,
    pairings: Object.freeze(parsed.pairings.map((p) => Object.freeze({ ...p }))),
    byePlayerId: parsed.byePlayerId,
    pairingIds: Object.freeze([...parsed.pairingIds]),
  });
}

// ---------------------------------------------------------------------------
// TournamentConfig
// ---------------------------------------------------------------------------

export function tournamentConfigToRecord(config: TournamentConfig): TournamentConfigRecord {
  return {
    totalRounds: config.totalRounds,
    tiebreaks: [...config.tiebreaks],
    colourPolicy: config.colourPolicy,
    initialColour: config.initialColour,
    ratingSeeding: config.ratingSeeding,
    byePoints: config.byePoints,
    byeOpponentPolicy: { ...config.byeOpponentPolicy },
  };
}

export function parseTournamentConfig(data: unknown): TournamentConfig {
  const parsed = parseRecord(tournamentConfigSchema, data, "tournament config");
  return createTournamentConfig(parsed);
}
