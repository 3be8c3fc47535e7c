/**
 * Tournament configuration: defaults, validation and freezing.
 */

import { z } from "zod";
import {
  TIEBREAK_KINDS,
  type ByeOpponentPolicy,
  type TiebreakKind,
  type TournamentConfig,
} from "../types/tournament";
import { parseRecord } from "./validation";

export const DEFAULT_TIEBREAK_ORDER: readonly TiebreakKind[] = [
  "buchholzCut1",
  "buchholz",
  "sonnebornBerger",
  "progressive",
  "wins",
];

/** Unplayed rounds count as a virtual opponent with the player's own score. */
export const DEFAULT_BYE_OPPONENT_POLICY: ByeOpponentPolicy = { kind: "ownScore" };

export const byeOpponentPolicySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("exclude") }),
  z.object({ kind: z.literal("ownScore") }),
  z.object({ kind: z.literal("fixed"), score: z.number().min(0) }),
]);

export const tournamentConfigSchema = z
  .object({
    totalRounds: z.number().int().positive(),
    tiebreaks: z.array(z.enum(TIEBREAK_KINDS)).default([...DEFAULT_TIEBREAK_ORDER]),
    colourPolicy: z.enum(["balanceFirst", "alternateFirst"]).default("balanceFirst"),
    initialColour: z.enum(["white", "black"]).default("white"),
    ratingSeeding: z.boolean().default(true),
    byePoints: z
      .number()
      .refine((v) => v === 0 || v === 0.5 || v === 1, "must be 0, 0.5 or 1")
      .default(1),
    byeOpponentPolicy: byeOpponentPolicySchema.default(DEFAULT_BYE_OPPONENT_POLICY),
  })
  .refine((c) => new Set(c.tiebreaks).size === c.tiebreaks.length, {
    message: "tiebreaks must not repeat",
    path: ["tiebreaks"],
  });

export type TournamentConfigInput = z.input<typeof tournamentConfigSchema>;

export function createTournamentConfig(
  input: TournamentConfigInput,
): TournamentConfig {
  const parsed = parseRecord(tournamentConfigSchema, input, "tournament config");
  const config: TournamentConfig = {
    totalRounds: parsed.totalRounds,
    tiebreaks: Object.freeze([...parsed.tiebreaks]),
    colourPolicy: parsed.colourPolicy,
    initialColour: parsed.initialColour,
    ratingSeeding: parsed.ratingSeeding,
    byePoints: parsed.byePoints,
    byeOpponentPolicy: Object.freeze({ ...parsed.byeOpponentPolicy }),
  };
  return Object.freeze(config);
}
