import { z } from "zod";
import { parseRecord } from "../utils/validation";
import type { ScoreWeights } from "./metrics";
import { DEFAULT_TIE_THRESHOLD } from "./pairingComparison";

const settingsSchema = z
  .object({
    COMPARE_TOURNAMENTS: z.coerce.number().int().positive().default(20),
    COMPARE_PLAYERS: z.coerce.number().int().min(2).default(12),
    COMPARE_ROUNDS: z.coerce.number().int().positive().default(5),
    COMPARE_SEED: z.coerce.number().int().default(1),
    FIDE_WEIGHT: z.coerce.number().nonnegative().default(0.7),
    QUALITY_WEIGHT: z.coerce.number().nonnegative().default(0.3),
    TIE_THRESHOLD: z.coerce.number().nonnegative().default(DEFAULT_TIE_THRESHOLD),
  })
  .refine((s) => s.COMPARE_ROUNDS < s.COMPARE_PLAYERS, {
    message: "COMPARE_ROUNDS must be lower than COMPARE_PLAYERS",
    path: ["COMPARE_ROUNDS"],
  })
  .refine((s) => s.FIDE_WEIGHT + s.QUALITY_WEIGHT > 0, {
    message: "FIDE_WEIGHT and QUALITY_WEIGHT cannot both be 0",
    path: ["FIDE_WEIGHT"],
  });

export interface ComparisonSettings {
  readonly tournaments: number;
  readonly players: number;
  readonly rounds: number;
  readonly seed: number;
  readonly weights: ScoreWeights;
  readonly tieThreshold: number;
}

/** Read comparison settings from environment variables; unset means default. */
export function loadComparisonSettings(
  env: Record<string, string | undefined> = process.env,
): ComparisonSettings {
  // empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = parseRecord(settingsSchema, present, "comparison settings");
  return Object.freeze({
    tournaments: parsed.COMPARE_TOURNAMENTS,
    players: parsed.COMPARE_PLAYERS,
    rounds: parsed.COMPARE_ROUNDS,
    seed: parsed.COMPARE_SEED,
    weights: Object.freeze({ fide: parsed.FIDE_WEIGHT, quality: parsed.QUALITY_WEIGHT }),
    tieThreshold: parsed.TIE_THRESHOLD,
  });
}
