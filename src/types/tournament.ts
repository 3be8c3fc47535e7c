/**
 * Shared tournament types.
 *
 * Every record here is read-only: state changes go through the player
 * registry, which swaps whole records rather than editing them.
 */

export type Colour = "white" | "black";

/** Points a single game can award to one side. */
export type GameScore = 0 | 0.5 | 1;

export type RoundEntryKind = "game" | "bye" | "absent";

export interface RoundEntry {
  readonly round: number;
  readonly kind: RoundEntryKind;
  readonly opponentId: string | null; // null for byes and absences
  readonly colour: Colour | null;
  readonly points: number;
}

/** Optional federation data; pairing and tiebreaks never read it. */
export interface FederationProfile {
  readonly federation: string;
  readonly fideId?: number;
  readonly title?: string;
}

export interface Player {
  readonly id: string;
  readonly name: string;
  readonly rating: number | null;
  readonly score: number;
  readonly history: readonly RoundEntry[];
  readonly byesReceived: number;
  readonly active: boolean; // withdrawn players stay registered but are not paired
  readonly profile?: FederationProfile;
}

export interface MatchResult {
  readonly whiteId: string;
  readonly blackId: string;
  readonly whiteScore: GameScore;
}

export interface BoardPairing {
  readonly whiteId: string;
  readonly blackId: string;
}

export interface FloatDecision {
  readonly playerId: string;
  readonly fromScore: number;
  readonly reason: string;
}

export interface PairingDecisionLog {
  readonly byeReason?: string;
  readonly floats: readonly FloatDecision[];
  readonly colourRelaxed: boolean;
  readonly searchNodes: number;
}

export interface PairingResult {
  readonly round: number;
  readonly pairings: readonly BoardPairing[]; // board order
  readonly byePlayerId: string | null;
  readonly pairingIds: readonly string[]; // parallel to pairings
  readonly decisionLog?: PairingDecisionLog;
}

/** A committed round as kept by the registry. */
export interface RoundData {
  readonly round: number;
  readonly pairing: PairingResult;
  readonly results: readonly MatchResult[];
}

export const TIEBREAK_KINDS = [
  "buchholz",
  "buchholzCut1",
  "buchholzMedian1",
  "modifiedMedian",
  "sonnebornBerger",
  "progressive",
  "cumulativeOpponents",
  "wins",
  "gamesWon",
  "blackGames",
  "blackWins",
  "directEncounter",
  "averageRatingOfOpponents",
] as const;

export type TiebreakKind = (typeof TIEBREAK_KINDS)[number];

/**
 * How rounds without an opponent (byes, absences) enter opponent-based
 * tiebreaks.
 * - exclude: the round is skipped
 * - ownScore: a virtual opponent holding the player's own current score
 * - fixed: a virtual opponent holding `score`
 */
export type ByeOpponentPolicy =
  | { readonly kind: "exclude" }
  | { readonly kind: "ownScore" }
  | { readonly kind: "fixed"; readonly score: number };

export type ColourPolicy = "balanceFirst" | "alternateFirst";

export interface TournamentConfig {
  readonly totalRounds: number;
  readonly tiebreaks: readonly TiebreakKind[];
  readonly colourPolicy: ColourPolicy;
  readonly initialColour: Colour;
  readonly ratingSeeding: boolean;
  readonly byePoints: number;
  readonly byeOpponentPolicy: ByeOpponentPolicy;
}

export interface RegistrySnapshot {
  readonly roundsCompleted: number;
  readonly players: readonly Player[];
}
