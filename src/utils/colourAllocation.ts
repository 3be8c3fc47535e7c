import type {
  BoardPairing,
  Colour,
  ColourPolicy,
  Player,
  TournamentConfig,
} from "../types/tournament";

export type PreferenceStrength = "absolute" | "strong" | "mild" | "none";

export interface ColourPreference {
  readonly colour: Colour | null;
  readonly strength: PreferenceStrength;
  /** whites minus blacks over played games */
  readonly difference: number;
}

const STRENGTH_RANK: Record<PreferenceStrength, number> = {
  none: 0,
  mild: 1,
  strong: 2,
  absolute: 3,
};

export function opposite(colour: Colour): Colour {
  return colour === "white" ? "black" : "white";
}

/** Colours of played games only; byes and absences carry no colour. */
export function colourSequence(player: Player): Colour[] {
  const colours: Colour[] = [];
  for (const entry of player.history) {
    if (entry.kind === "game" && entry.colour !== null) colours.push(entry.colour);
  }
  return colours;
}

export function colourDifference(player: Player): number {
  let diff = 0;
  for (const colour of colourSequence(player)) diff += colour === "white" ? 1 : -1;
  return diff;
}

/**
 * Absolute: difference of two or more, or the same colour in the last two
 * games. Strong: difference of one. Mild: balanced, alternate from the last
 * game. With alternateFirst, alternation wins over balancing for players
 * one colour out.
 */
export function colourPreference(
  player: Player,
  policy: ColourPolicy = "balanceFirst",
): ColourPreference {
  const colours = colourSequence(player);
  const difference = colourDifference(player);
  const last = colours[colours.length - 1];
  if (last === undefined) return { colour: null, strength: "none", difference };

  if (difference >= 2) return { colour: "black", strength: "absolute", difference };
  if (difference <= -2) return { colour: "white", strength: "absolute", difference };
  if (colours.length >= 2 && colours[colours.length - 2] === last) {
    return { colour: opposite(last), strength: "absolute", difference };
  }

  const alternate = opposite(last);
  if (difference === 0) return { colour: alternate, strength: "mild", difference };

  const balancing: Colour = difference > 0 ? "black" : "white";
  if (policy === "alternateFirst") {
    return {
      colour: alternate,
      strength: alternate === balancing ? "strong" : "mild",
      difference,
    };
  }
  return { colour: balancing, strength: "strong", difference };
}

/** Both players must have the same colour: they cannot meet without one of them breaking it. */
export function absoluteColourConflict(a: Player, b: Player): boolean {
  const pa = colourPreference(a);
  const pb = colourPreference(b);
  return (
    pa.strength === "absolute" &&
    pb.strength === "absolute" &&
    pa.colour === pb.colour
  );
}

/** Most recent round in which the two players had different colours. */
function lastDifferingColours(a: Player, b: Player): Colour | null {
  const ca = colourSequence(a);
  const cb = colourSequence(b);
  for (let i = Math.min(ca.length, cb.length) - 1; i >= 0; i--) {
    const x = ca[i];
    const y = cb[i];
    if (x !== undefined && y !== undefined && x !== y) return x;
  }
  return null;
}

function give(player: Player, colour: Colour, other: Player): BoardPairing {
  return colour === "white"
    ? { whiteId: player.id, blackId: other.id }
    : { whiteId: other.id, blackId: player.id };
}

/**
 * Decide colours for one board. `higher` must be the higher-ranked player.
 *
 * Order of precedence: both preferences, the stronger preference (wider
 * imbalance between two absolutes), alternation from the last round with
 * differing colours, the higher-ranked player's preference, and finally
 * the initial colour alternating by board.
 */
export function allocateColours(
  higher: Player,
  lower: Player,
  boardIndex: number,
  config: Pick<TournamentConfig, "colourPolicy" | "initialColour">,
): BoardPairing {
  const ph = colourPreference(higher, config.colourPolicy);
  const pl = colourPreference(lower, config.colourPolicy);

  if (ph.colour && pl.colour && ph.colour !== pl.colour) {
    return give(higher, ph.colour, lower);
  }

  const rh = STRENGTH_RANK[ph.strength];
  const rl = STRENGTH_RANK[pl.strength];
  if (ph.colour && rh > rl) return give(higher, ph.colour, lower);
  if (pl.colour && rl > rh) return give(lower, pl.colour, higher);

  if (ph.colour && pl.colour && ph.strength === "absolute") {
    const wh = Math.abs(ph.difference);
    const wl = Math.abs(pl.difference);
    if (wl > wh) return give(lower, pl.colour, higher);
    return give(higher, ph.colour, lower);
  }

  const then = lastDifferingColours(higher, lower);
  if (then) return give(higher, opposite(then), lower);

  if (ph.colour) return give(higher, ph.colour, lower);
  if (pl.colour) return give(lower, pl.colour, higher);

  const first = boardIndex % 2 === 0 ? config.initialColour : opposite(config.initialColour);
  return give(higher, first, lower);
}
