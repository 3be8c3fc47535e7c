/**
 * Player registry: the single mutable source of truth for standings.
 *
 * Player records are frozen; the registry changes by swapping records, and
 * only commitRound/revertRound (called by the result recorder) do that.
 * Readers take a snapshot(), which is deep-frozen and safe to hand to any
 * number of engines.
 */

import type {
  FederationProfile,
  Player,
  RegistrySnapshot,
  RoundData,
} from "../types/tournament";
import {
  InvalidTournamentStateError,
  PlayerNotFoundError,
  assert,
} from "./errors";
import type { FederationDirectory } from "./federation";
import { parsePlayerRecord, type PlayerRecord } from "./records";

export interface NewPlayer {
  id: string;
  name: string;
  rating?: number | null;
  profile?: FederationProfile;
}

export class PlayerRegistry {
  private players = new Map<string, Player>();
  private rounds: RoundData[] = [];

  constructor(private readonly federations?: FederationDirectory) {}

  /** Restore a registry from persisted player records (and optional rounds). */
  static fromRecords(
    records: readonly PlayerRecord[],
    options: { federations?: FederationDirectory; rounds?: readonly RoundData[] } = {},
  ): PlayerRegistry {
    const registry = new PlayerRegistry(options.federations);
    const parsed = records.map((record) => parsePlayerRecord(record));
    const lengths = new Set(parsed.map((p) => p.history.length));
    if (lengths.size > 1) {
      throw new InvalidTournamentStateError(
        "Players have different numbers of completed rounds",
        { lengths: [...lengths].join(",") },
      );
    }
    for (const player of parsed) registry.insert(player);
    registry.checkOpponents();
    registry.rounds = [...(options.rounds ?? [])];
    return registry;
  }

  get roundsCompleted(): number {
    const first = this.players.values().next();
    return first.done ? 0 : first.value.history.length;
  }

  get size(): number {
    return this.players.size;
  }

  register(input: NewPlayer): Player {
    if (this.roundsCompleted > 0) {
      throw new InvalidTournamentStateError(
        "Players cannot be registered after the first round has been recorded",
        { playerId: input.id },
      );
    }
    const player: Player = {
      id: input.id,
      name: input.name,
      rating: input.rating ?? null,
      score: 0,
      history: Object.freeze([]),
      byesReceived: 0,
      active: true,
      ...(input.profile ? { profile: Object.freeze({ ...input.profile }) } : {}),
    };
    this.insert(Object.freeze(player));
    return player;
  }

  get(id: string): Player | undefined {
    return this.players.get(id);
  }

  require(id: string): Player {
    const player = this.players.get(id);
    if (!player) throw new PlayerNotFoundError(id);
    return player;
  }

  list(): Player[] {
    return [...this.players.values()];
  }

  completedRounds(): readonly RoundData[] {
    return [...this.rounds];
  }

  /** Withdrawn players keep their history but are no longer paired. */
  setActive(id: string, active: boolean): Player {
    const current = this.require(id);
    const updated = Object.freeze({ ...current, active });
    this.players.set(id, updated);
    return updated;
  }

  snapshot(): RegistrySnapshot {
    return Object.freeze({
      roundsCompleted: this.roundsCompleted,
      players: Object.freeze(this.list()),
    });
  }

  /**
   * Replace every player record in one step. Used by the result recorder
   * once a round has been fully validated.
   */
  commitRound(round: RoundData, updated: ReadonlyMap<string, Player>): void {
    this.assertCovers(updated);
    for (const player of updated.values()) {
      assert(
        player.history.length === round.round,
        "Committed player history does not end at the committed round",
        { playerId: player.id, round: round.round },
      );
    }
    this.players = new Map([...this.players.keys()].map((id) => [id, this.lookup(updated, id)]));
    this.rounds = [...this.rounds, round];
  }

  /** Counterpart of commitRound used when a round is undone. */
  revertRound(restored: ReadonlyMap<string, Player>): RoundData {
    const last = this.rounds[this.rounds.length - 1];
    if (!last) {
      throw new InvalidTournamentStateError("No completed round to revert");
    }
    this.assertCovers(restored);
    this.players = new Map([...this.players.keys()].map((id) => [id, this.lookup(restored, id)]));
    this.rounds = this.rounds.slice(0, -1);
    return last;
  }

  private lookup(map: ReadonlyMap<string, Player>, id: string): Player {
    const player = map.get(id);
    if (!player) throw new PlayerNotFoundError(id);
    return player;
  }

  private assertCovers(updated: ReadonlyMap<string, Player>): void {
    assert(
      updated.size === this.players.size &&
        [...this.players.keys()].every((id) => updated.has(id)),
      "Round commit must cover every registered player",
      { expected: this.players.size, received: updated.size },
    );
  }

  private insert(player: Player): void {
    if (this.players.has(player.id)) {
      throw new InvalidTournamentStateError(`Duplicate player id: ${player.id}`);
    }
    if (player.profile) {
      if (!this.federations) {
        throw new InvalidTournamentStateError(
          "Player has a federation profile but the registry has no federation directory",
          { playerId: player.id },
        );
      }
      // throws UnknownFederationCodeError
      this.federations.lookup(player.profile.federation);
    }
    this.players.set(player.id, player);
  }

  private checkOpponents(): void {
    for (const player of this.players.values()) {
      for (const entry of player.history) {
        if (entry.opponentId === null) continue;
        const opponent = this.players.get(entry.opponentId);
        const mirror = opponent?.history[entry.round - 1];
        if (!mirror || mirror.opponentId !== player.id || mirror.colour === entry.colour) {
          throw new InvalidTournamentStateError(
            "Player history is not mirrored by the opponent",
            { playerId: player.id, opponentId: entry.opponentId, round: entry.round },
          );
        }
      }
    }
  }
}

/** Deep copy of a snapshot, frozen again; each engine gets its own. */
export function cloneSnapshot(snapshot: RegistrySnapshot): RegistrySnapshot {
  const players = snapshot.players.map((player) =>
    Object.freeze({
      ...player,
      history: Object.freeze(player.history.map((entry) => Object.freeze({ ...entry }))),
      ...(player.profile ? { profile: Object.freeze({ ...player.profile }) } : {}),
    }),
  );
  return Object.freeze({
    roundsCompleted: snapshot.roundsCompleted,
    players: Object.freeze(players),
  });
}
