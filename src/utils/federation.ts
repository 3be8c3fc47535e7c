/**
 * Federation directory.
 *
 * A directory is an owned table, not a module-level global: create one with
 * createFederationDirectory() at startup, hand it to whatever needs lookups,
 * and call dispose() when the tournament context is torn down. Codes are
 * case-insensitive and may be registered only once.
 */

import {
  DuplicateFederationCodeError,
  InvalidTournamentStateError,
  UnknownFederationCodeError,
} from "./errors";

export interface Federation {
  readonly code: string;
  readonly name: string;
}

export const DEFAULT_FEDERATIONS: readonly Federation[] = [
  { code: "FIDE", name: "International Chess Federation" },
  { code: "USCF", name: "United States Chess Federation" },
  { code: "CFC", name: "Chess Federation of Canada" },
];

export function canonicalFederationCode(code: string): string {
  return code.trim().toUpperCase();
}

export class FederationDirectory {
  private readonly table = new Map<string, Federation>();
  private disposed = false;

  register(code: string, name: string): Federation {
    this.ensureOpen();
    const canonical = canonicalFederationCode(code);
    if (canonical.length === 0) {
      throw new InvalidTournamentStateError("Federation code must not be empty");
    }
    if (this.table.has(canonical)) {
      throw new DuplicateFederationCodeError(canonical);
    }
    const federation: Federation = Object.freeze({ code: canonical, name });
    this.table.set(canonical, federation);
    return federation;
  }

  lookup(code: string): Federation {
    this.ensureOpen();
    const federation = this.table.get(canonicalFederationCode(code));
    if (!federation) throw new UnknownFederationCodeError(code);
    return federation;
  }

  has(code: string): boolean {
    return !this.disposed && this.table.has(canonicalFederationCode(code));
  }

  list(): Federation[] {
    this.ensureOpen();
    return [...this.table.values()];
  }

  dispose(): void {
    this.table.clear();
    this.disposed = true;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  private ensureOpen(): void {
    if (this.disposed) {
      throw new InvalidTournamentStateError(
        "Federation directory has been disposed",
      );
    }
  }
}

export function createFederationDirectory(
  seed: readonly Federation[] = DEFAULT_FEDERATIONS,
): FederationDirectory {
  const directory = new FederationDirectory();
  for (const f of seed) directory.register(f.code, f.name);
  return directory;
}
