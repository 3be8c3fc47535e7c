/**
 * Error taxonomy for the pairing engine.
 *
 * Every error carries a `kind` so callers (and the comparison layer) can
 * branch on it without instanceof checks across module boundaries.
 */

export type TournamentErrorKind =
  | "PairingInfeasible"
  | "ResultMismatch"
  | "UnknownFederationCode"
  | "DuplicateFederationCode"
  | "InsufficientSamples"
  | "InvalidRecord"
  | "PlayerNotFound"
  | "InvalidTournamentState";

export type ErrorContext = Record<string, string | number | boolean | null>;

function formatContext(context?: ErrorContext): string {
  if (!context) return "";
  const parts = Object.entries(context).map(([k, v]) => `${k}=${v}`);
  return parts.length > 0 ? ` [${parts.join(" ")}]` : "";
}

export class TournamentEngineError extends Error {
  readonly kind: TournamentErrorKind;
  readonly context: ErrorContext;

  constructor(kind: TournamentErrorKind, message: string, context?: ErrorContext) {
    super(`${message}${formatContext(context)}`);
    this.name = `${kind}Error`;
    this.kind = kind;
    this.context = context ?? {};
  }
}

/** No rule-compliant pairing exists; only relaxing configuration can help. */
export class PairingInfeasibleError extends TournamentEngineError {
  constructor(message: string, context?: ErrorContext) {
    super("PairingInfeasible", message, context);
  }
}

/** Results do not line up 1:1 with the round's pairing. Always a caller bug. */
export class ResultMismatchError extends TournamentEngineError {
  constructor(message: string, context?: ErrorContext) {
    super("ResultMismatch", message, context);
  }
}

export class UnknownFederationCodeError extends TournamentEngineError {
  constructor(code: string) {
    super("UnknownFederationCode", `Unknown federation code: ${code}`);
  }
}

export class DuplicateFederationCodeError extends TournamentEngineError {
  constructor(code: string) {
    super("DuplicateFederationCode", `Federation '${code}' already registered`);
  }
}

export class InsufficientSamplesError extends TournamentEngineError {
  constructor(statistic: string, required: number, actual: number) {
    super("InsufficientSamples", `Not enough samples for ${statistic}`, {
      required,
      actual,
    });
  }
}

export class InvalidRecordError extends TournamentEngineError {
  constructor(recordType: string, issues: string[]) {
    super("InvalidRecord", `Invalid ${recordType}: ${issues.join("; ")}`);
  }
}

export class PlayerNotFoundError extends TournamentEngineError {
  constructor(playerId: string) {
    super("PlayerNotFound", `Player not found: ${playerId}`);
  }
}

export class InvalidTournamentStateError extends TournamentEngineError {
  constructor(message: string, context?: ErrorContext) {
    super("InvalidTournamentState", message, context);
  }
}

export function isTournamentEngineError(
  error: unknown,
): error is TournamentEngineError {
  return error instanceof TournamentEngineError;
}

export function assert(
  condition: unknown,
  message: string,
  context?: ErrorContext,
): asserts condition {
  if (!condition) throw new InvalidTournamentStateError(message, context);
}
