export * from "./types/tournament";
export * from "./utils/errors";
export * from "./utils/federation";
export * from "./utils/tournamentConfig";
export * from "./utils/records";
export * from "./utils/playerRegistry";
export {
  allocateColours,
  colourDifference,
  colourPreference,
  type ColourPreference,
  type PreferenceStrength,
} from "./utils/colourAllocation";
export { pairRound, MAX_SEARCH_NODES } from "./utils/tournamentPairing";
export { pairMonradRound } from "./utils/monradPairing";
export { applyResults, undoLastRound } from "./utils/resultRecorder";
export { calculateTiebreak, computeTiebreaks, rankStandings, type StandingRow } from "./utils/tieBreaking";
export * from "./comparison/metrics";
export * from "./comparison/pairingComparison";
export * from "./comparison/statistics";
export * from "./comparison/tournamentSimulator";
export * from "./comparison/reporter";
export * from "./comparison/settings";
