// Load environment variables before any module reads them
import "dotenv/config";
import { formatComparison, formatSummary } from "../src/comparison/reporter";
import { loadComparisonSettings } from "../src/comparison/settings";
import { summarize } from "../src/comparison/statistics";
import { simulateComparisons } from "../src/comparison/tournamentSimulator";

const main = () => {
  const settings = loadComparisonSettings();
  const verbose = process.argv.includes("--verbose");

  console.log(
    `Comparing engines over ${settings.tournaments} tournaments ` +
      `(${settings.players} players, ${settings.rounds} rounds, seed ${settings.seed})`,
  );

  const results = simulateComparisons({
    tournaments: settings.tournaments,
    players: settings.players,
    rounds: settings.rounds,
    seed: settings.seed,
    compare: { weights: settings.weights, tieThreshold: settings.tieThreshold },
  });

  if (verbose) {
    for (const result of results) console.log(formatComparison(result));
  }
  console.log(formatSummary(summarize(results)));
};

try {
  main();
} catch (error) {
  console.error("Comparison run failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
