/**
 * Plain-text reports for comparison runs.
 */

import { compareIds } from "../utils/tournamentUtils";
import type { ViolationCounts } from "./metrics";
import type { ComparisonResult, EngineOutcome } from "./pairingComparison";
import {
  METRIC_NAMES,
  type EngineSummary,
  type MetricSummary,
  type Statistic,
  type StatisticalSummary,
  type WinRates,
} from "./statistics";

export interface EngineLabels {
  a?: string;
  b?: string;
}

export function formatStatistic(stat: Statistic, digits = 3): string {
  if (stat.status === "ok") return stat.value.toFixed(digits);
  return `n/a (needs ${stat.required}, have ${stat.actual})`;
}

/** A share as a percentage with one decimal. */
export function formatRate(stat: Statistic): string {
  if (stat.status === "ok") return `${(stat.value * 100).toFixed(1)}%`;
  return formatStatistic(stat);
}

function formatRates(a: string, b: string, rates: WinRates): string {
  return `${a} ${formatRate(rates.a)}, ${b} ${formatRate(rates.b)}, ties ${formatRate(rates.ties)}`;
}

export function formatMetric(name: string, summary: MetricSummary, digits = 3): string {
  const ci =
    summary.ci95.status === "ok"
      ? `[${summary.ci95.value.low.toFixed(digits)}, ${summary.ci95.value.high.toFixed(digits)}]`
      : "n/a";
  return (
    `${name.padEnd(8)} n=${summary.count} mean ${formatStatistic(summary.mean, digits)}` +
    ` sd ${formatStatistic(summary.stddev, digits)}` +
    ` min ${formatStatistic(summary.min, digits)}` +
    ` max ${formatStatistic(summary.max, digits)}` +
    ` ci95 ${ci}`
  );
}

function formatViolations(counts: Readonly<ViolationCounts>): string {
  const parts = Object.entries(counts)
    .filter(([, n]) => n !== undefined && n > 0)
    .sort(([x], [y]) => compareIds(x, y))
    .map(([code, n]) => `${code}=${n}`);
  return parts.length > 0 ? parts.join(" ") : "none";
}

function engineSection(label: string, engine: EngineSummary): string[] {
  const lines = [`== ${label} ==`, `  rounds ${engine.rounds}, failures ${engine.failures}`];
  for (const [kind, n] of Object.entries(engine.failureKinds)) {
    lines.push(`  failed with ${kind}: ${n}`);
  }
  for (const name of METRIC_NAMES) {
    lines.push(`  ${formatMetric(name, engine.metrics[name])}`);
  }
  lines.push(`  time ms  mean ${formatStatistic(engine.elapsedMs.mean, 2)}`);
  lines.push(`  violations: ${formatViolations(engine.violations)}`);
  return lines;
}

export function formatSummary(summary: StatisticalSummary, labels: EngineLabels = {}): string {
  const a = labels.a ?? (summary.a.engine || "A");
  const b = labels.b ?? (summary.b.engine || "B");
  const d = summary.divergence;
  const lines = [
    `Engine comparison: ${summary.comparisons} rounds`,
    ...engineSection(a, summary.a),
    ...engineSection(b, summary.b),
    `Wins: ${a} ${summary.wins.a}, ${b} ${summary.wins.b}, ties ${summary.wins.ties}, undecided ${summary.wins.undecided}`,
    `Win rates: ${formatRates(a, b, summary.rates)}`,
    `Score difference (${a} - ${b}): mean ${formatStatistic(summary.scoreDifference.mean)}`,
    `Score difference (${a} - ${b}): median ${formatStatistic(summary.medianScoreDifference)}`,
    `Significance ${formatStatistic(summary.significance)}, ` +
      `confidence ${formatStatistic(summary.confidence)}`,
    `Divergence: ${d.compared} compared, ${d.identicalRounds} identical, ` +
      `divergent pairs mean ${formatStatistic(d.divergentPairs.mean)}, ` +
      `colour divergences mean ${formatStatistic(d.colourDivergent.mean)}, ` +
      `bye divergences ${d.byeDivergences}`,
  ];
  for (const round of summary.byRound) {
    lines.push(
      `Round ${round.round}: n=${round.comparisons} ${a} ${formatStatistic(round.overallA)}` +
        ` ${b} ${formatStatistic(round.overallB)}` +
        ` divergent ${formatStatistic(round.divergentPairs)}`,
    );
  }
  for (const size of summary.bySize) {
    lines.push(
      `Size ${size.size}: n=${size.comparisons} ${formatRates(a, b, size.rates)}` +
        `, undecided ${size.wins.undecided}`,
    );
  }
  return lines.join("\n");
}

function formatOutcome(outcome: EngineOutcome): string {
  if (outcome.status === "failed") {
    return `${outcome.engine}: failed (${outcome.errorKind}) ${outcome.message}`;
  }
  const m = outcome.metrics;
  return (
    `${outcome.engine}: overall ${m.overall.toFixed(3)}` +
    ` (quality ${m.quality.toFixed(3)}, fide ${m.fide.toFixed(3)}),` +
    ` ${outcome.pairing.pairings.length} boards, bye ${outcome.pairing.byePlayerId ?? "none"}`
  );
}

export function formatComparison(result: ComparisonResult): string {
  const lines = [
    `${result.tournamentId} round ${result.round}`,
    `  ${formatOutcome(result.a)}`,
    `  ${formatOutcome(result.b)}`,
  ];
  const d = result.divergence;
  if (d) {
    const pairs = (list: readonly (readonly [string, string])[]) =>
      list.length > 0 ? list.map(([x, y]) => `${x}-${y}`).join(", ") : "none";
    lines.push(
      `  divergence: ${d.matchingPairs} matching, only A: ${pairs(d.onlyInA)}, only B: ${pairs(d.onlyInB)}, ` +
        `colour ${d.colourDivergent.length}, bye ${d.byeDivergent ? "differs" : "same"}`,
    );
  }
  if (result.winner === null) {
    lines.push("  winner: undecided");
  } else if (result.winner === "tie") {
    lines.push("  winner: tie");
  } else {
    const engine = result.winner === "a" ? result.a.engine : result.b.engine;
    const diff = Math.abs(result.scoreDifference ?? 0);
    lines.push(`  winner: ${engine} (+${diff.toFixed(3)})`);
  }
  return lines.join("\n");
}
