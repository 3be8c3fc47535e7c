/**
 * Aggregates comparison results. Every statistic is either a value or an
 * explicit insufficient-samples marker; nothing silently defaults to 0.
 */

import { InsufficientSamplesError } from "../utils/errors";
import { HARD_VIOLATIONS, SOFT_VIOLATIONS, type ViolationCounts } from "./metrics";
import {
  divergentPairCount,
  type ComparisonResult,
  type EngineOutcome,
} from "./pairingComparison";

export type Statistic<T = number> =
  | { readonly status: "ok"; readonly value: T }
  | { readonly status: "insufficientSamples"; readonly required: number; readonly actual: number };

export interface Interval {
  readonly low: number;
  readonly high: number;
}

export interface MetricSummary {
  readonly count: number;
  readonly mean: Statistic;
  readonly variance: Statistic;
  readonly stddev: Statistic;
  readonly min: Statistic;
  readonly max: Statistic;
  readonly ci95: Statistic<Interval>;
}

export const METRIC_NAMES = ["quality", "fide", "overall"] as const;
export type MetricName = (typeof METRIC_NAMES)[number];

const Z_95 = 1.96;

/** Comparisons needed before significance and confidence are reported. */
export const MIN_SIGNIFICANCE_SAMPLES = 30;

const MAX_CONFIDENCE = 0.99;

/** Welford's streaming mean and variance. */
export class RunningStats {
  private n = 0;
  private runningMean = 0;
  private m2 = 0;
  private low = Number.POSITIVE_INFINITY;
  private high = Number.NEGATIVE_INFINITY;

  push(value: number): void {
    this.n++;
    const delta = value - this.runningMean;
    this.runningMean += delta / this.n;
    this.m2 += delta * (value - this.runningMean);
    if (value < this.low) this.low = value;
    if (value > this.high) this.high = value;
  }

  get count(): number {
    return this.n;
  }

  private need<T>(required: number, value: () => T): Statistic<T> {
    if (this.n < required) {
      return { status: "insufficientSamples", required, actual: this.n };
    }
    return { status: "ok", value: value() };
  }

  mean(): Statistic {
    return this.need(1, () => this.runningMean);
  }

  /** Sample variance (n - 1 denominator). */
  variance(): Statistic {
    return this.need(2, () => this.m2 / (this.n - 1));
  }

  stddev(): Statistic {
    return this.need(2, () => Math.sqrt(this.m2 / (this.n - 1)));
  }

  min(): Statistic {
    return this.need(1, () => this.low);
  }

  max(): Statistic {
    return this.need(1, () => this.high);
  }

  ci95(): Statistic<Interval> {
    return this.need(2, () => {
      const half = (Z_95 * Math.sqrt(this.m2 / (this.n - 1))) / Math.sqrt(this.n);
      return { low: this.runningMean - half, high: this.runningMean + half };
    });
  }

  summary(): MetricSummary {
    return Object.freeze({
      count: this.n,
      mean: this.mean(),
      variance: this.variance(),
      stddev: this.stddev(),
      min: this.min(),
      max: this.max(),
      ci95: this.ci95(),
    });
  }
}

export function summarizeValues(values: readonly number[]): MetricSummary {
  const stats = new RunningStats();
  for (const v of values) stats.push(v);
  return stats.summary();
}

/** Unwrap a statistic for callers that cannot continue without a number. */
export function requireValue<T>(stat: Statistic<T>, name: string): T {
  if (stat.status === "insufficientSamples") {
    throw new InsufficientSamplesError(name, stat.required, stat.actual);
  }
  return stat.value;
}

export interface EngineSummary {
  readonly engine: string;
  readonly rounds: number;
  readonly failures: number;
  readonly failureKinds: Readonly<Record<string, number>>;
  readonly metrics: Readonly<Record<MetricName, MetricSummary>>;
  readonly elapsedMs: MetricSummary;
  readonly violations: Readonly<ViolationCounts>;
}

export interface DivergenceSummary {
  /** rounds where both engines produced a pairing */
  readonly compared: number;
  readonly identicalRounds: number;
  readonly divergentPairs: MetricSummary;
  readonly colourDivergent: MetricSummary;
  readonly byeDivergences: number;
}

export interface RoundSummary {
  readonly round: number;
  readonly comparisons: number;
  readonly overallA: Statistic;
  readonly overallB: Statistic;
  readonly divergentPairs: Statistic;
}

export interface WinCounts {
  readonly a: number;
  readonly b: number;
  readonly ties: number;
  readonly undecided: number;
}

/** Shares of all comparisons, undecided rounds included in the denominator. */
export interface WinRates {
  readonly a: Statistic;
  readonly b: Statistic;
  readonly ties: Statistic;
}

export type SizeCategory = "small" | "medium" | "large";

export interface SizeSummary {
  readonly size: SizeCategory;
  readonly comparisons: number;
  readonly wins: WinCounts;
  readonly rates: WinRates;
}

export interface StatisticalSummary {
  readonly comparisons: number;
  readonly a: EngineSummary;
  readonly b: EngineSummary;
  readonly wins: WinCounts;
  readonly rates: WinRates;
  readonly scoreDifference: MetricSummary;
  readonly medianScoreDifference: Statistic;
  /**
   * How far engine A's win rate sits from an even split, scaled by the
   * sample size and capped at 1.
   */
  readonly significance: Statistic;
  /** Share of the more frequent winner, pulled toward 0.5 for small runs. */
  readonly confidence: Statistic;
  readonly divergence: DivergenceSummary;
  readonly byRound: readonly RoundSummary[];
  readonly bySize: readonly SizeSummary[];
}

export interface SummarizeOptions {
  readonly minSignificanceSamples?: number;
}

/** Up to 16 players is small, up to 32 medium. */
export function sizeCategory(players: number): SizeCategory {
  if (players <= 16) return "small";
  return players <= 32 ? "medium" : "large";
}

const SIZE_ORDER: readonly SizeCategory[] = ["small", "medium", "large"];

export function median(values: readonly number[]): Statistic {
  if (values.length === 0) return { status: "insufficientSamples", required: 1, actual: 0 };
  const sorted = [...values].sort((x, y) => x - y);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return { status: "ok", value: upper };
  const lower = sorted[mid - 1] ?? upper;
  return { status: "ok", value: (lower + upper) / 2 };
}

function winRates(wins: WinCounts, total: number): WinRates {
  const rate = (count: number): Statistic =>
    total === 0
      ? { status: "insufficientSamples", required: 1, actual: 0 }
      : { status: "ok", value: count / total };
  return Object.freeze({ a: rate(wins.a), b: rate(wins.b), ties: rate(wins.ties) });
}

function significance(wins: WinCounts, total: number, required: number): Statistic {
  if (total < required) return { status: "insufficientSamples", required, actual: total };
  const deviation = Math.abs(wins.a / total - 0.5);
  return { status: "ok", value: Math.min(1, deviation * 2 * (total / required)) };
}

function confidence(wins: WinCounts, total: number, required: number): Statistic {
  if (total < required) return { status: "insufficientSamples", required, actual: total };
  const share = Math.max(wins.a, wins.b) / total;
  const sampleFactor = Math.min(1, total / (required * 3));
  const value = 0.5 + (share - 0.5) * sampleFactor;
  return { status: "ok", value: Math.min(MAX_CONFIDENCE, Math.max(0.5, value)) };
}

interface WinTally {
  a: number;
  b: number;
  ties: number;
  undecided: number;
}

function countWinner(wins: WinTally, result: ComparisonResult): void {
  if (result.winner === null) wins.undecided++;
  else if (result.winner === "tie") wins.ties++;
  else wins[result.winner]++;
}

class EngineAccumulator {
  engine = "";
  rounds = 0;
  failures = 0;
  readonly failureKinds: Record<string, number> = {};
  readonly metrics: Record<MetricName, RunningStats> = {
    quality: new RunningStats(),
    fide: new RunningStats(),
    overall: new RunningStats(),
  };
  readonly elapsed = new RunningStats();
  readonly violations: ViolationCounts = {};

  add(outcome: EngineOutcome): void {
    this.engine ||= outcome.engine;
    this.rounds++;
    this.elapsed.push(outcome.elapsedMs);
    if (outcome.status === "failed") {
      // excluded from every score average
      this.failures++;
      this.failureKinds[outcome.errorKind] = (this.failureKinds[outcome.errorKind] ?? 0) + 1;
      return;
    }
    for (const name of METRIC_NAMES) this.metrics[name].push(outcome.metrics[name]);
    for (const code of [...HARD_VIOLATIONS, ...SOFT_VIOLATIONS]) {
      const n = outcome.metrics.violations[code];
      if (n !== undefined) this.violations[code] = (this.violations[code] ?? 0) + n;
    }
  }

  summary(): EngineSummary {
    return Object.freeze({
      engine: this.engine,
      rounds: this.rounds,
      failures: this.failures,
      failureKinds: Object.freeze({ ...this.failureKinds }),
      metrics: Object.freeze({
        quality: this.metrics.quality.summary(),
        fide: this.metrics.fide.summary(),
        overall: this.metrics.overall.summary(),
      }),
      elapsedMs: this.elapsed.summary(),
      violations: Object.freeze({ ...this.violations }),
    });
  }
}

interface RoundAccumulator {
  comparisons: number;
  overallA: RunningStats;
  overallB: RunningStats;
  divergentPairs: RunningStats;
}

export function summarize(
  results: readonly ComparisonResult[],
  options: SummarizeOptions = {},
): StatisticalSummary {
  const required = Math.max(1, options.minSignificanceSamples ?? MIN_SIGNIFICANCE_SAMPLES);
  const a = new EngineAccumulator();
  const b = new EngineAccumulator();
  const wins: WinTally = { a: 0, b: 0, ties: 0, undecided: 0 };
  const sizes = new Map<SizeCategory, WinTally>();
  const scoreDifference = new RunningStats();
  const differences: number[] = [];
  const divergentPairs = new RunningStats();
  const colourDivergent = new RunningStats();
  let identicalRounds = 0;
  let byeDivergences = 0;
  const rounds = new Map<number, RoundAccumulator>();

  for (const result of results) {
    a.add(result.a);
    b.add(result.b);

    countWinner(wins, result);
    const size = sizeCategory(result.players);
    let sizeWins = sizes.get(size);
    if (!sizeWins) {
      sizeWins = { a: 0, b: 0, ties: 0, undecided: 0 };
      sizes.set(size, sizeWins);
    }
    countWinner(sizeWins, result);
    if (result.scoreDifference !== null) {
      scoreDifference.push(result.scoreDifference);
      differences.push(result.scoreDifference);
    }

    let round = rounds.get(result.round);
    if (!round) {
      round = {
        comparisons: 0,
        overallA: new RunningStats(),
        overallB: new RunningStats(),
        divergentPairs: new RunningStats(),
      };
      rounds.set(result.round, round);
    }
    round.comparisons++;
    if (result.a.status === "ok") round.overallA.push(result.a.metrics.overall);
    if (result.b.status === "ok") round.overallB.push(result.b.metrics.overall);

    const divergence = result.divergence;
    if (divergence) {
      const pairs = divergentPairCount(divergence);
      divergentPairs.push(pairs);
      colourDivergent.push(divergence.colourDivergent.length);
      round.divergentPairs.push(pairs);
      if (divergence.byeDivergent) byeDivergences++;
      if (pairs === 0 && divergence.colourDivergent.length === 0 && !divergence.byeDivergent) {
        identicalRounds++;
      }
    }
  }

  const byRound = [...rounds.entries()]
    .sort(([x], [y]) => x - y)
    .map(([round, acc]) =>
      Object.freeze({
        round,
        comparisons: acc.comparisons,
        overallA: acc.overallA.mean(),
        overallB: acc.overallB.mean(),
        divergentPairs: acc.divergentPairs.mean(),
      }),
    );

  const bySize: SizeSummary[] = [];
  for (const size of SIZE_ORDER) {
    const counts = sizes.get(size);
    if (!counts) continue;
    const total = counts.a + counts.b + counts.ties + counts.undecided;
    bySize.push(
      Object.freeze({
        size,
        comparisons: total,
        wins: Object.freeze(counts),
        rates: winRates(counts, total),
      }),
    );
  }

  return Object.freeze({
    comparisons: results.length,
    a: a.summary(),
    b: b.summary(),
    wins: Object.freeze(wins),
    rates: winRates(wins, results.length),
    scoreDifference: scoreDifference.summary(),
    medianScoreDifference: median(differences),
    significance: significance(wins, results.length, required),
    confidence: confidence(wins, results.length, required),
    divergence: Object.freeze({
      compared: divergentPairs.count,
      identicalRounds,
      divergentPairs: divergentPairs.summary(),
      colourDivergent: colourDivergent.summary(),
      byeDivergences,
    }),
    byRound: Object.freeze(byRound),
    bySize: Object.freeze(bySize),
  });
}
