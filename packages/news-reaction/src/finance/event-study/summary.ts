import type {
  LegSummary,
  PerformanceSummary,
  PortfolioDayRecord,
  PortfolioLeg,
  PortfolioMetric,
  SeriesStats,
} from "./types"

export const TRADING_DAYS_PER_YEAR = 252

type SeriesColumn = keyof Omit<PortfolioDayRecord, "date" | "n_positive" | "n_negative" | "n_neutral">

export const SUMMARY_SERIES: ReadonlyArray<{ column: SeriesColumn; metric: PortfolioMetric; leg: PortfolioLeg }> = [
  { column: "ir_long_short", metric: "initial_reaction", leg: "long_short" },
  { column: "ir_long_only", metric: "initial_reaction", leg: "long_only" },
  { column: "ir_short_only", metric: "initial_reaction", leg: "short_only" },
  { column: "drift_long_short", metric: "drift", leg: "long_short" },
  { column: "drift_long_only", metric: "drift", leg: "long_only" },
  { column: "drift_short_only", metric: "drift", leg: "short_only" },
]

/** Hit rate, mean and sample stdev (N-1); null for an empty series. */
export function computeSeriesStats(values: readonly number[]): SeriesStats | null {
  const count = values.length
  if (count === 0) return null
  const mean = values.reduce((acc, value) => acc + value, 0) / count
  // exact zero for a constant series; the summed mean can carry rounding
  const constant = values.every((value) => value === values[0])
  const variance =
    count < 2 || constant
      ? 0
      : values.reduce((acc, value) => {
          const diff = value - mean
          return acc + diff * diff
        }, 0) /
        (count - 1)
  const hits = values.reduce((acc, value) => (value > 0 ? acc + 1 : acc), 0)
  return {
    sampleCount: count,
    hitRate: hits / count,
    mean,
    stdev: Math.sqrt(variance),
  }
}

export function annualizedSharpe(stats: SeriesStats, periodsPerYear = TRADING_DAYS_PER_YEAR) {
  if (stats.stdev === 0) return Number.NaN
  return (stats.mean / stats.stdev) * Math.sqrt(periodsPerYear)
}

export function summarizePortfolios(
  days: readonly PortfolioDayRecord[],
  options: { annualizationFactor?: number; firmDayObservations?: number } = {},
): PerformanceSummary {
  const legs = SUMMARY_SERIES.map(({ column, metric, leg }): LegSummary => {
    const values = days.map((day) => day[column]).filter((value): value is number => value !== null)
    const stats = computeSeriesStats(values)
    if (!stats) return { metric, leg, status: "no_data" }
    return {
      metric,
      leg,
      status: "ok",
      trading_days: stats.sampleCount,
      hit_rate: stats.hitRate,
      mean: stats.mean,
      stdev: stats.stdev,
      sharpe: metric === "drift" ? annualizedSharpe(stats, options.annualizationFactor) : null,
    }
  })

  return {
    legs,
    firm_day_observations: options.firmDayObservations ?? 0,
    trading_days: days.length,
  }
}
