import { meanOf } from "./firm-day"
import type { FirmDayRecord, IsoDate, PortfolioDayRecord, PortfolioMetric, Sentiment } from "./types"

export const DEFAULT_MIN_LEG_SIZE = 2

type DateBuckets = Record<Sentiment, FirmDayRecord[]> & { date: IsoDate }

function bucketByDate(firmDays: readonly FirmDayRecord[]) {
  const byDate = new Map<IsoDate, DateBuckets>()
  firmDays.forEach((row) => {
    const bucket = byDate.get(row.date) ?? { date: row.date, positive: [], negative: [], neutral: [] }
    bucket[row.sentiment].push(row)
    byDate.set(row.date, bucket)
  })
  return [...byDate.values()].toSorted((a, b) => a.date.localeCompare(b.date))
}

function negate(value: number | null) {
  return value === null ? null : -value
}

function legs(bucket: DateBuckets, metric: PortfolioMetric, eligible: boolean) {
  const long = meanOf(bucket.positive.map((row) => row[metric]))
  const short = meanOf(bucket.negative.map((row) => row[metric]))
  return {
    longOnly: long,
    shortOnly: negate(short),
    longShort: eligible && long !== null && short !== null ? long - short : null,
  }
}

/**
 * Daily equal-weighted portfolios. Long-short is reported only when both legs hold at
 * least `minLegSize` firm-days; the short-only leg is sign-flipped so a gain on the
 * short book is positive.
 */
export function buildPortfolios(
  firmDays: readonly FirmDayRecord[],
  options: { minLegSize?: number } = {},
): PortfolioDayRecord[] {
  const minLegSize = options.minLegSize ?? DEFAULT_MIN_LEG_SIZE

  return bucketByDate(firmDays).map((bucket) => {
    const eligible = bucket.positive.length >= minLegSize && bucket.negative.length >= minLegSize
    const ir = legs(bucket, "initial_reaction", eligible)
    const drift = legs(bucket, "drift", eligible)
    return {
      date: bucket.date,
      n_positive: bucket.positive.length,
      n_negative: bucket.negative.length,
      n_neutral: bucket.neutral.length,
      ir_long_only: ir.longOnly,
      ir_short_only: ir.shortOnly,
      ir_long_short: ir.longShort,
      drift_long_only: drift.longOnly,
      drift_short_only: drift.shortOnly,
      drift_long_short: drift.longShort,
    }
  })
}

export function isLongShortEligible(day: PortfolioDayRecord, minLegSize = DEFAULT_MIN_LEG_SIZE) {
  return day.n_positive >= minLegSize && day.n_negative >= minLegSize
}
