import type { EventReturnRecord, FirmDayRecord, Sentiment } from "./types"

export const DEFAULT_SENTIMENT_THRESHOLD = 0.5

/** Mean of the non-null values; null when none remain. */
export function meanOf(values: readonly (number | null)[]): number | null {
  const present = values.filter((value): value is number => value !== null)
  if (present.length === 0) return null
  return present.reduce((acc, value) => acc + value, 0) / present.length
}

export function classifySentiment(score: number | null, threshold = DEFAULT_SENTIMENT_THRESHOLD): Sentiment {
  if (score === null) return "neutral"
  if (score > threshold) return "positive"
  if (score < threshold) return "negative"
  return "neutral"
}

/**
 * Collapse stories to one row per (ticker, date). Sentiment comes from the averaged
 * score, not from any single story's label.
 */
export function aggregateFirmDays(
  records: readonly EventReturnRecord[],
  options: { threshold?: number } = {},
): FirmDayRecord[] {
  const grouped = new Map<string, EventReturnRecord[]>()
  records.forEach((record) => {
    const id = `${record.ticker}|${record.date}`
    const list = grouped.get(id) ?? []
    list.push(record)
    grouped.set(id, list)
  })

  return [...grouped.values()]
    .map((list) => {
      const avgScore = meanOf(list.map((item) => item.score))
      return {
        ticker: list[0].ticker,
        date: list[0].date,
        avg_score: avgScore,
        n_stories: list.length,
        initial_reaction: meanOf(list.map((item) => item.initial_reaction)),
        drift: meanOf(list.map((item) => item.drift)),
        sentiment: classifySentiment(avgScore, options.threshold),
      } satisfies FirmDayRecord
    })
    .toSorted((a, b) => a.date.localeCompare(b.date) || a.ticker.localeCompare(b.ticker))
}
