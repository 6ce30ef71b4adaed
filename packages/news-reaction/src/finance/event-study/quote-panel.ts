import { normalizeTicker } from "./price-history"
import type { IsoDate, MinuteKey, MinuteQuoteRow, QuoteLookup } from "./types"

export function canonicalTicker(root: string, suffix?: string | null) {
  const base = normalizeTicker(root)
  const extra = suffix?.trim() ?? ""
  return extra ? `${base}${normalizeTicker(extra)}` : base
}

function key(ticker: string, date: IsoDate, minute: MinuteKey) {
  return `${ticker}|${date}|${minute}`
}

/**
 * Exact-key lookup over a minute mid-quote panel. The upstream aggregator already
 * resolves one mid per minute, so a repeated bucket keeps its first value.
 */
export function indexQuotes(rows: readonly MinuteQuoteRow[]): QuoteLookup {
  const mids = new Map<string, number>()
  for (const row of rows) {
    if (row.mid === null) continue
    const id = key(normalizeTicker(row.ticker), row.date, row.minute)
    if (!mids.has(id)) mids.set(id, row.mid)
  }

  return {
    size: mids.size,
    lookupMid(ticker, date, minute) {
      return mids.get(key(normalizeTicker(ticker), date, minute))
    },
  }
}
