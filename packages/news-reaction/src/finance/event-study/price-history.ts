import type { DailyPrice, DailyPriceRow, IsoDate, PriceLookup } from "./types"

const COMMON_SHARE_CODES = new Set([10, 11])
const MAIN_EXCHANGE_CODES = new Set([1, 2, 3])

function key(ticker: string, date: IsoDate) {
  return `${ticker}|${date}`
}

export function normalizeTicker(value: string) {
  return value.trim().toUpperCase()
}

function absolute(value: number | null) {
  return value === null ? null : Math.abs(value)
}

/**
 * Keep common stocks on the main exchanges. Rows without share or exchange codes pass
 * through, since not every panel carries them.
 */
export function filterCommonStock(rows: readonly DailyPriceRow[]) {
  return rows.filter((row) => {
    if (row.share_code != null && !COMMON_SHARE_CODES.has(row.share_code)) return false
    if (row.exchange_code != null && !MAIN_EXCHANGE_CODES.has(row.exchange_code)) return false
    return true
  })
}

/**
 * Index a daily price panel by (ticker, date). Previous and next closes are positional
 * neighbours within the ticker's date-sorted series, so a gap in the series shifts them.
 */
export function indexPrices(rows: readonly DailyPriceRow[]): PriceLookup {
  const unique = new Map<string, DailyPriceRow>()
  let duplicates = 0
  for (const row of rows) {
    const ticker = normalizeTicker(row.ticker)
    const id = key(ticker, row.date)
    if (unique.has(id)) {
      duplicates += 1
      continue
    }
    unique.set(id, {
      ticker,
      date: row.date,
      open: absolute(row.open),
      close: absolute(row.close),
    })
  }

  const sorted = [...unique.values()].toSorted(
    (a, b) => a.ticker.localeCompare(b.ticker) || a.date.localeCompare(b.date),
  )

  const byKey = new Map<string, DailyPrice>()
  sorted.forEach((row, index) => {
    const previous = sorted[index - 1]
    const next = sorted[index + 1]
    byKey.set(key(row.ticker, row.date), {
      ticker: row.ticker,
      date: row.date,
      open: row.open,
      close: row.close,
      prev_close: previous?.ticker === row.ticker ? previous.close : null,
      next_close: next?.ticker === row.ticker ? next.close : null,
    })
  })

  return {
    size: byKey.size,
    duplicates,
    get(ticker, date) {
      return byKey.get(key(normalizeTicker(ticker), date))
    },
  }
}
