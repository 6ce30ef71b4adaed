import { describe, expect, test } from "vitest"
import { filterCommonStock, indexPrices, normalizeTicker } from "./price-history"
import { canonicalTicker, indexQuotes } from "./quote-panel"

describe("indexPrices", () => {
  test("takes absolute prices and links neighbouring closes per ticker", () => {
    const prices = indexPrices([
      { ticker: "AAA", date: "2024-03-06", open: 103, close: 104 },
      { ticker: "AAA", date: "2024-03-04", open: 99, close: 100 },
      { ticker: "aaa", date: "2024-03-05", open: -101, close: -102 },
      { ticker: "BBB", date: "2024-03-05", open: 49, close: 48 },
    ])

    expect(prices.size).toBe(4)
    expect(prices.get("AAA", "2024-03-05")).toEqual({
      ticker: "AAA",
      date: "2024-03-05",
      open: 101,
      close: 102,
      prev_close: 100,
      next_close: 104,
    })
    expect(prices.get("aaa", "2024-03-04")?.prev_close).toBeNull()
    expect(prices.get("AAA", "2024-03-06")?.next_close).toBeNull()
  })

  test("never links closes across tickers", () => {
    const prices = indexPrices([
      { ticker: "AAA", date: "2024-03-05", open: 10, close: 11 },
      { ticker: "BBB", date: "2024-03-04", open: 20, close: 21 },
    ])
    expect(prices.get("AAA", "2024-03-05")?.next_close).toBeNull()
    expect(prices.get("BBB", "2024-03-04")?.prev_close).toBeNull()
  })

  test("uses the prior available row when the series has a gap", () => {
    const prices = indexPrices([
      { ticker: "AAA", date: "2024-03-01", open: 9, close: 10 },
      { ticker: "AAA", date: "2024-03-05", open: 11, close: 12 },
    ])
    expect(prices.get("AAA", "2024-03-05")?.prev_close).toBe(10)
  })

  test("keeps the first of duplicate rows and counts the rest", () => {
    const prices = indexPrices([
      { ticker: "AAA", date: "2024-03-05", open: 10, close: 11 },
      { ticker: "AAA", date: "2024-03-05", open: 50, close: 51 },
    ])
    expect(prices.size).toBe(1)
    expect(prices.duplicates).toBe(1)
    expect(prices.get("AAA", "2024-03-05")?.close).toBe(11)
  })

  test("carries null prices through", () => {
    const prices = indexPrices([{ ticker: "AAA", date: "2024-03-05", open: null, close: 11 }])
    expect(prices.get("AAA", "2024-03-05")?.open).toBeNull()
  })
})

describe("filterCommonStock", () => {
  test("keeps common shares on the main exchanges and rows without codes", () => {
    const rows = filterCommonStock([
      { ticker: "AAA", date: "2024-03-05", open: 1, close: 1, share_code: 10, exchange_code: 1 },
      { ticker: "ETF", date: "2024-03-05", open: 1, close: 1, share_code: 73, exchange_code: 3 },
      { ticker: "OTC", date: "2024-03-05", open: 1, close: 1, share_code: 11, exchange_code: 4 },
      { ticker: "RAW", date: "2024-03-05", open: 1, close: 1 },
    ])
    expect(rows.map((row) => row.ticker)).toEqual(["AAA", "RAW"])
  })
})

describe("quote panel", () => {
  test("builds canonical tickers from root and suffix", () => {
    expect(canonicalTicker("brk", "a")).toBe("BRKA")
    expect(canonicalTicker("IBM", "")).toBe("IBM")
    expect(canonicalTicker(" ibm ", null)).toBe("IBM")
    expect(normalizeTicker(" msft ")).toBe("MSFT")
  })

  test("matches only the exact ticker, date and minute", () => {
    const quotes = indexQuotes([
      { ticker: "AAA", date: "2024-03-05", minute: "2024-03-05T09:46", mid: 100.5 },
      { ticker: "AAA", date: "2024-03-05", minute: "2024-03-05T09:47", mid: null },
      { ticker: "AAA", date: "2024-03-05", minute: "2024-03-05T09:46", mid: 999 },
    ])

    expect(quotes.size).toBe(1)
    expect(quotes.lookupMid("aaa", "2024-03-05", "2024-03-05T09:46")).toBe(100.5)
    expect(quotes.lookupMid("AAA", "2024-03-05", "2024-03-05T09:47")).toBeUndefined()
    expect(quotes.lookupMid("AAA", "2024-03-05", "2024-03-05T09:48")).toBeUndefined()
  })
})
