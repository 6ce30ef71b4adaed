import { Table as ArrowTable, TimestampMillisecond, tableToIPC, vectorFromArray } from "apache-arrow"
import { describe, expect, test } from "vitest"
import {
  DEFAULT_CALENDAR_OPTIONS,
  buildStoryIndex,
  InputSchemaViolationError,
  InvalidInputRowError,
  parsePrices,
  parseQuotes,
  parseStories,
  parseStoryIndex,
  type RawTable,
} from "../../src/finance/event-study"
import { Table } from "../../src/storage/table"

function table(name: string, rows: Record<string, unknown>[], columns?: string[]): RawTable {
  return { name, columns: columns ?? Object.keys(rows[0] ?? {}), rows }
}

describe("news reaction input tables", () => {
  test("names the table and column when a required column is absent", () => {
    const prices = table("prices", [{ date: "2024-03-05", ticker: "AAA", open: 1 }])
    expect(() => parsePrices(prices)).toThrow(InputSchemaViolationError)
    expect(() => parsePrices(prices)).toThrow("Input table 'prices' is missing required column 'close'")
  })

  test("rejects a malformed row with its position", () => {
    const prices = table("prices", [
      { date: "2024-03-05", ticker: "AAA", open: 1, close: 2 },
      { date: "not a date", ticker: "AAA", open: 1, close: 2 },
    ])
    expect(() => parsePrices(prices)).toThrow(InvalidInputRowError)
    expect(() => parsePrices(prices)).toThrow("Invalid row 1 in 'prices'")
  })

  test("normalizes labels and keeps missing values as null", () => {
    const stories = parseStories(
      table("stories", [
        { story_id: 7, ticker: "AAA", headline: "beats", label: " Positive ", score: 0.9, timestamp: "2024-03-05 10:00" },
        { story_id: "s2", ticker: null, headline: null, label: "neutral", score: null, timestamp: null },
      ]),
    )
    expect(stories[0]).toEqual({
      story_id: "7",
      ticker: "AAA",
      headline: "beats",
      label: "positive",
      score: 0.9,
      timestamp: "2024-03-05 10:00",
    })
    expect(stories[1].label).toBe("unknown")
    expect(stories[1].ticker).toBeNull()
  })

  test("rejects sentiment scores outside the unit interval", () => {
    const stories = table("stories", [
      { story_id: "s1", ticker: "AAA", headline: null, label: "positive", score: 1.5, timestamp: null },
    ])
    expect(() => parseStories(stories)).toThrow(InvalidInputRowError)
  })

  test("reads story index minutes as exchange-local keys", () => {
    const [entry] = parseStoryIndex(
      table("story_index", [
        { story_id: "s1", ticker: "AAA", date: "2024-03-05", is_intraday: 1, target_minute: "2024-03-05 10:15:00" },
      ]),
      "America/New_York",
    )
    expect(entry).toEqual({
      story_id: "s1",
      ticker: "AAA",
      date: "2024-03-05",
      is_intraday: true,
      target_minute: "2024-03-05T10:15",
    })
  })

  test("builds quote tickers from root and suffix when no ticker column exists", () => {
    const quotes = parseQuotes(
      table("quotes", [
        { date: "2024-03-05", sym_root: "BRK", sym_suffix: "B", minute_ts: "2024-03-05 10:15:00", mid: 410.25 },
        { date: "2024-03-05", sym_root: "IBM", sym_suffix: null, minute_ts: "2024-03-05 10:16:00", mid: null },
      ]),
      "America/New_York",
    )
    expect(quotes).toEqual([
      { ticker: "BRKB", date: "2024-03-05", minute: "2024-03-05T10:15", mid: 410.25 },
      { ticker: "IBM", date: "2024-03-05", minute: "2024-03-05T10:16", mid: null },
    ])
  })

  test("decodes JSON tables in both record and column layouts", () => {
    const encoder = new TextEncoder()
    const records = Table.decode("prices", "json", encoder.encode('[{"date":"2024-03-05","ticker":"AAA","open":1,"close":2}]'))
    expect(records.columns).toEqual(["date", "ticker", "open", "close"])
    expect(records.rows).toHaveLength(1)

    const empty = Table.decode("prices", "json", encoder.encode('{"columns":["date","ticker","open","close"],"rows":[]}'))
    expect(empty.columns).toEqual(["date", "ticker", "open", "close"])
    expect(parsePrices(empty)).toEqual([])
  })

  test("rejects unsupported table files", () => {
    expect(Table.formatOf("prices.feather")).toBe("arrow")
    expect(() => Table.formatOf("prices.parquet")).toThrow("Unsupported table format: prices.parquet")
  })

  test("reads back Arrow tables it writes", () => {
    const bytes = Table.encode("arrow", [
      { date: "2024-03-05", ticker: "AAA", open: 101, close: 102 },
      { date: "2024-03-06", ticker: "AAA", open: null, close: 104 },
    ])
    if (typeof bytes === "string") throw new Error("expected binary Arrow output")
    const decoded = Table.decode("prices", "arrow", bytes)
    expect(decoded.columns).toEqual(["date", "ticker", "open", "close"])
    expect(parsePrices(decoded)).toEqual([
      { date: "2024-03-05", ticker: "AAA", open: 101, close: 102 },
      { date: "2024-03-06", ticker: "AAA", open: null, close: 104 },
    ])
  })

  test("reads zone-less Arrow quote minutes as exchange-local time", () => {
    const bytes = tableToIPC(
      new ArrowTable({
        date: vectorFromArray(["2024-03-05", "2024-03-05"]),
        ticker: vectorFromArray(["AAA", "BBB"]),
        minute_ts: vectorFromArray([Date.UTC(2024, 2, 5, 10, 15), Date.UTC(2024, 2, 5, 10, 16)], new TimestampMillisecond()),
        mid: vectorFromArray([100.5, 48.25]),
      }),
      "file",
    )
    const decoded = Table.decode("quotes", "arrow", bytes)
    expect(decoded.rows[0].minute_ts).toBe("2024-03-05T10:15:00.000")
    expect(parseQuotes(decoded, "America/New_York")).toEqual([
      { ticker: "AAA", date: "2024-03-05", minute: "2024-03-05T10:15", mid: 100.5 },
      { ticker: "BBB", date: "2024-03-05", minute: "2024-03-05T10:16", mid: 48.25 },
    ])
  })

  test("keeps zone-tagged Arrow timestamps as instants", () => {
    const bytes = tableToIPC(
      new ArrowTable({
        date: vectorFromArray(["2024-03-05"]),
        ticker: vectorFromArray(["AAA"]),
        minute_ts: vectorFromArray([Date.UTC(2024, 2, 5, 15, 15)], new TimestampMillisecond("UTC")),
        mid: vectorFromArray([100.5]),
      }),
      "file",
    )
    const [quote] = parseQuotes(Table.decode("quotes", "arrow", bytes), "America/New_York")
    expect(quote.minute).toBe("2024-03-05T10:15")
  })

  test("reads zone-less Arrow story timestamps in the origin time zone", () => {
    const bytes = tableToIPC(
      new ArrowTable({
        story_id: vectorFromArray(["s1"]),
        ticker: vectorFromArray(["AAA"]),
        headline: vectorFromArray(["AAA guidance"]),
        label: vectorFromArray(["positive"]),
        score: vectorFromArray([0.8]),
        timestamp: vectorFromArray([Date.UTC(2024, 2, 5, 10, 0)], new TimestampMillisecond()),
      }),
      "file",
    )
    const stories = parseStories(Table.decode("stories", "arrow", bytes))
    expect(stories[0].timestamp).toBe("2024-03-05T10:00:00.000")
    expect(
      buildStoryIndex(stories, { ...DEFAULT_CALENDAR_OPTIONS, originTimeZone: "America/New_York" }),
    ).toEqual([{ story_id: "s1", ticker: "AAA", date: "2024-03-05", is_intraday: true, target_minute: "2024-03-05T10:15" }])
  })
})
