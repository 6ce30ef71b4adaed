import pino from "pino"
import { describe, expect, test } from "vitest"
import { runNewsReactionStudy } from "./core"
import type { RawTable } from "./schema"

function rawTable(name: string, columns: string[], rows: Record<string, unknown>[]): RawTable {
  return { name, columns, rows }
}

const tables = {
  stories: rawTable(
    "stories",
    ["story_id", "ticker", "headline", "label", "score", "timestamp"],
    [
      { story_id: "s1", ticker: "AAA", headline: "AAA beats", label: "positive", score: 0.9, timestamp: "2024-03-05T13:00:00Z" },
      { story_id: "s2", ticker: null, headline: "market wrap", label: "unknown", score: null, timestamp: "2024-03-05T13:00:00Z" },
    ],
  ),
  quotes: rawTable("quotes", ["date", "ticker", "minute_ts", "mid"], []),
  prices: rawTable(
    "prices",
    ["date", "ticker", "open", "close"],
    [
      { date: "2024-03-04", ticker: "AAA", open: 99, close: 100 },
      { date: "2024-03-05", ticker: "AAA", open: 101, close: 102 },
    ],
  ),
}

describe("runNewsReactionStudy", () => {
  test("logs diagnostics to the logger it is given", () => {
    const lines: Record<string, unknown>[] = []
    const logger = pino({ level: "info" }, { write: (line: string) => void lines.push(JSON.parse(line)) })

    const result = runNewsReactionStudy({ tables, logger })
    expect(result.event_returns).toHaveLength(1)

    const messages = lines.map((line) => line.msg)
    expect(messages.slice(0, 3)).toEqual([
      "input tables validated",
      "derived story index from story timestamps",
      "1 stories, 0 matched t+15 quote",
    ])
    expect(lines.find((line) => line.msg === "labeled stories excluded from the study")).toMatchObject({
      level: 40,
      without_ticker: 1,
      unindexed: 0,
    })
    expect(messages.filter((message) => message === "no observations for portfolio series")).toHaveLength(4)
  })

  test("runs without a logger", () => {
    const result = runNewsReactionStudy({ tables })
    expect(result.firm_days).toHaveLength(1)
    expect(result.portfolio_days[0].ir_long_only).toBe(0.01)
  })
})
