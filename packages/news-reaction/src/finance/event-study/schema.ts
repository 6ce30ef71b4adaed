import z from "zod"
import { InputSchemaViolationError, InvalidInputRowError, NewsReactionError } from "./errors"
import { canonicalTicker } from "./quote-panel"
import { minuteKeyOf } from "./trading-calendar"
import { STORY_LABEL } from "./types"
import type { DailyPriceRow, LabeledStory, MinuteQuoteRow, StoryIndexEntry, StoryLabel } from "./types"

export interface RawTable {
  name: string
  columns: readonly string[]
  rows: readonly Record<string, unknown>[]
}

export const TABLE_COLUMNS = {
  stories: ["story_id", "ticker", "headline", "label", "score", "timestamp"],
  story_index: ["story_id", "ticker", "date", "is_intraday", "target_minute"],
  quotes: ["date", "ticker", "minute_ts", "mid"],
  prices: ["date", "ticker", "open", "close"],
} as const

const ISO_PREFIX_RE = /^(\d{4}-\d{2}-\d{2})(?:$|[T ])/

export function requireColumns(table: RawTable, required: readonly string[]) {
  const present = new Set(table.columns)
  for (const column of required) {
    if (!present.has(column)) {
      throw new InputSchemaViolationError(table.name, column, { present: [...table.columns] })
    }
  }
}

const isoDate = z.union([z.string(), z.number(), z.date()]).transform((value, ctx) => {
  if (typeof value === "string") {
    const match = ISO_PREFIX_RE.exec(value.trim())
    const date = match?.[1]
    const epochMs = date ? Date.parse(`${date}T00:00:00.000Z`) : Number.NaN
    if (date && Number.isFinite(epochMs) && new Date(epochMs).toISOString().startsWith(date)) return date
  } else {
    const date = value instanceof Date ? value : new Date(value)
    if (Number.isFinite(date.getTime())) return date.toISOString().slice(0, 10)
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date ${String(value)}` })
  return z.NEVER
})

const nullableNumber = z
  .union([z.number(), z.bigint(), z.null(), z.undefined()])
  .transform((value) => {
    if (value === null || value === undefined) return null
    const number = Number(value)
    return Number.isFinite(number) ? number : null
  })

const nullableString = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((value) => (value === null || value === undefined ? null : String(value)))

const identifier = z.union([z.string().min(1), z.number(), z.bigint()]).transform((value) => String(value))

const timestamp = z
  .union([z.string(), z.number(), z.bigint(), z.date(), z.null(), z.undefined()])
  .transform((value) => {
    if (value === null || value === undefined) return null
    return typeof value === "bigint" ? Number(value) : value
  })

const flag = z.union([z.boolean(), z.literal(0), z.literal(1)]).transform((value) => Boolean(value))

const label = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((value): StoryLabel => {
    const normalized = value?.trim().toLowerCase()
    return STORY_LABEL.find((item) => item === normalized) ?? "unknown"
  })

const score = nullableNumber.refine((value) => value === null || (value >= 0 && value <= 1), {
  message: "score must lie in [0, 1]",
})

export const LabeledStoryRow = z.object({
  story_id: identifier,
  ticker: nullableString,
  timestamp,
  headline: nullableString,
  label,
  score,
})

export const StoryIndexRow = z.object({
  story_id: identifier,
  ticker: z.string().min(1),
  date: isoDate,
  is_intraday: flag,
  target_minute: timestamp,
})

export const QuoteRow = z.object({
  ticker: nullableString,
  sym_root: nullableString.optional(),
  sym_suffix: nullableString.optional(),
  date: isoDate,
  minute_ts: z.union([z.string(), z.number(), z.bigint(), z.date()]),
  mid: nullableNumber,
})

export const PriceRow = z.object({
  ticker: z.string().min(1),
  date: isoDate,
  open: nullableNumber,
  close: nullableNumber,
  share_code: nullableNumber.optional(),
  exchange_code: nullableNumber.optional(),
})

function parseRows<Schema extends z.ZodTypeAny, Row>(
  table: RawTable,
  schema: Schema,
  map: (value: z.output<Schema>, rowIndex: number) => Row,
): Row[] {
  return table.rows.map((row, rowIndex) => {
    const parsed = schema.safeParse(row)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new InvalidInputRowError(table.name, rowIndex, `${issue?.path.join(".") ?? "row"}: ${issue?.message}`)
    }
    try {
      return map(parsed.data, rowIndex)
    } catch (error) {
      if (error instanceof InvalidInputRowError) throw error
      if (error instanceof NewsReactionError) {
        throw new InvalidInputRowError(table.name, rowIndex, error.message, error.details)
      }
      throw error
    }
  })
}

export function parseStories(table: RawTable): LabeledStory[] {
  requireColumns(table, TABLE_COLUMNS.stories)
  return parseRows(table, LabeledStoryRow, (row) => row)
}

export function parseStoryIndex(table: RawTable, localTimeZone: string): StoryIndexEntry[] {
  requireColumns(table, TABLE_COLUMNS.story_index)
  return parseRows(table, StoryIndexRow, (row) => ({
    story_id: row.story_id,
    ticker: row.ticker,
    date: row.date,
    is_intraday: row.is_intraday,
    target_minute: row.target_minute === null ? null : minuteKeyOf(row.target_minute, localTimeZone),
  }))
}

export function parseQuotes(table: RawTable, localTimeZone: string): MinuteQuoteRow[] {
  const hasRoot = table.columns.includes("sym_root")
  requireColumns(
    table,
    TABLE_COLUMNS.quotes.filter((column) => !(hasRoot && column === "ticker")),
  )
  return parseRows(table, QuoteRow, (row, rowIndex) => {
    const ticker = row.ticker ?? (row.sym_root ? canonicalTicker(row.sym_root, row.sym_suffix) : null)
    if (!ticker) throw new InvalidInputRowError(table.name, rowIndex, "ticker or sym_root is required")
    const minute = typeof row.minute_ts === "bigint" ? Number(row.minute_ts) : row.minute_ts
    return {
      ticker,
      date: row.date,
      minute: minuteKeyOf(minute, localTimeZone),
      mid: row.mid,
    }
  })
}

export function parsePrices(table: RawTable): DailyPriceRow[] {
  requireColumns(table, TABLE_COLUMNS.prices)
  return parseRows(table, PriceRow, (row) => row)
}
