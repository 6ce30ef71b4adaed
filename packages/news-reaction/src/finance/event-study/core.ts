import pino, { type Logger } from "pino"
import { computeEventReturns } from "./event-returns"
import { aggregateFirmDays, DEFAULT_SENTIMENT_THRESHOLD } from "./firm-day"
import { buildPortfolios, DEFAULT_MIN_LEG_SIZE, isLongShortEligible } from "./portfolio"
import { filterCommonStock, indexPrices } from "./price-history"
import { indexQuotes } from "./quote-panel"
import { parsePrices, parseQuotes, parseStories, parseStoryIndex, type RawTable } from "./schema"
import { summarizePortfolios, TRADING_DAYS_PER_YEAR } from "./summary"
import { assertTimeZone, buildStoryIndex, DEFAULT_CALENDAR_OPTIONS, parseClock } from "./trading-calendar"
import type { CalendarOptions, PipelineResult } from "./types"

export interface StudyOptions {
  calendar: CalendarOptions
  targetOffsetMinutes: number
  sentimentThreshold: number
  minLegSize: number
  annualizationFactor: number
  commonStockOnly: boolean
}

export const DEFAULT_STUDY_OPTIONS: StudyOptions = Object.freeze({
  calendar: DEFAULT_CALENDAR_OPTIONS,
  targetOffsetMinutes: 15,
  sentimentThreshold: DEFAULT_SENTIMENT_THRESHOLD,
  minLegSize: DEFAULT_MIN_LEG_SIZE,
  annualizationFactor: TRADING_DAYS_PER_YEAR,
  commonStockOnly: false,
})

export interface StudyTables {
  stories: RawTable
  /** Derived from the stories' timestamps when absent. */
  story_index?: RawTable
  quotes: RawTable
  prices: RawTable
}

/**
 * Run the full study: validate every input table up front, then compute story-level
 * returns, firm-day sentiment, daily portfolios and the performance summary. Diagnostics
 * go to `logger`; without one the run is silent.
 */
export function runNewsReactionStudy(input: {
  tables: StudyTables
  options?: StudyOptions
  logger?: Logger
}): PipelineResult {
  const options = input.options ?? DEFAULT_STUDY_OPTIONS
  const log = input.logger ?? pino({ level: "silent" })
  const { calendar } = options
  assertTimeZone(calendar.originTimeZone)
  assertTimeZone(calendar.localTimeZone)
  parseClock(calendar.sessionOpen, "sessionOpen")
  parseClock(calendar.rolloverCutoff, "rolloverCutoff")

  const stories = parseStories(input.tables.stories)
  const index = input.tables.story_index
    ? parseStoryIndex(input.tables.story_index, calendar.localTimeZone)
    : undefined
  const quoteRows = parseQuotes(input.tables.quotes, calendar.localTimeZone)
  const rawPrices = parsePrices(input.tables.prices)
  log.info(
    {
      stories: stories.length,
      story_index: index?.length ?? null,
      quotes: quoteRows.length,
      prices: rawPrices.length,
    },
    "input tables validated",
  )

  const priceRows = options.commonStockOnly ? filterCommonStock(rawPrices) : rawPrices
  const prices = indexPrices(priceRows)
  if (prices.duplicates > 0) log.warn({ duplicates: prices.duplicates }, "dropped duplicate daily price rows")

  const quotes = indexQuotes(quoteRows)
  const droppedNullMid = quoteRows.filter((row) => row.mid === null).length

  const storyIndex = index ?? buildStoryIndex(stories, calendar, options.targetOffsetMinutes)
  if (!index) log.info({ entries: storyIndex.length }, "derived story index from story timestamps")

  const events = computeEventReturns({ stories, index: storyIndex, prices, quotes })
  const diag = events.diagnostics
  log.info(
    {
      stories: diag.total,
      quote_matched: diag.quote_matched,
      intraday: diag.intraday,
      price_matched: diag.price_matched,
    },
    `${diag.total} stories, ${diag.quote_matched} matched t+${options.targetOffsetMinutes} quote`,
  )
  if (diag.dropped_without_ticker > 0 || diag.unindexed_stories > 0) {
    log.warn(
      { without_ticker: diag.dropped_without_ticker, unindexed: diag.unindexed_stories },
      "labeled stories excluded from the study",
    )
  }
  if (diag.initial_reaction.zero_denominator > 0 || diag.drift.zero_denominator > 0) {
    log.warn(
      {
        initial_reaction: diag.initial_reaction.zero_denominator,
        drift: diag.drift.zero_denominator,
      },
      "returns nulled by zero denominators",
    )
  }

  const firmDays = aggregateFirmDays(events.records, { threshold: options.sentimentThreshold })
  const portfolioDays = buildPortfolios(firmDays, { minLegSize: options.minLegSize })
  const summary = summarizePortfolios(portfolioDays, {
    annualizationFactor: options.annualizationFactor,
    firmDayObservations: firmDays.length,
  })

  const portfolios = {
    days: portfolioDays.length,
    long_short_eligible_days: portfolioDays.filter((day) => isLongShortEligible(day, options.minLegSize)).length,
    empty_long_leg_days: portfolioDays.filter((day) => day.n_positive === 0).length,
    empty_short_leg_days: portfolioDays.filter((day) => day.n_negative === 0).length,
  }
  log.info({ firm_days: firmDays.length, ...portfolios }, "portfolios built")
  summary.legs
    .filter((leg) => leg.status === "no_data")
    .forEach((leg) => log.warn({ metric: leg.metric, leg: leg.leg }, "no observations for portfolio series"))

  return {
    event_returns: events.records,
    firm_days: firmDays,
    portfolio_days: portfolioDays,
    summary,
    diagnostics: {
      prices: {
        rows: prices.size,
        duplicates: prices.duplicates,
        filtered_non_common: rawPrices.length - priceRows.length,
      },
      quotes: {
        rows: quotes.size,
        dropped_null_mid: droppedNullMid,
      },
      events: diag,
      portfolios,
    },
  }
}
