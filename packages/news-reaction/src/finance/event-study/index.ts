export * from "./types"
export * from "./errors"
export {
  DEFAULT_CALENDAR_OPTIONS,
  addDays,
  assertTimeZone,
  buildStoryIndex,
  minuteKeyOf,
  normalizeTimestamp,
  parseClock,
  targetMinute,
  toEpochMs,
  toLocalDateTime,
  toMinuteKey,
} from "./trading-calendar"
export { filterCommonStock, indexPrices, normalizeTicker } from "./price-history"
export { canonicalTicker, indexQuotes } from "./quote-panel"
export { computeEventReturn, computeEventReturns, joinStories, simpleReturn } from "./event-returns"
export { DEFAULT_SENTIMENT_THRESHOLD, aggregateFirmDays, classifySentiment, meanOf } from "./firm-day"
export { DEFAULT_MIN_LEG_SIZE, buildPortfolios, isLongShortEligible } from "./portfolio"
export {
  SUMMARY_SERIES,
  TRADING_DAYS_PER_YEAR,
  annualizedSharpe,
  computeSeriesStats,
  summarizePortfolios,
} from "./summary"
export { renderSummary } from "./render"
export {
  TABLE_COLUMNS,
  parsePrices,
  parseQuotes,
  parseStories,
  parseStoryIndex,
  requireColumns,
  type RawTable,
} from "./schema"
export { DEFAULT_STUDY_OPTIONS, runNewsReactionStudy, type StudyOptions, type StudyTables } from "./core"
