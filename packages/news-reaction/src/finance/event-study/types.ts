export type IsoDate = string

/** Local wall-clock minute, `YYYY-MM-DDTHH:MM`. */
export type MinuteKey = string

export const STORY_LABEL = ["positive", "negative", "unknown"] as const
export type StoryLabel = (typeof STORY_LABEL)[number]

export const SENTIMENT = ["positive", "negative", "neutral"] as const
export type Sentiment = (typeof SENTIMENT)[number]

export type TimestampInput = string | number | Date

export interface CalendarOptions {
  originTimeZone: string
  localTimeZone: string
  /** `HH:MM`, inclusive start of the intraday window. */
  sessionOpen: string
  /** `HH:MM`, exclusive end of the intraday window and trading-date rollover. */
  rolloverCutoff: string
}

export interface LocalDateTime {
  date: IsoDate
  hour: number
  minute: number
  second: number
  millisecond: number
}

export interface NormalizedTimestamp {
  epochMs: number
  local: LocalDateTime
  date: IsoDate
  isIntraday: boolean
}

export interface LabeledStory {
  story_id: string
  ticker: string | null
  timestamp: TimestampInput | null
  headline: string | null
  label: StoryLabel
  score: number | null
}

export interface StoryIndexEntry {
  story_id: string
  ticker: string
  date: IsoDate
  is_intraday: boolean
  target_minute: MinuteKey | null
}

export interface DailyPriceRow {
  ticker: string
  date: IsoDate
  open: number | null
  close: number | null
  share_code?: number | null
  exchange_code?: number | null
}

export interface DailyPrice {
  ticker: string
  date: IsoDate
  open: number | null
  close: number | null
  prev_close: number | null
  next_close: number | null
}

export interface PriceLookup {
  readonly size: number
  readonly duplicates: number
  get(ticker: string, date: IsoDate): DailyPrice | undefined
}

export interface MinuteQuoteRow {
  ticker: string
  date: IsoDate
  minute: MinuteKey
  mid: number | null
}

export interface QuoteLookup {
  readonly size: number
  lookupMid(ticker: string, date: IsoDate, minute: MinuteKey): number | undefined
}

/** A labeled story joined with its index entry, ready for return computation. */
export interface EventStory extends StoryIndexEntry {
  headline: string | null
  label: StoryLabel
  score: number | null
}

export const RETURN_STATUS = ["ok", "missing_input", "zero_denominator"] as const
export type ReturnStatus = (typeof RETURN_STATUS)[number]

export interface ReturnOutcome {
  value: number | null
  status: ReturnStatus
}

export interface EventReturnRecord extends EventStory {
  mid_t15: number | null
  open: number | null
  close: number | null
  prev_close: number | null
  next_close: number | null
  initial_reaction: number | null
  initial_reaction_status: ReturnStatus
  drift: number | null
  drift_status: ReturnStatus
}

export interface MetricDiagnostics {
  ok: number
  missing_input: number
  zero_denominator: number
}

export interface EventReturnDiagnostics {
  labeled_stories: number
  dropped_without_ticker: number
  unindexed_stories: number
  total: number
  intraday: number
  overnight: number
  quote_matched: number
  price_matched: number
  initial_reaction: MetricDiagnostics
  drift: MetricDiagnostics
}

export interface FirmDayRecord {
  ticker: string
  date: IsoDate
  avg_score: number | null
  n_stories: number
  initial_reaction: number | null
  drift: number | null
  sentiment: Sentiment
}

export interface PortfolioDayRecord {
  date: IsoDate
  n_positive: number
  n_negative: number
  n_neutral: number
  ir_long_only: number | null
  ir_short_only: number | null
  ir_long_short: number | null
  drift_long_only: number | null
  drift_short_only: number | null
  drift_long_short: number | null
}

export const PORTFOLIO_METRIC = ["initial_reaction", "drift"] as const
export type PortfolioMetric = (typeof PORTFOLIO_METRIC)[number]

export const PORTFOLIO_LEG = ["long_short", "long_only", "short_only"] as const
export type PortfolioLeg = (typeof PORTFOLIO_LEG)[number]

export interface SeriesStats {
  sampleCount: number
  hitRate: number
  mean: number
  stdev: number
}

export type LegSummary =
  | {
      metric: PortfolioMetric
      leg: PortfolioLeg
      status: "no_data"
    }
  | {
      metric: PortfolioMetric
      leg: PortfolioLeg
      status: "ok"
      trading_days: number
      hit_rate: number
      mean: number
      stdev: number
      /** Annualized; only computed for drift, NaN when stdev is zero. */
      sharpe: number | null
    }

export interface PerformanceSummary {
  legs: LegSummary[]
  firm_day_observations: number
  trading_days: number
}

export interface PipelineDiagnostics {
  prices: {
    rows: number
    duplicates: number
    filtered_non_common: number
  }
  quotes: {
    rows: number
    dropped_null_mid: number
  }
  events: EventReturnDiagnostics
  portfolios: {
    days: number
    long_short_eligible_days: number
    empty_long_leg_days: number
    empty_short_leg_days: number
  }
}

export interface PipelineResult {
  event_returns: EventReturnRecord[]
  firm_days: FirmDayRecord[]
  portfolio_days: PortfolioDayRecord[]
  summary: PerformanceSummary
  diagnostics: PipelineDiagnostics
}
