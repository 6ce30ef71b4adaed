import { normalizeTicker } from "./price-history"
import type {
  EventReturnDiagnostics,
  EventReturnRecord,
  EventStory,
  LabeledStory,
  MetricDiagnostics,
  PriceLookup,
  QuoteLookup,
  ReturnOutcome,
  StoryIndexEntry,
} from "./types"

/** `(end - start) / start`, null when an operand is missing or the base is zero. */
export function simpleReturn(start: number | null, end: number | null): ReturnOutcome {
  if (start === null || end === null) return { value: null, status: "missing_input" }
  if (start === 0) return { value: null, status: "zero_denominator" }
  return { value: (end - start) / start, status: "ok" }
}

/**
 * Intraday stories react from the previous close to the mid 15 minutes after the story
 * and drift from today's close to the next close. Overnight stories react at the open
 * and drift from open to close.
 */
export function computeEventReturn(story: EventStory, prices: PriceLookup, quotes: QuoteLookup): EventReturnRecord {
  const price = prices.get(story.ticker, story.date)
  const open = price?.open ?? null
  const close = price?.close ?? null
  const prevClose = price?.prev_close ?? null
  const nextClose = price?.next_close ?? null

  const mid =
    story.is_intraday && story.target_minute !== null
      ? (quotes.lookupMid(story.ticker, story.date, story.target_minute) ?? null)
      : null

  const initialReaction = story.is_intraday ? simpleReturn(prevClose, mid) : simpleReturn(prevClose, open)
  const drift = story.is_intraday ? simpleReturn(close, nextClose) : simpleReturn(open, close)

  return {
    ...story,
    mid_t15: mid,
    open,
    close,
    prev_close: prevClose,
    next_close: nextClose,
    initial_reaction: initialReaction.value,
    initial_reaction_status: initialReaction.status,
    drift: drift.value,
    drift_status: drift.status,
  }
}

function storyKey(storyID: string, ticker: string) {
  return `${storyID}|${ticker}`
}

/** Inner join of labeled stories with the story index on (story_id, ticker). */
export function joinStories(stories: readonly LabeledStory[], index: readonly StoryIndexEntry[]) {
  const entries = new Map<string, StoryIndexEntry>()
  index.forEach((entry) => {
    const ticker = normalizeTicker(entry.ticker)
    entries.set(storyKey(entry.story_id, ticker), { ...entry, ticker })
  })

  const joined: EventStory[] = []
  let droppedWithoutTicker = 0
  let unindexed = 0
  for (const story of stories) {
    const ticker = story.ticker ? normalizeTicker(story.ticker) : ""
    if (!ticker) {
      droppedWithoutTicker += 1
      continue
    }
    const entry = entries.get(storyKey(story.story_id, ticker))
    if (!entry) {
      unindexed += 1
      continue
    }
    joined.push({
      ...entry,
      headline: story.headline,
      label: story.label,
      score: story.score,
    })
  }

  return {
    stories: joined,
    droppedWithoutTicker,
    unindexed,
  }
}

function emptyMetric(): MetricDiagnostics {
  return { ok: 0, missing_input: 0, zero_denominator: 0 }
}

export function computeEventReturns(input: {
  stories: readonly LabeledStory[]
  index: readonly StoryIndexEntry[]
  prices: PriceLookup
  quotes: QuoteLookup
}): { records: EventReturnRecord[]; diagnostics: EventReturnDiagnostics } {
  const joined = joinStories(input.stories, input.index)
  const records = joined.stories.map((story) => computeEventReturn(story, input.prices, input.quotes))

  const diagnostics: EventReturnDiagnostics = {
    labeled_stories: input.stories.length,
    dropped_without_ticker: joined.droppedWithoutTicker,
    unindexed_stories: joined.unindexed,
    total: records.length,
    intraday: 0,
    overnight: 0,
    quote_matched: 0,
    price_matched: 0,
    initial_reaction: emptyMetric(),
    drift: emptyMetric(),
  }
  for (const record of records) {
    if (record.is_intraday) diagnostics.intraday += 1
    else diagnostics.overnight += 1
    if (record.mid_t15 !== null) diagnostics.quote_matched += 1
    if (input.prices.get(record.ticker, record.date)) diagnostics.price_matched += 1
    diagnostics.initial_reaction[record.initial_reaction_status] += 1
    diagnostics.drift[record.drift_status] += 1
  }

  return { records, diagnostics }
}
