import { InvalidTimeZoneError, InvalidTimestampError } from "./errors"
import type {
  CalendarOptions,
  IsoDate,
  LabeledStory,
  LocalDateTime,
  MinuteKey,
  NormalizedTimestamp,
  StoryIndexEntry,
  TimestampInput,
} from "./types"

const MS_PER_MINUTE = 60_000
const CLOCK_RE = /^(\d{2}):(\d{2})$/
const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i

export const DEFAULT_CALENDAR_OPTIONS: CalendarOptions = Object.freeze({
  originTimeZone: "UTC",
  localTimeZone: "America/New_York",
  sessionOpen: "09:30",
  rolloverCutoff: "16:00",
})

const formatters = new Map<string, Intl.DateTimeFormat>()

function formatterFor(timeZone: string) {
  const cached = formatters.get(timeZone)
  if (cached) return cached
  let formatter: Intl.DateTimeFormat
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    })
  } catch (error) {
    if (error instanceof RangeError) throw new InvalidTimeZoneError(timeZone)
    throw error
  }
  formatters.set(timeZone, formatter)
  return formatter
}

export function assertTimeZone(timeZone: string) {
  formatterFor(timeZone)
  return timeZone
}

function pad(value: number, width = 2) {
  return String(value).padStart(width, "0")
}

export function parseClock(value: string, field = "clock") {
  const match = CLOCK_RE.exec(value.trim())
  const hour = Number(match?.[1])
  const minute = Number(match?.[2])
  if (!match || hour > 23 || minute > 59) {
    throw new InvalidTimestampError(value, { field, expected: "HH:MM" })
  }
  return (hour * 60 + minute) * MS_PER_MINUTE
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const value = new Date(`${date}T00:00:00.000Z`)
  value.setUTCDate(value.getUTCDate() + days)
  return value.toISOString().slice(0, 10)
}

export function toLocalDateTime(epochMs: number, timeZone: string): LocalDateTime {
  const parts = formatterFor(timeZone).formatToParts(new Date(epochMs))
  const part = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((item) => item.type === type)?.value)
  const year = part("year")
  return {
    date: `${pad(year, 4)}-${pad(part("month"))}-${pad(part("day"))}`,
    hour: part("hour"),
    minute: part("minute"),
    second: part("second"),
    millisecond: ((epochMs % 1000) + 1000) % 1000,
  }
}

function offsetAt(epochMs: number, timeZone: string) {
  const local = toLocalDateTime(epochMs, timeZone)
  const [year, month, day] = local.date.split("-").map(Number)
  const wall = Date.UTC(year, month - 1, day, local.hour, local.minute, local.second, local.millisecond)
  return wall - epochMs
}

function zonedWallTimeToEpoch(wallAsUtc: number, timeZone: string) {
  const guess = wallAsUtc - offsetAt(wallAsUtc, timeZone)
  return wallAsUtc - offsetAt(guess, timeZone)
}

function parseOffset(value: string) {
  if (value.toUpperCase() === "Z") return 0
  const sign = value.startsWith("-") ? -1 : 1
  const digits = value.slice(1).replace(":", "")
  const hours = Number(digits.slice(0, 2))
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0
  return sign * (hours * 60 + minutes) * MS_PER_MINUTE
}

/**
 * Resolve a timestamp to epoch milliseconds. Strings without an offset are wall-clock
 * times in `originTimeZone`; numbers are epoch milliseconds.
 */
export function toEpochMs(input: TimestampInput, originTimeZone: string): number {
  if (input instanceof Date) {
    const epochMs = input.getTime()
    if (!Number.isFinite(epochMs)) throw new InvalidTimestampError(input)
    return epochMs
  }
  if (typeof input === "number") {
    if (!Number.isFinite(input)) throw new InvalidTimestampError(input)
    return input
  }

  const match = TIMESTAMP_RE.exec(input.trim())
  if (!match) throw new InvalidTimestampError(input)
  const [, yearRaw, monthRaw, dayRaw, hourRaw, minuteRaw, secondRaw, fractionRaw, zone] = match
  const year = Number(yearRaw)
  const month = Number(monthRaw)
  const day = Number(dayRaw)
  const hour = Number(hourRaw ?? 0)
  const minute = Number(minuteRaw ?? 0)
  const second = Number(secondRaw ?? 0)
  const millisecond = Number((fractionRaw ?? "0").padEnd(3, "0").slice(0, 3))

  const wallAsUtc = Date.UTC(year, month - 1, day, hour, minute, second, millisecond)
  const check = new Date(wallAsUtc)
  if (
    !Number.isFinite(wallAsUtc) ||
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() + 1 !== month ||
    check.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    throw new InvalidTimestampError(input)
  }

  if (zone) return wallAsUtc - parseOffset(zone)
  return zonedWallTimeToEpoch(wallAsUtc, assertTimeZone(originTimeZone))
}

function msOfDay(local: LocalDateTime) {
  return ((local.hour * 60 + local.minute) * 60 + local.second) * 1000 + local.millisecond
}

/**
 * Map a story timestamp to its trading date and intraday flag. News at or after the
 * rollover cutoff belongs to the next calendar day; the intraday window is
 * [sessionOpen, rolloverCutoff).
 */
export function normalizeTimestamp(
  input: TimestampInput,
  options: CalendarOptions = DEFAULT_CALENDAR_OPTIONS,
): NormalizedTimestamp {
  const epochMs = toEpochMs(input, options.originTimeZone)
  const local = toLocalDateTime(epochMs, assertTimeZone(options.localTimeZone))
  const open = parseClock(options.sessionOpen, "sessionOpen")
  const cutoff = parseClock(options.rolloverCutoff, "rolloverCutoff")
  const time = msOfDay(local)

  return {
    epochMs,
    local,
    date: time < cutoff ? local.date : addDays(local.date, 1),
    isIntraday: time >= open && time < cutoff,
  }
}

export function toMinuteKey(local: LocalDateTime): MinuteKey {
  return `${local.date}T${pad(local.hour)}:${pad(local.minute)}`
}

/** Local wall-clock minute of `input + offsetMinutes`, floored to the minute. */
export function targetMinute(
  input: TimestampInput,
  options: CalendarOptions = DEFAULT_CALENDAR_OPTIONS,
  offsetMinutes = 15,
): MinuteKey {
  const epochMs = toEpochMs(input, options.originTimeZone) + offsetMinutes * MS_PER_MINUTE
  return toMinuteKey(toLocalDateTime(epochMs, assertTimeZone(options.localTimeZone)))
}

/** Minute key for a quote bucket or index entry; naive values are already local wall-clock. */
export function minuteKeyOf(input: TimestampInput, localTimeZone: string): MinuteKey {
  return toMinuteKey(toLocalDateTime(toEpochMs(input, localTimeZone), assertTimeZone(localTimeZone)))
}

export function buildStoryIndex(
  stories: readonly LabeledStory[],
  options: CalendarOptions = DEFAULT_CALENDAR_OPTIONS,
  offsetMinutes = 15,
): StoryIndexEntry[] {
  const entries: StoryIndexEntry[] = []
  for (const story of stories) {
    if (!story.ticker || story.timestamp === null) continue
    const normalized = normalizeTimestamp(story.timestamp, options)
    entries.push({
      story_id: story.story_id,
      ticker: story.ticker,
      date: normalized.date,
      is_intraday: normalized.isIntraday,
      target_minute: normalized.isIntraday ? targetMinute(normalized.epochMs, options, offsetMinutes) : null,
    })
  }
  return entries
}
