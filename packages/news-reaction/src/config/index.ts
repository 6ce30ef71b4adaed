import fs from "fs/promises"
import path from "path"
import z from "zod"
import { Env } from "../env"
import { ConfigError } from "../finance/event-study/errors"
import type { StudyOptions } from "../finance/event-study/core"
import { assertTimeZone } from "../finance/event-study/trading-calendar"
import { Global } from "../global"
import { Table } from "../storage/table"
import { Log } from "../util/log"

const CLOCK = /^([01]\d|2[0-3]):[0-5]\d$/

const timeZone = z
  .string()
  .min(1)
  .refine(
    (value) => {
      try {
        assertTimeZone(value)
        return true
      } catch {
        return false
      }
    },
    (value) => ({ message: `unknown IANA time zone '${value}'` }),
  )

const clock = z.string().regex(CLOCK, "expected HH:MM")

const Inputs = z.object({
  stories: z.string().min(1),
  storyIndex: z.string().min(1).optional(),
  quotes: z.string().min(1),
  prices: z.string().min(1),
})

const Calendar = z.object({
  originTimeZone: timeZone,
  localTimeZone: timeZone,
  sessionOpen: clock,
  rolloverCutoff: clock,
})

export const NewsReactionConfig = z
  .object({
    dataDir: z.string().min(1),
    inputs: Inputs,
    outputDir: z.string().min(1),
    outputFormat: z.enum(Table.FORMAT),
    calendar: Calendar,
    targetOffsetMinutes: z.number().int().min(0).max(390),
    sentimentThreshold: z.number().min(0).max(1),
    minLegSize: z.number().int().min(1),
    annualizationFactor: z.number().positive(),
    commonStockOnly: z.boolean(),
    logLevel: z.enum(Log.LEVELS),
  })
  .refine((config) => config.calendar.sessionOpen < config.calendar.rolloverCutoff, {
    message: "sessionOpen must be earlier than rolloverCutoff",
    path: ["calendar", "sessionOpen"],
  })

export type NewsReactionConfig = z.infer<typeof NewsReactionConfig>

export const NewsReactionConfigOverrides = z
  .object({
    dataDir: z.string(),
    inputs: Inputs.partial(),
    outputDir: z.string(),
    outputFormat: z.enum(Table.FORMAT),
    calendar: Calendar.partial(),
    targetOffsetMinutes: z.number(),
    sentimentThreshold: z.number(),
    minLegSize: z.number(),
    annualizationFactor: z.number(),
    commonStockOnly: z.boolean(),
    logLevel: z.string(),
  })
  .partial()
  .strict()

export type NewsReactionConfigOverrides = z.infer<typeof NewsReactionConfigOverrides>

export const DEFAULT_INPUTS = {
  stories: path.join("interim", "labeled_stories.arrow"),
  quotes: path.join("clean", "quote_minute.arrow"),
  prices: "daily_prices.arrow",
} as const

function describeIssues(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ")
}

async function readConfigFile(filepath: string, required: boolean): Promise<NewsReactionConfigOverrides> {
  const text = await fs.readFile(filepath, "utf8").catch((error) => {
    if (!required && error instanceof Error && "code" in error && error.code === "ENOENT") return undefined
    throw new ConfigError(`Cannot read config file ${filepath}`, {
      path: filepath,
      cause: error instanceof Error ? error.message : String(error),
    })
  })
  if (text === undefined) return {}

  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`Config file ${filepath} is not valid JSON`, {
      path: filepath,
      cause: error instanceof Error ? error.message : String(error),
    })
  }
  const parsed = NewsReactionConfigOverrides.safeParse(value)
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filepath}: ${describeIssues(parsed.error)}`, { path: filepath })
  }
  return parsed.data
}

function fromEnv(env: NodeJS.ProcessEnv): NewsReactionConfigOverrides {
  const out: NewsReactionConfigOverrides = {}
  const dataDir = Env.get(Env.KEY.dataDir, env)
  const logLevel = Env.get(Env.KEY.logLevel, env)
  const localTimeZone = Env.get(Env.KEY.localTimeZone, env)
  const originTimeZone = Env.get(Env.KEY.originTimeZone, env)
  if (dataDir) out.dataDir = dataDir
  if (logLevel) out.logLevel = logLevel
  if (localTimeZone || originTimeZone) {
    out.calendar = {
      ...(localTimeZone ? { localTimeZone } : {}),
      ...(originTimeZone ? { originTimeZone } : {}),
    }
  }
  return out
}

/**
 * Resolve configuration from defaults, a JSON config file, the environment and explicit
 * overrides, in increasing precedence. Relative input and output paths resolve against
 * the data directory.
 */
export async function loadConfig(
  input: {
    file?: string
    cwd?: string
    env?: NodeJS.ProcessEnv
    overrides?: NewsReactionConfigOverrides
  } = {},
): Promise<NewsReactionConfig> {
  const cwd = input.cwd ?? process.cwd()
  const file = input.file
    ? await readConfigFile(path.resolve(cwd, input.file), true)
    : await readConfigFile(path.join(cwd, Global.App.configFile), false)
  const overrides = NewsReactionConfigOverrides.safeParse(input.overrides ?? {})
  if (!overrides.success) throw new ConfigError(`Invalid config overrides: ${describeIssues(overrides.error)}`)

  // highest precedence first
  const layers = [overrides.data, fromEnv(input.env ?? process.env), file]
  const pick = <T>(read: (layer: NewsReactionConfigOverrides) => T | undefined) =>
    layers.map(read).find((value) => value !== undefined)

  const dataDir = path.resolve(cwd, pick((layer) => layer.dataDir) ?? Global.Path.data)
  const resolve = (value: string) => path.resolve(dataDir, value)
  const storyIndex = pick((layer) => layer.inputs?.storyIndex)

  const parsed = NewsReactionConfig.safeParse({
    dataDir,
    inputs: {
      stories: resolve(pick((layer) => layer.inputs?.stories) ?? DEFAULT_INPUTS.stories),
      storyIndex: storyIndex ? resolve(storyIndex) : undefined,
      quotes: resolve(pick((layer) => layer.inputs?.quotes) ?? DEFAULT_INPUTS.quotes),
      prices: resolve(pick((layer) => layer.inputs?.prices) ?? DEFAULT_INPUTS.prices),
    },
    outputDir: resolve(pick((layer) => layer.outputDir) ?? "clean"),
    outputFormat: pick((layer) => layer.outputFormat) ?? "arrow",
    calendar: {
      originTimeZone: pick((layer) => layer.calendar?.originTimeZone) ?? "UTC",
      localTimeZone: pick((layer) => layer.calendar?.localTimeZone) ?? "America/New_York",
      sessionOpen: pick((layer) => layer.calendar?.sessionOpen) ?? "09:30",
      rolloverCutoff: pick((layer) => layer.calendar?.rolloverCutoff) ?? "16:00",
    },
    targetOffsetMinutes: pick((layer) => layer.targetOffsetMinutes) ?? 15,
    sentimentThreshold: pick((layer) => layer.sentimentThreshold) ?? 0.5,
    minLegSize: pick((layer) => layer.minLegSize) ?? 2,
    annualizationFactor: pick((layer) => layer.annualizationFactor) ?? 252,
    commonStockOnly: pick((layer) => layer.commonStockOnly) ?? false,
    logLevel: pick((layer) => layer.logLevel)?.toLowerCase() ?? "info",
  })
  if (!parsed.success) throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`)
  return parsed.data
}

export function toStudyOptions(config: NewsReactionConfig): StudyOptions {
  return {
    calendar: config.calendar,
    targetOffsetMinutes: config.targetOffsetMinutes,
    sentimentThreshold: config.sentimentThreshold,
    minLegSize: config.minLegSize,
    annualizationFactor: config.annualizationFactor,
    commonStockOnly: config.commonStockOnly,
  }
}
