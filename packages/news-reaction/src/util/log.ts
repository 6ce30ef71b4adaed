import pino, { type DestinationStream, type LevelWithSilent, type Logger, type LoggerOptions } from "pino"
import { Env } from "../env"
import { Global } from "../global"

export namespace Log {
  export type Level = LevelWithSilent

  export const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly Level[]

  function build(level: Level, destination: DestinationStream): Logger {
    const options: LoggerOptions = {
      level,
      base: { app: Global.App.name },
      formatters: {
        level: (label) => ({ severity: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    }
    return pino(options, destination)
  }

  let root = build(parseLevel(Env.get(Env.KEY.logLevel)) ?? "info", pino.destination(2))

  export function parseLevel(value: string | undefined): Level | undefined {
    const normalized = value?.trim().toLowerCase()
    return LEVELS.find((level) => level === normalized)
  }

  /** Reconfigure the root logger. Loggers created earlier keep their old settings. */
  export function init(options: { level: Level; destination?: DestinationStream }) {
    root = build(options.level, options.destination ?? pino.destination(2))
    return root
  }

  export function create(tags: { service: string } & Record<string, unknown>): Logger {
    return root.child(tags)
  }
}
