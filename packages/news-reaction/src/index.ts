import { parseArgs } from "node:util"
import { runCommand } from "./command/run"
import { loadConfig, type NewsReactionConfigOverrides } from "./config"
import { NewsReactionError } from "./finance/event-study/errors"
import { Log } from "./util/log"

export * from "./finance/event-study"
export { loadConfig, toStudyOptions, NewsReactionConfig, type NewsReactionConfigOverrides } from "./config"
export { runCommand, readStudyTables } from "./command/run"
export { Table } from "./storage/table"
export { writeArtifacts } from "./artifacts/write-artifacts"
export { Log } from "./util/log"

const USAGE = `news-reaction: news event returns and daily sentiment portfolios

Usage:
  news-reaction run [options]
  news-reaction help

Options:
  --config <file>        JSON config file (default: ./news-reaction.json if present)
  --data-dir <dir>       base directory for relative input and output paths
  --stories <file>       labeled stories table (.arrow, .feather, .json)
  --story-index <file>   intraday story index; derived from story timestamps when omitted
  --quotes <file>        minute mid-quote panel
  --prices <file>        daily price panel
  --out <dir>            output directory
  --format <arrow|json>  output table format
  --origin-tz <tz>       time zone of timestamps without an offset (default UTC)
  --local-tz <tz>        exchange time zone (default America/New_York)
  --min-leg-size <n>     minimum firm-days per leg for long-short (default 2)
  --common-stock-only    keep share codes 10/11 on exchanges 1-3 when present
  --log-level <level>    fatal | error | warn | info | debug | trace | silent
`

type Output = { write(chunk: string): unknown }

function toNumber(flag: string, value: string | undefined) {
  if (value === undefined) return undefined
  const number = Number(value)
  if (!Number.isFinite(number)) throw new NewsReactionError(`--${flag} must be a number: ${value}`, "INVALID_CONFIG")
  return number
}

function toFormat(value: string | undefined) {
  if (value === undefined) return undefined
  if (value === "arrow" || value === "json") return value
  throw new NewsReactionError(`--format must be arrow or json: ${value}`, "INVALID_CONFIG")
}

export async function main(
  argv: string[],
  io: { stdout: Output; stderr: Output } = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  try {
    const { positionals, values } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        config: { type: "string" },
        "data-dir": { type: "string" },
        stories: { type: "string" },
        "story-index": { type: "string" },
        quotes: { type: "string" },
        prices: { type: "string" },
        out: { type: "string" },
        format: { type: "string" },
        "origin-tz": { type: "string" },
        "local-tz": { type: "string" },
        "min-leg-size": { type: "string" },
        "common-stock-only": { type: "boolean" },
        "log-level": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    })

    const command = positionals[0] ?? "help"
    if (values.help || command === "help") {
      io.stdout.write(USAGE)
      return 0
    }
    if (command !== "run") {
      io.stderr.write(`Unknown command: ${command}\n\n${USAGE}`)
      return 1
    }

    const overrides: NewsReactionConfigOverrides = {
      dataDir: values["data-dir"],
      inputs: {
        stories: values.stories,
        storyIndex: values["story-index"],
        quotes: values.quotes,
        prices: values.prices,
      },
      outputDir: values.out,
      outputFormat: toFormat(values.format),
      calendar: {
        originTimeZone: values["origin-tz"],
        localTimeZone: values["local-tz"],
      },
      minLegSize: toNumber("min-leg-size", values["min-leg-size"]),
      commonStockOnly: values["common-stock-only"],
      logLevel: values["log-level"],
    }

    const config = await loadConfig({ file: values.config, overrides })
    Log.init({ level: config.logLevel })
    const { report } = await runCommand({ config })
    io.stdout.write(report)
    return 0
  } catch (error) {
    const wrapped = NewsReactionError.wrap(error)
    io.stderr.write(`news-reaction: ${wrapped.message}\n`)
    return 1
  }
}
