import type { Logger } from "pino"
import { writeArtifacts } from "../artifacts/write-artifacts"
import { toStudyOptions, type NewsReactionConfig } from "../config"
import { renderSummary, runNewsReactionStudy, type PipelineResult, type StudyTables } from "../finance/event-study"
import { Table } from "../storage/table"
import { Log } from "../util/log"

export type RunCommandResult = {
  result: PipelineResult
  report: string
  paths: Record<string, string>
  archived?: string
}

export async function readStudyTables(config: NewsReactionConfig): Promise<StudyTables> {
  const [stories, storyIndex, quotes, prices] = await Promise.all([
    Table.read("stories", config.inputs.stories),
    config.inputs.storyIndex ? Table.read("story_index", config.inputs.storyIndex) : Promise.resolve(undefined),
    Table.read("quotes", config.inputs.quotes),
    Table.read("prices", config.inputs.prices),
  ])
  return { stories, story_index: storyIndex, quotes, prices }
}

export async function runCommand(input: { config: NewsReactionConfig; logger?: Logger }): Promise<RunCommandResult> {
  const log = input.logger ?? Log.create({ service: "run" })
  const { config } = input

  log.info({ inputs: config.inputs, output_dir: config.outputDir }, "reading input tables")
  const tables = await readStudyTables(config)
  const result = runNewsReactionStudy({
    tables,
    options: toStudyOptions(config),
    logger: log.child({ stage: "event-study" }),
  })
  const report = renderSummary({ summary: result.summary, diagnostics: result.diagnostics })

  const ext = config.outputFormat === "json" ? "json" : "arrow"
  const written = await writeArtifacts({
    outputRoot: config.outputDir,
    archive: true,
    files: {
      [`event_returns.${ext}`]: Table.encode(config.outputFormat, result.event_returns),
      [`portfolio_daily.${ext}`]: Table.encode(config.outputFormat, result.portfolio_days),
      [`firm_day.${ext}`]: Table.encode(config.outputFormat, result.firm_days),
      "diagnostics.json": `${JSON.stringify({ diagnostics: result.diagnostics, summary: result.summary }, null, 2)}\n`,
      "summary.txt": report,
    },
  })
  log.info({ paths: written.paths, archived: written.archived ?? null }, "artifacts written")

  return {
    result,
    report,
    paths: written.paths,
    archived: written.archived,
  }
}
