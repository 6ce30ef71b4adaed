import type { PerformanceSummary, PipelineDiagnostics, PortfolioLeg, PortfolioMetric } from "./types"

const RULE = "=".repeat(70)

const METRIC_LABEL: Record<PortfolioMetric, string> = {
  initial_reaction: "Initial Reaction",
  drift: "Drift",
}

const LEG_LABEL: Record<PortfolioLeg, string> = {
  long_short: "Long-Short",
  long_only: "Long-Only",
  short_only: "Short-Only",
}

function percent(value: number, digits: number) {
  return `${(value * 100).toFixed(digits)}%`
}

export function renderSummary(input: {
  summary: PerformanceSummary
  diagnostics?: PipelineDiagnostics
  title?: string
}) {
  const lines = [RULE, input.title ?? "News Reaction: Portfolio Performance", RULE]

  for (const item of input.summary.legs) {
    const heading = `${METRIC_LABEL[item.metric]} | ${LEG_LABEL[item.leg]}`
    if (item.status === "no_data") {
      lines.push("", `  ${heading}: no data`)
      continue
    }
    lines.push("", `  ${heading}:`)
    lines.push(`    Hit Rate     : ${percent(item.hit_rate, 1)}`)
    lines.push(`    Mean Return  : ${percent(item.mean, 4)} daily`)
    if (item.sharpe !== null) {
      // NaN when the series has no spread
      const sharpe = Number.isNaN(item.sharpe) ? "n/a" : `${item.sharpe.toFixed(2)} (annualized)`
      lines.push(`    Sharpe Ratio : ${sharpe}`)
    }
    lines.push(`    Trading Days : ${item.trading_days}`)
  }

  lines.push(
    "",
    `  Firm-Day Observations: ${input.summary.firm_day_observations.toLocaleString("en-US")}`,
    `  Trading Days (total): ${input.summary.trading_days}`,
  )

  const diagnostics = input.diagnostics
  if (diagnostics) {
    const events = diagnostics.events
    lines.push(
      "",
      "  Diagnostics:",
      `    Stories joined      : ${events.total} of ${events.labeled_stories} labeled`,
      `    Intraday / overnight: ${events.intraday} / ${events.overnight}`,
      `    Quote t+15 matched  : ${events.quote_matched} of ${events.intraday} intraday`,
      `    Daily price matched : ${events.price_matched} of ${events.total}`,
      `    Initial reaction    : ${events.initial_reaction.ok} ok, ${events.initial_reaction.missing_input} missing input, ${events.initial_reaction.zero_denominator} zero denominator`,
      `    Drift               : ${events.drift.ok} ok, ${events.drift.missing_input} missing input, ${events.drift.zero_denominator} zero denominator`,
      `    Long-short days     : ${diagnostics.portfolios.long_short_eligible_days} of ${diagnostics.portfolios.days} eligible`,
    )
  }

  lines.push(RULE)
  return `${lines.join("\n")}\n`
}
