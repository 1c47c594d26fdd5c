/**
 * Report generation for evaluation summaries.
 * Generates plain text and markdown reports.
 */

import type { EvaluationSummary } from './evaluation-runner'

export interface ReportOptions {
  title?: string
  includeConfig?: boolean
  includeTrials?: boolean
  decimalPlaces?: number
}

/**
 * Formats a number to a fixed number of decimal places.
 */
function formatNumber(value: number, decimals: number = 2): string {
  return value.toFixed(decimals)
}

/**
 * Formats a ratio (0-1 value) as a percentage string.
 */
function formatPercent(value: number, decimals: number = 1): string {
  return `${(value * 100).toFixed(decimals)}%`
}

/**
 * Generates a markdown table from headers and rows.
 */
function generateTable(headers: string[], rows: string[][]): string {
  const separator = headers.map(() => '---').join(' | ')
  const headerRow = headers.join(' | ')
  const dataRows = rows.map((row) => `| ${row.join(' | ')} |`)

  return [`| ${headerRow} |`, `| ${separator} |`, ...dataRows].join('\n')
}

/**
 * Relative improvement of the stable mean over the random mean, or null
 * when the random mean is zero.
 */
export function improvementRatio(summary: EvaluationSummary): number | null {
  if (summary.meanRandomAggregations === 0) {
    return null
  }
  return (
    (summary.meanStableAggregations - summary.meanRandomAggregations) /
    summary.meanRandomAggregations
  )
}

/**
 * Generates a short plain text report, one line per fact.
 */
export function generateTextReport(
  summary: EvaluationSummary,
  options: ReportOptions = {}
): string {
  const decimals = options.decimalPlaces ?? 2
  const lines: string[] = []

  if (options.includeTrials) {
    for (const trial of summary.trials) {
      lines.push(
        `Trial ${trial.trial}: stable=${trial.stableAggregations} random=${trial.randomAggregations}`
      )
    }
    lines.push('')
  }

  lines.push(`${summary.totalStableAggregations} stable matching aggregations`)
  lines.push(`${summary.totalRandomAggregations} random pairing aggregations`)
  lines.push(
    `Mean per trial: stable=${formatNumber(summary.meanStableAggregations, decimals)} random=${formatNumber(summary.meanRandomAggregations, decimals)}`
  )
  lines.push(
    `Wins: stable=${summary.stableWins} random=${summary.randomWins} ties=${summary.ties}`
  )

  return lines.join('\n')
}

/**
 * Generates a markdown report with a summary table and, optionally, the
 * configuration and per-trial results.
 */
export function generateMarkdownReport(
  summary: EvaluationSummary,
  options: ReportOptions = {}
): string {
  const {
    title = 'Stable Matching vs Random Pairing',
    includeConfig = true,
    includeTrials = false,
    decimalPlaces = 2,
  } = options
  const sections: string[] = [`# ${title}`]

  if (includeConfig) {
    const { config } = summary
    sections.push(
      [
        '## Configuration',
        '',
        generateTable(
          ['Setting', 'Value'],
          [
            ['Trials', String(config.trials)],
            ['Requesters per trial', String(config.requesterCount)],
            ['Blocks per trial', String(config.blockCount)],
            [
              'Prefix lengths',
              `/${config.prefixLengthRange.min} - /${config.prefixLengthRange.max}`,
            ],
            ['Base networks', config.baseNetworks.join(', ')],
            ['Seed', config.seed === undefined ? 'none' : String(config.seed)],
          ]
        ),
      ].join('\n')
    )
  }

  const improvement = improvementRatio(summary)
  sections.push(
    [
      '## Summary',
      '',
      generateTable(
        ['Metric', 'Stable', 'Random'],
        [
          [
            'Total aggregations',
            String(summary.totalStableAggregations),
            String(summary.totalRandomAggregations),
          ],
          [
            'Mean per trial',
            formatNumber(summary.meanStableAggregations, decimalPlaces),
            formatNumber(summary.meanRandomAggregations, decimalPlaces),
          ],
          ['Trials won', String(summary.stableWins), String(summary.randomWins)],
        ]
      ),
      '',
      `Ties: ${summary.ties}`,
      `Improvement over random: ${improvement === null ? 'n/a' : formatPercent(improvement)}`,
    ].join('\n')
  )

  if (includeTrials) {
    sections.push(
      [
        '## Trials',
        '',
        generateTable(
          ['Trial', 'Stable', 'Random', 'Matched', 'Proposals'],
          summary.trials.map((trial) => [
            String(trial.trial),
            String(trial.stableAggregations),
            String(trial.randomAggregations),
            String(trial.matchedCount),
            String(trial.proposals),
          ])
        ),
      ].join('\n')
    )
  }

  return sections.join('\n\n') + '\n'
}
