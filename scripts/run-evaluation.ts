#!/usr/bin/env npx tsx
/**
 * Evaluation Script
 *
 * Generates synthetic requesters and address blocks, allocates them by
 * stable matching, and compares the number of aggregatable pairs with a
 * uniformly random pairing of the same inputs.
 *
 * Usage:
 *   npx tsx scripts/run-evaluation.ts
 *
 * Or with custom parameters:
 *   npx tsx scripts/run-evaluation.ts --trials=100 --requesters=20 --blocks=20 --seed=42 --format=markdown
 */

import {
  createPrefixedLogger,
  defaultLogger,
  generateMarkdownReport,
  generateTextReport,
  isPrefixPairingError,
  requireOneOf,
  runEvaluation,
  type EvaluationConfig,
} from '../src/index'

type ReportFormat = 'text' | 'markdown'

const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'markdown']

interface CliOptions {
  config: Partial<EvaluationConfig>
  format: ReportFormat
  verbose: boolean
}

function parseArgs(args: string[]): CliOptions {
  const config: Partial<EvaluationConfig> = {}
  let format: ReportFormat = 'text'
  let verbose = false

  for (const arg of args) {
    const [flag, value = ''] = arg.split('=')
    switch (flag) {
      case '--trials':
        config.trials = parseInt(value, 10)
        break
      case '--requesters':
        config.requesterCount = parseInt(value, 10)
        break
      case '--blocks':
        config.blockCount = parseInt(value, 10)
        break
      case '--seed':
        config.seed = parseInt(value, 10)
        break
      case '--format':
        format = requireOneOf(value, REPORT_FORMATS, '--format')
        break
      case '--verbose':
        verbose = true
        break
      default:
        throw new Error(`Unknown argument '${arg}'`)
    }
  }

  return { config, format, verbose }
}

function main(): void {
  const { config, format, verbose } = parseArgs(process.argv.slice(2))

  const summary = runEvaluation(config, {
    logger: verbose ? createPrefixedLogger('evaluation', defaultLogger) : undefined,
  })

  const report =
    format === 'markdown'
      ? generateMarkdownReport(summary, { includeTrials: verbose })
      : generateTextReport(summary, { includeTrials: true })

  console.log(report)
}

try {
  main()
} catch (error) {
  if (isPrefixPairingError(error)) {
    console.error(`[${error.code}] ${error.message}`)
  } else {
    console.error(error)
  }
  process.exitCode = 1
}
