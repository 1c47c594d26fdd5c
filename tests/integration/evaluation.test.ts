import { describe, it, expect } from 'vitest'
import { runEvaluation } from '../../src/evaluation/evaluation-runner'
import { generateMarkdownReport, generateTextReport } from '../../src/evaluation/report-generator'

describe('Stable matching against random pairing', () => {
  it('aggregates more often than a random pairing over many trials', () => {
    const summary = runEvaluation({ trials: 100, seed: 12345 })

    expect(summary.trials).toHaveLength(100)
    expect(summary.meanStableAggregations).toBeGreaterThan(summary.meanRandomAggregations)
    expect(summary.stableWins).toBeGreaterThan(summary.randomWins)
  })

  it('runs over IPv6 base networks', () => {
    const summary = runEvaluation({
      trials: 5,
      requesterCount: 6,
      blockCount: 6,
      baseNetworks: ['2001:db8::/32'],
      prefixLengthRange: { min: 44, max: 48 },
      seed: 3,
    })

    expect(summary.trials.every((trial) => trial.matchedCount === 6)).toBe(true)
  })

  it('renders both report formats from one run', () => {
    const summary = runEvaluation({ trials: 2, requesterCount: 3, blockCount: 3, seed: 1 })

    const text = generateTextReport(summary)
    const markdown = generateMarkdownReport(summary, { includeTrials: true })

    expect(text.split('\n')[0]).toBe(`${summary.totalStableAggregations} stable matching aggregations`)
    expect(markdown.startsWith('# Stable Matching vs Random Pairing\n')).toBe(true)
    expect(markdown).toContain('| Seed | 1 |')
  })
})
