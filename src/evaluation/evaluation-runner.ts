import type { EvaluationConfig } from '../types/config'
import { PrefixAllocator } from '../core/allocator'
import { aggregationCount } from '../core/aggregation'
import { resolveEvaluationConfig, parseBaseNetworks } from './config'
import { generateScenario, type Scenario } from './scenario-generator'
import { randomPairing } from './random-baseline'
import { seededRandom, type RandomSource } from './random'
import { createSilentLogger, type Logger } from '../utils/logger'

/**
 * Outcome of one trial: stable matching versus a random pairing of the same inputs.
 */
export interface TrialResult {
  /** 1-based trial number */
  trial: number
  requesterCount: number
  blockCount: number
  /** Aggregatable pairs in the stable matching */
  stableAggregations: number
  /** Aggregatable pairs in the random pairing */
  randomAggregations: number
  /** Pairs in the stable matching */
  matchedCount: number
  /** Proposal attempts made by the matching engine */
  proposals: number
}

/**
 * Totals across all trials of an evaluation.
 */
export interface EvaluationSummary {
  config: EvaluationConfig
  trials: TrialResult[]
  totalStableAggregations: number
  totalRandomAggregations: number
  meanStableAggregations: number
  meanRandomAggregations: number
  /** Trials where the stable matching had more aggregatable pairs */
  stableWins: number
  /** Trials where the random pairing had more aggregatable pairs */
  randomWins: number
  ties: number
}

export interface EvaluationRunOptions {
  /** Logs one info line per trial (default: silent) */
  logger?: Logger
  /** Allocator used for the stable matching (default: new PrefixAllocator()) */
  allocator?: PrefixAllocator
  /** Overrides the random source derived from config.seed */
  random?: RandomSource
}

/**
 * Runs the stable matching and a random pairing on one scenario.
 * Pure apart from the draws taken from `random`.
 */
export function runTrial(
  trial: number,
  scenario: Scenario,
  allocator: PrefixAllocator,
  random: RandomSource
): TrialResult {
  const { requesters, blocks } = scenario
  const allocation = allocator.allocate(requesters, blocks)
  const baseline = randomPairing(requesters, blocks, random)

  return {
    trial,
    requesterCount: requesters.length,
    blockCount: blocks.length,
    stableAggregations: allocation.stats.aggregatableCount,
    randomAggregations: aggregationCount(baseline, requesters),
    matchedCount: allocation.stats.matchedCount,
    proposals: allocation.stats.proposals,
  }
}

/**
 * Accumulates per-trial results into an evaluation summary.
 */
export function summarizeTrials(
  config: EvaluationConfig,
  trials: readonly TrialResult[]
): EvaluationSummary {
  let totalStableAggregations = 0
  let totalRandomAggregations = 0
  let stableWins = 0
  let randomWins = 0
  let ties = 0

  for (const result of trials) {
    totalStableAggregations += result.stableAggregations
    totalRandomAggregations += result.randomAggregations

    if (result.stableAggregations > result.randomAggregations) {
      stableWins++
    } else if (result.stableAggregations < result.randomAggregations) {
      randomWins++
    } else {
      ties++
    }
  }

  const count = trials.length
  return {
    config,
    trials: [...trials],
    totalStableAggregations,
    totalRandomAggregations,
    meanStableAggregations: count > 0 ? totalStableAggregations / count : 0,
    meanRandomAggregations: count > 0 ? totalRandomAggregations / count : 0,
    stableWins,
    randomWins,
    ties,
  }
}

/**
 * Generates a fresh scenario per trial, runs {@link runTrial} on each and
 * summarizes the results.
 *
 * @example
 * ```typescript
 * const summary = runEvaluation({ trials: 100, seed: 7 })
 * summary.meanStableAggregations > summary.meanRandomAggregations
 * ```
 */
export function runEvaluation(
  partialConfig: Partial<EvaluationConfig> = {},
  options: EvaluationRunOptions = {}
): EvaluationSummary {
  const config = resolveEvaluationConfig(partialConfig)
  const logger = options.logger ?? createSilentLogger()
  const allocator = options.allocator ?? new PrefixAllocator()
  const random =
    options.random ??
    (config.seed !== undefined ? seededRandom(config.seed) : Math.random)
  const baseNetworks = parseBaseNetworks(config.baseNetworks)

  const results: TrialResult[] = []
  for (let trial = 1; trial <= config.trials; trial++) {
    const scenario = generateScenario(
      {
        requesterCount: config.requesterCount,
        blockCount: config.blockCount,
        baseNetworks,
        prefixLengthRange: config.prefixLengthRange,
        maxGenerationAttempts: config.maxGenerationAttempts,
      },
      random
    )
    const result = runTrial(trial, scenario, allocator, random)
    results.push(result)

    logger.info(`Trial ${trial}/${config.trials}`, {
      stable: result.stableAggregations,
      random: result.randomAggregations,
    })
  }

  return summarizeTrials(config, results)
}
