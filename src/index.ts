// Main entry point
export { PrefixPairing, AllocatorBuilder } from './builder/allocator-builder'

// Core classes
export { PrefixAllocator } from './core/allocator'
export { aggregationCount } from './core/aggregation'

// Address blocks and network relations
export {
  AddressBlock,
  ADDRESS_WIDTH,
  parseAddressBlock,
  toAddressBlock,
  formatAddress,
  prefixMask,
  isSupernetOf,
  supernet,
  isAggregatable,
  commonPrefixLength,
  type AddressFamily,
  type BlockKey,
  type ParseOptions,
} from './core/address'

// Preference ranking
export {
  scoreCompatibility,
  explainCompatibility,
  COMMON_PREFIX_WEIGHT,
  rankCandidatesFor,
  rankBlocksFor,
  scoreCandidatesFor,
  buildPreferenceMaps,
  validatePreferenceMaps,
  type CompatibilityScore,
  type RankedCandidate,
} from './core/ranking'

// Stable matching
export {
  deferredAcceptance,
  findBlockingPairs,
  isStableMatching,
  type DeferredAcceptanceResult,
  type BlockingPair,
} from './core/matching'

// Types
export type {
  RequesterId,
  Requester,
  RequesterInput,
  BlockInput,
  PreferenceMaps,
  Matching,
  AllocationStats,
  AllocationResult,
  AllocatorOptions,
  PrefixLengthRange,
  EvaluationConfig,
} from './types'

// Evaluation harness
export {
  seededRandom,
  shuffle,
  generateScenario,
  randomPairing,
  resolveEvaluationConfig,
  DEFAULT_BASE_NETWORKS,
  DEFAULT_EVALUATION_CONFIG,
  runTrial,
  runEvaluation,
  summarizeTrials,
  generateTextReport,
  generateMarkdownReport,
  improvementRatio,
  type RandomSource,
  type Scenario,
  type ScenarioOptions,
  type TrialResult,
  type EvaluationSummary,
  type EvaluationRunOptions,
  type ReportOptions,
} from './evaluation'

// Errors
export {
  PrefixPairingError,
  InvalidParameterError,
  ConfigurationError,
  InvalidAddressBlockError,
  AddressFamilyMismatchError,
  DuplicateEntityError,
  IncompletePreferenceListError,
  ScenarioGenerationError,
  isPrefixPairingError,
  requirePositiveInteger,
  requireNonNegativeInteger,
  requireNonEmptyArray,
  requireNonEmptyString,
  requireOneOf,
} from './utils/errors'

// Logging
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  type Logger,
} from './utils/logger'
