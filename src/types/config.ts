import type { Logger } from '../utils/logger'

/**
 * Options for a {@link PrefixAllocator} instance.
 */
export interface AllocatorOptions {
  /** Receives a debug line per run and a warning when the two sides differ in size (default: silent) */
  logger?: Logger
  /** Check that every preference list ranks the full opposite side before matching (default: true) */
  validatePreferences?: boolean
  /** Reject CIDR strings with host bits set instead of clearing them (default: false) */
  strictParsing?: boolean
}

/**
 * Inclusive range of prefix lengths drawn by the scenario generator.
 */
export interface PrefixLengthRange {
  min: number
  max: number
}

/**
 * Configuration for an evaluation run comparing stable matching with a random baseline.
 */
export interface EvaluationConfig {
  /** Number of independent trials (default: 10) */
  trials: number
  /** Requesters generated per trial (default: 10) */
  requesterCount: number
  /** Blocks generated per trial (default: 10) */
  blockCount: number
  /** Prefix lengths drawn for generated blocks (default: 22-29) */
  prefixLengthRange: PrefixLengthRange
  /** Networks from which generated addresses are drawn */
  baseNetworks: string[]
  /** Seed for reproducible runs; Math.random is used when omitted */
  seed?: number
  /** Redraws allowed per generated block when its key collides (default: 50) */
  maxGenerationAttempts: number
}
