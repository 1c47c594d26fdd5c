import type { AddressBlock } from '../address/address-block'
import { commonPrefixLength, isAggregatable } from '../address/relations'
import { AddressFamilyMismatchError } from '../../utils/errors'

/** Weight of the shared-prefix term relative to prefix-length similarity. */
export const COMMON_PREFIX_WEIGHT = 2

/**
 * Breakdown of a compatibility score between two blocks.
 */
export interface CompatibilityScore {
  /** Leading bits shared by both network addresses */
  commonPrefixLength: number
  /** Absolute difference between the two prefix lengths */
  prefixLengthDelta: number
  /** commonPrefixLength × COMMON_PREFIX_WEIGHT */
  proximityScore: number
  /** Address width minus prefixLengthDelta */
  prefixSimilarityScore: number
  /** proximityScore + prefixSimilarityScore */
  total: number
  /** Whether the two blocks can be aggregated */
  aggregatable: boolean
}

/**
 * Scores how well two blocks fit together, field by field.
 *
 * @throws AddressFamilyMismatchError when the blocks belong to different families
 */
export function explainCompatibility(x: AddressBlock, y: AddressBlock): CompatibilityScore {
  if (x.family !== y.family) {
    throw new AddressFamilyMismatchError(x.key, y.key)
  }

  const shared = commonPrefixLength(x, y)
  const prefixLengthDelta = Math.abs(x.prefixLength - y.prefixLength)
  const proximityScore = COMMON_PREFIX_WEIGHT * shared
  const prefixSimilarityScore = x.width - prefixLengthDelta

  return {
    commonPrefixLength: shared,
    prefixLengthDelta,
    proximityScore,
    prefixSimilarityScore,
    total: proximityScore + prefixSimilarityScore,
    aggregatable: isAggregatable(x, y),
  }
}

/**
 * Compatibility score between two blocks: shared leading bits count twice,
 * plus the address width minus the prefix length difference.
 * Symmetric in its arguments.
 *
 * @example
 * ```typescript
 * scoreCompatibility(
 *   parseAddressBlock('10.0.0.0/24'),
 *   parseAddressBlock('10.0.1.0/24')
 * ) // 2 * 23 + (32 - 0) = 78
 * ```
 */
export function scoreCompatibility(x: AddressBlock, y: AddressBlock): number {
  return (
    COMMON_PREFIX_WEIGHT * commonPrefixLength(x, y) +
    (x.width - Math.abs(x.prefixLength - y.prefixLength))
  )
}
