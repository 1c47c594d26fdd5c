import type { AddressBlock, BlockKey } from '../core/address/address-block'
import type { RequesterId } from './requester'

/**
 * Both sides' preference lists, most preferred first.
 * Every list ranks the entire opposite side exactly once.
 */
export interface PreferenceMaps {
  /** For each requester, all block keys ordered by preference */
  requesterPreferences: Map<RequesterId, BlockKey[]>
  /** For each block key, all requester ids ordered by preference */
  blockPreferences: Map<BlockKey, RequesterId[]>
}

/**
 * Final assignment: at most one block per requester and one requester per block.
 * Requesters absent from the map are unmatched.
 */
export type Matching = Map<RequesterId, AddressBlock>

/**
 * Counters describing one allocation run.
 */
export interface AllocationStats {
  /** Number of requesters supplied */
  requesterCount: number
  /** Number of blocks supplied */
  blockCount: number
  /** Number of requester-block pairs in the matching */
  matchedCount: number
  /** Proposal attempts made by requesters; never exceeds requesterCount × blockCount */
  proposals: number
  /** Matched pairs whose home block and assigned block can be aggregated */
  aggregatableCount: number
}

/**
 * Complete result of an allocation run.
 */
export interface AllocationResult {
  /** Requester id → assigned block */
  matching: Matching
  /** Preference lists that produced the matching */
  preferences: PreferenceMaps
  /** Requesters left without a block, in input order */
  unmatchedRequesters: RequesterId[]
  /** Blocks left without a requester, in input order */
  unmatchedBlocks: BlockKey[]
  /** Run counters */
  stats: AllocationStats
}
