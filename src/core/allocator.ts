import type { AllocatorOptions } from '../types/config'
import type { AllocationResult, Matching } from '../types/matching'
import type { BlockInput, Requester, RequesterInput } from '../types/requester'
import { AddressBlock, toAddressBlock } from './address/address-block'
import {
  buildPreferenceMaps,
  validatePreferenceMaps,
} from './ranking/preference-ranker'
import { deferredAcceptance } from './matching/stable-matcher'
import { aggregationCount } from './aggregation'
import {
  AddressFamilyMismatchError,
  DuplicateEntityError,
  requireNonEmptyString,
} from '../utils/errors'
import { createSilentLogger, type Logger } from '../utils/logger'

/**
 * Assigns address blocks to requesters by stable matching over
 * aggregation-compatibility preferences.
 *
 * Requesters propose, so each one receives the best block it can hold in any
 * stable matching.
 *
 * @example
 * ```typescript
 * const allocator = new PrefixAllocator()
 * const result = allocator.allocate(
 *   [
 *     { id: 'AS1', homeBlock: '10.0.0.0/24' },
 *     { id: 'AS2', homeBlock: '192.168.0.0/24' },
 *   ],
 *   ['10.0.1.0/24', '192.168.1.0/24']
 * )
 * result.matching.get('AS1')?.key // '10.0.1.0/24'
 * ```
 */
export class PrefixAllocator {
  private readonly logger: Logger
  private readonly validatePreferences: boolean
  private readonly strictParsing: boolean

  constructor(options: AllocatorOptions = {}) {
    this.logger = options.logger ?? createSilentLogger()
    this.validatePreferences = options.validatePreferences ?? true
    this.strictParsing = options.strictParsing ?? false
  }

  /**
   * Runs one allocation: parses inputs once, builds both preference maps,
   * and runs requester-proposing deferred acceptance.
   *
   * @param requesters - Requesters with their home blocks; ids must be unique
   * @param blocks - Allocatable blocks; canonical keys must be unique
   * @returns The matching with its preferences, leftovers and counters
   * @throws InvalidAddressBlockError when a CIDR string is malformed
   * @throws DuplicateEntityError when an id or block key repeats
   * @throws AddressFamilyMismatchError when IPv4 and IPv6 blocks are mixed
   */
  allocate(
    requesters: readonly RequesterInput[],
    blocks: readonly BlockInput[]
  ): AllocationResult {
    const parsedRequesters = this.ingestRequesters(requesters)
    const parsedBlocks = this.ingestBlocks(blocks)
    requireSingleFamily([
      ...parsedRequesters.map((r) => r.homeBlock),
      ...parsedBlocks,
    ])

    if (parsedRequesters.length !== parsedBlocks.length) {
      this.logger.warn('Requester and block counts differ; some will stay unmatched', {
        requesters: parsedRequesters.length,
        blocks: parsedBlocks.length,
      })
    }

    const preferences = buildPreferenceMaps(parsedRequesters, parsedBlocks)
    if (this.validatePreferences) {
      validatePreferenceMaps(
        preferences,
        parsedRequesters.map((r) => r.id),
        parsedBlocks.map((b) => b.key)
      )
    }

    const outcome = deferredAcceptance(
      preferences.requesterPreferences,
      preferences.blockPreferences
    )

    const blocksByKey = new Map(parsedBlocks.map((b) => [b.key, b]))
    const matching: Matching = new Map()
    for (const requester of parsedRequesters) {
      const key = outcome.pairs.get(requester.id)
      const block = key === undefined ? undefined : blocksByKey.get(key)
      if (block) {
        matching.set(requester.id, block)
      }
    }

    const stats = {
      requesterCount: parsedRequesters.length,
      blockCount: parsedBlocks.length,
      matchedCount: matching.size,
      proposals: outcome.proposals,
      aggregatableCount: aggregationCount(matching, parsedRequesters),
    }

    this.logger.debug('Allocation complete', { ...stats })

    return {
      matching,
      preferences,
      unmatchedRequesters: outcome.unmatchedProposers,
      unmatchedBlocks: outcome.unmatchedAcceptors,
      stats,
    }
  }

  private ingestRequesters(inputs: readonly RequesterInput[]): Requester[] {
    const seen = new Set<string>()
    return inputs.map((input) => {
      requireNonEmptyString(input.id, 'requester.id')
      if (seen.has(input.id)) {
        throw new DuplicateEntityError('requester', input.id)
      }
      seen.add(input.id)
      return {
        id: input.id,
        homeBlock: toAddressBlock(input.homeBlock, { strict: this.strictParsing }),
      }
    })
  }

  private ingestBlocks(inputs: readonly BlockInput[]): AddressBlock[] {
    const seen = new Set<string>()
    return inputs.map((input) => {
      const block = toAddressBlock(input, { strict: this.strictParsing })
      if (seen.has(block.key)) {
        throw new DuplicateEntityError('block', block.key)
      }
      seen.add(block.key)
      return block
    })
  }
}

/**
 * Every home block and allocatable block must share the family of the first
 * one seen.
 */
function requireSingleFamily(blocks: readonly AddressBlock[]): void {
  const [first] = blocks
  if (!first) {
    return
  }
  const offending = blocks.find((block) => block.family !== first.family)
  if (offending) {
    throw new AddressFamilyMismatchError(first.key, offending.key)
  }
}
