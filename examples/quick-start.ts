/**
 * Quick Start Example
 *
 * This example demonstrates the most basic usage of prefix-pairing. It shows how to:
 * - Describe requesters by their home prefixes
 * - Configure an allocator with the fluent builder
 * - Allocate a set of free blocks by stable matching
 * - Inspect preferences, leftovers and aggregation results
 */

import {
  PrefixPairing,
  createPrefixedLogger,
  defaultLogger,
  explainCompatibility,
  toAddressBlock,
  type RequesterInput,
} from '../src/index'

// Autonomous Systems asking for more address space, each with the prefix it already routes
const requesters: RequesterInput[] = [
  { id: 'AS64500', homeBlock: '10.0.0.0/24' },
  { id: 'AS64501', homeBlock: '192.168.4.0/23' },
  { id: 'AS64502', homeBlock: '198.51.100.64/26' },
]

// Blocks ready to be handed out
const freeBlocks = [
  '10.0.1.0/24',
  '198.51.100.0/26',
  '192.168.6.0/23',
  '172.16.0.0/22',
]

const allocator = PrefixPairing.create()
  .logger(createPrefixedLogger('quick-start', defaultLogger))
  .build()

const result = allocator.allocate(requesters, freeBlocks)

console.log('=== Allocation ===')
for (const requester of requesters) {
  const block = result.matching.get(requester.id)
  if (!block) {
    console.log(`${requester.id}: unmatched`)
    continue
  }

  const home = toAddressBlock(requester.homeBlock)
  const score = explainCompatibility(home, block)
  console.log(
    `${requester.id} (${home.key}) -> ${block.key} ` +
      `[score ${score.total}, aggregatable: ${score.aggregatable}]`
  )
}

console.log('\n=== Preferences ===')
for (const [id, ranked] of result.preferences.requesterPreferences) {
  console.log(`${id}: ${ranked.join(' > ')}`)
}

console.log('\n=== Leftovers ===')
console.log(`Unmatched blocks: ${result.unmatchedBlocks.join(', ') || 'none'}`)
console.log(
  `Aggregatable pairs: ${result.stats.aggregatableCount}/${result.stats.matchedCount} ` +
    `(${result.stats.proposals} proposals)`
)
