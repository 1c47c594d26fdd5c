import type { AddressBlock } from '../core/address/address-block'
import type { Matching } from '../types/matching'
import type { Requester } from '../types/requester'
import { shuffle, type RandomSource } from './random'

/**
 * Pairs requesters with a uniformly shuffled copy of the blocks, in
 * requester order. Pairs min(|requesters|, |blocks|) entities.
 */
export function randomPairing(
  requesters: readonly Requester[],
  blocks: readonly AddressBlock[],
  random: RandomSource
): Matching {
  const shuffled = shuffle(random, blocks)
  const matching: Matching = new Map()
  const count = Math.min(requesters.length, shuffled.length)

  for (let i = 0; i < count; i++) {
    matching.set(requesters[i].id, shuffled[i])
  }

  return matching
}
