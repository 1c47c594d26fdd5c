import { AddressBlock, prefixMask } from '../core/address/address-block'
import type { PrefixLengthRange } from '../types/config'
import type { Requester } from '../types/requester'
import { ScenarioGenerationError } from '../utils/errors'
import {
  pickOne,
  randomBigIntBelow,
  randomInt,
  type RandomSource,
} from './random'

/**
 * Requesters and blocks for one trial.
 */
export interface Scenario {
  requesters: Requester[]
  blocks: AddressBlock[]
}

/**
 * Inputs for {@link generateScenario}. Base networks are already parsed.
 */
export interface ScenarioOptions {
  requesterCount: number
  blockCount: number
  baseNetworks: readonly AddressBlock[]
  prefixLengthRange: PrefixLengthRange
  /** Redraws allowed per block when its key is already taken */
  maxGenerationAttempts: number
}

/**
 * Draws a host address inside `base`. Network and broadcast addresses are
 * skipped when the block has more than two addresses.
 */
export function randomHostAddress(base: AddressBlock, random: RandomSource): bigint {
  const size = base.size
  const offset =
    size > 2n ? 1n + randomBigIntBelow(random, size - 2n) : randomBigIntBelow(random, size)
  return base.network + offset
}

/**
 * Draws a block: random base network, random host inside it, random prefix
 * length from the range, host bits cleared.
 */
export function randomBlock(
  baseNetworks: readonly AddressBlock[],
  range: PrefixLengthRange,
  random: RandomSource
): AddressBlock {
  const base = pickOne(random, baseNetworks)
  const host = randomHostAddress(base, random)
  const prefixLength = randomInt(random, range.min, range.max)
  return new AddressBlock(
    base.family,
    host & prefixMask(prefixLength, base.width),
    prefixLength
  )
}

/**
 * Generates requesters `AS1..ASn` with random home blocks, and blocks with
 * unique keys. Requester home blocks may repeat.
 *
 * @throws ScenarioGenerationError when a unique block cannot be drawn within
 *   the attempt limit
 */
export function generateScenario(
  options: ScenarioOptions,
  random: RandomSource
): Scenario {
  const { baseNetworks, prefixLengthRange } = options

  const requesters: Requester[] = []
  for (let i = 1; i <= options.requesterCount; i++) {
    requesters.push({
      id: `AS${i}`,
      homeBlock: randomBlock(baseNetworks, prefixLengthRange, random),
    })
  }

  const blocks: AddressBlock[] = []
  const taken = new Set<string>()
  while (blocks.length < options.blockCount) {
    let block: AddressBlock | undefined
    for (let attempt = 0; attempt < options.maxGenerationAttempts; attempt++) {
      const candidate = randomBlock(baseNetworks, prefixLengthRange, random)
      if (!taken.has(candidate.key)) {
        block = candidate
        break
      }
    }

    if (!block) {
      throw new ScenarioGenerationError(
        `Could not draw a unique block after ${options.maxGenerationAttempts} attempts`,
        { generated: blocks.length, requested: options.blockCount }
      )
    }

    taken.add(block.key)
    blocks.push(block)
  }

  return { requesters, blocks }
}
