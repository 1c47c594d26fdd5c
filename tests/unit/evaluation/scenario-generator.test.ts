import { describe, it, expect } from 'vitest'
import { parseAddressBlock } from '../../../src/core/address/address-block'
import { isSupernetOf } from '../../../src/core/address/relations'
import {
  generateScenario,
  randomBlock,
  randomHostAddress,
  type ScenarioOptions,
} from '../../../src/evaluation/scenario-generator'
import { DEFAULT_BASE_NETWORKS, parseBaseNetworks } from '../../../src/evaluation/config'
import { seededRandom } from '../../../src/evaluation/random'
import { ScenarioGenerationError } from '../../../src/utils/errors'

const baseNetworks = parseBaseNetworks(DEFAULT_BASE_NETWORKS)

const options: ScenarioOptions = {
  requesterCount: 5,
  blockCount: 8,
  baseNetworks,
  prefixLengthRange: { min: 22, max: 29 },
  maxGenerationAttempts: 50,
}

describe('randomHostAddress', () => {
  it('skips the network address of larger blocks', () => {
    const base = parseAddressBlock('10.0.0.0/30')

    expect(randomHostAddress(base, () => 0)).toBe(base.network + 1n)
    expect(randomHostAddress(base, () => 0.99)).toBe(base.network + 2n)
  })

  it('uses every address of /31 and /32 blocks', () => {
    expect(randomHostAddress(parseAddressBlock('10.0.0.0/31'), () => 0)).toBe(
      parseAddressBlock('10.0.0.0/31').network
    )
    expect(randomHostAddress(parseAddressBlock('10.0.0.7/32'), () => 0.5)).toBe(
      parseAddressBlock('10.0.0.7/32').network
    )
  })
})

describe('randomBlock', () => {
  it('draws a block within the prefix range related to a base network', () => {
    const random = seededRandom(11)
    for (let i = 0; i < 50; i++) {
      const block = randomBlock(baseNetworks, { min: 22, max: 29 }, random)

      expect(block.prefixLength).toBeGreaterThanOrEqual(22)
      expect(block.prefixLength).toBeLessThanOrEqual(29)
      expect(
        baseNetworks.some((base) => isSupernetOf(base, block) || isSupernetOf(block, base))
      ).toBe(true)
    }
  })

  it('keeps the base network family', () => {
    const block = randomBlock(
      [parseAddressBlock('2001:db8::/32')],
      { min: 48, max: 64 },
      seededRandom(4)
    )

    expect(block.family).toBe('ipv6')
    expect(isSupernetOf(parseAddressBlock('2001:db8::/32'), block)).toBe(true)
  })
})

describe('generateScenario', () => {
  it('numbers requesters AS1..ASn', () => {
    const scenario = generateScenario(options, seededRandom(42))

    expect(scenario.requesters.map((r) => r.id)).toEqual(['AS1', 'AS2', 'AS3', 'AS4', 'AS5'])
  })

  it('draws the requested number of unique blocks', () => {
    const scenario = generateScenario(options, seededRandom(42))
    const keys = scenario.blocks.map((b) => b.key)

    expect(keys).toHaveLength(8)
    expect(new Set(keys).size).toBe(8)
  })

  it('is reproducible for a seed', () => {
    const first = generateScenario(options, seededRandom(42))
    const second = generateScenario(options, seededRandom(42))

    expect(first.blocks.map((b) => b.key)).toEqual(second.blocks.map((b) => b.key))
    expect(first.requesters.map((r) => r.homeBlock.key)).toEqual(
      second.requesters.map((r) => r.homeBlock.key)
    )
  })

  it('allows unequal sides', () => {
    const scenario = generateScenario(
      { ...options, requesterCount: 3, blockCount: 6 },
      seededRandom(1)
    )

    expect(scenario.requesters).toHaveLength(3)
    expect(scenario.blocks).toHaveLength(6)
  })

  it('fails when unique blocks run out', () => {
    const exhausted: ScenarioOptions = {
      requesterCount: 1,
      blockCount: 2,
      baseNetworks: [parseAddressBlock('10.0.0.0/30')],
      prefixLengthRange: { min: 30, max: 30 },
      maxGenerationAttempts: 5,
    }

    expect(() => generateScenario(exhausted, seededRandom(1))).toThrow(ScenarioGenerationError)
    expect(() => generateScenario(exhausted, seededRandom(1))).toThrow(
      'Could not draw a unique block after 5 attempts'
    )
  })
})
