import { describe, it, expect, vi } from 'vitest'
import { AllocatorBuilder, PrefixPairing } from '../../../src/builder/allocator-builder'
import { PrefixAllocator } from '../../../src/core/allocator'
import { InvalidParameterError } from '../../../src/utils/errors'
import { createSilentLogger, type Logger } from '../../../src/utils/logger'

describe('PrefixPairing.create', () => {
  it('returns a fresh builder each time', () => {
    const first = PrefixPairing.create()
    const second = PrefixPairing.create()

    expect(first).toBeInstanceOf(AllocatorBuilder)
    expect(first).not.toBe(second)
  })
})

describe('AllocatorBuilder', () => {
  it('starts with no options', () => {
    expect(PrefixPairing.create().getOptions()).toEqual({})
  })

  it('collects options through chaining', () => {
    const logger = createSilentLogger()

    const options = PrefixPairing.create()
      .logger(logger)
      .validatePreferences(false)
      .strictParsing()
      .getOptions()

    expect(options).toEqual({
      logger,
      validatePreferences: false,
      strictParsing: true,
    })
  })

  it('returns a copy of its options', () => {
    const builder = PrefixPairing.create().strictParsing(false)
    const options = builder.getOptions()
    options.strictParsing = true

    expect(builder.getOptions().strictParsing).toBe(false)
  })

  it('rejects values that are not loggers', () => {
    const incomplete: Logger = JSON.parse('{"debug": true}')
    const missing: Logger = JSON.parse('null')

    expect(() => PrefixPairing.create().logger(incomplete)).toThrow(InvalidParameterError)
    expect(() => PrefixPairing.create().logger(missing)).toThrow(
      "Invalid parameter 'logger': must implement the Logger interface"
    )
  })

  it('builds an allocator', () => {
    expect(PrefixPairing.create().build()).toBeInstanceOf(PrefixAllocator)
  })

  it('passes the logger through to the allocator', () => {
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }

    PrefixPairing.create()
      .logger(logger)
      .build()
      .allocate([{ id: 'AS1', homeBlock: '10.0.0.0/24' }], [])

    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.debug).toHaveBeenCalledTimes(1)
  })

  it('passes strict parsing through to the allocator', () => {
    const allocator = PrefixPairing.create().strictParsing().build()

    expect(() =>
      allocator.allocate([{ id: 'AS1', homeBlock: '10.0.0.1/24' }], ['10.0.1.0/24'])
    ).toThrow('host bits set beyond the prefix length')
  })
})
