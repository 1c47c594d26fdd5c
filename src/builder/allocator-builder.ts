import type { AllocatorOptions } from '../types/config'
import { PrefixAllocator } from '../core/allocator'
import { InvalidParameterError } from '../utils/errors'
import type { Logger } from '../utils/logger'

/**
 * Fluent builder for configuring and creating a PrefixAllocator instance.
 *
 * @example
 * ```typescript
 * const allocator = PrefixPairing.create()
 *   .logger(defaultLogger)
 *   .strictParsing(true)
 *   .build()
 *
 * const result = allocator.allocate(requesters, blocks)
 * ```
 */
export class AllocatorBuilder {
  private options: AllocatorOptions = {}

  /**
   * Sets the logger receiving per-run diagnostics.
   *
   * @param logger - Logger implementation
   * @returns This builder for chaining
   */
  logger(logger: Logger): this {
    if (
      typeof logger !== 'object' ||
      logger === null ||
      typeof logger.debug !== 'function' ||
      typeof logger.warn !== 'function'
    ) {
      throw new InvalidParameterError('logger', logger, 'must implement the Logger interface')
    }
    this.options.logger = logger
    return this
  }

  /**
   * Turns preference-list completeness checks on or off.
   */
  validatePreferences(enabled: boolean = true): this {
    this.options.validatePreferences = enabled
    return this
  }

  /**
   * Rejects CIDR strings with host bits set instead of clearing them.
   */
  strictParsing(enabled: boolean = true): this {
    this.options.strictParsing = enabled
    return this
  }

  /**
   * Returns a copy of the options collected so far.
   */
  getOptions(): AllocatorOptions {
    return { ...this.options }
  }

  build(): PrefixAllocator {
    return new PrefixAllocator({ ...this.options })
  }
}

/**
 * Main entry point for prefix-pairing.
 */
export class PrefixPairing {
  /**
   * Starts configuring an allocator.
   */
  static create(): AllocatorBuilder {
    return new AllocatorBuilder()
  }
}
