import type { EvaluationConfig } from '../types/config'
import {
  ADDRESS_WIDTH,
  parseAddressBlock,
  type AddressBlock,
} from '../core/address/address-block'
import {
  ConfigurationError,
  isPrefixPairingError,
  requireNonEmptyArray,
  requireNonNegativeInteger,
  requirePositiveInteger,
} from '../utils/errors'

/** Networks used when none are configured. */
export const DEFAULT_BASE_NETWORKS: readonly string[] = [
  '10.0.0.0/16',
  '172.16.0.0/12',
  '192.168.0.0/16',
  '198.51.100.0/24',
]

export const DEFAULT_EVALUATION_CONFIG: Readonly<EvaluationConfig> = {
  trials: 10,
  requesterCount: 10,
  blockCount: 10,
  prefixLengthRange: { min: 22, max: 29 },
  baseNetworks: [...DEFAULT_BASE_NETWORKS],
  maxGenerationAttempts: 50,
}

/**
 * Fills defaults and validates an evaluation configuration.
 *
 * @throws InvalidParameterError for non-integer or non-positive counts
 * @throws ConfigurationError for unusable base networks or prefix ranges
 */
export function resolveEvaluationConfig(
  partial: Partial<EvaluationConfig> = {}
): EvaluationConfig {
  const config: EvaluationConfig = {
    ...DEFAULT_EVALUATION_CONFIG,
    ...partial,
    prefixLengthRange: {
      ...DEFAULT_EVALUATION_CONFIG.prefixLengthRange,
      ...partial.prefixLengthRange,
    },
    baseNetworks: [...(partial.baseNetworks ?? DEFAULT_EVALUATION_CONFIG.baseNetworks)],
  }

  requirePositiveInteger(config.trials, 'trials')
  requirePositiveInteger(config.requesterCount, 'requesterCount')
  requirePositiveInteger(config.blockCount, 'blockCount')
  requirePositiveInteger(config.maxGenerationAttempts, 'maxGenerationAttempts')
  if (config.seed !== undefined) {
    requireNonNegativeInteger(config.seed, 'seed')
  }

  const bases = parseBaseNetworks(config.baseNetworks)
  const width = ADDRESS_WIDTH[bases[0].family]
  const { min, max } = config.prefixLengthRange

  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new ConfigurationError(
      'prefixLengthRange bounds must be integers',
      'prefixLengthRange'
    )
  }
  if (min < 0 || max > width || min > max) {
    throw new ConfigurationError(
      `prefixLengthRange must satisfy 0 <= min <= max <= ${width} (got ${min}-${max})`,
      'prefixLengthRange',
      { min, max }
    )
  }

  return config
}

/**
 * Parses base networks, requiring at least one and a single address family.
 *
 * @throws ConfigurationError when a network is malformed or families are mixed
 */
export function parseBaseNetworks(networks: readonly string[]): AddressBlock[] {
  requireNonEmptyArray(networks, 'baseNetworks')

  const blocks = networks.map((network) => {
    try {
      return parseAddressBlock(network)
    } catch (error) {
      if (isPrefixPairingError(error)) {
        throw new ConfigurationError(
          `Invalid base network '${network}': ${error.message}`,
          'baseNetworks',
          { network }
        )
      }
      throw error
    }
  })

  const family = blocks[0].family
  if (blocks.some((block) => block.family !== family)) {
    throw new ConfigurationError(
      'baseNetworks must all belong to the same address family',
      'baseNetworks'
    )
  }

  return blocks
}
