import { InvalidAddressBlockError } from '../../utils/errors'

/**
 * Address families understood by the prefix model.
 */
export type AddressFamily = 'ipv4' | 'ipv6'

/**
 * Canonical CIDR string of an address block, used as its key in preference maps.
 */
export type BlockKey = string

/** Number of address bits for each family. */
export const ADDRESS_WIDTH: Readonly<Record<AddressFamily, number>> = {
  ipv4: 32,
  ipv6: 128,
}

/**
 * Options for parsing CIDR notation.
 */
export interface ParseOptions {
  /**
   * Reject blocks whose address has bits set beyond the prefix length.
   * When false (default), those bits are cleared.
   */
  strict?: boolean
}

/**
 * Returns the mask selecting the first `prefixLength` bits of a `width`-bit address.
 */
export function prefixMask(prefixLength: number, width: number): bigint {
  const all = (1n << BigInt(width)) - 1n
  const host = (1n << BigInt(width - prefixLength)) - 1n
  return all ^ host
}

/**
 * An immutable address prefix: network bits plus prefix length.
 *
 * Instances are built from CIDR strings once at ingestion via
 * {@link parseAddressBlock}; every relation and scoring function works on
 * this structured form.
 *
 * @example
 * ```typescript
 * const block = parseAddressBlock('10.0.0.0/24')
 * block.prefixLength // 24
 * block.key          // '10.0.0.0/24'
 * ```
 */
export class AddressBlock {
  readonly family: AddressFamily
  readonly network: bigint
  readonly prefixLength: number
  readonly width: number
  /** Canonical CIDR form */
  readonly key: BlockKey

  constructor(family: AddressFamily, network: bigint, prefixLength: number) {
    const width = ADDRESS_WIDTH[family]
    const label = `${family}:${network.toString(16)}/${prefixLength}`

    if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > width) {
      throw new InvalidAddressBlockError(
        label,
        `prefix length must be an integer between 0 and ${width}`
      )
    }
    if (network < 0n || network >= 1n << BigInt(width)) {
      throw new InvalidAddressBlockError(
        label,
        `network address does not fit in ${width} bits`
      )
    }
    if ((network & ~prefixMask(prefixLength, width)) !== 0n) {
      throw new InvalidAddressBlockError(
        label,
        'network address has bits set beyond the prefix length'
      )
    }

    this.family = family
    this.network = network
    this.prefixLength = prefixLength
    this.width = width
    this.key = `${formatAddress(family, network)}/${prefixLength}`
    Object.freeze(this)
  }

  /** Number of addresses covered by this block. */
  get size(): bigint {
    return 1n << BigInt(this.width - this.prefixLength)
  }

  equals(other: AddressBlock): boolean {
    return (
      this.family === other.family &&
      this.prefixLength === other.prefixLength &&
      this.network === other.network
    )
  }

  toString(): string {
    return this.key
  }
}

/**
 * Parses CIDR notation (`10.0.0.0/24`, `2001:db8::/32`) into an AddressBlock.
 *
 * @throws InvalidAddressBlockError when the address or prefix is malformed,
 *   the prefix is out of range, or (strict mode) host bits are set
 */
export function parseAddressBlock(
  cidr: string,
  options: ParseOptions = {}
): AddressBlock {
  if (typeof cidr !== 'string') {
    throw new InvalidAddressBlockError(String(cidr), 'must be a string')
  }

  const input = cidr.trim()
  const parts = input.split('/')
  if (parts.length !== 2) {
    throw new InvalidAddressBlockError(cidr, 'expected <address>/<prefix>')
  }

  const [addressPart, prefixPart] = parts
  if (!/^\d{1,3}$/.test(prefixPart)) {
    throw new InvalidAddressBlockError(cidr, 'prefix length must be an integer')
  }

  const family: AddressFamily = addressPart.includes(':') ? 'ipv6' : 'ipv4'
  const address =
    family === 'ipv6' ? parseIPv6(addressPart, cidr) : parseIPv4(addressPart, cidr)
  const width = ADDRESS_WIDTH[family]
  const prefixLength = parseInt(prefixPart, 10)

  if (prefixLength > width) {
    throw new InvalidAddressBlockError(
      cidr,
      `prefix length must be between 0 and ${width}`
    )
  }

  const mask = prefixMask(prefixLength, width)
  if (options.strict && (address & ~mask) !== 0n) {
    throw new InvalidAddressBlockError(cidr, 'host bits set beyond the prefix length')
  }

  return new AddressBlock(family, address & mask, prefixLength)
}

/**
 * Accepts either a CIDR string or an already parsed block.
 */
export function toAddressBlock(
  input: string | AddressBlock,
  options: ParseOptions = {}
): AddressBlock {
  return input instanceof AddressBlock ? input : parseAddressBlock(input, options)
}

/**
 * Formats raw address bits in the family's textual form.
 */
export function formatAddress(family: AddressFamily, value: bigint): string {
  if (family === 'ipv4') {
    const octets: number[] = []
    for (let shift = 24; shift >= 0; shift -= 8) {
      octets.push(Number((value >> BigInt(shift)) & 0xffn))
    }
    return octets.join('.')
  }

  const groups: number[] = []
  for (let shift = 112; shift >= 0; shift -= 16) {
    groups.push(Number((value >> BigInt(shift)) & 0xffffn))
  }

  // Longest run of two or more zero groups collapses to '::' (first one on ties)
  let bestStart = -1
  let bestLength = 0
  let runStart = -1
  for (let i = 0; i <= groups.length; i++) {
    if (i < groups.length && groups[i] === 0) {
      if (runStart === -1) runStart = i
      continue
    }
    if (runStart !== -1) {
      const runLength = i - runStart
      if (runLength > bestLength && runLength >= 2) {
        bestStart = runStart
        bestLength = runLength
      }
      runStart = -1
    }
  }

  const hex = groups.map((group) => group.toString(16))
  if (bestStart === -1) {
    return hex.join(':')
  }
  const head = hex.slice(0, bestStart).join(':')
  const tail = hex.slice(bestStart + bestLength).join(':')
  return `${head}::${tail}`
}

function parseIPv4(text: string, cidr: string): bigint {
  const octets = text.split('.')
  if (octets.length !== 4) {
    throw new InvalidAddressBlockError(cidr, 'IPv4 address must have four octets')
  }

  let value = 0n
  for (const octet of octets) {
    // Multi-digit octets may not start with 0
    if (!/^(0|[1-9]\d{0,2})$/.test(octet) || parseInt(octet, 10) > 255) {
      throw new InvalidAddressBlockError(cidr, `invalid IPv4 octet '${octet}'`)
    }
    value = (value << 8n) | BigInt(parseInt(octet, 10))
  }
  return value
}

function parseIPv6(text: string, cidr: string): bigint {
  const halves = text.split('::')
  if (halves.length > 2) {
    throw new InvalidAddressBlockError(cidr, "IPv6 address may contain '::' only once")
  }

  const splitGroups = (part: string): string[] =>
    part.length === 0 ? [] : part.split(':')
  const head = splitGroups(halves[0])
  const tail = halves.length === 2 ? splitGroups(halves[1]) : []
  const explicit = head.length + tail.length

  if (halves.length === 2 ? explicit > 7 : explicit !== 8) {
    throw new InvalidAddressBlockError(cidr, 'IPv6 address must have eight groups')
  }

  const groups = [...head, ...Array<string>(8 - explicit).fill('0'), ...tail]
  let value = 0n
  for (const group of groups) {
    if (!/^[0-9a-fA-F]{1,4}$/.test(group)) {
      throw new InvalidAddressBlockError(cidr, `invalid IPv6 group '${group}'`)
    }
    value = (value << 16n) | BigInt(parseInt(group, 16))
  }
  return value
}
