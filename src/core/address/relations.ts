import { AddressBlock, prefixMask } from './address-block'
import {
  AddressFamilyMismatchError,
  InvalidParameterError,
} from '../../utils/errors'

/**
 * Returns true when `inner` lies entirely within `outer`.
 * A block is a supernet of itself.
 */
export function isSupernetOf(outer: AddressBlock, inner: AddressBlock): boolean {
  if (outer.family !== inner.family || outer.prefixLength > inner.prefixLength) {
    return false
  }
  const mask = prefixMask(outer.prefixLength, outer.width)
  return (inner.network & mask) === outer.network
}

/**
 * Returns the enclosing block of `block` at a shorter (or equal) prefix length.
 *
 * @throws InvalidParameterError when `newPrefixLength` is negative or longer
 *   than the block's own prefix
 */
export function supernet(block: AddressBlock, newPrefixLength: number): AddressBlock {
  if (
    !Number.isInteger(newPrefixLength) ||
    newPrefixLength < 0 ||
    newPrefixLength > block.prefixLength
  ) {
    throw new InvalidParameterError(
      'newPrefixLength',
      newPrefixLength,
      `must be an integer between 0 and ${block.prefixLength}`,
      { block: block.key }
    )
  }
  const mask = prefixMask(newPrefixLength, block.width)
  return new AddressBlock(block.family, block.network & mask, newPrefixLength)
}

/**
 * Determines whether two blocks can be aggregated into one routing entry.
 *
 * True when either block contains the other, or when widening both to one
 * bit shorter than the shorter prefix yields the same block (adjacent
 * siblings). A /0 input has nothing shorter to widen to, so that second test
 * is skipped and the result is false unless containment holds.
 */
export function isAggregatable(a: AddressBlock, b: AddressBlock): boolean {
  if (a.family !== b.family) {
    return false
  }
  if (isSupernetOf(a, b) || isSupernetOf(b, a)) {
    return true
  }

  const widened = Math.min(a.prefixLength, b.prefixLength) - 1
  if (widened < 0) {
    return false
  }
  return supernet(a, widened).equals(supernet(b, widened))
}

/**
 * Counts leading bits shared by the two network addresses over the full
 * address width. Prefix lengths are ignored, so the result can exceed either
 * of them.
 *
 * @throws AddressFamilyMismatchError when the blocks belong to different families
 */
export function commonPrefixLength(a: AddressBlock, b: AddressBlock): number {
  if (a.family !== b.family) {
    throw new AddressFamilyMismatchError(a.key, b.key)
  }
  const difference = a.network ^ b.network
  if (difference === 0n) {
    return a.width
  }
  return a.width - difference.toString(2).length
}
