export {
  AddressBlock,
  ADDRESS_WIDTH,
  parseAddressBlock,
  toAddressBlock,
  formatAddress,
  prefixMask,
  type AddressFamily,
  type BlockKey,
  type ParseOptions,
} from './address-block'

export {
  isSupernetOf,
  supernet,
  isAggregatable,
  commonPrefixLength,
} from './relations'
