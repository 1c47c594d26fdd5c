export {
  deferredAcceptance,
  type DeferredAcceptanceResult,
} from './stable-matcher'

export {
  findBlockingPairs,
  isStableMatching,
  type BlockingPair,
} from './stability'
