export type {
  RequesterId,
  Requester,
  RequesterInput,
  BlockInput,
} from './requester'

export type {
  PreferenceMaps,
  Matching,
  AllocationStats,
  AllocationResult,
} from './matching'

export type {
  AllocatorOptions,
  PrefixLengthRange,
  EvaluationConfig,
} from './config'
