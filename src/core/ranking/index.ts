export {
  scoreCompatibility,
  explainCompatibility,
  COMMON_PREFIX_WEIGHT,
  type CompatibilityScore,
} from './compatibility'

export {
  rankCandidatesFor,
  rankBlocksFor,
  scoreCandidatesFor,
  buildPreferenceMaps,
  validatePreferenceMaps,
  type RankedCandidate,
} from './preference-ranker'
