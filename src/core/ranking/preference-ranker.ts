import type { AddressBlock, BlockKey } from '../address/address-block'
import type { PreferenceMaps } from '../../types/matching'
import type { Requester, RequesterId } from '../../types/requester'
import { scoreCompatibility } from './compatibility'
import { IncompletePreferenceListError } from '../../utils/errors'

/**
 * A candidate paired with its score against the subject being ranked.
 */
export interface RankedCandidate<C> {
  candidate: C
  score: number
}

/**
 * Scores every candidate against `subject` and returns them with their
 * scores, highest first. Equal scores keep their input order.
 */
export function scoreCandidatesFor<C>(
  subject: AddressBlock,
  candidates: readonly C[],
  blockOf: (candidate: C) => AddressBlock
): RankedCandidate<C>[] {
  const scored = candidates.map((candidate, index) => ({
    candidate,
    score: scoreCompatibility(subject, blockOf(candidate)),
    index,
  }))

  scored.sort((a, b) => b.score - a.score || a.index - b.index)

  return scored.map(({ candidate, score }) => ({ candidate, score }))
}

/**
 * Orders the full candidate set by compatibility with `subject`, most
 * preferred first. Ties keep their input order.
 *
 * @param subject - Block of the entity whose preferences are being built
 * @param candidates - Entities on the opposite side
 * @param blockOf - Extracts the block to score from a candidate
 */
export function rankCandidatesFor<C>(
  subject: AddressBlock,
  candidates: readonly C[],
  blockOf: (candidate: C) => AddressBlock
): C[] {
  return scoreCandidatesFor(subject, candidates, blockOf).map(
    (ranked) => ranked.candidate
  )
}

/**
 * Orders address blocks by compatibility with `subject`.
 */
export function rankBlocksFor(
  subject: AddressBlock,
  blocks: readonly AddressBlock[]
): AddressBlock[] {
  return rankCandidatesFor(subject, blocks, (block) => block)
}

/**
 * Builds both sides' preference lists: for each requester, every block
 * ordered by compatibility with its home block; for each block, every
 * requester ordered the same way.
 */
export function buildPreferenceMaps(
  requesters: readonly Requester[],
  blocks: readonly AddressBlock[]
): PreferenceMaps {
  const requesterPreferences = new Map<RequesterId, BlockKey[]>()
  for (const requester of requesters) {
    const ranked = rankBlocksFor(requester.homeBlock, blocks)
    requesterPreferences.set(
      requester.id,
      ranked.map((block) => block.key)
    )
  }

  const blockPreferences = new Map<BlockKey, RequesterId[]>()
  for (const block of blocks) {
    const ranked = rankCandidatesFor(block, requesters, (r) => r.homeBlock)
    blockPreferences.set(
      block.key,
      ranked.map((requester) => requester.id)
    )
  }

  return { requesterPreferences, blockPreferences }
}

/**
 * Checks that every preference list is a permutation of the opposite side.
 *
 * @throws IncompletePreferenceListError naming the first offending list
 */
export function validatePreferenceMaps(
  preferences: PreferenceMaps,
  requesterIds: readonly RequesterId[],
  blockKeys: readonly BlockKey[]
): void {
  validateSide(preferences.requesterPreferences, requesterIds, blockKeys)
  validateSide(preferences.blockPreferences, blockKeys, requesterIds)
}

function validateSide(
  lists: ReadonlyMap<string, readonly string[]>,
  owners: readonly string[],
  candidates: readonly string[]
): void {
  const expected = new Set(candidates)

  for (const owner of owners) {
    const list = lists.get(owner)
    if (!list) {
      throw new IncompletePreferenceListError(owner, 'no preference list')
    }

    const seen = new Set<string>()
    for (const candidate of list) {
      if (!expected.has(candidate)) {
        throw new IncompletePreferenceListError(
          owner,
          `unknown candidate '${candidate}'`,
          { candidate }
        )
      }
      if (seen.has(candidate)) {
        throw new IncompletePreferenceListError(
          owner,
          `candidate '${candidate}' ranked more than once`,
          { candidate }
        )
      }
      seen.add(candidate)
    }

    if (seen.size !== expected.size) {
      const missing = candidates.filter((candidate) => !seen.has(candidate))
      throw new IncompletePreferenceListError(
        owner,
        `missing ${missing.length} candidate(s): ${missing.join(', ')}`,
        { missing }
      )
    }
  }

  const known = new Set(owners)
  for (const owner of lists.keys()) {
    if (!known.has(owner)) {
      throw new IncompletePreferenceListError(owner, 'list owner is not a known entity')
    }
  }
}
