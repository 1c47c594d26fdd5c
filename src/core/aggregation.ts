import type { Matching } from '../types/matching'
import type { Requester } from '../types/requester'
import { isAggregatable } from './address/relations'

/**
 * Counts matched pairs whose requester home block and assigned block can be
 * aggregated. Matched ids with no corresponding requester are not counted.
 */
export function aggregationCount(
  matching: Matching,
  requesters: readonly Requester[]
): number {
  const homes = new Map(requesters.map((r) => [r.id, r.homeBlock]))
  let count = 0

  for (const [requesterId, block] of matching) {
    const home = homes.get(requesterId)
    if (home && isAggregatable(home, block)) {
      count++
    }
  }

  return count
}
