/**
 * A proposer-acceptor pair that would both rather be matched to each other.
 */
export interface BlockingPair<P, A> {
  proposer: P
  acceptor: A
}

/**
 * Lists every blocking pair of a matching: a proposer and acceptor not
 * matched together where the proposer prefers the acceptor to its current
 * partner (or has none) and the acceptor prefers the proposer to its current
 * holder (or holds nobody).
 *
 * Entities missing from a preference list are treated as least preferred.
 */
export function findBlockingPairs<P, A>(
  pairs: ReadonlyMap<P, A>,
  proposerPreferences: ReadonlyMap<P, readonly A[]>,
  acceptorPreferences: ReadonlyMap<A, readonly P[]>
): BlockingPair<P, A>[] {
  const holders = new Map<A, P>()
  for (const [proposer, acceptor] of pairs) {
    holders.set(acceptor, proposer)
  }

  const blocking: BlockingPair<P, A>[] = []

  for (const [proposer, list] of proposerPreferences) {
    const partner = pairs.get(proposer)
    // Only acceptors ranked above the current partner can form a blocking pair
    const limit = partner === undefined ? list.length : list.indexOf(partner)

    for (let i = 0; i < limit; i++) {
      const acceptor = list[i]
      const holder = holders.get(acceptor)
      if (holder === undefined) {
        blocking.push({ proposer, acceptor })
        continue
      }

      const acceptorList = acceptorPreferences.get(acceptor) ?? []
      if (rankIn(acceptorList, proposer) < rankIn(acceptorList, holder)) {
        blocking.push({ proposer, acceptor })
      }
    }
  }

  return blocking
}

/**
 * True when the matching has no blocking pair.
 */
export function isStableMatching<P, A>(
  pairs: ReadonlyMap<P, A>,
  proposerPreferences: ReadonlyMap<P, readonly A[]>,
  acceptorPreferences: ReadonlyMap<A, readonly P[]>
): boolean {
  return findBlockingPairs(pairs, proposerPreferences, acceptorPreferences).length === 0
}

function rankIn<T>(list: readonly T[], value: T): number {
  const index = list.indexOf(value)
  return index === -1 ? Infinity : index
}
