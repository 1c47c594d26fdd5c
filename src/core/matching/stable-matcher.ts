import { IncompletePreferenceListError } from '../../utils/errors'

/**
 * Outcome of a deferred-acceptance run.
 *
 * @typeParam P - Proposer key type
 * @typeParam A - Acceptor key type
 */
export interface DeferredAcceptanceResult<P, A> {
  /** Proposer → accepted acceptor */
  pairs: Map<P, A>
  /** Proposers that exhausted their list, in preference-map order */
  unmatchedProposers: P[]
  /** Acceptors that never held a proposer, in preference-map order */
  unmatchedAcceptors: A[]
  /** Proposal attempts made; at most |proposers| × |acceptors| */
  proposals: number
}

/**
 * Precomputes each acceptor's rank of every proposer (0 = most preferred)
 * so proposals are compared in constant time.
 */
function buildRankTable<P, A>(
  acceptorPreferences: ReadonlyMap<A, readonly P[]>
): Map<A, Map<P, number>> {
  const table = new Map<A, Map<P, number>>()
  for (const [acceptor, list] of acceptorPreferences) {
    const ranks = new Map<P, number>()
    list.forEach((proposer, rank) => ranks.set(proposer, rank))
    table.set(acceptor, ranks)
  }
  return table
}

/**
 * Proposer-proposing deferred acceptance (Gale-Shapley).
 *
 * Free proposers wait in a FIFO queue. Each turn the proposer at the head
 * proposes to the next acceptor on its list; its pointer only ever moves
 * forward. An unclaimed acceptor accepts tentatively. A claimed acceptor
 * switches only to a proposer it ranks strictly higher, sending the
 * displaced proposer back to the queue. A rejected proposer also rejoins
 * the queue and tries its next choice on a later turn. A proposer that
 * runs out of choices stays unmatched.
 *
 * The result is stable and optimal for the proposing side among all stable
 * matchings; the acceptor side gets its worst stable outcome. Do not swap
 * the arguments unless that is the intended direction.
 *
 * Both maps must rank the complete opposite side. A proposer or acceptor
 * missing from the other side raises IncompletePreferenceListError.
 *
 * @example
 * ```typescript
 * const result = deferredAcceptance(
 *   new Map([['AS1', ['10.0.0.0/24']], ['AS2', ['10.0.0.0/24']]]),
 *   new Map([['10.0.0.0/24', ['AS2', 'AS1']]])
 * )
 * result.pairs.get('AS2') // '10.0.0.0/24'
 * ```
 */
export function deferredAcceptance<P, A>(
  proposerPreferences: ReadonlyMap<P, readonly A[]>,
  acceptorPreferences: ReadonlyMap<A, readonly P[]>
): DeferredAcceptanceResult<P, A> {
  const ranks = buildRankTable(acceptorPreferences)
  const pairs = new Map<P, A>()
  const holders = new Map<A, P>()
  const nextChoice = new Map<P, number>()
  const queue: P[] = Array.from(proposerPreferences.keys())
  let head = 0
  let proposals = 0

  while (head < queue.length) {
    const proposer = queue[head++]
    const list = proposerPreferences.get(proposer) ?? []
    const index = nextChoice.get(proposer) ?? 0

    if (index >= list.length) {
      continue
    }

    const acceptor = list[index]
    nextChoice.set(proposer, index + 1)
    proposals++

    const acceptorRanks = ranks.get(acceptor)
    if (!acceptorRanks) {
      throw new IncompletePreferenceListError(
        String(acceptor),
        `no preference list, but '${String(proposer)}' proposed to it`
      )
    }

    const current = holders.get(acceptor)
    if (current === undefined) {
      holders.set(acceptor, proposer)
      pairs.set(proposer, acceptor)
      continue
    }

    if (rankOf(acceptorRanks, acceptor, proposer) < rankOf(acceptorRanks, acceptor, current)) {
      holders.set(acceptor, proposer)
      pairs.set(proposer, acceptor)
      pairs.delete(current)
      queue.push(current)
    } else {
      queue.push(proposer)
    }
  }

  const unmatchedProposers = Array.from(proposerPreferences.keys()).filter(
    (proposer) => !pairs.has(proposer)
  )
  const unmatchedAcceptors = Array.from(acceptorPreferences.keys()).filter(
    (acceptor) => !holders.has(acceptor)
  )

  return { pairs, unmatchedProposers, unmatchedAcceptors, proposals }
}

function rankOf<P, A>(ranks: Map<P, number>, acceptor: A, proposer: P): number {
  const rank = ranks.get(proposer)
  if (rank === undefined) {
    throw new IncompletePreferenceListError(
      String(acceptor),
      `'${String(proposer)}' is not ranked`
    )
  }
  return rank
}
