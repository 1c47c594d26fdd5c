import { describe, it, expect } from 'vitest'
import { deferredAcceptance } from '../../../src/core/matching/stable-matcher'
import { isStableMatching } from '../../../src/core/matching/stability'
import { IncompletePreferenceListError } from '../../../src/utils/errors'

describe('deferredAcceptance', () => {
  const proposers = new Map([
    ['m1', ['w1', 'w2', 'w3']],
    ['m2', ['w1', 'w3', 'w2']],
    ['m3', ['w2', 'w1', 'w3']],
  ])
  const acceptors = new Map([
    ['w1', ['m2', 'm1', 'm3']],
    ['w2', ['m1', 'm3', 'm2']],
    ['w3', ['m1', 'm2', 'm3']],
  ])

  it('finds the proposer-optimal stable matching', () => {
    const result = deferredAcceptance(proposers, acceptors)

    expect(Object.fromEntries(result.pairs)).toEqual({
      m1: 'w2',
      m2: 'w1',
      m3: 'w3',
    })
    expect(result.unmatchedProposers).toEqual([])
    expect(result.unmatchedAcceptors).toEqual([])
    expect(isStableMatching(result.pairs, proposers, acceptors)).toBe(true)
  })

  it('counts every proposal attempt', () => {
    expect(deferredAcceptance(proposers, acceptors).proposals).toBe(6)
  })

  it('runs with the roles reversed', () => {
    // This instance has a single stable matching, so both directions agree
    const reversed = deferredAcceptance(acceptors, proposers)

    expect(Object.fromEntries(reversed.pairs)).toEqual({
      w1: 'm2',
      w2: 'm1',
      w3: 'm3',
    })
  })

  it('picks the proposer-optimal matching when several are stable', () => {
    const requesters = new Map([
      ['r1', ['b1', 'b2']],
      ['r2', ['b2', 'b1']],
    ])
    const blocks = new Map([
      ['b1', ['r2', 'r1']],
      ['b2', ['r1', 'r2']],
    ])

    const result = deferredAcceptance(requesters, blocks)

    expect(Object.fromEntries(result.pairs)).toEqual({ r1: 'b1', r2: 'b2' })
    expect(result.proposals).toBe(2)
    expect(isStableMatching(result.pairs, requesters, blocks)).toBe(true)
  })

  it('picks the acceptor-optimal matching when the sides swap', () => {
    const requesters = new Map([
      ['r1', ['b1', 'b2']],
      ['r2', ['b2', 'b1']],
    ])
    const blocks = new Map([
      ['b1', ['r2', 'r1']],
      ['b2', ['r1', 'r2']],
    ])

    const swapped = deferredAcceptance(blocks, requesters)

    // The other stable matching: every requester gets its second choice
    expect(Object.fromEntries(swapped.pairs)).toEqual({ b1: 'r2', b2: 'r1' })
    expect(isStableMatching(swapped.pairs, blocks, requesters)).toBe(true)
  })

  it('leaves surplus proposers unmatched', () => {
    const result = deferredAcceptance(
      new Map([
        ['AS1', ['b1']],
        ['AS2', ['b1']],
      ]),
      new Map([['b1', ['AS2', 'AS1']]])
    )

    expect(result.pairs.get('AS2')).toBe('b1')
    expect(result.pairs.has('AS1')).toBe(false)
    expect(result.unmatchedProposers).toEqual(['AS1'])
    expect(result.unmatchedAcceptors).toEqual([])
    expect(result.proposals).toBe(2)
  })

  it('leaves surplus acceptors unmatched', () => {
    const result = deferredAcceptance(
      new Map([['AS1', ['b2', 'b1']]]),
      new Map([
        ['b1', ['AS1']],
        ['b2', ['AS1']],
      ])
    )

    expect(result.pairs.get('AS1')).toBe('b2')
    expect(result.unmatchedAcceptors).toEqual(['b1'])
    expect(result.proposals).toBe(1)
  })

  it('lets an acceptor trade up and requeues the displaced proposer', () => {
    const result = deferredAcceptance(
      new Map([
        ['p1', ['a1', 'a2']],
        ['p2', ['a1', 'a2']],
      ]),
      new Map([
        ['a1', ['p2', 'p1']],
        ['a2', ['p1', 'p2']],
      ])
    )

    // p1 holds a1, p2 displaces p1, p1 moves on to a2
    expect(Object.fromEntries(result.pairs)).toEqual({ p1: 'a2', p2: 'a1' })
    expect(result.proposals).toBe(3)
  })

  it('handles empty inputs', () => {
    const result = deferredAcceptance(new Map<string, string[]>(), new Map<string, string[]>())

    expect(result.pairs.size).toBe(0)
    expect(result.unmatchedProposers).toEqual([])
    expect(result.unmatchedAcceptors).toEqual([])
    expect(result.proposals).toBe(0)
  })

  it('rejects a proposal to an acceptor without a list', () => {
    expect(() =>
      deferredAcceptance(new Map([['p1', ['ghost']]]), new Map<string, string[]>())
    ).toThrow(
      "Preference list for 'ghost' is incomplete: no preference list, but 'p1' proposed to it"
    )
  })

  it('rejects a proposer the acceptor does not rank', () => {
    expect(() =>
      deferredAcceptance(
        new Map([
          ['p1', ['a1']],
          ['p2', ['a1']],
        ]),
        new Map([['a1', ['p1']]])
      )
    ).toThrow(IncompletePreferenceListError)
  })

  it('never makes more than n x m proposals', () => {
    const ids = ['p1', 'p2', 'p3', 'p4']
    const targets = ['a1', 'a2', 'a3', 'a4']
    const result = deferredAcceptance(
      new Map(ids.map((id) => [id, [...targets]])),
      new Map(targets.map((target) => [target, [...ids].reverse()]))
    )

    expect(result.proposals).toBeLessThanOrEqual(ids.length * targets.length)
    expect(result.pairs.size).toBe(4)
  })
})
