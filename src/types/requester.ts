import type { AddressBlock } from '../core/address/address-block'

/**
 * Unique identifier of a requester (an Autonomous System, e.g. `'AS64500'`).
 */
export type RequesterId = string

/**
 * A requester seeking address space, with the home prefix used for scoring.
 */
export interface Requester {
  /** Unique identifier within a run */
  readonly id: RequesterId
  /** Prefix the requester already routes */
  readonly homeBlock: AddressBlock
}

/**
 * Requester as accepted by the allocator, before CIDR strings are parsed.
 */
export interface RequesterInput {
  id: RequesterId
  homeBlock: string | AddressBlock
}

/**
 * Allocatable block as accepted by the allocator.
 */
export type BlockInput = string | AddressBlock
