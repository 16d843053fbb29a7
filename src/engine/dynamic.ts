// =============================================================================
// Dynamic (One-Peer) Schedule — one outgoing edge per rank per round
//
// Picture all ranks on a clock. Every rank orders its out-neighbors by
// clockwise distance from itself and, in round t, sends to entry
// t mod outDegree. Every rank applies the same rule to the same static
// topology, so each can also work out who sends to it in round t without
// exchanging a single message.
// =============================================================================

import type { Topology, SendRecvRanks } from './types'
import { assertRank, assertRound } from './errors'
import { mod } from '../utils/modular'

export type SendOrder = readonly (readonly number[])[]

const sendOrderCache = new WeakMap<Topology, SendOrder>()

// =============================================================================
// buildSendOrder — out-neighbors of every rank, self loop removed, sorted by
// clockwise distance (n - r) mod size
// =============================================================================
export function buildSendOrder(topology: Topology): SendOrder {
  const cached = sendOrderCache.get(topology)
  if (cached) return cached

  const { size } = topology
  const order: number[][] = []
  for (let rank = 0; rank < size; rank++) {
    const sorted = topology.weights
      .successors(rank)
      .filter((r) => r !== rank)
      .sort((a, b) => mod(a - rank, size) - mod(b - rank, size))
    order.push(sorted)
  }

  const frozen = Object.freeze(order.map((ranks) => Object.freeze(ranks)))
  sendOrderCache.set(topology, frozen)
  return frozen
}

// Target of `rank` in `round`, or undefined when it has no out-neighbor
function activeTarget(order: SendOrder, rank: number, round: number): number | undefined {
  const neighbors = order[rank]
  if (neighbors.length === 0) return undefined
  return neighbors[round % neighbors.length]
}

// =============================================================================
// nextSendRecv — the schedule of `rank` in `round`
//
// Pure in (topology, rank, round): recomputing a round yields the same pair.
// =============================================================================
export function nextSendRecv(topology: Topology, rank: number, round: number): SendRecvRanks {
  assertRank(rank, topology.size)
  assertRound(round)
  const order = buildSendOrder(topology)

  const target = activeTarget(order, rank, round)
  const sendRanks = target === undefined ? [] : [target]

  const recvRanks: number[] = []
  for (let other = 0; other < topology.size; other++) {
    if (other === rank) continue
    if (activeTarget(order, other, round) === rank) recvRanks.push(other)
  }

  return { sendRanks, recvRanks }
}
