// =============================================================================
// Weight Extraction — per-rank views of a topology's weight matrix
//
// Send weights read row `rank` (successors): what rank's value is scaled by
// at each destination. Recv weights read column `rank` (predecessors): what
// rank applies to each incoming value when combining.
// =============================================================================

import type { Topology, WeightView } from './types'
import { assertRank } from './errors'

export function getSendWeights(topology: Topology, rank: number): WeightView {
  assertRank(rank, topology.size)
  const { weights } = topology
  let selfWeight = 0.0
  const neighborWeights = new Map<number, number>()
  for (const recvRank of weights.successors(rank)) {
    if (recvRank === rank) {
      selfWeight = weights.get(rank, recvRank)
    } else {
      neighborWeights.set(recvRank, weights.get(rank, recvRank))
    }
  }
  return { selfWeight, neighborWeights }
}

export function getRecvWeights(topology: Topology, rank: number): WeightView {
  assertRank(rank, topology.size)
  const { weights } = topology
  let selfWeight = 0.0
  const neighborWeights = new Map<number, number>()
  for (const srcRank of weights.predecessors(rank)) {
    if (srcRank === rank) {
      selfWeight = weights.get(srcRank, rank)
    } else {
      neighborWeights.set(srcRank, weights.get(srcRank, rank))
    }
  }
  return { selfWeight, neighborWeights }
}

// Plain average over self and in-neighbors, for topologies installed unweighted
export function getUniformRecvWeights(topology: Topology, rank: number): WeightView {
  const sources = inNeighborRanks(topology, rank)
  const w = 1 / (sources.length + 1)
  return {
    selfWeight: w,
    neighborWeights: new Map(sources.map((r) => [r, w])),
  }
}

export function inNeighborRanks(topology: Topology, rank: number): number[] {
  assertRank(rank, topology.size)
  return topology.weights.predecessors(rank).filter((r) => r !== rank)
}

export function outNeighborRanks(topology: Topology, rank: number): number[] {
  assertRank(rank, topology.size)
  return topology.weights.successors(rank).filter((r) => r !== rank)
}
