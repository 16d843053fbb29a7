// =============================================================================
// Hierarchical Dynamic Schedule — one-peer rounds on inner/outer topologies
//
// Derived from (worldSize, localSize, rank, round) alone; the full matrix is
// never built. In round t, local id t mod localSize of every machine "goes
// outside" and exchanges with its counterpart on another machine. Every
// other rank exchanges inside its machine, stepping over the outside id so
// that rank is never also used for an inner exchange in the same round.
//
//   inner-outer-ring: outside distance 1 machine, inner distance 1 rank
//   inner-outer-exp2: outside distance 2^(t mod (floor(log2(M-1)) + 1)),
//                     inner distance 2^(t mod (floor(log2(L-2)) + 1))
//
// localSize <= 2 leaves no room for an inner exchange next to the outside
// slot and is rejected.
// =============================================================================

import type { HierarchicalKind, SendRecvRanks, Topology } from './types'
import { assertRank, assertRound, assertSize, unsupported } from './errors'
import { machineLayout, placeRank, rankAt } from './multi-node'
import type { MachineLayout, RankPlacement } from './multi-node'
import { mod, floorLog2 } from '../utils/modular'

/** The hierarchical schedule a built topology follows, or null for flat kinds */
export function hierarchicalKindOf(topology: Topology): HierarchicalKind | null {
  if (topology.kind === 'inner-outer-ring' || topology.kind === 'inner-outer-exp2') {
    return topology.kind
  }
  return null
}

export function hierarchicalLocalSize(topology: Topology): number {
  const localSize = topology.params.localSize
  return typeof localSize === 'number' ? localSize : topology.size
}

interface RoundContext {
  layout: MachineLayout
  self: RankPlacement
  outsideId: number
  round: number
}

function resolveRound(
  worldSize: number,
  localSize: number,
  rank: number,
  round: number,
): RoundContext {
  assertSize(localSize, 'localSize')
  if (localSize <= 2) {
    throw unsupported(
      `Dynamic inner/outer schedules need more than 2 ranks per machine, got ${localSize}`,
    )
  }
  const layout = machineLayout(worldSize, localSize)
  assertRank(rank, worldSize)
  assertRound(round)
  return {
    layout,
    self: placeRank(layout, rank),
    outsideId: round % localSize,
    round,
  }
}

// Same local id, `distance` machines forward (send) and backward (recv)
function outsideExchange(ctx: RoundContext, distance: number): SendRecvRanks {
  const { layout, self } = ctx
  const target = mod(self.machineId + distance, layout.numMachines)
  const source = mod(self.machineId - distance, layout.numMachines)
  return {
    sendRanks: [rankAt(layout, target, self.localId)],
    recvRanks: [rankAt(layout, source, self.localId)],
  }
}

// =============================================================================
// inner-outer-ring
// =============================================================================
function ringInner(ctx: RoundContext): SendRecvRanks {
  const { layout, self, outsideId } = ctx
  const L = layout.localSize

  let target = mod(self.localId + 1, L)
  if (target === outsideId) target = mod(target + 1, L)

  let source = mod(self.localId - 1, L)
  if (source === outsideId) source = mod(source - 1, L)

  return {
    sendRanks: [rankAt(layout, self.machineId, target)],
    recvRanks: [rankAt(layout, self.machineId, source)],
  }
}

export function innerOuterRingSendRecv(
  worldSize: number,
  localSize: number,
  rank: number,
  round: number,
): SendRecvRanks {
  const ctx = resolveRound(worldSize, localSize, rank, round)
  if (ctx.self.localId === ctx.outsideId) return outsideExchange(ctx, 1)
  return ringInner(ctx)
}

// =============================================================================
// inner-outer-exp2
//
// The inner distance is bumped by one when it reaches or passes the outside
// slot. The forward (send) and backward (recv) directions see the outside
// slot at different distances, so each is bumped independently.
// =============================================================================
function exp2Inner(ctx: RoundContext): SendRecvRanks {
  const { layout, self, outsideId, round } = ctx
  const L = layout.localSize
  const exp2InSize = floorLog2(L - 2)

  const distToOut = mod(outsideId - self.localId, L)
  let innerDist = 2 ** (round % (exp2InSize + 1))
  if (innerDist >= distToOut) innerDist += 1

  const reverseDistToOut = mod(self.localId - outsideId, L)
  let reverseDist = 2 ** (round % (exp2InSize + 1))
  if (reverseDist >= reverseDistToOut) reverseDist += 1

  return {
    sendRanks: [rankAt(layout, self.machineId, mod(self.localId + innerDist, L))],
    recvRanks: [rankAt(layout, self.machineId, mod(self.localId - reverseDist, L))],
  }
}

export function innerOuterExp2SendRecv(
  worldSize: number,
  localSize: number,
  rank: number,
  round: number,
): SendRecvRanks {
  const ctx = resolveRound(worldSize, localSize, rank, round)
  if (ctx.self.localId === ctx.outsideId) {
    // With one or two machines every outside distance is 1
    const M = ctx.layout.numMachines
    const exp2OutSize = M > 2 ? floorLog2(M - 1) : 0
    return outsideExchange(ctx, 2 ** (round % (exp2OutSize + 1)))
  }
  return exp2Inner(ctx)
}

export function nextHierarchicalSendRecv(
  worldSize: number,
  localSize: number,
  rank: number,
  round: number,
  kind: HierarchicalKind,
): SendRecvRanks {
  return kind === 'inner-outer-ring'
    ? innerOuterRingSendRecv(worldSize, localSize, rank, round)
    : innerOuterExp2SendRecv(worldSize, localSize, rank, round)
}
