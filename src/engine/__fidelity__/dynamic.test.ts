// =============================================================================
// One-Peer Schedule Tests
//
// The schedule must be derivable on every rank independently: whatever rank
// o computes as its send target in round t, the target must list o among its
// receive ranks for that same round.
// =============================================================================

import { describe, test, expect } from 'vitest'

import type { Topology } from '../types'
import { TopologyError } from '../errors'
import { fromWeightRows } from '../matrix'
import { powerTwoRingGraph, ringGraph, powerGraph } from '../rings'
import { meshGrid2DGraph, starGraph } from '../mesh'
import { innerOuterExp2Graph } from '../multi-node'
import { outNeighborRanks } from '../weights'
import { buildSendOrder, nextSendRecv } from '../dynamic'

describe('buildSendOrder', () => {
  test('sorts out-neighbors clockwise and drops the self loop', () => {
    const order = buildSendOrder(powerTwoRingGraph(10))
    expect(order[0]).toEqual([1, 2, 4, 8])
    expect(order[3]).toEqual([4, 5, 7, 1])
    expect(order[9]).toEqual([0, 1, 3, 7])
  })

  test('is cached per topology', () => {
    const topo = ringGraph(6)
    expect(buildSendOrder(topo)).toBe(buildSendOrder(topo))
  })
})

describe('nextSendRecv', () => {
  test('visits every out-neighbor once per cycle, clockwise', () => {
    const topo = powerTwoRingGraph(10)
    const sends = [0, 1, 2, 3, 4, 5, 6, 7].map((t) => nextSendRecv(topo, 3, t).sendRanks)
    expect(sends).toEqual([[4], [5], [7], [1], [4], [5], [7], [1]])
  })

  test('power-two ring of 10: rank 0 receives from the mirrored offset', () => {
    const topo = powerTwoRingGraph(10)
    expect(nextSendRecv(topo, 0, 0)).toEqual({ sendRanks: [1], recvRanks: [9] })
    expect(nextSendRecv(topo, 0, 1)).toEqual({ sendRanks: [2], recvRanks: [8] })
    expect(nextSendRecv(topo, 0, 2)).toEqual({ sendRanks: [4], recvRanks: [6] })
    expect(nextSendRecv(topo, 0, 3)).toEqual({ sendRanks: [8], recvRanks: [2] })
  })

  test('star: the center gathers from every leaf while sending to one', () => {
    const topo = starGraph(5)
    expect(nextSendRecv(topo, 0, 0)).toEqual({ sendRanks: [1], recvRanks: [1, 2, 3, 4] })
    expect(nextSendRecv(topo, 2, 1)).toEqual({ sendRanks: [0], recvRanks: [0] })
    expect(nextSendRecv(topo, 3, 1)).toEqual({ sendRanks: [0], recvRanks: [] })
  })

  test('recomputing a round gives the same answer', () => {
    const topo = meshGrid2DGraph(12)
    const later = nextSendRecv(topo, 5, 17)
    nextSendRecv(topo, 5, 3)
    expect(nextSendRecv(topo, 5, 17)).toEqual(later)
  })

  test('a rank without out-neighbors sends nowhere', () => {
    const topo = fromWeightRows([
      [1, 0],
      [0.5, 0.5],
    ])
    expect(nextSendRecv(topo, 0, 0)).toEqual({ sendRanks: [], recvRanks: [1] })
    expect(nextSendRecv(topo, 1, 0)).toEqual({ sendRanks: [0], recvRanks: [] })
  })

  test('rejects a bad rank or round', () => {
    const topo = ringGraph(4)
    expect(() => nextSendRecv(topo, 4, 0)).toThrowError(TopologyError)
    expect(() => nextSendRecv(topo, 0, -1)).toThrowError(TopologyError)
    expect(() => nextSendRecv(topo, 0, 1.5)).toThrowError(TopologyError)
  })
})

// =============================================================================
// Cross-rank consistency
// =============================================================================

const topologies: [string, Topology][] = [
  ['power-two ring of 10', powerTwoRingGraph(10)],
  ['power graph base 3 of 13', powerGraph(13, 3)],
  ['mesh of 12', meshGrid2DGraph(12)],
  ['star of 6', starGraph(6, 2)],
  ['inner/outer exp2 of 12', innerOuterExp2Graph(12, 3)],
]

describe('schedule agreement between ranks', () => {
  test.each(topologies)('%s', (_, topo) => {
    for (let t = 0; t < 8; t++) {
      const plans = Array.from({ length: topo.size }, (_, r) => nextSendRecv(topo, r, t))
      for (let r = 0; r < topo.size; r++) {
        for (let o = 0; o < topo.size; o++) {
          if (o === r) continue
          const oSendsToR = plans[o].sendRanks[0] === r
          expect(plans[r].recvRanks.includes(o)).toBe(oSendsToR)
        }
      }
    }
  })

  test.each(topologies)('%s sends only along static edges', (_, topo) => {
    for (let r = 0; r < topo.size; r++) {
      const neighbors = outNeighborRanks(topo, r)
      for (let t = 0; t < neighbors.length; t++) {
        const [target] = nextSendRecv(topo, r, t).sendRanks
        expect(neighbors).toContain(target)
      }
    }
  })
})
