import { describe, test, expect } from 'vitest'

import type { Topology } from '../types'
import { fromWeightRows } from '../matrix'
import {
  ringGraph,
  powerTwoRingGraph,
  powerGraph,
  symmetricPowerGraph,
  fullyConnectedGraph,
} from '../rings'
import { meshGrid2DGraph, starGraph } from '../mesh'
import { innerOuterRingGraph, innerOuterExp2Graph } from '../multi-node'
import { isTopologyEquivalent, isRegularGraph, checkStochastic } from '../validate'

const builders: [string, () => Topology][] = [
  ['ring', () => ringGraph(8)],
  ['power-two-ring', () => powerTwoRingGraph(8)],
  ['power', () => powerGraph(9, 3)],
  ['symmetric-power', () => symmetricPowerGraph(12)],
  ['mesh-grid-2d', () => meshGrid2DGraph(12)],
  ['star', () => starGraph(8)],
  ['fully-connected', () => fullyConnectedGraph(8)],
  ['inner-outer-ring', () => innerOuterRingGraph(12, 3)],
  ['inner-outer-exp2', () => innerOuterExp2Graph(12, 3)],
]

describe('isTopologyEquivalent', () => {
  test.each(builders)('%s is equivalent to itself and to a rebuild', (_, build) => {
    const t = build()
    expect(isTopologyEquivalent(t, t)).toBe(true)
    expect(isTopologyEquivalent(t, build())).toBe(true)
  })

  test('absent topologies are never equivalent', () => {
    expect(isTopologyEquivalent(null, ringGraph(4))).toBe(false)
    expect(isTopologyEquivalent(ringGraph(4), undefined)).toBe(false)
    expect(isTopologyEquivalent(null, null)).toBe(false)
  })

  test('different node counts', () => {
    expect(isTopologyEquivalent(ringGraph(4), ringGraph(5))).toBe(false)
  })

  test('different edge counts', () => {
    expect(isTopologyEquivalent(ringGraph(4), fullyConnectedGraph(4))).toBe(false)
  })

  test('same edges, one weight changed', () => {
    const a = fromWeightRows([
      [0.5, 0.5],
      [0.5, 0.5],
    ])
    const b = fromWeightRows([
      [0.6, 0.4],
      [0.5, 0.5],
    ])
    expect(isTopologyEquivalent(a, b)).toBe(false)
  })

  test('compares weights, not the family that built them', () => {
    expect(isTopologyEquivalent(ringGraph(2), fullyConnectedGraph(2))).toBe(true)
  })

  test('labeling matters', () => {
    expect(isTopologyEquivalent(starGraph(5, 0), starGraph(5, 1))).toBe(false)
  })
})

describe('isRegularGraph', () => {
  test('circulant graphs are regular', () => {
    expect(isRegularGraph(ringGraph(6))).toBe(true)
    expect(isRegularGraph(powerTwoRingGraph(12))).toBe(true)
    expect(isRegularGraph(fullyConnectedGraph(5))).toBe(true)
  })

  test('inner/outer graphs are regular', () => {
    expect(isRegularGraph(innerOuterRingGraph(12, 3))).toBe(true)
    expect(isRegularGraph(innerOuterExp2Graph(20, 4))).toBe(true)
  })

  test('star and mesh are not', () => {
    expect(isRegularGraph(starGraph(5))).toBe(false)
    expect(isRegularGraph(meshGrid2DGraph(6))).toBe(false)
  })
})

describe('checkStochastic', () => {
  test.each(builders)('%s rows sum to 1', (_, build) => {
    expect(checkStochastic(build()).rowStochastic).toBe(true)
  })

  test('symmetric graphs are doubly stochastic', () => {
    const report = checkStochastic(starGraph(7))
    expect(report.rowStochastic).toBe(true)
    expect(report.columnStochastic).toBe(true)
  })

  test('reports the column error of a row-stochastic matrix', () => {
    const report = checkStochastic(
      fromWeightRows([
        [0.6, 0.4],
        [0.5, 0.5],
      ]),
    )
    expect(report.rowStochastic).toBe(true)
    expect(report.columnStochastic).toBe(false)
    expect(report.maxColumnError).toBeCloseTo(0.1, 12)
  })
})
