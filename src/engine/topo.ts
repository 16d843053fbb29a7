// =============================================================================
// Topology Builder — dispatches a TopologySpec to its family builder
//
// Builders either return a complete, frozen Topology or throw before anything
// is exposed. Each build is recorded in the decision log.
// =============================================================================

import type { Topology, TopologySpec, TopologyKind } from './types'
import { ConnectStyle } from './types'
import { DecisionLog } from './decision-log'
import {
  ringGraph,
  powerTwoRingGraph,
  powerGraph,
  symmetricPowerGraph,
  fullyConnectedGraph,
} from './rings'
import { meshGrid2DGraph, starGraph, defaultMeshShape } from './mesh'
import { innerOuterRingGraph, innerOuterExp2Graph } from './multi-node'

// Kinds buildTopology accepts ('custom' comes from fromWeightRows only)
export const BUILDABLE_KINDS: readonly Exclude<TopologyKind, 'custom'>[] = [
  'ring',
  'power-two-ring',
  'power',
  'symmetric-power',
  'mesh-grid-2d',
  'star',
  'fully-connected',
  'inner-outer-ring',
  'inner-outer-exp2',
]

export function isBuildableKind(kind: string): kind is Exclude<TopologyKind, 'custom'> {
  return BUILDABLE_KINDS.some((k) => k === kind)
}

function dispatch(spec: TopologySpec): Topology {
  switch (spec.kind) {
    case 'ring':
      return ringGraph(spec.size, spec.connectStyle ?? ConnectStyle.BI)
    case 'power-two-ring':
      return powerTwoRingGraph(spec.size)
    case 'power':
      return powerGraph(spec.size, spec.base ?? 2)
    case 'symmetric-power':
      return symmetricPowerGraph(spec.size, spec.base ?? 4)
    case 'mesh-grid-2d':
      return meshGrid2DGraph(spec.size, spec.shape)
    case 'star':
      return starGraph(spec.size, spec.centerRank ?? 0)
    case 'fully-connected':
      return fullyConnectedGraph(spec.size)
    case 'inner-outer-ring':
      return innerOuterRingGraph(spec.size, spec.localSize)
    case 'inner-outer-exp2':
      return innerOuterExp2Graph(spec.size, spec.localSize)
  }
}

function describe(spec: TopologySpec): string {
  switch (spec.kind) {
    case 'ring':
      return `connect style ${spec.connectStyle ?? ConnectStyle.BI}`
    case 'power':
      return `base ${spec.base ?? 2}`
    case 'symmetric-power':
      return `base ${spec.base ?? 4}, mirrored past size/2`
    case 'mesh-grid-2d': {
      const [nrow, ncol] = spec.shape ?? defaultMeshShape(spec.size)
      return `${nrow}x${ncol} grid${spec.shape ? '' : ' (closest factors)'}, Metropolis-Hastings weights`
    }
    case 'star':
      return `center rank ${spec.centerRank ?? 0}`
    case 'inner-outer-ring':
    case 'inner-outer-exp2':
      return `local size ${spec.localSize}`
    default:
      return 'uniform weights over the connected set'
  }
}

// =============================================================================
// buildTopology — BuildTopology(kind, size, params)
// =============================================================================
export function buildTopology(
  spec: TopologySpec,
  log: DecisionLog = new DecisionLog(),
): Topology {
  const topology = dispatch(spec)

  log.emit(
    'buildTopology',
    `Built ${spec.kind} topology over ${topology.size} ranks`,
    describe(spec),
    `topo.ts:${spec.kind}`,
    BUILDABLE_KINDS.filter((k) => k !== spec.kind),
    {
      kind: spec.kind,
      size: topology.size,
      edges: topology.weights.edgeCount,
      params: topology.params,
    },
  )

  return topology
}
