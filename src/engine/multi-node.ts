// =============================================================================
// Multi-Node Topologies — inner (intra-machine) / outer (inter-machine) graphs
//
// worldSize ranks are split into numMachines machines of localSize ranks each.
// Within a machine every rank is connected to every other. Across machines
// only ranks with the same local id are connected:
//   - inner-outer-ring: machine m -> machine (m + 1) mod numMachines
//   - inner-outer-exp2: machine m -> every machine at a power-of-2 distance
// Rows are normalized to sum 1.
// =============================================================================

import type { Topology } from './types'
import { WeightMatrix, makeTopology } from './matrix'
import { assertSize, invalidArgument } from './errors'
import { isPowerOf } from './rings'
import { mod } from '../utils/modular'

export interface MachineLayout {
  worldSize: number
  localSize: number
  numMachines: number
}

export interface RankPlacement {
  machineId: number
  localId: number
}

export function machineLayout(worldSize: number, localSize: number): MachineLayout {
  assertSize(worldSize, 'worldSize')
  assertSize(localSize, 'localSize')
  if (worldSize % localSize !== 0) {
    throw invalidArgument(
      `worldSize ${worldSize} is not divisible by localSize ${localSize}; ` +
        'only homogeneous machines are supported',
    )
  }
  return { worldSize, localSize, numMachines: worldSize / localSize }
}

export function placeRank(layout: MachineLayout, rank: number): RankPlacement {
  return {
    machineId: Math.floor(rank / layout.localSize),
    localId: rank % layout.localSize,
  }
}

export function rankAt(layout: MachineLayout, machineId: number, localId: number): number {
  return machineId * layout.localSize + localId
}

function buildInnerOuter(
  layout: MachineLayout,
  linksMachines: (distance: number) => boolean,
): WeightMatrix {
  const { worldSize, numMachines } = layout
  const rows: number[][] = []

  for (let i = 0; i < worldSize; i++) {
    const a = placeRank(layout, i)
    const row = new Array<number>(worldSize).fill(0)
    for (let j = 0; j < worldSize; j++) {
      const b = placeRank(layout, j)
      if (a.machineId === b.machineId) {
        row[j] = 1
      } else if (a.localId === b.localId) {
        const distance = mod(b.machineId - a.machineId, numMachines)
        row[j] = linksMachines(distance) ? 1 : 0
      }
    }
    const sum = row.reduce((acc, v) => acc + v, 0)
    rows.push(row.map((v) => v / sum))
  }

  return WeightMatrix.fromRows(rows)
}

export function innerOuterRingGraph(worldSize: number, localSize: number): Topology {
  const layout = machineLayout(worldSize, localSize)
  const weights = buildInnerOuter(layout, (distance) => distance === 1)
  return makeTopology('inner-outer-ring', weights, { localSize })
}

export function innerOuterExp2Graph(worldSize: number, localSize: number): Topology {
  const layout = machineLayout(worldSize, localSize)
  const weights = buildInnerOuter(layout, (distance) => isPowerOf(distance, 2))
  return makeTopology('inner-outer-exp2', weights, { localSize })
}
