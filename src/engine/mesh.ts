// =============================================================================
// Grid and Star Topologies
//
// Both are symmetric (W[i][j] === W[j][i]) with rows summing to 1, so the
// averaging operator is doubly stochastic without being circulant.
// =============================================================================

import type { Topology } from './types'
import { WeightMatrix, makeTopology } from './matrix'
import { assertSize, invalidArgument } from './errors'

// Largest nrow <= floor(sqrt(size)) dividing size; a prime size gives 1 x size
export function defaultMeshShape(size: number): [number, number] {
  assertSize(size)
  let nrow = Math.floor(Math.sqrt(size))
  while (size % nrow !== 0) nrow--
  return [nrow, size / nrow]
}

// =============================================================================
// meshGrid2DGraph — nrow x ncol grid, Metropolis-Hastings weights
//
// Each node links to itself, its right neighbor (no wraparound) and the node
// below it; links are bidirectional. With deg(i) counting i itself:
//   W[i][j] = 1 / max(deg(i), deg(j))   for neighbors j != i
//   W[i][i] = 1 - sum of the other weights in row i
// =============================================================================
export function meshGrid2DGraph(size: number, shape?: [number, number]): Topology {
  assertSize(size)
  const [nrow, ncol] = shape ?? defaultMeshShape(size)
  if (!Number.isInteger(nrow) || !Number.isInteger(ncol) || nrow <= 0 || ncol <= 0) {
    throw invalidArgument(`Mesh shape must be two positive integers, got ${nrow}x${ncol}`)
  }
  if (nrow * ncol !== size) {
    throw invalidArgument(`The shape ${nrow}x${ncol} doesn't match the size ${size}`)
  }

  const adjacent: boolean[][] = Array.from({ length: size }, () =>
    new Array<boolean>(size).fill(false),
  )
  for (let i = 0; i < size; i++) {
    adjacent[i][i] = true
    if ((i + 1) % ncol !== 0) {
      adjacent[i][i + 1] = true
      adjacent[i + 1][i] = true
    }
    if (i + ncol < size) {
      adjacent[i][i + ncol] = true
      adjacent[i + ncol][i] = true
    }
  }

  const degree = adjacent.map((row) => row.filter(Boolean).length)
  const rows: number[][] = []
  for (let i = 0; i < size; i++) {
    const row = new Array<number>(size).fill(0)
    let neighborSum = 0
    for (let j = 0; j < size; j++) {
      if (i === j || !adjacent[i][j]) continue
      row[j] = 1 / Math.max(degree[i], degree[j])
      neighborSum += row[j]
    }
    row[i] = 1 - neighborSum
    rows.push(row)
  }

  return makeTopology('mesh-grid-2d', WeightMatrix.fromRows(rows), { shape: [nrow, ncol] })
}

// =============================================================================
// starGraph — every leaf exchanges with centerRank
//
// Leaf rows: self 1 - 1/size, center 1/size. The center row gives 1/size to
// every node including itself, so it also sums to 1.
// =============================================================================
export function starGraph(size: number, centerRank = 0): Topology {
  assertSize(size)
  if (!Number.isInteger(centerRank) || centerRank < 0 || centerRank >= size) {
    throw invalidArgument(`centerRank ${centerRank} is outside [0, ${size})`)
  }

  const rows: number[][] = Array.from({ length: size }, () =>
    new Array<number>(size).fill(0),
  )
  for (let i = 0; i < size; i++) {
    rows[i][i] = 1 - 1 / size
    rows[centerRank][i] = 1 / size
    rows[i][centerRank] = 1 / size
  }
  return makeTopology('star', WeightMatrix.fromRows(rows), { centerRank })
}
