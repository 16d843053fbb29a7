// =============================================================================
// Circulant Topologies — ring, power-of-base and fully connected families
//
// Each builder computes a single first row x (the weights node 0 gives its
// neighbors), normalizes it to sum 1, and rotates it: row i = x shifted right
// by i. Circulant rows and columns both sum to 1, so these graphs are
// doubly stochastic.
// =============================================================================

import type { Topology } from './types'
import { ConnectStyle } from './types'
import { WeightMatrix, makeTopology } from './matrix'
import { assertSize, invalidArgument } from './errors'

function normalize(x: number[]): number[] {
  const sum = x.reduce((acc, v) => acc + v, 0)
  return x.map((v) => v / sum)
}

function assertBase(base: number): void {
  if (!Number.isInteger(base) || base <= 1) {
    throw invalidArgument(`Base has to be an integer larger than 1, got ${base}`)
  }
}

// =============================================================================
// isPowerOf — true iff base^floor(log_base(x)) === x
//
// Evaluated by repeated integer division rather than Math.log, which rounds
// log_3(243) down to 4.
// =============================================================================
export function isPowerOf(x: number, base: number): boolean {
  assertBase(base)
  if (!Number.isInteger(x) || x <= 0) {
    throw invalidArgument(`Power test needs a positive integer, got ${x}`)
  }
  let v = x
  while (v % base === 0) v /= base
  return v === 1
}

// =============================================================================
// ringGraph
//
//   size 1 -> [[1]]
//   size 2 -> [[.5, .5], [.5, .5]]
//   size 3+ -> BI: self/left/right 1/3 each, LEFT or RIGHT: self/neighbor 1/2
// =============================================================================
export function ringGraph(size: number, connectStyle: ConnectStyle = ConnectStyle.BI): Topology {
  assertSize(size)
  if (
    connectStyle !== ConnectStyle.BI &&
    connectStyle !== ConnectStyle.LEFT &&
    connectStyle !== ConnectStyle.RIGHT
  ) {
    throw invalidArgument(
      `connectStyle has to be 0 (bi), 1 (left) or 2 (right), got ${connectStyle}`,
    )
  }

  const params = { connectStyle }
  if (size === 1) {
    return makeTopology('ring', WeightMatrix.fromRows([[1.0]]), params)
  }
  if (size === 2) {
    return makeTopology('ring', WeightMatrix.fromRows([[0.5, 0.5], [0.5, 0.5]]), params)
  }

  const x = new Array<number>(size).fill(0)
  if (connectStyle === ConnectStyle.BI) {
    x[0] = 1 / 3
    x[1] = 1 / 3
    x[size - 1] = 1 / 3
  } else if (connectStyle === ConnectStyle.LEFT) {
    x[0] = 0.5
    x[size - 1] = 0.5
  } else {
    x[0] = 0.5
    x[1] = 0.5
  }
  return makeTopology('ring', WeightMatrix.circulant(x), params)
}

// Node 0 reaches every i with i & (i - 1) === 0, i.e. 0 and powers of two
export function powerTwoRingGraph(size: number): Topology {
  assertSize(size)
  const x: number[] = []
  for (let i = 0; i < size; i++) {
    x.push((i & (i - 1)) === 0 ? 1.0 : 0.0)
  }
  return makeTopology('power-two-ring', WeightMatrix.circulant(normalize(x)))
}

export function powerGraph(size: number, base = 2): Topology {
  assertSize(size)
  assertBase(base)
  const x = [1.0]
  for (let i = 1; i < size; i++) {
    x.push(isPowerOf(i, base) ? 1.0 : 0.0)
  }
  return makeTopology('power', WeightMatrix.circulant(normalize(x)), { base })
}

// =============================================================================
// symmetricPowerGraph — power-of-base test on the first half of the ring,
// mirrored onto the second half (i > size/2 is tested as size - i)
// =============================================================================
export function symmetricPowerGraph(size: number, base = 4): Topology {
  assertSize(size)
  assertBase(base)
  const half = Math.floor(size / 2)
  const x = [1.0]
  for (let i = 1; i < size; i++) {
    const index = i <= half ? i : size - i
    x.push(isPowerOf(index, base) ? 1.0 : 0.0)
  }
  return makeTopology('symmetric-power', WeightMatrix.circulant(normalize(x)), { base })
}

export function fullyConnectedGraph(size: number): Topology {
  assertSize(size)
  const x = new Array<number>(size).fill(1 / size)
  return makeTopology('fully-connected', WeightMatrix.circulant(x))
}
