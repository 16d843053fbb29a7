// =============================================================================
// Topology Validation
// =============================================================================

import type { Topology, StochasticReport } from './types'

// Same node count, same edge count and an identical weight matrix. Stricter
// than isomorphism: node labels must line up.
export function isTopologyEquivalent(
  a: Topology | null | undefined,
  b: Topology | null | undefined,
): boolean {
  if (!a || !b) return false
  if (a.size !== b.size) return false
  if (a.weights.edgeCount !== b.weights.edgeCount) return false
  return a.weights.equals(b.weights)
}

// Every node has the out-degree of node 0 (self loops included)
export function isRegularGraph(topology: Topology): boolean {
  const degree = topology.weights.outDegree(0)
  for (let rank = 1; rank < topology.size; rank++) {
    if (topology.weights.outDegree(rank) !== degree) return false
  }
  return true
}

export function checkStochastic(topology: Topology, epsilon = 1e-9): StochasticReport {
  let maxRowError = 0
  let maxColumnError = 0
  for (let k = 0; k < topology.size; k++) {
    maxRowError = Math.max(maxRowError, Math.abs(topology.weights.rowSum(k) - 1))
    maxColumnError = Math.max(maxColumnError, Math.abs(topology.weights.columnSum(k) - 1))
  }
  return {
    rowStochastic: maxRowError <= epsilon,
    columnStochastic: maxColumnError <= epsilon,
    maxRowError,
    maxColumnError,
  }
}
