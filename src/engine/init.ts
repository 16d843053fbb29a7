// =============================================================================
// Initialization Orchestrator — configuration to a per-rank round plan
//
// Runs the full pipeline for one rank:
//   1. Resolve the topology spec from the environment config
//   2. Build the topology
//   3. Validate it (stochasticity, regularity)
//   4. Pick the combine weights (topology weights or a uniform average)
//   5. Pick the schedule mode (static neighbors, one-peer, hierarchical)
// =============================================================================

import type { Topology, WeightView, SendRecvRanks } from './types'
import { DecisionLog } from './decision-log'
import type { EnvConfig } from './env'
import { getEnvBool, resolveTopologySpec } from './env'
import { buildTopology } from './topo'
import { checkStochastic, isRegularGraph } from './validate'
import {
  getRecvWeights,
  getUniformRecvWeights,
  inNeighborRanks,
  outNeighborRanks,
} from './weights'
import { nextSendRecv } from './dynamic'
import {
  hierarchicalKindOf,
  hierarchicalLocalSize,
  nextHierarchicalSendRecv,
} from './hierarchical'
import { assertRank, assertRound } from './errors'

// =============================================================================
// Types
// =============================================================================

export type ScheduleMode = 'static' | 'dynamic' | 'hierarchical-ring' | 'hierarchical-exp2'

export interface InitResult {
  topology: Topology
  rank: number
  weighted: boolean
  mode: ScheduleMode
  weights: WeightView
  schedule: (round: number) => SendRecvRanks
  log: DecisionLog
}

function selectSchedule(
  topology: Topology,
  rank: number,
  dynamic: boolean,
): { mode: ScheduleMode; schedule: (round: number) => SendRecvRanks } {
  if (!dynamic) {
    const sendRanks = outNeighborRanks(topology, rank)
    const recvRanks = inNeighborRanks(topology, rank)
    return {
      mode: 'static',
      schedule: (round) => {
        assertRound(round)
        return { sendRanks: [...sendRanks], recvRanks: [...recvRanks] }
      },
    }
  }

  const hierarchical = hierarchicalKindOf(topology)
  if (hierarchical) {
    const localSize = hierarchicalLocalSize(topology)
    return {
      mode: hierarchical === 'inner-outer-ring' ? 'hierarchical-ring' : 'hierarchical-exp2',
      schedule: (round) =>
        nextHierarchicalSendRecv(topology.size, localSize, rank, round, hierarchical),
    }
  }

  return { mode: 'dynamic', schedule: (round) => nextSendRecv(topology, rank, round) }
}

// =============================================================================
// runInit
// =============================================================================

export function runInit(
  env: EnvConfig,
  size: number,
  rank: number,
  log: DecisionLog = new DecisionLog(),
): InitResult {
  // -------------------------------------------------------------------------
  // Step 1: Resolve the spec
  // -------------------------------------------------------------------------
  const spec = resolveTopologySpec(env, size)
  const weighted = getEnvBool(env, 'GOSSIP_WEIGHTED')
  const dynamic = getEnvBool(env, 'GOSSIP_DYNAMIC')

  log.emit(
    'configure',
    `Resolved ${spec.kind} topology for rank ${rank} of ${size}`,
    `weighted=${weighted}, dynamic=${dynamic}`,
    'env.ts:resolveTopologySpec',
    [],
    { spec, weighted, dynamic },
  )

  // -------------------------------------------------------------------------
  // Step 2: Build
  // -------------------------------------------------------------------------
  const topology = buildTopology(spec, log)
  assertRank(rank, topology.size)

  // -------------------------------------------------------------------------
  // Step 3: Validate
  // -------------------------------------------------------------------------
  const report = checkStochastic(topology)
  const regular = isRegularGraph(topology)

  log.emit(
    'validate',
    report.rowStochastic
      ? `Rows sum to 1 (max error ${report.maxRowError.toExponential(2)})`
      : `Rows do not sum to 1 (max error ${report.maxRowError.toExponential(2)})`,
    report.columnStochastic
      ? 'Columns also sum to 1: doubly stochastic'
      : 'Columns do not all sum to 1: row stochastic only',
    'validate.ts:checkStochastic',
    [],
    { ...report, regular },
  )

  // -------------------------------------------------------------------------
  // Step 4: Combine weights
  // -------------------------------------------------------------------------
  const weights = weighted
    ? getRecvWeights(topology, rank)
    : getUniformRecvWeights(topology, rank)

  log.emit(
    'configure',
    `Rank ${rank} combines ${weights.neighborWeights.size} neighbors, self weight ${weights.selfWeight}`,
    weighted ? 'Using topology weights' : 'Using a uniform average over in-neighbors and self',
    weighted ? 'weights.ts:getRecvWeights' : 'weights.ts:getUniformRecvWeights',
    [weighted ? 'uniform average' : 'topology weights'],
    { neighbors: [...weights.neighborWeights.keys()] },
  )

  // -------------------------------------------------------------------------
  // Step 5: Schedule
  // -------------------------------------------------------------------------
  const { mode, schedule } = selectSchedule(topology, rank, dynamic)

  // Fail fast on configurations the schedule rejects (e.g. localSize <= 2)
  const first = schedule(0)

  log.emit(
    'schedule',
    `Schedule mode: ${mode}`,
    `Round 0: send to [${first.sendRanks.join(', ')}], receive from [${first.recvRanks.join(', ')}]`,
    mode === 'static'
      ? 'weights.ts:outNeighborRanks'
      : mode === 'dynamic'
        ? 'dynamic.ts:nextSendRecv'
        : 'hierarchical.ts:nextHierarchicalSendRecv',
    [],
    { mode, round0: first },
  )

  return { topology, rank, weighted, mode, weights, schedule, log }
}
