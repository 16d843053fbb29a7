// =============================================================================
// gossip-topology — public entry
// =============================================================================

export type {
  TopologyKind,
  TopologySpec,
  TopologyParams,
  Topology,
  WeightView,
  SendRecvRanks,
  HierarchicalKind,
  StochasticReport,
  DecisionPhase,
  DecisionEntry,
} from './engine/types'
export { ConnectStyle } from './engine/types'

export { TopologyError, type TopologyErrorCode } from './engine/errors'
export { DecisionLog, type DecisionLogOptions, type DecisionSink } from './engine/decision-log'
export { WeightMatrix, fromWeightRows } from './engine/matrix'

export {
  isPowerOf,
  ringGraph,
  powerTwoRingGraph,
  powerGraph,
  symmetricPowerGraph,
  fullyConnectedGraph,
} from './engine/rings'
export { meshGrid2DGraph, starGraph, defaultMeshShape } from './engine/mesh'
export {
  innerOuterRingGraph,
  innerOuterExp2Graph,
  machineLayout,
  type MachineLayout,
} from './engine/multi-node'
export { buildTopology, BUILDABLE_KINDS } from './engine/topo'

export {
  getSendWeights,
  getRecvWeights,
  getUniformRecvWeights,
  inNeighborRanks,
  outNeighborRanks,
} from './engine/weights'
export { isTopologyEquivalent, isRegularGraph, checkStochastic } from './engine/validate'

export { buildSendOrder, nextSendRecv, type SendOrder } from './engine/dynamic'
export {
  innerOuterRingSendRecv,
  innerOuterExp2SendRecv,
  nextHierarchicalSendRecv,
} from './engine/hierarchical'

export {
  createDefaultEnvConfig,
  applyEnvOverrides,
  resolveTopologySpec,
  getEnvValue,
  isEnvOverridden,
  type EnvConfig,
  type EnvVarDef,
} from './engine/env'
export { runInit, type InitResult, type ScheduleMode } from './engine/init'

export {
  createTopologyStore,
  type TopologyStore,
  type TopologyStoreOptions,
} from './store/topology-store'
