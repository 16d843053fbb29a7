// =============================================================================
// Gossip Topology Types — weighted digraphs over ranks, weight views and
// per-round schedules
// =============================================================================

import type { WeightMatrix } from './matrix'

// --- Topology families ---
export type TopologyKind =
  | 'ring'
  | 'power-two-ring'
  | 'power'
  | 'symmetric-power'
  | 'mesh-grid-2d'
  | 'star'
  | 'fully-connected'
  | 'inner-outer-ring'
  | 'inner-outer-exp2'
  | 'custom'

// --- Ring connection styles ---
export enum ConnectStyle {
  BI = 0,     // self, left and right
  LEFT = 1,   // self and left
  RIGHT = 2,  // self and right
}

// =============================================================================
// Topology specifications (input to buildTopology)
// =============================================================================

export type TopologySpec =
  | { kind: 'ring'; size: number; connectStyle?: ConnectStyle }
  | { kind: 'power-two-ring'; size: number }
  | { kind: 'power'; size: number; base?: number }
  | { kind: 'symmetric-power'; size: number; base?: number }
  | { kind: 'mesh-grid-2d'; size: number; shape?: [number, number] }
  | { kind: 'star'; size: number; centerRank?: number }
  | { kind: 'fully-connected'; size: number }
  | { kind: 'inner-outer-ring'; size: number; localSize: number }
  | { kind: 'inner-outer-exp2'; size: number; localSize: number }

export type TopologyParams = Record<string, number | [number, number]>

// =============================================================================
// Core topology value
// =============================================================================

// W[i][j] != 0 means an edge i -> j; the destination j weighs the value it
// receives from i by W[i][j]. Every builder produces row-stochastic weights.
export interface Topology {
  readonly kind: TopologyKind
  readonly size: number
  readonly weights: WeightMatrix
  readonly params: Readonly<TopologyParams>
}

export interface WeightView {
  selfWeight: number
  neighborWeights: Map<number, number>  // rank -> weight, ascending ranks
}

export interface SendRecvRanks {
  sendRanks: number[]
  recvRanks: number[]
}

export type HierarchicalKind = 'inner-outer-ring' | 'inner-outer-exp2'

export interface StochasticReport {
  rowStochastic: boolean
  columnStochastic: boolean
  maxRowError: number
  maxColumnError: number
}

// =============================================================================
// Decision log
// =============================================================================

export type DecisionPhase =
  | 'configure'
  | 'buildTopology'
  | 'validate'
  | 'schedule'
  | 'install'

export interface DecisionEntry {
  step: number
  phase: DecisionPhase
  action: string
  reason: string
  alternatives: string[]
  sourceRef: string       // e.g. "rings.ts:ringGraph"
  data?: Record<string, unknown>
  timestamp: number
}
