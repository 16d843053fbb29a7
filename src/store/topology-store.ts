import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { Topology, WeightView, SendRecvRanks } from '../engine/types'
import { DecisionLog } from '../engine/decision-log'
import { isTopologyEquivalent } from '../engine/validate'
import {
  getRecvWeights,
  getSendWeights,
  getUniformRecvWeights,
  inNeighborRanks,
  outNeighborRanks,
} from '../engine/weights'
import { nextSendRecv } from '../engine/dynamic'
import {
  hierarchicalKindOf,
  hierarchicalLocalSize,
  nextHierarchicalSendRecv,
} from '../engine/hierarchical'
import { assertRound, invalidArgument } from '../engine/errors'

interface TopologyState {
  // Installed configuration; identical on every process of a job
  topology: Topology | null
  isWeighted: boolean
  dynamic: boolean

  log: DecisionLog

  // Actions
  setTopology: (topology: Topology, isWeighted?: boolean) => boolean
  setDynamic: (dynamic: boolean) => void
  reset: () => void

  // Queries against the installed topology
  sendWeights: (rank: number) => WeightView
  recvWeights: (rank: number) => WeightView
  inNeighbors: (rank: number) => number[]
  outNeighbors: (rank: number) => number[]
  nextSendRecv: (rank: number, round: number) => SendRecvRanks
}

export type TopologyStore = StoreApi<TopologyState>

export interface TopologyStoreOptions {
  topology?: Topology
  isWeighted?: boolean
  dynamic?: boolean
  log?: DecisionLog
}

// One store per coordinator; nothing here is module-global
export function createTopologyStore(options: TopologyStoreOptions = {}): TopologyStore {
  return createStore<TopologyState>((set, get) => {
    const installed = (): Topology => {
      const { topology } = get()
      if (!topology) throw invalidArgument('No topology installed')
      return topology
    }

    return {
      topology: options.topology ?? null,
      isWeighted: options.isWeighted ?? false,
      dynamic: options.dynamic ?? false,
      log: options.log ?? new DecisionLog(),

      setTopology: (topology, isWeighted = false) => {
        const state = get()
        if (isTopologyEquivalent(state.topology, topology) && state.isWeighted === isWeighted) {
          state.log.emit(
            'install',
            `Kept current ${topology.kind} topology`,
            'New topology is equivalent to the installed one',
            'topology-store.ts:setTopology',
          )
          return false
        }
        set({ topology, isWeighted })
        state.log.emit(
          'install',
          `Installed ${topology.kind} topology over ${topology.size} ranks`,
          isWeighted ? 'Combining with topology weights' : 'Combining with a uniform average',
          'topology-store.ts:setTopology',
          [],
          { kind: topology.kind, size: topology.size, isWeighted },
        )
        return true
      },

      setDynamic: (dynamic) => set({ dynamic }),

      reset: () =>
        set({
          topology: null,
          isWeighted: false,
          dynamic: false,
        }),

      sendWeights: (rank) => getSendWeights(installed(), rank),

      recvWeights: (rank) => {
        const topology = installed()
        return get().isWeighted
          ? getRecvWeights(topology, rank)
          : getUniformRecvWeights(topology, rank)
      },

      inNeighbors: (rank) => inNeighborRanks(installed(), rank),
      outNeighbors: (rank) => outNeighborRanks(installed(), rank),

      // Static mode activates every out-edge each round; dynamic inner/outer
      // topologies follow the same hierarchical rounds as runInit
      nextSendRecv: (rank, round) => {
        const topology = installed()
        if (get().dynamic) {
          const hierarchical = hierarchicalKindOf(topology)
          return hierarchical
            ? nextHierarchicalSendRecv(
                topology.size,
                hierarchicalLocalSize(topology),
                rank,
                round,
                hierarchical,
              )
            : nextSendRecv(topology, rank, round)
        }
        assertRound(round)
        return {
          sendRanks: outNeighborRanks(topology, rank),
          recvRanks: inNeighborRanks(topology, rank),
        }
      },
    }
  })
}
