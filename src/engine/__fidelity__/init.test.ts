import { describe, test, expect } from 'vitest'

import type { DecisionEntry } from '../types'
import { TopologyError } from '../errors'
import { DecisionLog } from '../decision-log'
import { createDefaultEnvConfig, applyEnvOverrides } from '../env'
import { runInit } from '../init'

function env(source: Record<string, string> = {}) {
  return applyEnvOverrides(createDefaultEnvConfig(), source)
}

describe('runInit', () => {
  test('defaults: weighted power-two ring with static neighbors', () => {
    const result = runInit(env(), 8, 0)
    expect(result.topology.kind).toBe('power-two-ring')
    expect(result.mode).toBe('static')
    expect(result.weighted).toBe(true)
    expect(result.weights.selfWeight).toBe(0.25)
    expect([...result.weights.neighborWeights.keys()]).toEqual([4, 6, 7])
    expect(result.schedule(0)).toEqual({ sendRanks: [1, 2, 4], recvRanks: [4, 6, 7] })
    expect(result.schedule(9)).toEqual(result.schedule(0))
  })

  test('dynamic one-peer schedule', () => {
    const result = runInit(env({ GOSSIP_DYNAMIC: '1' }), 8, 0)
    expect(result.mode).toBe('dynamic')
    expect(result.schedule(0)).toEqual({ sendRanks: [1], recvRanks: [7] })
    expect(result.schedule(2)).toEqual({ sendRanks: [4], recvRanks: [4] })
  })

  test('hierarchical schedule', () => {
    const result = runInit(
      env({ GOSSIP_TOPOLOGY: 'inner-outer-exp2', GOSSIP_LOCAL_SIZE: '3', GOSSIP_DYNAMIC: '1' }),
      12,
      0,
    )
    expect(result.mode).toBe('hierarchical-exp2')
    expect(result.schedule(0)).toEqual({ sendRanks: [3], recvRanks: [9] })
  })

  test('hierarchical topology without dynamic rounds uses static neighbors', () => {
    const result = runInit(
      env({ GOSSIP_TOPOLOGY: 'inner-outer-ring', GOSSIP_LOCAL_SIZE: '2' }),
      8,
      0,
    )
    expect(result.mode).toBe('static')
    expect(result.schedule(0)).toEqual({ sendRanks: [1, 2], recvRanks: [1, 6] })
  })

  test('fails fast on an unsupported hierarchical schedule', () => {
    const config = env({
      GOSSIP_TOPOLOGY: 'inner-outer-ring',
      GOSSIP_LOCAL_SIZE: '2',
      GOSSIP_DYNAMIC: '1',
    })
    let code: string | undefined
    try {
      runInit(config, 8, 0)
    } catch (err) {
      code = err instanceof TopologyError ? err.code : undefined
    }
    expect(code).toBe('E_UNSUPPORTED')
  })

  test('unweighted combine uses a plain average', () => {
    const result = runInit(env({ GOSSIP_TOPOLOGY: 'star', GOSSIP_WEIGHTED: '0' }), 5, 1)
    expect(result.weights.selfWeight).toBe(0.5)
    expect([...result.weights.neighborWeights]).toEqual([[0, 0.5]])
  })

  test('rejects a rank outside the group', () => {
    expect(() => runInit(env(), 8, 8)).toThrowError(TopologyError)
  })

  test('logs each step', () => {
    const seen: DecisionEntry[] = []
    const log = new DecisionLog({ sink: (e) => seen.push(e), now: () => 42 })
    runInit(env({ GOSSIP_DYNAMIC: '1' }), 8, 3, log)
    expect(log.getEntries().map((e) => e.phase)).toEqual([
      'configure',
      'buildTopology',
      'validate',
      'configure',
      'schedule',
    ])
    expect(seen).toHaveLength(5)
    expect(log.getEntries()[3].action).toBe('Rank 3 combines 3 neighbors, self weight 0.25')
    expect(log.last()?.action).toBe('Schedule mode: dynamic')
    expect(log.last()?.reason).toBe('Round 0: send to [4], receive from [2]')
    expect(log.last()?.timestamp).toBe(42)
  })
})

describe('DecisionLog', () => {
  test('numbers steps and filters by phase', () => {
    const log = new DecisionLog()
    log.emit('configure', 'a', 'r', 'x.ts')
    log.emit('validate', 'b', 'r', 'x.ts', ['alt'])
    log.emit('configure', 'c', 'r', 'x.ts')
    expect(log.getEntriesByPhase('configure').map((e) => e.step)).toEqual([0, 2])
    expect(log.getEntries()[1].alternatives).toEqual(['alt'])
    log.clear()
    expect(log.length).toBe(0)
    log.emit('schedule', 'd', 'r', 'x.ts')
    expect(log.last()?.step).toBe(0)
  })
})
