// =============================================================================
// Environment Variable Configuration — topology, weighting and schedule knobs
//
// Every process of a job must resolve the same values; agreeing on them is
// the launcher's concern, not this module's.
// =============================================================================

import type { TopologySpec } from './types'
import { ConnectStyle } from './types'
import { invalidArgument } from './errors'
import { isBuildableKind } from './topo'

export type EnvVarType = 'int' | 'string' | 'bool'
export type EnvCategory = 'topology' | 'weights' | 'schedule'

export interface EnvVarDef {
  name: string
  default: number | string | null
  value: number | string | null
  type: EnvVarType
  description: string
  sourceRef: string
  category: EnvCategory
}

function def(
  name: string,
  defaultVal: number | string | null,
  type: EnvVarType,
  description: string,
  sourceRef: string,
  category: EnvCategory,
): EnvVarDef {
  return { name, default: defaultVal, value: null, type, description, sourceRef, category }
}

export function createDefaultEnvConfig(): Map<string, EnvVarDef> {
  const vars: EnvVarDef[] = [
    // === TOPOLOGY ===
    def('GOSSIP_TOPOLOGY', 'power-two-ring', 'string', 'Topology family (ring, power-two-ring, power, symmetric-power, mesh-grid-2d, star, fully-connected, inner-outer-ring, inner-outer-exp2)', 'topo.ts:buildTopology', 'topology'),
    def('GOSSIP_TOPOLOGY_BASE', null, 'int', 'Base of power / symmetric-power graphs (unset: 2 and 4 respectively)', 'rings.ts:powerGraph', 'topology'),
    def('GOSSIP_RING_CONNECT_STYLE', 0, 'int', 'Ring connection (0=bi, 1=left, 2=right)', 'rings.ts:ringGraph', 'topology'),
    def('GOSSIP_MESH_SHAPE', null, 'string', 'Mesh grid shape as NROWxNCOL (unset: closest factors of size)', 'mesh.ts:meshGrid2DGraph', 'topology'),
    def('GOSSIP_STAR_CENTER', 0, 'int', 'Center rank of the star graph', 'mesh.ts:starGraph', 'topology'),
    def('GOSSIP_LOCAL_SIZE', null, 'int', 'Ranks per machine for inner/outer topologies', 'multi-node.ts:machineLayout', 'topology'),

    // === WEIGHTS ===
    def('GOSSIP_WEIGHTED', 1, 'bool', 'Combine with topology weights (1) or a plain average over in-neighbors (0)', 'weights.ts:getUniformRecvWeights', 'weights'),

    // === SCHEDULE ===
    def('GOSSIP_DYNAMIC', 0, 'bool', 'Use one-peer dynamic rounds (1) instead of all static neighbors (0)', 'dynamic.ts:nextSendRecv', 'schedule'),
  ]

  const map = new Map<string, EnvVarDef>()
  for (const v of vars) {
    map.set(v.name, v)
  }
  return map
}

export type EnvConfig = Map<string, EnvVarDef>

// Get the effective value of an env var (user value or default)
export function getEnvValue(config: EnvConfig, name: string): number | string | null {
  const v = config.get(name)
  if (!v) return null
  return v.value !== null ? v.value : v.default
}

export function getEnvInt(config: EnvConfig, name: string): number | null {
  const val = getEnvValue(config, name)
  if (val === null) return null
  return typeof val === 'number' ? val : parseInt(val, 10)
}

export function getEnvString(config: EnvConfig, name: string): string | null {
  const val = getEnvValue(config, name)
  return val === null ? null : String(val)
}

export function getEnvBool(config: EnvConfig, name: string): boolean {
  return getEnvInt(config, name) === 1
}

// Check if an env var has been overridden from its default
export function isEnvOverridden(config: EnvConfig, name: string): boolean {
  const v = config.get(name)
  return v !== undefined && v.value !== null
}

// =============================================================================
// applyEnvOverrides — copy the config, taking values found in `source`
// (typically process.env). Empty strings count as unset.
// =============================================================================

function parseValue(v: EnvVarDef, raw: string): number | string {
  const text = raw.trim()
  switch (v.type) {
    case 'int': {
      if (!/^-?\d+$/.test(text)) {
        throw invalidArgument(`${v.name} must be an integer, got "${raw}"`)
      }
      return parseInt(text, 10)
    }
    case 'bool': {
      const lower = text.toLowerCase()
      if (lower === '1' || lower === 'true') return 1
      if (lower === '0' || lower === 'false') return 0
      throw invalidArgument(`${v.name} must be 0/1 or true/false, got "${raw}"`)
    }
    case 'string':
      return text
  }
}

export function applyEnvOverrides(
  config: EnvConfig,
  source: Record<string, string | undefined>,
): EnvConfig {
  const next: EnvConfig = new Map()
  for (const [name, v] of config) {
    const raw = source[name]
    if (raw === undefined || raw.trim() === '') {
      next.set(name, { ...v })
    } else {
      next.set(name, { ...v, value: parseValue(v, raw) })
    }
  }
  return next
}

// =============================================================================
// resolveTopologySpec — config -> TopologySpec for `size` ranks
// =============================================================================

function parseShape(text: string): [number, number] {
  const match = /^(\d+)\s*x\s*(\d+)$/i.exec(text.trim())
  if (!match) {
    throw invalidArgument(`GOSSIP_MESH_SHAPE must look like NROWxNCOL, got "${text}"`)
  }
  return [parseInt(match[1], 10), parseInt(match[2], 10)]
}

function toConnectStyle(value: number): ConnectStyle {
  switch (value) {
    case ConnectStyle.BI:
      return ConnectStyle.BI
    case ConnectStyle.LEFT:
      return ConnectStyle.LEFT
    case ConnectStyle.RIGHT:
      return ConnectStyle.RIGHT
    default:
      throw invalidArgument(`GOSSIP_RING_CONNECT_STYLE must be 0, 1 or 2, got ${value}`)
  }
}

function requireLocalSize(config: EnvConfig, kind: string): number {
  const localSize = getEnvInt(config, 'GOSSIP_LOCAL_SIZE')
  if (localSize === null) {
    throw invalidArgument(`GOSSIP_LOCAL_SIZE is required for ${kind}`)
  }
  return localSize
}

export function resolveTopologySpec(config: EnvConfig, size: number): TopologySpec {
  const kind = getEnvString(config, 'GOSSIP_TOPOLOGY') ?? 'power-two-ring'
  if (!isBuildableKind(kind)) {
    throw invalidArgument(`Unknown topology "${kind}"`)
  }

  const base = getEnvInt(config, 'GOSSIP_TOPOLOGY_BASE') ?? undefined

  switch (kind) {
    case 'ring':
      return {
        kind,
        size,
        connectStyle: toConnectStyle(getEnvInt(config, 'GOSSIP_RING_CONNECT_STYLE') ?? 0),
      }
    case 'power':
    case 'symmetric-power':
      return { kind, size, base }
    case 'mesh-grid-2d': {
      const shape = getEnvString(config, 'GOSSIP_MESH_SHAPE')
      return { kind, size, shape: shape === null ? undefined : parseShape(shape) }
    }
    case 'star':
      return { kind, size, centerRank: getEnvInt(config, 'GOSSIP_STAR_CENTER') ?? 0 }
    case 'inner-outer-ring':
    case 'inner-outer-exp2':
      return { kind, size, localSize: requireLocalSize(config, kind) }
    case 'power-two-ring':
    case 'fully-connected':
      return { kind, size }
  }
}
