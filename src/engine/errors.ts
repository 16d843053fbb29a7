export type TopologyErrorCode =
  | 'E_INVALID_ARGUMENT'
  | 'E_UNSUPPORTED'

export class TopologyError extends Error {
  readonly code: TopologyErrorCode

  constructor(code: TopologyErrorCode, message: string) {
    super(message)
    this.code = code
    this.name = 'TopologyError'
  }
}

export function invalidArgument(message: string): TopologyError {
  return new TopologyError('E_INVALID_ARGUMENT', message)
}

export function unsupported(message: string): TopologyError {
  return new TopologyError('E_UNSUPPORTED', message)
}

// Non-negative integer in [0, size)
export function assertRank(rank: number, size: number): void {
  if (!Number.isInteger(rank) || rank < 0 || rank >= size) {
    throw invalidArgument(`Rank ${rank} is outside [0, ${size})`)
  }
}

export function assertSize(size: number, what = 'size'): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw invalidArgument(`${what} must be a positive integer, got ${size}`)
  }
}

export function assertRound(round: number): void {
  if (!Number.isInteger(round) || round < 0) {
    throw invalidArgument(`Round must be a non-negative integer, got ${round}`)
  }
}
