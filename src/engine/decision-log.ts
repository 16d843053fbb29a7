import type { DecisionEntry, DecisionPhase } from './types'

export type DecisionSink = (entry: DecisionEntry) => void

export interface DecisionLogOptions {
  // Receives every entry as it is emitted (e.g. a console or file writer)
  sink?: DecisionSink
  now?: () => number
}

export class DecisionLog {
  private entries: DecisionEntry[] = []
  private stepCounter = 0
  private readonly sink?: DecisionSink
  private readonly now: () => number

  constructor(options: DecisionLogOptions = {}) {
    this.sink = options.sink
    this.now = options.now ?? Date.now
  }

  emit(
    phase: DecisionPhase,
    action: string,
    reason: string,
    sourceRef: string,
    alternatives: string[] = [],
    data?: Record<string, unknown>,
  ): void {
    const entry: DecisionEntry = {
      step: this.stepCounter++,
      phase,
      action,
      reason,
      alternatives,
      sourceRef,
      data,
      timestamp: this.now(),
    }
    this.entries.push(entry)
    this.sink?.(entry)
  }

  getEntries(): DecisionEntry[] {
    return [...this.entries]
  }

  getEntriesByPhase(phase: DecisionPhase): DecisionEntry[] {
    return this.entries.filter((e) => e.phase === phase)
  }

  last(): DecisionEntry | undefined {
    return this.entries[this.entries.length - 1]
  }

  clear(): void {
    this.entries = []
    this.stepCounter = 0
  }

  get length(): number {
    return this.entries.length
  }
}
