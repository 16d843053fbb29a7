// =============================================================================
// Weight Matrix — owned, immutable size x size matrix of edge weights
//
// Entry (i, j) is the weight on edge i -> j. Zero means no edge. The matrix
// replaces a general graph library: successors are the non-zero entries of a
// row, predecessors the non-zero entries of a column.
// =============================================================================

import { invalidArgument, assertSize } from './errors'
import type { Topology, TopologyKind, TopologyParams } from './types'

export class WeightMatrix {
  readonly size: number
  private readonly data: Float64Array

  private constructor(size: number, data: Float64Array) {
    this.size = size
    this.data = data
  }

  // Copies rows; rejects ragged, negative or non-finite input
  static fromRows(rows: readonly (readonly number[])[]): WeightMatrix {
    const size = rows.length
    assertSize(size, 'Matrix size')
    const data = new Float64Array(size * size)
    for (let i = 0; i < size; i++) {
      const row = rows[i]
      if (row.length !== size) {
        throw invalidArgument(`Row ${i} has ${row.length} entries, expected ${size}`)
      }
      for (let j = 0; j < size; j++) {
        const w = row[j]
        if (!Number.isFinite(w) || w < 0) {
          throw invalidArgument(`Weight (${i}, ${j}) must be finite and non-negative, got ${w}`)
        }
        data[i * size + j] = w
      }
    }
    return new WeightMatrix(size, data)
  }

  // Row i is firstRow rotated right by i: W[i][j] = x[(j - i) mod size]
  static circulant(firstRow: readonly number[]): WeightMatrix {
    const size = firstRow.length
    const rows: number[][] = []
    for (let i = 0; i < size; i++) {
      const row = new Array<number>(size)
      for (let j = 0; j < size; j++) {
        row[j] = firstRow[(j - i + size) % size]
      }
      rows.push(row)
    }
    return WeightMatrix.fromRows(rows)
  }

  get(i: number, j: number): number {
    return this.data[i * this.size + j]
  }

  row(i: number): number[] {
    return Array.from(this.data.subarray(i * this.size, (i + 1) * this.size))
  }

  column(j: number): number[] {
    const col = new Array<number>(this.size)
    for (let i = 0; i < this.size; i++) col[i] = this.data[i * this.size + j]
    return col
  }

  // Ascending, including i itself when there is a self loop
  successors(i: number): number[] {
    const out: number[] = []
    for (let j = 0; j < this.size; j++) {
      if (this.data[i * this.size + j] !== 0) out.push(j)
    }
    return out
  }

  predecessors(j: number): number[] {
    const out: number[] = []
    for (let i = 0; i < this.size; i++) {
      if (this.data[i * this.size + j] !== 0) out.push(i)
    }
    return out
  }

  outDegree(i: number): number {
    return this.successors(i).length
  }

  inDegree(j: number): number {
    return this.predecessors(j).length
  }

  get edgeCount(): number {
    let count = 0
    for (const w of this.data) {
      if (w !== 0) count++
    }
    return count
  }

  rowSum(i: number): number {
    let sum = 0
    for (let j = 0; j < this.size; j++) sum += this.data[i * this.size + j]
    return sum
  }

  columnSum(j: number): number {
    let sum = 0
    for (let i = 0; i < this.size; i++) sum += this.data[i * this.size + j]
    return sum
  }

  toRows(): number[][] {
    const rows: number[][] = []
    for (let i = 0; i < this.size; i++) rows.push(this.row(i))
    return rows
  }

  // Exact element-wise comparison; labeling matters
  equals(other: WeightMatrix): boolean {
    if (other.size !== this.size) return false
    for (let k = 0; k < this.data.length; k++) {
      if (this.data[k] !== other.data[k]) return false
    }
    return true
  }
}

export function makeTopology(
  kind: TopologyKind,
  weights: WeightMatrix,
  params: TopologyParams = {},
): Topology {
  return Object.freeze({
    kind,
    size: weights.size,
    weights,
    params: Object.freeze({ ...params }),
  })
}

// Wraps caller-supplied weights; stochasticity is the caller's responsibility
export function fromWeightRows(rows: readonly (readonly number[])[]): Topology {
  return makeTopology('custom', WeightMatrix.fromRows(rows))
}
