/**
 * Mat: natural numbers and real matrices.
 *
 *   Objects:     n ∈ ℕ
 *   Morphisms:   A: n → m, an n×m matrix
 *   Composition: compose(A, B) = A·B  (n×m times m×k gives n×k)
 *   Identity:    id_n = I_n
 *
 * Shapes are stored explicitly so 0×m and n×0 matrices keep their type.
 */

import type { AnyCategory } from './core'
import { AbstractCategory } from './core'
import { InvalidMorphismError } from './errors'
import type { Endofunctor } from './functor'
import { createFunctor } from './functor'

export type Row = readonly number[]

export interface Matrix {
  readonly rows: number
  readonly cols: number
  readonly entries: readonly Row[]
}

/**
 * Build a matrix from its rows. The column count is taken from the first row
 * unless given, and must be given when there are no rows.
 *
 * @throws InvalidMorphismError for ragged rows or non-finite entries
 */
export function matrix(entries: readonly Row[], cols?: number): Matrix {
  const width = cols ?? (entries.length > 0 ? entries[0].length : undefined)
  if (width === undefined) {
    throw new InvalidMorphismError('A matrix with no rows needs an explicit column count')
  }
  if (!Number.isInteger(width) || width < 0) {
    throw new InvalidMorphismError(`Column count must be a natural number, got ${width}`)
  }
  entries.forEach((row, r) => {
    if (row.length !== width) {
      throw new InvalidMorphismError(`Row ${r} has ${row.length} entries, expected ${width}`)
    }
    if (!row.every(Number.isFinite)) {
      throw new InvalidMorphismError(`Row ${r} has a non-finite entry`)
    }
  })
  return { rows: entries.length, cols: width, entries: entries.map((row) => [...row]) }
}

function tabulate(rows: number, cols: number, entry: (r: number, c: number) => number): Matrix {
  return {
    rows,
    cols,
    entries: Array.from({ length: rows }, (_, r) => Array.from({ length: cols }, (_, c) => entry(r, c))),
  }
}

export function zeros(rows: number, cols: number): Matrix {
  return tabulate(rows, cols, () => 0)
}

export function identityMatrix(n: number): Matrix {
  return tabulate(n, n, (r, c) => (r === c ? 1 : 0))
}

/** A·B. Callers check a.cols === b.rows. */
export function multiply(a: Matrix, b: Matrix): Matrix {
  return tabulate(a.rows, b.cols, (r, c) => {
    let sum = 0
    for (let k = 0; k < a.cols; k++) sum += a.entries[r][k] * b.entries[k][c]
    return sum
  })
}

/** Block diagonal A ⊕ B. */
export function directSum(a: Matrix, b: Matrix): Matrix {
  return tabulate(a.rows + b.rows, a.cols + b.cols, (r, c) => {
    if (r < a.rows && c < a.cols) return a.entries[r][c]
    if (r >= a.rows && c >= a.cols) return b.entries[r - a.rows][c - a.cols]
    return 0
  })
}

/** Exact entrywise equality with matching shapes. */
export function matrixEquals(a: Matrix, b: Matrix): boolean {
  return (
    a.rows === b.rows &&
    a.cols === b.cols &&
    a.entries.every((row, r) => row.every((x, c) => x === b.entries[r][c]))
  )
}

export class MatCategory extends AbstractCategory<number, Matrix> {
  constructor() {
    super('Mat')
  }

  override dom(a: Matrix): number {
    return a.rows
  }

  override codom(a: Matrix): number {
    return a.cols
  }

  override id(n: number): Matrix {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidMorphismError(`Object must be a natural number, got ${n}`)
    }
    return identityMatrix(n)
  }

  override homEquals(a: Matrix, b: Matrix): boolean {
    return matrixEquals(a, b)
  }

  override equals(other: AnyCategory): boolean {
    return other instanceof MatCategory
  }

  protected override composeMorphisms(a: Matrix, b: Matrix): Matrix {
    return multiply(a, b)
  }
}

export const MatCat = new MatCategory()

/** n ↦ 2n, A ↦ A ⊕ A. */
export const doubling: Endofunctor<number, Matrix> = createFunctor({
  name: 'Double',
  dom: MatCat,
  codom: MatCat,
  obMap: (n: number) => 2 * n,
  homMap: (a: Matrix) => directSum(a, a),
})
