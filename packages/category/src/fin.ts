/**
 * Fin: natural numbers and functions between initial segments.
 *
 *   Objects:     n ∈ ℕ, read as the set {1, ..., n}
 *   Morphisms:   f: n → m, a total function {1..n} → {1..m}
 *   Composition: (f ; g)(i) = g(f(i))
 *   Identity:    id_n(i) = i
 */

import type { AnyCategory } from './core'
import { AbstractCategory } from './core'
import { InvalidMorphismError, KeyNotFoundError } from './errors'

/** A function {1..dom} → {1..codom}; values[i - 1] is the image of i. */
export interface FinMap {
  readonly dom: number
  readonly codom: number
  readonly values: readonly number[]
}

export function isNatural(n: number): boolean {
  return Number.isInteger(n) && n >= 0
}

function assertNatural(n: number, what: string): void {
  if (!isNatural(n)) throw new InvalidMorphismError(`${what} must be a natural number, got ${n}`)
}

/**
 * Build f: values.length → codom from its images.
 *
 * @throws InvalidMorphismError if an image is outside 1..codom
 */
export function finMap(codom: number, values: readonly number[]): FinMap {
  assertNatural(codom, 'Codomain')
  values.forEach((v, i) => {
    if (!Number.isInteger(v) || v < 1 || v > codom) {
      throw new InvalidMorphismError(`Image of ${i + 1} is ${v}, outside 1..${codom}`)
    }
  })
  return { dom: values.length, codom, values: [...values] }
}

/** f(i) for i in 1..f.dom. */
export function applyFinMap(f: FinMap, i: number): number {
  if (!Number.isInteger(i) || i < 1 || i > f.dom) throw new KeyNotFoundError(i)
  return f.values[i - 1]
}

export class FinCategory extends AbstractCategory<number, FinMap> {
  constructor() {
    super('Fin')
  }

  override dom(f: FinMap): number {
    return f.dom
  }

  override codom(f: FinMap): number {
    return f.codom
  }

  override id(n: number): FinMap {
    assertNatural(n, 'Object')
    return finMap(n, Array.from({ length: n }, (_, i) => i + 1))
  }

  override homEquals(f: FinMap, g: FinMap): boolean {
    return (
      f.dom === g.dom &&
      f.codom === g.codom &&
      f.values.every((v, i) => v === g.values[i])
    )
  }

  override equals(other: AnyCategory): boolean {
    return other instanceof FinCategory
  }

  protected override composeMorphisms(f: FinMap, g: FinMap): FinMap {
    return finMap(g.codom, f.values.map((v) => applyFinMap(g, v)))
  }
}

export const FinCat = new FinCategory()
