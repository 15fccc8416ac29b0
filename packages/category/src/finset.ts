/**
 * FinSet: the category of finite sets and total functions.
 *
 *   Objects:     FinSet<T>
 *   Morphisms:   FinFunction<T, T>, a total map dom → codom
 *   Composition: (f ; g)(x) = g(f(x)), tabulated eagerly over f.dom
 *   Identity:    id_X(x) = x
 *
 * Elements are compared the way a JS Set compares them (SameValueZero), so
 * numbers and strings behave as values and objects by reference.
 */

import type { AnyCategory } from './core'
import { AbstractCategory } from './core'
import { InvalidMorphismError, KeyNotFoundError } from './errors'

// ─── Finite Sets ────────────────────────────────────────────────────────────

/** The equality a JS Set uses for membership: like ===, except NaN equals NaN. */
export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b)
}

export class FinSet<T> implements Iterable<T> {
  private readonly elements: ReadonlySet<T>

  constructor(elements: Iterable<T>) {
    this.elements = new Set(elements)
  }

  get size(): number {
    return this.elements.size
  }

  has(x: T): boolean {
    return this.elements.has(x)
  }

  [Symbol.iterator](): Iterator<T> {
    return this.elements.values()
  }

  /** Extensional equality: same members, in any order. */
  equals(other: FinSet<T>): boolean {
    if (this === other) return true
    if (this.size !== other.size) return false
    for (const x of this.elements) {
      if (!other.has(x)) return false
    }
    return true
  }

  toString(): string {
    return `{${[...this.elements].map(String).join(', ')}}`
  }
}

export function finSet<T>(...elements: T[]): FinSet<T> {
  return new FinSet(elements)
}

/** {1, 2, ..., n} */
export function range(n: number): FinSet<number> {
  return new FinSet(Array.from({ length: n }, (_, i) => i + 1))
}

// ─── Finite Functions ───────────────────────────────────────────────────────

/** Either explicit [input, output] pairs or a function evaluated over the domain. */
export type FinMapping<A, B> = Iterable<readonly [A, B]> | ((x: A) => B)

export class FinFunction<A, B> {
  private constructor(
    public readonly dom: FinSet<A>,
    public readonly codom: FinSet<B>,
    private readonly table: ReadonlyMap<A, { readonly value: B }>,
  ) {}

  /**
   * Build a total function. Every element of dom must be mapped exactly once,
   * and every output must lie in codom.
   *
   * @throws InvalidMorphismError if the mapping is partial, repeats an input,
   *   or leaves the declared sets
   */
  static of<A, B>(dom: FinSet<A>, codom: FinSet<B>, mapping: FinMapping<A, B>): FinFunction<A, B> {
    const entries: Iterable<readonly [A, B]> =
      typeof mapping === 'function' ? [...dom].map((x) => [x, mapping(x)] as const) : mapping

    const table = new Map<A, { readonly value: B }>()
    for (const [x, y] of entries) {
      if (!dom.has(x)) {
        throw new InvalidMorphismError(`Input ${String(x)} is not in the domain ${dom.toString()}`)
      }
      if (table.has(x)) {
        throw new InvalidMorphismError(`Input ${String(x)} is mapped more than once`)
      }
      if (!codom.has(y)) {
        throw new InvalidMorphismError(
          `Output ${String(y)} for input ${String(x)} is not in the codomain ${codom.toString()}`,
        )
      }
      table.set(x, { value: y })
    }

    if (table.size !== dom.size) {
      const missing = [...dom].filter((x) => !table.has(x))
      throw new InvalidMorphismError(`Function is not total: no output for ${missing.map(String).join(', ')}`)
    }

    return new FinFunction(dom, codom, table)
  }

  /** @throws KeyNotFoundError outside the domain */
  apply(x: A): B {
    const hit = this.table.get(x)
    if (!hit) throw new KeyNotFoundError(x)
    return hit.value
  }

  /** [input, output] pairs in domain iteration order. */
  entries(): Array<[A, B]> {
    return [...this.dom].map((x): [A, B] => [x, this.apply(x)])
  }

  equals(other: FinFunction<A, B>): boolean {
    if (this === other) return true
    if (!this.dom.equals(other.dom) || !this.codom.equals(other.codom)) return false
    for (const x of this.dom) {
      if (!sameValueZero(this.apply(x), other.apply(x))) return false
    }
    return true
  }

  toString(): string {
    const pairs = this.entries().map(([x, y]) => `${String(x)}↦${String(y)}`)
    return `${this.dom.toString()} → ${this.codom.toString()} [${pairs.join(', ')}]`
  }
}

export function finFunction<A, B>(
  dom: FinSet<A>,
  codom: FinSet<B>,
  mapping: FinMapping<A, B>,
): FinFunction<A, B> {
  return FinFunction.of(dom, codom, mapping)
}

// ─── The Category ───────────────────────────────────────────────────────────

/**
 * Stateless: every instance describes the same category, so all instances
 * compare equal. The element type is a compile-time view only.
 */
export class FinSetCategory<T = unknown> extends AbstractCategory<FinSet<T>, FinFunction<T, T>> {
  constructor() {
    super('FinSet')
  }

  override dom(f: FinFunction<T, T>): FinSet<T> {
    return f.dom
  }

  override codom(f: FinFunction<T, T>): FinSet<T> {
    return f.codom
  }

  override id(x: FinSet<T>): FinFunction<T, T> {
    return FinFunction.of(x, x, (a) => a)
  }

  override obEquals(a: FinSet<T>, b: FinSet<T>): boolean {
    return a.equals(b)
  }

  override homEquals(f: FinFunction<T, T>, g: FinFunction<T, T>): boolean {
    return f.equals(g)
  }

  override equals(other: AnyCategory): boolean {
    return other instanceof FinSetCategory
  }

  protected override composeMorphisms(f: FinFunction<T, T>, g: FinFunction<T, T>): FinFunction<T, T> {
    return FinFunction.of(f.dom, g.codom, (x) => g.apply(f.apply(x)))
  }
}

export const FinSetCat = new FinSetCategory()
