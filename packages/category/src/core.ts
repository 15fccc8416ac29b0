/**
 * Core Category Interface
 *
 * A Category C consists of:
 *   - A collection of objects Ob(C)
 *   - For each pair of objects A, B: a set of morphisms Hom(A, B)
 *   - Composition: Hom(A, B) × Hom(B, C) → Hom(A, C)
 *   - Identity: for each object A, an identity morphism id_A ∈ Hom(A, A)
 *
 * Category Laws:
 *   1. Associativity: compose(compose(f, g), h) = compose(f, compose(g, h))
 *   2. Left identity:  compose(id_A, f) = f
 *   3. Right identity: compose(f, id_B) = f
 *
 * Composition is written in diagrammatic order throughout: compose(f, g)
 * applies f first, then g.
 *
 * The type parameters say which values a category *may* treat as objects and
 * morphisms; the category itself decides which of them it actually uses.
 * Hom-set membership (dom(f) = A ∧ codom(f) = B ⇒ f ∈ Hom(A, B)) is a runtime
 * contract checked by the law checkers in ./laws, not by the type system.
 */

import { DomainMismatchError, NotImplementedError } from './errors'

// ─── Category ───────────────────────────────────────────────────────────────

export interface Category<Ob, Hom> {
  readonly name: string

  /** Source object of a morphism. */
  dom(f: Hom): Ob
  /** Target object of a morphism. */
  codom(f: Hom): Ob

  /**
   * Diagrammatic composition: f then g.
   * Diagram:  A --f--> B --g--> C
   *           A --compose(f,g)--> C
   *
   * @throws DomainMismatchError if codom(f) is not dom(g)
   */
  compose(f: Hom, g: Hom): Hom

  /** Identity morphism on x. */
  id(x: Ob): Hom

  /** Equality on the objects this category uses. */
  obEquals(a: Ob, b: Ob): boolean
  /** Equality on the morphisms this category uses. */
  homEquals(f: Hom, g: Hom): boolean

  /**
   * Category-value equality. Stateless categories compare by kind; categories
   * that carry runtime state (a specific underlying set, say) compare that state.
   */
  equals(other: AnyCategory): boolean
}

/**
 * A category with its object and morphism types erased. This is the handle
 * KittenCategory uses to hold heterogeneous categories side by side.
 */
export type AnyCategory = Category<unknown, unknown>

/** Category-value equality: same reference, or structurally equal. */
export function sameCategory(a: AnyCategory, b: AnyCategory): boolean {
  return a === b || a.equals(b)
}

// ─── Abstract Base ──────────────────────────────────────────────────────────

/**
 * Base class for concrete categories.
 *
 * `compose` checks composability and then calls `composeMorphisms`; the
 * projections, the composition step and `id` throw NotImplementedError until
 * a subclass overrides them.
 */
export abstract class AbstractCategory<Ob, Hom> implements Category<Ob, Hom> {
  constructor(public readonly name: string) {}

  dom(_f: Hom): Ob {
    throw new NotImplementedError(this.name, 'dom')
  }

  codom(_f: Hom): Ob {
    throw new NotImplementedError(this.name, 'codom')
  }

  id(_x: Ob): Hom {
    throw new NotImplementedError(this.name, 'id')
  }

  compose(f: Hom, g: Hom): Hom {
    const middle = this.codom(f)
    const next = this.dom(g)
    if (!this.obEquals(middle, next)) throw this.mismatch(middle, next)
    return this.composeMorphisms(f, g)
  }

  obEquals(a: Ob, b: Ob): boolean {
    return Object.is(a, b)
  }

  homEquals(f: Hom, g: Hom): boolean {
    return Object.is(f, g)
  }

  equals(other: AnyCategory): boolean {
    return other === this
  }

  toString(): string {
    return this.name
  }

  /** The composition step, called once f and g are known to be composable. */
  protected composeMorphisms(_f: Hom, _g: Hom): Hom {
    throw new NotImplementedError(this.name, 'compose')
  }

  /** The failure raised by `compose` for arrows that do not line up. */
  protected mismatch(codomain: Ob, domain: Ob): DomainMismatchError {
    return new DomainMismatchError(this.name, codomain, domain)
  }
}

// ─── Result (checked composition) ───────────────────────────────────────────

export type Result<T, E = string> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/**
 * Compose without throwing on a domain mismatch: the mismatch comes back as
 * an error value. Any other failure still propagates.
 */
export function tryCompose<Ob, Hom>(
  category: Category<Ob, Hom>,
  f: Hom,
  g: Hom,
): Result<Hom, DomainMismatchError> {
  try {
    return ok(category.compose(f, g))
  } catch (e) {
    if (e instanceof DomainMismatchError) return err(e)
    throw e
  }
}
