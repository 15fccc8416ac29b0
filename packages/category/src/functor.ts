/**
 * Functor Interface
 *
 * A Functor F: C → D maps between categories while preserving structure:
 *   - Object mapping:   obMap(A) for objects A ∈ Ob(C)
 *   - Morphism mapping: homMap(f: A→B): obMap(A) → obMap(B)
 *
 * Functor Laws:
 *   1. Identity:    homMap(id_A) = id_{obMap(A)}
 *   2. Composition: homMap(compose(f, g)) = compose(homMap(f), homMap(g))
 *
 * The source and target are category *values*, not just types: two
 * categories of the same class can carry different runtime state, and
 * KittenCategory reads dom/codom back off the functor.
 */

import type { Category } from './core'
import { sameCategory } from './core'
import { CompositionMismatchError, NotImplementedError } from './errors'

// ─── Functor Interface ──────────────────────────────────────────────────────

export interface Functor<ObA, HomA, ObB, HomB> {
  readonly name: string
  readonly dom: Category<ObA, HomA>
  readonly codom: Category<ObB, HomB>

  /** Object mapping. */
  obMap(x: ObA): ObB
  /** Morphism mapping; must preserve identities and composition. */
  homMap(f: HomA): HomB
}

/** A functor with its categories' types erased (a KittenCategory morphism). */
export type AnyFunctor = Functor<unknown, unknown, unknown, unknown>

/** A functor from a category to itself. */
export type Endofunctor<Ob, Hom> = Functor<Ob, Hom, Ob, Hom>

// ─── Abstract Base ──────────────────────────────────────────────────────────

export abstract class AbstractFunctor<ObA, HomA, ObB, HomB>
  implements Functor<ObA, HomA, ObB, HomB>
{
  constructor(
    public readonly name: string,
    public readonly dom: Category<ObA, HomA>,
    public readonly codom: Category<ObB, HomB>,
  ) {}

  obMap(_x: ObA): ObB {
    throw new NotImplementedError(this.name, 'obMap')
  }

  homMap(_f: HomA): HomB {
    throw new NotImplementedError(this.name, 'homMap')
  }

  toString(): string {
    return this.name
  }
}

// ─── Helper: Create a Functor from two mappings ─────────────────────────────

export interface FunctorDefinition<ObA, HomA, ObB, HomB> {
  readonly name: string
  readonly dom: Category<ObA, HomA>
  readonly codom: Category<ObB, HomB>
  readonly obMap: (x: ObA) => ObB
  readonly homMap: (f: HomA) => HomB
}

/**
 * Create a functor from its object and morphism mappings. The laws are not
 * checked here; run verifyFunctorLaws over sample data for that.
 */
export function createFunctor<ObA, HomA, ObB, HomB>(
  definition: FunctorDefinition<ObA, HomA, ObB, HomB>,
): Functor<ObA, HomA, ObB, HomB> {
  const { name, dom, codom, obMap, homMap } = definition
  return {
    name,
    dom,
    codom,
    obMap(x: ObA): ObB {
      return obMap(x)
    },
    homMap(f: HomA): HomB {
      return homMap(f)
    },
  }
}

// ─── Composition ────────────────────────────────────────────────────────────

/**
 * first ; second. Holds both factors by reference and evaluates them on every
 * call; nothing is tabulated.
 *
 * If first: C → D and second: D → E, then the composite is C → E.
 */
export class ComposedFunctor<ObA, HomA, ObB, HomB, ObC, HomC> extends AbstractFunctor<
  ObA,
  HomA,
  ObC,
  HomC
> {
  constructor(
    public readonly first: Functor<ObA, HomA, ObB, HomB>,
    public readonly second: Functor<ObB, HomB, ObC, HomC>,
  ) {
    if (!sameCategory(first.codom, second.dom)) {
      throw new CompositionMismatchError(first.codom, second.dom)
    }
    super(`${first.name} ; ${second.name}`, first.dom, second.codom)
  }

  override obMap(x: ObA): ObC {
    return this.second.obMap(this.first.obMap(x))
  }

  override homMap(f: HomA): HomC {
    return this.second.homMap(this.first.homMap(f))
  }
}

/** Typed functor composition. */
export function composeFunctors<ObA, HomA, ObB, HomB, ObC, HomC>(
  first: Functor<ObA, HomA, ObB, HomB>,
  second: Functor<ObB, HomB, ObC, HomC>,
): ComposedFunctor<ObA, HomA, ObB, HomB, ObC, HomC> {
  return new ComposedFunctor(first, second)
}

// ─── Identity ───────────────────────────────────────────────────────────────

export class IdentityFunctor<Ob, Hom> extends AbstractFunctor<Ob, Hom, Ob, Hom> {
  constructor(public readonly category: Category<Ob, Hom>) {
    super(`id(${category.name})`, category, category)
  }

  override obMap(x: Ob): Ob {
    return x
  }

  override homMap(f: Hom): Hom {
    return f
  }
}

export function identityFunctor<Ob, Hom>(category: Category<Ob, Hom>): IdentityFunctor<Ob, Hom> {
  return new IdentityFunctor(category)
}

// ─── Flattening ─────────────────────────────────────────────────────────────

/**
 * The non-identity factors of a functor, left to right. Composites are
 * flattened, identity functors dropped; any other functor is its own factor.
 */
export function factors(functor: AnyFunctor): AnyFunctor[] {
  if (functor instanceof ComposedFunctor) {
    return [...factors(functor.first), ...factors(functor.second)]
  }
  if (functor instanceof IdentityFunctor) return []
  return [functor]
}

/** Whether two category values line up for `first ; second`. */
export function composable(first: AnyFunctor, second: AnyFunctor): boolean {
  return sameCategory(first.codom, second.dom)
}
