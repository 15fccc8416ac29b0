/**
 * KittenCategory: the category whose objects are categories and whose
 * morphisms are functors.
 *
 *   Ob(Kitten)      = category values (AnyCategory handles)
 *   Hom(Kitten)     = functor values (AnyFunctor handles)
 *   compose(F, G)   = ComposedFunctor(F, G), requires codom(F) = dom(G)
 *   id(C)           = IdentityFunctor(C)
 *
 * This is the category of categories expressible as values in this library,
 * not the category of all small categories. Kitten is itself one of its own
 * objects.
 */

import type { AnyCategory } from './core'
import { AbstractCategory, sameCategory } from './core'
import { CompositionMismatchError } from './errors'
import type { AnyFunctor } from './functor'
import { ComposedFunctor, IdentityFunctor, factors } from './functor'
import { createLogger } from './log'

const log = createLogger('kitten')

export class KittenCategory extends AbstractCategory<AnyCategory, AnyFunctor> {
  constructor() {
    super('Kitten')
  }

  override dom(functor: AnyFunctor): AnyCategory {
    return functor.dom
  }

  override codom(functor: AnyFunctor): AnyCategory {
    return functor.codom
  }

  override id(category: AnyCategory): AnyFunctor {
    return new IdentityFunctor(category)
  }

  override obEquals(a: AnyCategory, b: AnyCategory): boolean {
    return sameCategory(a, b)
  }

  /**
   * Functors are compared as composition chains: equal when their sources and
   * targets agree and their non-identity factors are the same functor values
   * in the same order. Under this equality id ; F = F = F ; id and
   * (F ; G) ; H = F ; (G ; H).
   */
  override homEquals(f: AnyFunctor, g: AnyFunctor): boolean {
    if (f === g) return true
    if (!sameCategory(f.dom, g.dom) || !sameCategory(f.codom, g.codom)) return false
    const left = factors(f)
    const right = factors(g)
    return left.length === right.length && left.every((factor, i) => factor === right[i])
  }

  override equals(other: AnyCategory): boolean {
    return other instanceof KittenCategory
  }

  protected override composeMorphisms(f: AnyFunctor, g: AnyFunctor): AnyFunctor {
    return new ComposedFunctor(f, g)
  }

  protected override mismatch(codomain: AnyCategory, domain: AnyCategory): CompositionMismatchError {
    log.debug('rejected functor composition', {
      codomain: codomain.name,
      domain: domain.name,
    })
    return new CompositionMismatchError(codomain, domain)
  }
}

/** The category of categories. */
export const Kitten = new KittenCategory()
