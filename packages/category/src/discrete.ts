/**
 * Discrete categories: a set of objects with only identity arrows.
 *
 * Unlike Fin, Mat and FinSet, a discrete category carries runtime state (its
 * object set), so two instances are equal exactly when their sets are.
 */

import type { AnyCategory } from './core'
import { AbstractCategory } from './core'
import { InvalidMorphismError, KeyNotFoundError } from './errors'
import type { FinSet } from './finset'
import { sameValueZero } from './finset'
import type { Functor } from './functor'
import { createFunctor } from './functor'

/** The identity arrow on `object`, the only kind of arrow there is. */
export interface DiscreteArrow<T> {
  readonly object: T
}

export class DiscreteCategory<T> extends AbstractCategory<T, DiscreteArrow<T>> {
  constructor(public readonly objects: FinSet<T>) {
    super(`Disc${objects.toString()}`)
  }

  override dom(f: DiscreteArrow<T>): T {
    return f.object
  }

  override codom(f: DiscreteArrow<T>): T {
    return f.object
  }

  /** @throws KeyNotFoundError for an object outside the set */
  override id(x: T): DiscreteArrow<T> {
    if (!this.objects.has(x)) throw new KeyNotFoundError(x)
    return { object: x }
  }

  /** Objects compare the way the underlying set does, so 0 and -0 are one object. */
  override obEquals(a: T, b: T): boolean {
    return sameValueZero(a, b)
  }

  override homEquals(f: DiscreteArrow<T>, g: DiscreteArrow<T>): boolean {
    return sameValueZero(f.object, g.object)
  }

  override equals(other: AnyCategory): boolean {
    return other instanceof DiscreteCategory && this.objects.equals(other.objects)
  }

  protected override composeMorphisms(f: DiscreteArrow<T>, _g: DiscreteArrow<T>): DiscreteArrow<T> {
    return f
  }
}

/**
 * Lift a function between object sets to a functor. Every source object must
 * land in the target set.
 *
 * @throws InvalidMorphismError if fn leaves the target set
 */
export function discreteFunctor<A, B>(
  source: DiscreteCategory<A>,
  target: DiscreteCategory<B>,
  fn: (a: A) => B,
): Functor<A, DiscreteArrow<A>, B, DiscreteArrow<B>> {
  for (const a of source.objects) {
    const b = fn(a)
    if (!target.objects.has(b)) {
      throw new InvalidMorphismError(
        `${String(a)} maps to ${String(b)}, which is not an object of ${target.name}`,
      )
    }
  }
  return createFunctor({
    name: `${source.name}→${target.name}`,
    dom: source,
    codom: target,
    obMap: fn,
    homMap: (f: DiscreteArrow<A>) => target.id(fn(f.object)),
  })
}
