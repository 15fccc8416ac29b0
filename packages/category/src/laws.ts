/**
 * Category and Functor Law Checkers
 *
 * Pointwise checkers:
 *   1. Associativity:  compose(compose(f, g), h) ≡ compose(f, compose(g, h))
 *   2. Left identity:  compose(id_A, f) ≡ f
 *   3. Right identity: compose(f, id_B) ≡ f
 *   4. Functor identity:    homMap(id_A) ≡ id_{obMap(A)}
 *   5. Functor composition: homMap(compose(f, g)) ≡ compose(homMap(f), homMap(g))
 *
 * Equality is always the category's own homEquals. The batch verifiers walk
 * every composable pair/triple in a sample and collect violations; they are
 * meant to be driven by fast-check or by hand-picked fixtures.
 */

import { settings } from '@kitten/config'
import type { Category } from './core'
import type { Functor } from './functor'
import { createLogger } from './log'

const log = createLogger('laws')

// ─── Category Laws ──────────────────────────────────────────────────────────

export function checkLeftIdentity<Ob, Hom>(category: Category<Ob, Hom>, f: Hom): boolean {
  const lhs = category.compose(category.id(category.dom(f)), f)
  return category.homEquals(lhs, f)
}

export function checkRightIdentity<Ob, Hom>(category: Category<Ob, Hom>, f: Hom): boolean {
  const lhs = category.compose(f, category.id(category.codom(f)))
  return category.homEquals(lhs, f)
}

/** f, g, h must be composable in that order. */
export function checkAssociativity<Ob, Hom>(
  category: Category<Ob, Hom>,
  f: Hom,
  g: Hom,
  h: Hom,
): boolean {
  const lhs = category.compose(category.compose(f, g), h)
  const rhs = category.compose(f, category.compose(g, h))
  return category.homEquals(lhs, rhs)
}

// ─── Functor Laws ───────────────────────────────────────────────────────────

export function checkFunctorIdentity<ObA, HomA, ObB, HomB>(
  functor: Functor<ObA, HomA, ObB, HomB>,
  x: ObA,
): boolean {
  const mapped = functor.homMap(functor.dom.id(x))
  return functor.codom.homEquals(mapped, functor.codom.id(functor.obMap(x)))
}

/** f and g must be composable in the source category. */
export function checkFunctorComposition<ObA, HomA, ObB, HomB>(
  functor: Functor<ObA, HomA, ObB, HomB>,
  f: HomA,
  g: HomA,
): boolean {
  const composed = functor.homMap(functor.dom.compose(f, g))
  const sequential = functor.codom.compose(functor.homMap(f), functor.homMap(g))
  return functor.codom.homEquals(composed, sequential)
}

// ─── Batch Verification ─────────────────────────────────────────────────────

export type LawName =
  | 'left-identity'
  | 'right-identity'
  | 'associativity'
  | 'functor-identity'
  | 'functor-composition'

export interface LawViolation {
  readonly law: LawName
  /** Human-readable witness: the morphisms or object involved. */
  readonly witness: string
}

export interface LawReport {
  /** Number of law instances evaluated. */
  readonly checked: number
  readonly violations: readonly LawViolation[]
}

export interface VerifyOptions {
  /** Stop after this many law instances. Defaults to KITTEN_LAW_SAMPLE_LIMIT. */
  readonly sampleLimit?: number
}

class LawTally {
  checked = 0
  readonly violations: LawViolation[] = []

  constructor(
    private readonly subject: string,
    private readonly limit: number,
  ) {}

  get exhausted(): boolean {
    return this.checked >= this.limit
  }

  record(law: LawName, holds: boolean, witness: () => string): void {
    this.checked++
    if (holds) return
    const violation = { law, witness: witness() }
    this.violations.push(violation)
    log.warn('law violated', { subject: this.subject, ...violation })
  }

  report(): LawReport {
    log.debug('laws verified', {
      subject: this.subject,
      checked: this.checked,
      violations: this.violations.length,
    })
    return { checked: this.checked, violations: this.violations }
  }
}

function show(value: unknown): string {
  if (typeof value === 'object' && value !== null && value.toString === Object.prototype.toString) {
    return JSON.stringify(value)
  }
  return String(value)
}

function witnessOf(values: readonly unknown[]): string {
  return values.map(show).join(', ')
}

/**
 * Check both identity laws for every sample morphism, then associativity for
 * every composable triple drawn from the sample.
 */
export function verifyCategoryLaws<Ob, Hom>(
  category: Category<Ob, Hom>,
  morphisms: readonly Hom[],
  options: VerifyOptions = {},
): LawReport {
  const tally = new LawTally(category.name, options.sampleLimit ?? settings.LAW_SAMPLE_LIMIT)
  const follows = (f: Hom, g: Hom): boolean => category.obEquals(category.codom(f), category.dom(g))

  for (const f of morphisms) {
    if (tally.exhausted) return tally.report()
    tally.record('left-identity', checkLeftIdentity(category, f), () => witnessOf([f]))
    if (tally.exhausted) return tally.report()
    tally.record('right-identity', checkRightIdentity(category, f), () => witnessOf([f]))
  }

  for (const f of morphisms) {
    for (const g of morphisms) {
      if (!follows(f, g)) continue
      for (const h of morphisms) {
        if (!follows(g, h)) continue
        if (tally.exhausted) return tally.report()
        tally.record('associativity', checkAssociativity(category, f, g, h), () => witnessOf([f, g, h]))
      }
    }
  }

  return tally.report()
}

/**
 * Check identity preservation on every sample object and composition
 * preservation on every composable pair of sample morphisms.
 */
export function verifyFunctorLaws<ObA, HomA, ObB, HomB>(
  functor: Functor<ObA, HomA, ObB, HomB>,
  objects: readonly ObA[],
  morphisms: readonly HomA[],
  options: VerifyOptions = {},
): LawReport {
  const tally = new LawTally(functor.name, options.sampleLimit ?? settings.LAW_SAMPLE_LIMIT)
  const source = functor.dom

  for (const x of objects) {
    if (tally.exhausted) return tally.report()
    tally.record('functor-identity', checkFunctorIdentity(functor, x), () => witnessOf([x]))
  }

  for (const f of morphisms) {
    for (const g of morphisms) {
      if (!source.obEquals(source.codom(f), source.dom(g))) continue
      if (tally.exhausted) return tally.report()
      tally.record('functor-composition', checkFunctorComposition(functor, f, g), () => witnessOf([f, g]))
    }
  }

  return tally.report()
}
