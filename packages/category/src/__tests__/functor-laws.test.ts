/**
 * Functor law tests for every functor in the category package, including
 * composites built in Kitten.
 */

import { describe, test, expect } from 'vitest'
import fc from 'fast-check'
import { FinCat, finMap } from '../fin'
import { finToFinSet, finToMat, indicatorMatrix } from '../fin-to-mat'
import { composeFunctors, identityFunctor } from '../functor'
import { Kitten } from '../kitten'
import { checkFunctorComposition, checkFunctorIdentity } from '../laws'
import { MatCat, doubling } from '../mat'
import { composablePair, finMapArb, matrixArb } from './arbitraries'

const objects = fc.integer({ min: 0, max: 5 })

// ─── Fin → Mat ──────────────────────────────────────────────────────────────

describe('Fin→Mat', () => {
  test('maps f(1)=2, f(2)=3 to its indicator matrix', () => {
    const f = finMap(3, [2, 3])
    const a = finToMat.homMap(f)
    expect(a.rows).toBe(2)
    expect(a.cols).toBe(3)
    expect(a.entries).toEqual([
      [0, 1, 0],
      [0, 0, 1],
    ])
  })

  test('maps id_2 to the 2×2 identity matrix', () => {
    expect(finToMat.homMap(FinCat.id(2)).entries).toEqual([
      [1, 0],
      [0, 1],
    ])
  })

  test('is the identity on objects', () => {
    expect(finToMat.obMap(4)).toBe(4)
  })

  test('keeps the column count for maps out of an empty domain', () => {
    const a = indicatorMatrix(finMap(3, []))
    expect(a).toEqual({ rows: 0, cols: 3, entries: [] })
  })

  test('identity law: homMap(id_n) ≡ id_{obMap(n)}', () => {
    fc.assert(fc.property(objects, (n) => checkFunctorIdentity(finToMat, n)))
  })

  test('composition law: homMap(compose(f, g)) ≡ compose(homMap(f), homMap(g))', () => {
    fc.assert(fc.property(
      composablePair(finMapArb),
      ([f, g]) => checkFunctorComposition(finToMat, f, g),
    ))
  })

  test('composition law on a worked pair', () => {
    // f: 2 → 3 with 1↦2, 2↦3; g: 3 → 2 with 1↦1, 2↦2, 3↦1; f;g sends 1↦2, 2↦1
    const f = finMap(3, [2, 3])
    const g = finMap(2, [1, 2, 1])
    expect(finToMat.homMap(FinCat.compose(f, g)).entries).toEqual([
      [0, 1],
      [1, 0],
    ])
    expect(MatCat.compose(finToMat.homMap(f), finToMat.homMap(g)).entries).toEqual([
      [0, 1],
      [1, 0],
    ])
  })
})

// ─── Fin → FinSet ───────────────────────────────────────────────────────────

describe('Fin→FinSet', () => {
  test('sends n to {1..n}', () => {
    expect([...finToFinSet.obMap(3)]).toEqual([1, 2, 3])
  })

  test('tabulates the function', () => {
    expect(finToFinSet.homMap(finMap(3, [3, 1])).entries()).toEqual([
      [1, 3],
      [2, 1],
    ])
  })

  test('identity law', () => {
    fc.assert(fc.property(objects, (n) => checkFunctorIdentity(finToFinSet, n)))
  })

  test('composition law', () => {
    fc.assert(fc.property(
      composablePair(finMapArb),
      ([f, g]) => checkFunctorComposition(finToFinSet, f, g),
    ))
  })
})

// ─── Doubling ───────────────────────────────────────────────────────────────

describe('Doubling endofunctor on Mat', () => {
  test('builds the block diagonal A ⊕ A', () => {
    const a = MatCat.id(1)
    expect(doubling.obMap(1)).toBe(2)
    expect(doubling.homMap(a).entries).toEqual([
      [1, 0],
      [0, 1],
    ])
  })

  test('identity law', () => {
    fc.assert(fc.property(objects, (n) => checkFunctorIdentity(doubling, n)))
  })

  test('composition law', () => {
    fc.assert(fc.property(
      composablePair(matrixArb),
      ([a, b]) => checkFunctorComposition(doubling, a, b),
    ))
  })
})

// ─── Composed and Identity Functors ─────────────────────────────────────────

describe('Composed functor closure', () => {
  const composed = composeFunctors(finToMat, doubling)

  test('applies the first factor, then the second', () => {
    expect(composed.obMap(3)).toBe(6)
    expect(composed.homMap(finMap(2, [2, 1])).entries).toEqual([
      [0, 1, 0, 0],
      [1, 0, 0, 0],
      [0, 0, 0, 1],
      [0, 0, 1, 0],
    ])
  })

  test('identity law survives composition', () => {
    fc.assert(fc.property(objects, (n) => checkFunctorIdentity(composed, n)))
  })

  test('composition law survives composition', () => {
    fc.assert(fc.property(
      composablePair(finMapArb),
      ([f, g]) => checkFunctorComposition(composed, f, g),
    ))
  })

  test('the Kitten composite satisfies the same laws', () => {
    const viaKitten = Kitten.compose(finToMat, doubling)
    fc.assert(fc.property(
      composablePair(finMapArb),
      ([f, g]) => checkFunctorComposition(viaKitten, f, g),
    ))
    fc.assert(fc.property(objects, (n) => checkFunctorIdentity(viaKitten, n)))
  })

  test('the identity functor satisfies both laws', () => {
    const id = identityFunctor(FinCat)
    fc.assert(fc.property(objects, (n) => checkFunctorIdentity(id, n)))
    fc.assert(fc.property(
      composablePair(finMapArb),
      ([f, g]) => checkFunctorComposition(id, f, g),
    ))
  })
})
