/**
 * FinSet: finite sets, total functions between them, and their category.
 */

import { describe, test, expect } from 'vitest'
import { tryCompose } from '../core'
import { DomainMismatchError, InvalidMorphismError, KeyNotFoundError } from '../errors'
import { FinSetCat, FinSetCategory, finFunction, finSet, range } from '../finset'
import type { FinSet } from '../finset'
import { MatCat } from '../mat'

const cat = new FinSetCategory<number>()

const A = finSet(1, 2)
const B = finSet(3, 4)
const C = finSet(5, 6)
const f = finFunction(A, B, [[1, 3], [2, 4]])
const g = finFunction(B, C, [[3, 5], [4, 6]])

// ─── Sets ───────────────────────────────────────────────────────────────────

describe('FinSet', () => {
  test('compares extensionally', () => {
    expect(finSet(1, 2).equals(finSet(2, 1))).toBe(true)
    expect(finSet(1, 2).equals(finSet(1, 2, 3))).toBe(false)
    expect(finSet(1, 2).equals(finSet(1, 3))).toBe(false)
  })

  test('drops duplicates', () => {
    expect(finSet(1, 1, 2).size).toBe(2)
  })

  test('iterates in insertion order', () => {
    expect([...finSet('b', 'a', 'c')]).toEqual(['b', 'a', 'c'])
  })

  test('range(n) is {1..n}', () => {
    expect([...range(3)]).toEqual([1, 2, 3])
    expect(range(0).size).toBe(0)
  })

  test('prints as a set literal', () => {
    expect(finSet(1, 2).toString()).toBe('{1, 2}')
  })
})

// ─── Functions ──────────────────────────────────────────────────────────────

describe('FinFunction', () => {
  test('evaluates on its domain', () => {
    expect(f.apply(1)).toBe(3)
    expect(f.apply(2)).toBe(4)
  })

  test('throws KeyNotFoundError off its domain', () => {
    expect(() => f.apply(7)).toThrow(KeyNotFoundError)
    expect(() => f.apply(7)).toThrow('Key not found: 7')
  })

  test('can be built from a plain function', () => {
    const reverse = finFunction(range(3), range(3), (i) => 4 - i)
    expect(reverse.entries()).toEqual([[1, 3], [2, 2], [3, 1]])
  })

  test('rejects a partial mapping', () => {
    expect(() => finFunction(A, B, [[1, 3]])).toThrow(InvalidMorphismError)
    expect(() => finFunction(A, B, [[1, 3]])).toThrow('Function is not total: no output for 2')
  })

  test('rejects an input mapped twice', () => {
    expect(() => finFunction(A, B, [[1, 3], [1, 4], [2, 4]])).toThrow(
      'Input 1 is mapped more than once',
    )
  })

  test('rejects an input outside the domain', () => {
    expect(() => finFunction(A, B, [[1, 3], [2, 4], [9, 3]])).toThrow(
      'Input 9 is not in the domain {1, 2}',
    )
  })

  test('rejects an output outside the codomain', () => {
    expect(() => finFunction(A, B, [[1, 3], [2, 5]])).toThrow(
      'Output 5 for input 2 is not in the codomain {3, 4}',
    )
  })

  test('compares extensionally', () => {
    const same = finFunction(finSet(2, 1), finSet(4, 3), [[2, 4], [1, 3]])
    expect(f.equals(same)).toBe(true)
    expect(f.equals(finFunction(A, B, [[1, 4], [2, 3]]))).toBe(false)
  })
})

// ─── The Category ───────────────────────────────────────────────────────────

describe('FinSetCategory', () => {
  test('dom and codom read the recorded sets', () => {
    expect(cat.dom(f)).toBe(A)
    expect(cat.codom(f)).toBe(B)
  })

  test('composes f: 1↦3, 2↦4 with g: 3↦5, 4↦6 into 1↦5, 2↦6', () => {
    const h = cat.compose(f, g)
    expect(h.apply(1)).toBe(5)
    expect(h.apply(2)).toBe(6)
    expect(h.dom.equals(A)).toBe(true)
    expect(h.codom.equals(C)).toBe(true)
  })

  test('id({1, 2}) maps 1↦1, 2↦2', () => {
    const id = cat.id(finSet(1, 2))
    expect(id.entries()).toEqual([[1, 1], [2, 2]])
  })

  test('rejects arrows that do not line up', () => {
    expect(() => cat.compose(g, f)).toThrow(DomainMismatchError)
    expect(() => cat.compose(g, f)).toThrow(
      'Cannot compose in FinSet: codomain {5, 6} does not match domain {1, 2}',
    )
  })

  test('matches codomain and domain as sets, not by reference', () => {
    const fReordered = finFunction(A, finSet(4, 3), [[1, 3], [2, 4]])
    expect(cat.compose(fReordered, g).entries()).toEqual([[1, 5], [2, 6]])
  })

  test('tryCompose returns the mismatch as a value', () => {
    const good = tryCompose(cat, f, g)
    expect(good.ok).toBe(true)

    const bad = tryCompose(cat, g, f)
    expect(bad.ok).toBe(false)
    if (!bad.ok) {
      expect(bad.error.category).toBe('FinSet')
      expect(bad.error.codomain).toBe(C)
      expect(bad.error.domain).toBe(A)
    }
  })

  test('tryCompose lets other failures through', () => {
    class Faulty extends FinSetCategory<number> {
      override dom(): FinSet<number> {
        throw new KeyNotFoundError('dom')
      }
    }
    expect(() => tryCompose(new Faulty(), f, g)).toThrow(KeyNotFoundError)
  })

  test('all instances are the same category', () => {
    expect(FinSetCat.equals(cat)).toBe(true)
    expect(cat.equals(FinSetCat)).toBe(true)
    expect(FinSetCat.equals(MatCat)).toBe(false)
  })
})
