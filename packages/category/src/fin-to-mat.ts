/**
 * Functors out of Fin.
 *
 * finToMat: Fin → Mat
 *   n ↦ n
 *   f: n → m ↦ the n×m indicator matrix A with A[i][f(i)] = 1
 *
 * Identity:    id_n has a single 1 per row, on the diagonal, so it maps to I_n.
 * Composition: row i of A_f·A_g picks row f(i) of A_g, which has its 1 in
 *              column g(f(i)); that is row i of A_{f;g}.
 *
 * finToFinSet: Fin → FinSet
 *   n ↦ {1..n}
 *   f ↦ the same function, tabulated
 */

import type { FinMap } from './fin'
import { FinCat, applyFinMap } from './fin'
import type { FinFunction, FinSet } from './finset'
import { FinSetCategory, finFunction, range } from './finset'
import type { Functor } from './functor'
import { createFunctor } from './functor'
import type { Matrix } from './mat'
import { MatCat, matrix } from './mat'

/** Indicator matrix of f (1-based f, 0-based rows and columns). */
export function indicatorMatrix(f: FinMap): Matrix {
  const rows = f.values.map((image) =>
    Array.from({ length: f.codom }, (_, c) => (c + 1 === image ? 1 : 0)),
  )
  return matrix(rows, f.codom)
}

export const finToMat: Functor<number, FinMap, number, Matrix> = createFunctor({
  name: 'Fin→Mat',
  dom: FinCat,
  codom: MatCat,
  obMap: (n: number) => n,
  homMap: indicatorMatrix,
})

const finSets = new FinSetCategory<number>()

export const finToFinSet: Functor<number, FinMap, FinSet<number>, FinFunction<number, number>> =
  createFunctor({
    name: 'Fin→FinSet',
    dom: FinCat,
    codom: finSets,
    obMap: range,
    homMap: (f: FinMap) => finFunction(range(f.dom), range(f.codom), (i) => applyFinMap(f, i)),
  })
