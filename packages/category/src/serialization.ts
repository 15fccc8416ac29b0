/**
 * JSON codecs for FinSet functions and matrices.
 *
 * Wire shapes are validated with zod before the domain constructors run, so a
 * decoded value satisfies the same invariants as one built in code.
 */

import { z } from 'zod'
import { InvalidMorphismError } from './errors'
import type { FinFunction } from './finset'
import { FinSet, finFunction } from './finset'
import type { Matrix } from './mat'
import { matrix } from './mat'

// ─── Schemas ────────────────────────────────────────────────────────────────

export const finElementSchema = z.union([z.string(), z.number().finite()])

export type FinElement = z.infer<typeof finElementSchema>

export const finFunctionSchema = z.object({
  dom: z.array(finElementSchema),
  codom: z.array(finElementSchema),
  mapping: z.array(z.tuple([finElementSchema, finElementSchema])),
})

export type FinFunctionJson = z.infer<typeof finFunctionSchema>

export const matrixSchema = z.object({
  rows: z.number().int().min(0),
  cols: z.number().int().min(0),
  entries: z.array(z.array(z.number().finite())),
})

export type MatrixJson = z.infer<typeof matrixSchema>

function parse<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new InvalidMorphismError(`Invalid ${what}: ${problems}`)
  }
  return result.data
}

// ─── FinFunction ────────────────────────────────────────────────────────────

export function encodeFinFunction(f: FinFunction<FinElement, FinElement>): FinFunctionJson {
  return {
    dom: [...f.dom],
    codom: [...f.codom],
    mapping: f.entries(),
  }
}

function distinct(elements: readonly FinElement[], field: string): FinSet<FinElement> {
  const set = new FinSet(elements)
  if (set.size !== elements.length) {
    throw new InvalidMorphismError(`Invalid FinFunction: ${field} repeats an element`)
  }
  return set
}

/** @throws InvalidMorphismError for malformed JSON, repeated set elements or a partial/out-of-range mapping */
export function decodeFinFunction(input: unknown): FinFunction<FinElement, FinElement> {
  const json = parse(finFunctionSchema, input, 'FinFunction')
  return finFunction(distinct(json.dom, 'dom'), distinct(json.codom, 'codom'), json.mapping)
}

// ─── Matrix ─────────────────────────────────────────────────────────────────

export function encodeMatrix(a: Matrix): MatrixJson {
  return {
    rows: a.rows,
    cols: a.cols,
    entries: a.entries.map((row) => [...row]),
  }
}

/** @throws InvalidMorphismError for malformed JSON or a shape that disagrees with the entries */
export function decodeMatrix(input: unknown): Matrix {
  const json = parse(matrixSchema, input, 'Matrix')
  if (json.entries.length !== json.rows) {
    throw new InvalidMorphismError(`Invalid Matrix: ${json.entries.length} rows given, expected ${json.rows}`)
  }
  return matrix(json.entries, json.cols)
}
