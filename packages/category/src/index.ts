/**
 * @kitten/category — categories and functors as values
 *
 * Core:        Category contract, AbstractCategory, checked composition
 * Functors:    Functor contract, composition, identity
 * Kitten:      the category of categories
 * Examples:    FinSet, Fin, Mat, discrete categories, Fin→Mat
 * Laws:        pointwise and batch law checkers
 * Codecs:      JSON encode/decode for FinFunction and Matrix
 */

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  CategoryError,
  NotImplementedError,
  DomainMismatchError,
  CompositionMismatchError,
  KeyNotFoundError,
  InvalidMorphismError,
} from './errors'

// ─── Core ───────────────────────────────────────────────────────────────────
export {
  type Category, type AnyCategory,
  AbstractCategory, sameCategory,
  type Result, ok, err, tryCompose,
} from './core'

// ─── Functors ───────────────────────────────────────────────────────────────
export {
  type Functor, type AnyFunctor, type Endofunctor, type FunctorDefinition,
  AbstractFunctor, createFunctor,
  ComposedFunctor, composeFunctors,
  IdentityFunctor, identityFunctor,
  factors, composable,
} from './functor'

// ─── Kitten ─────────────────────────────────────────────────────────────────
export { KittenCategory, Kitten } from './kitten'

// ─── Concrete Categories ────────────────────────────────────────────────────
export {
  FinSet, finSet, range, sameValueZero,
  FinFunction, finFunction, type FinMapping,
  FinSetCategory, FinSetCat,
} from './finset'

export {
  type FinMap, finMap, applyFinMap, isNatural,
  FinCategory, FinCat,
} from './fin'

export {
  type Matrix, type Row, matrix, zeros, identityMatrix,
  multiply, directSum, matrixEquals,
  MatCategory, MatCat, doubling,
} from './mat'

export {
  type DiscreteArrow, DiscreteCategory, discreteFunctor,
} from './discrete'

export { indicatorMatrix, finToMat, finToFinSet } from './fin-to-mat'

// ─── Laws ───────────────────────────────────────────────────────────────────
export {
  checkLeftIdentity, checkRightIdentity, checkAssociativity,
  checkFunctorIdentity, checkFunctorComposition,
  verifyCategoryLaws, verifyFunctorLaws,
  type LawName, type LawViolation, type LawReport, type VerifyOptions,
} from './laws'

// ─── Serialization ──────────────────────────────────────────────────────────
export {
  finElementSchema, finFunctionSchema, matrixSchema,
  type FinElement, type FinFunctionJson, type MatrixJson,
  encodeFinFunction, decodeFinFunction,
  encodeMatrix, decodeMatrix,
} from './serialization'

// ─── Logging ────────────────────────────────────────────────────────────────
export {
  createLogger, setLogLevel, getLogLevel, setLogSink,
  type Logger, type LogSink, type LogFields,
} from './log'
