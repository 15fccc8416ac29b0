/**
 * Typed failures raised by categories and functors.
 *
 * Every failure here is a broken caller contract (composing arrows that do
 * not line up, evaluating a function off its domain). They are thrown at the
 * call that introduces the inconsistency and never retried.
 */

/** Base class: `catch (e) { if (e instanceof CategoryError) ... }` */
export class CategoryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CategoryError'
  }
}

/** An abstract Category or Functor operation was called without an override. */
export class NotImplementedError extends CategoryError {
  constructor(
    public readonly owner: string,
    public readonly operation: string,
  ) {
    super(`${owner} does not implement ${operation}`)
    this.name = 'NotImplementedError'
  }
}

/** `compose(f, g)` where the codomain of f is not the domain of g. */
export class DomainMismatchError extends CategoryError {
  constructor(
    public readonly category: string,
    public readonly codomain: unknown,
    public readonly domain: unknown,
  ) {
    super(
      `Cannot compose in ${category}: codomain ${String(codomain)} does not match domain ${String(domain)}`,
    )
    this.name = 'DomainMismatchError'
  }
}

/** Functor composition `F ; G` where F's target category is not G's source. */
export class CompositionMismatchError extends DomainMismatchError {
  constructor(codomain: unknown, domain: unknown) {
    super('Kitten', codomain, domain)
    this.name = 'CompositionMismatchError'
  }
}

/** A finite map evaluated at a point it was not built over. */
export class KeyNotFoundError extends CategoryError {
  constructor(public readonly key: unknown) {
    super(`Key not found: ${String(key)}`)
    this.name = 'KeyNotFoundError'
  }
}

/** A morphism value that breaks its own invariants (partial, out of range, ragged). */
export class InvalidMorphismError extends CategoryError {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidMorphismError'
  }
}
