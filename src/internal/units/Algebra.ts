import { RECIPROCAL, UnitTerm, type Dimension, type UnitTerms } from "../../Dimension.js"

const EPSILON = 1e-12

export type Sign = 1 | -1

const isZero = (exponent: number): boolean => Math.abs(exponent) <= EPSILON

const isNumerator = (term: UnitTerm): boolean =>
  term.dimension !== "Reciprocal" && term.exponent > EPSILON

/**
 * Dimension-keyed union of `left` and `right`: one term per distinct dimension,
 * with exponent `left + sign * right`. Dimensions keep the order in which they
 * are first seen, `left` before `right`, and the prefix comes from `left`
 * whenever `left` has the dimension.
 */
export const merge = (left: UnitTerms, right: UnitTerms, sign: Sign): UnitTerms => {
  const merged = new Map<Dimension, UnitTerm>()
  const add = (term: UnitTerm, factor: number): void => {
    const current = merged.get(term.dimension)
    merged.set(
      term.dimension,
      current
        ? current.withExponent(current.exponent + factor * term.exponent)
        : term.withExponent(factor * term.exponent),
    )
  }
  for (const term of left) {
    add(term, 1)
  }
  for (const term of right) {
    add(term, sign)
  }
  return Array.from(merged.values())
}

/**
 * Drop zero exponents and manage the `Reciprocal` placeholder: it is removed
 * once a genuine numerator term exists, otherwise exactly one placeholder with
 * exponent 1 is kept (or appended).
 */
export const rectify = (terms: UnitTerms): UnitTerms => {
  const hasNumerator = terms.some(isNumerator)
  const result: Array<UnitTerm> = []
  let placeholder = false
  for (const term of terms) {
    if (term.dimension === "Reciprocal") {
      if (!hasNumerator && !placeholder) {
        result.push(RECIPROCAL)
        placeholder = true
      }
      continue
    }
    if (!isZero(term.exponent)) {
      result.push(term)
    }
  }
  if (!hasNumerator && !placeholder) {
    result.push(RECIPROCAL)
  }
  return result
}

/**
 * Multiset equality on (dimension, exponent), ignoring order and prefixes.
 */
export const sameDimensions = (left: UnitTerms, right: UnitTerms): boolean =>
  left.length === right.length &&
  right.every((term) =>
    left.some((candidate) => candidate.dimension === term.dimension && candidate.exponent === term.exponent),
  )

export const scaleExponents = (terms: UnitTerms, factor: number): UnitTerms =>
  terms.map((term) => term.withExponent(term.exponent * factor))

/**
 * Collapse repeated dimensions and rectify.
 */
export const normalize = (terms: UnitTerms): UnitTerms => rectify(merge(terms, [], 1))

export const dimensionsOf = (terms: UnitTerms): ReadonlySet<Dimension> =>
  new Set(terms.map((term) => term.dimension))
