import type { UnitTerm, UnitTerms } from "../../Dimension.js"

const withMagnitude = (term: UnitTerm): string => {
  const magnitude = Math.abs(term.exponent)
  return magnitude === 1 ? term.symbol : `${term.symbol}^${magnitude}`
}

const withSignedExponent = (term: UnitTerm): string =>
  term.exponent === 1 ? term.symbol : `${term.symbol}^${term.exponent}`

/**
 * `kg*m/s^2` style. Always contains the `/`, even with an empty denominator.
 */
export const toFractionalString = (terms: UnitTerms): string => {
  const numerator = terms
    .filter((term) => term.dimension !== "Reciprocal" && term.exponent > 0)
    .map(withMagnitude)
  if (numerator.length === 0 && terms.some((term) => term.dimension === "Reciprocal")) {
    numerator.push("1")
  }
  const denominator = terms
    .filter((term) => term.dimension !== "Reciprocal" && term.exponent < 0)
    .map(withMagnitude)
  return `${numerator.join("*")}/${denominator.join("*")}`
}

/**
 * `kg*m*s^-2` style.
 */
export const toExponentialString = (terms: UnitTerms): string =>
  terms
    .filter((term) => term.exponent !== 0)
    .map(withSignedExponent)
    .join("*")
