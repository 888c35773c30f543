import { createToken, Lexer } from "chevrotain"

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })

// Brackets only group visually; they carry no nesting semantics.
export const Grouping = createToken({ name: "Grouping", pattern: /[()[\]{}]/, group: Lexer.SKIPPED })

export const UnitSymbol = createToken({ name: "UnitSymbol", pattern: /[A-Za-z][A-Za-z_]*/ })
export const Integer = createToken({ name: "Integer", pattern: /\d+/ })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })

export const unitTokens = [WhiteSpace, Grouping, UnitSymbol, Integer, Caret, Star, Slash, Plus, Minus]

export const UnitLexer = new Lexer(unitTokens, { positionTracking: "full" })
