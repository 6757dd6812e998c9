const FLOAT_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/
const INTEGER_LITERAL = /^[+-]?\d+$/

const TRUE_LITERALS = new Set(["1", "t", "T", "TRUE", "true", "True"])
const FALSE_LITERALS = new Set(["0", "f", "F", "FALSE", "false", "False"])

/**
 * Parse a decimal float literal (`"1.5"`, `"-10"`, `"2e3"`).
 * Whitespace, hex, `Infinity` and `NaN` are rejected: JSON cannot carry them.
 */
export function parseFloatLiteral(literal: string): number | undefined {
  if (!FLOAT_LITERAL.test(literal)) return undefined
  const value = Number(literal)
  return Number.isFinite(value) ? value : undefined
}

/**
 * Parse a base-10 integer literal within the safe integer range
 */
export function parseIntegerLiteral(literal: string): number | undefined {
  if (!INTEGER_LITERAL.test(literal)) return undefined
  const value = Number(literal)
  return Number.isSafeInteger(value) ? value : undefined
}

/**
 * Parse a boolean literal: `1 t T TRUE true True` or `0 f F FALSE false False`
 */
export function parseBooleanLiteral(literal: string): boolean | undefined {
  if (TRUE_LITERALS.has(literal)) return true
  if (FALSE_LITERALS.has(literal)) return false
  return undefined
}
