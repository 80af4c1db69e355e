// CHANGE: round decimal literals straight to the nearest 32-bit float
// WHY: parsing to a double first and then narrowing can land exactly on a float32 midpoint
// REF: req-number-precision-1
// SOURCE: n/a
// FORMAT THEOREM: ∀l: roundToFloat32(l) is the float32 nearest to the exact decimal l, ties to even
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Math.fround(roundToFloat32(l)) === roundToFloat32(l)
// COMPLEXITY: O(|l|) except on a midpoint, where exact BigInt comparison is O(|l| + exponent)

interface DecimalLiteral {
  readonly negative: boolean
  readonly digits: bigint
  readonly exponent: number
}

const literalShape = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/u

const readDecimal = (literal: string): DecimalLiteral | undefined => {
  const match = literalShape.exec(literal)
  if (match === null) {
    return undefined
  }
  const [, sign = "", integer = "", fraction = "", exponent = "0"] = match
  if (integer.length + fraction.length === 0) {
    return undefined
  }
  return {
    negative: sign === "-",
    digits: BigInt(`${integer}${fraction}`),
    exponent: Number.parseInt(exponent, 10) - fraction.length
  }
}

// next float32 from a non-negative float32 in the given direction
const neighbor = (value: number, upward: boolean): number => {
  const bits = new DataView(new ArrayBuffer(4))
  bits.setFloat32(0, value)
  bits.setUint32(0, bits.getUint32(0) + (upward ? 1 : -1))
  return bits.getFloat32(0)
}

// sign of (exact decimal - double), both non-negative; the double is a dyadic rational
const compareExact = (decimal: DecimalLiteral, double: number): number => {
  let scaled = double
  let shift = 0n
  while (!Number.isInteger(scaled)) {
    scaled *= 2
    shift += 1n
  }
  const doubleNumerator = BigInt(scaled)
  const left = decimal.exponent >= 0
    ? decimal.digits * 10n ** BigInt(decimal.exponent) << shift
    : decimal.digits << shift
  const right = decimal.exponent >= 0
    ? doubleNumerator
    : doubleNumerator * 10n ** BigInt(-decimal.exponent)
  return left === right ? 0 : left > right ? 1 : -1
}

/**
 * Round a decimal literal to a 32-bit float.
 *
 * @param literal - Text accepted by the number scanner.
 * @returns Nearest float32, possibly ±Infinity when out of range.
 *
 * @pure true
 * @invariant a literal strictly above or below a float32 midpoint rounds away from the midpoint
 * @complexity O(n)
 */
export const roundToFloat32 = (literal: string): number => {
  const double = Number.parseFloat(literal)
  const magnitude = Math.abs(double)
  const rounded = Math.fround(magnitude)
  if (rounded === magnitude || !Number.isFinite(rounded)) {
    return Math.fround(double)
  }
  const other = neighbor(rounded, magnitude > rounded)
  const decimal = readDecimal(literal)
  if ((rounded + other) / 2 !== magnitude || decimal === undefined) {
    return Math.fround(double)
  }
  const direction = compareExact(decimal, magnitude)
  const result = direction === 0
    ? rounded
    : direction > 0
    ? Math.max(rounded, other)
    : Math.min(rounded, other)
  return decimal.negative ? -result : result
}
