/**
 * CostAmount — immutable fixed-point decimal for currency amounts.
 *
 * Values are held as a bigint count of 10^-12 units, so sums of many
 * provider line items never accumulate binary floating-point error.
 * All rounding (on parse beyond 12 digits, and on display) is half-even.
 */

/** Number of fractional digits carried internally */
export const COST_AMOUNT_SCALE = 12

/** Largest accepted decimal exponent, matching the range of a JSON double */
export const MAX_DECIMAL_EXPONENT = 308

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/

/**
 * Divide `numerator` by a positive `denominator`, rounding the quotient half-to-even.
 */
function divideHalfEven(numerator: bigint, denominator: bigint): bigint {
  if (numerator < 0n) return -divideHalfEven(-numerator, denominator)
  const quotient = numerator / denominator
  const twiceRemainder = (numerator % denominator) * 2n
  if (twiceRemainder > denominator) return quotient + 1n
  if (twiceRemainder === denominator && quotient % 2n === 1n) return quotient + 1n
  return quotient
}

export class CostAmount {
  private constructor(private readonly _units: bigint) {}

  static readonly ZERO = new CostAmount(0n)

  /**
   * Parse a decimal string (optionally signed, optionally in exponent notation)
   * or a finite JSON number.
   *
   * Numbers are read through their shortest round-trip string form, which is the
   * literal that appeared in the JSON document for any value the provider emits.
   *
   * @throws {RangeError} when the value is not a finite decimal, or its exponent
   *   exceeds MAX_DECIMAL_EXPONENT in either direction
   */
  static parse(value: string | number): CostAmount {
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new RangeError(`Cost amount must be finite, got ${String(value)}`)
      }
      return CostAmount.parse(String(value))
    }

    const match = DECIMAL_PATTERN.exec(value.trim())
    const intDigits = match?.[2] ?? ''
    const fracDigits = match?.[3] ?? ''
    if (match === null || intDigits.length + fracDigits.length === 0) {
      throw new RangeError(`Invalid decimal cost amount: "${value}"`)
    }

    const writtenExponent = Number(match[4] ?? '0')
    if (Math.abs(writtenExponent) > MAX_DECIMAL_EXPONENT) {
      throw new RangeError(`Cost amount exponent out of range: "${value}"`)
    }

    const negative = match[1] === '-'
    const mantissa = BigInt(intDigits + fracDigits)
    const exponent = writtenExponent - fracDigits.length + COST_AMOUNT_SCALE

    const magnitude = exponent >= 0
      ? mantissa * 10n ** BigInt(exponent)
      : divideHalfEven(mantissa, 10n ** BigInt(-exponent))

    return new CostAmount(negative ? -magnitude : magnitude)
  }

  /** Sum of all amounts; the empty sum is zero */
  static sum(amounts: Iterable<CostAmount>): CostAmount {
    let total = 0n
    for (const amount of amounts) total += amount._units
    return new CostAmount(total)
  }

  add(other: CostAmount): CostAmount {
    return new CostAmount(this._units + other._units)
  }

  equals(other: CostAmount): boolean {
    return this._units === other._units
  }

  isZero(): boolean {
    return this._units === 0n
  }

  /**
   * Render with exactly `fractionDigits` digits after the point, rounding half-even.
   */
  toFixed(fractionDigits = 2): string {
    if (!Number.isInteger(fractionDigits) || fractionDigits < 0 || fractionDigits > COST_AMOUNT_SCALE) {
      throw new RangeError(`fractionDigits must be an integer between 0 and ${String(COST_AMOUNT_SCALE)}`)
    }

    const rounded = divideHalfEven(this._units, 10n ** BigInt(COST_AMOUNT_SCALE - fractionDigits))
    const sign = rounded < 0n ? '-' : ''
    const digits = (rounded < 0n ? -rounded : rounded).toString().padStart(fractionDigits + 1, '0')
    if (fractionDigits === 0) return `${sign}${digits}`

    const cut = digits.length - fractionDigits
    return `${sign}${digits.slice(0, cut)}.${digits.slice(cut)}`
  }

  /** Full-precision representation with trailing zeros removed */
  toString(): string {
    const full = this.toFixed(COST_AMOUNT_SCALE)
    return full.replace(/\.?0+$/, '')
  }

  toJSON(): string {
    return this.toFixed(2)
  }

  /** Underlying integer count of 10^-12 units */
  get units(): bigint {
    return this._units
  }
}
