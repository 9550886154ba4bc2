/**
 * Exact rational numbers over BigInt, always kept in lowest terms with a
 * positive denominator.
 */

const DECIMAL = /^(\d+)?(?:\.(\d*))?$/

const abs = (n: bigint): bigint => (n < 0n ? -n : n)

const gcd = (a: bigint, b: bigint): bigint => {
  let x = abs(a)
  let y = abs(b)
  while (y !== 0n) {
    const t = x % y
    x = y
    y = t
  }
  return x
}

export class Rational {
  static readonly ZERO = new Rational(0n, 1n)

  readonly numerator: bigint
  readonly denominator: bigint

  constructor(numerator: bigint, denominator: bigint = 1n) {
    if (denominator === 0n) throw new RangeError('Rational denominator cannot be zero')
    const sign = denominator < 0n ? -1n : 1n
    const divisor = gcd(numerator, denominator)
    this.numerator = (sign * numerator) / divisor
    this.denominator = abs(denominator) / divisor
  }

  /**
   * Parses an unsigned decimal such as `"12"`, `"0.25"`, `"5."` or `".5"`.
   * @throws SyntaxError for anything else.
   */
  static parse(text: string): Rational {
    const match = DECIMAL.exec(text)
    if (!match || (match[1] === undefined && !match[2])) {
      throw new SyntaxError(`Not a decimal number: "${text}"`)
    }
    const whole = match[1] ?? ''
    const fraction = match[2] ?? ''
    return new Rational(BigInt(whole + fraction || '0'), 10n ** BigInt(fraction.length))
  }

  static isDecimal(text: string): boolean {
    const match = DECIMAL.exec(text)
    return match !== null && (match[1] !== undefined || Boolean(match[2]))
  }

  isZero(): boolean {
    return this.numerator === 0n
  }

  add(other: Rational): Rational {
    return new Rational(
      this.numerator * other.denominator + other.numerator * this.denominator,
      this.denominator * other.denominator
    )
  }

  subtract(other: Rational): Rational {
    return new Rational(
      this.numerator * other.denominator - other.numerator * this.denominator,
      this.denominator * other.denominator
    )
  }

  multiply(other: Rational): Rational {
    return new Rational(this.numerator * other.numerator, this.denominator * other.denominator)
  }

  /**
   * @throws RangeError when `other` is zero.
   */
  divide(other: Rational): Rational {
    if (other.isZero()) throw new RangeError('Division by zero')
    return new Rational(this.numerator * other.denominator, this.denominator * other.numerator)
  }

  equals(other: Rational): boolean {
    return this.numerator === other.numerator && this.denominator === other.denominator
  }

  toNumber(): number {
    return Number(this.numerator) / Number(this.denominator)
  }

  /**
   * Formats the nearest double the way a float is usually printed in a
   * calculator display: `8` as `"8.0"`, `1/3` as `"0.3333333333333333"`,
   * very large or small magnitudes in exponent form (`"1e+16"`, `"1e-05"`).
   */
  toFloatString(): string {
    const value = this.toNumber()
    const magnitude = Math.abs(value)
    if (magnitude !== 0 && (magnitude >= 1e16 || magnitude < 1e-4)) {
      return value.toExponential().replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`)
    }
    const text = String(value)
    return Number.isInteger(value) ? `${text}.0` : text
  }

  toString(): string {
    return this.denominator === 1n ? `${this.numerator}` : `${this.numerator}/${this.denominator}`
  }
}
