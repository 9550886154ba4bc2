import { describe, it, expect } from 'vitest'
import { Rational } from '../src/calculator/rational'

describe('Rational', () => {
  describe('Parsing', () => {
    it('should parse integers and decimals into lowest terms', () => {
      expect(Rational.parse('12').toString()).toBe('12')
      expect(Rational.parse('0.25').toString()).toBe('1/4')
      expect(Rational.parse('5.').toString()).toBe('5')
      expect(Rational.parse('.5').toString()).toBe('1/2')
    })

    it('should reject text that is not an unsigned decimal', () => {
      expect(() => Rational.parse('.')).toThrow(SyntaxError)
      expect(() => Rational.parse('')).toThrow(SyntaxError)
      expect(() => Rational.parse('1.2.3')).toThrow('Not a decimal number: "1.2.3"')
    })

    it('should recognise partial decimal input', () => {
      expect(Rational.isDecimal('0.')).toBe(true)
      expect(Rational.isDecimal('.5')).toBe(true)
      expect(Rational.isDecimal('.')).toBe(false)
      expect(Rational.isDecimal('1..')).toBe(false)
    })
  })

  describe('Arithmetic', () => {
    it('should add decimals exactly', () => {
      const sum = Rational.parse('0.1').add(Rational.parse('0.2'))

      expect(sum.equals(Rational.parse('0.3'))).toBe(true)
      expect(sum.toFloatString()).toBe('0.3')
    })

    it('should subtract, multiply and divide', () => {
      const five = new Rational(5n)
      const eight = new Rational(8n)

      expect(five.subtract(eight).toString()).toBe('-3')
      expect(Rational.parse('1.5').multiply(new Rational(4n)).toString()).toBe('6')
      expect(new Rational(1n).divide(new Rational(3n)).toString()).toBe('1/3')
    })

    it('should normalise the sign onto the numerator', () => {
      const value = new Rational(2n, -4n)

      expect(value.numerator).toBe(-1n)
      expect(value.denominator).toBe(2n)
    })

    it('should refuse division by zero', () => {
      expect(() => new Rational(1n).divide(Rational.ZERO)).toThrow(RangeError)
      expect(() => new Rational(1n, 0n)).toThrow('Rational denominator cannot be zero')
    })
  })

  describe('Formatting', () => {
    it('should print integral values with a trailing .0', () => {
      expect(new Rational(8n).toFloatString()).toBe('8.0')
      expect(new Rational(-3n).toFloatString()).toBe('-3.0')
      expect(Rational.ZERO.toFloatString()).toBe('0.0')
    })

    it('should print fractions with the shortest round-trip digits', () => {
      expect(new Rational(1n, 3n).toFloatString()).toBe('0.3333333333333333')
      expect(new Rational(5n, 2n).toFloatString()).toBe('2.5')
    })

    it('should switch to exponent form for very large and very small values', () => {
      expect(new Rational(10n ** 16n).toFloatString()).toBe('1e+16')
      expect(new Rational(1n, 100000n).toFloatString()).toBe('1e-05')
      expect(new Rational(1n, 10000n).toFloatString()).toBe('0.0001')
    })
  })
})
