import { describe, it, expect } from 'vitest';
import { FormatSpec } from '../../../src/domain/value-objects/FormatSpec.js';
import { FilePath } from '../../../src/domain/value-objects/FilePath.js';

const fmt = (spec: string, value: string | number | bigint | FilePath) =>
  FormatSpec.parse(spec).apply(value);

/**
 * Feature: format spec mini-language
 *
 * 作為樣板引擎，我需要把單一值依 `{name:spec}` 的 spec 轉成字串，
 * 例如 `sub{subject:03d}` 搭配 subject=1 產生 `sub001`。
 */
describe('FormatSpec', () => {
  describe('parse', () => {
    it('should parse every component of a full spec', () => {
      const spec = FormatSpec.parse('*^+z#012,.3f');
      expect(spec.fill).toBe('*');
      expect(spec.align).toBe('^');
      expect(spec.sign).toBe('+');
      expect(spec.coerceNegativeZero).toBe(true);
      expect(spec.alternate).toBe(true);
      expect(spec.zeroPad).toBe(true);
      expect(spec.width).toBe(12);
      expect(spec.grouping).toBe(',');
      expect(spec.precision).toBe(3);
      expect(spec.type).toBe('f');
    });

    it('should treat a leading zero before the width as zero padding, not fill', () => {
      const spec = FormatSpec.parse('05');
      expect(spec.fill).toBeUndefined();
      expect(spec.align).toBeUndefined();
      expect(spec.zeroPad).toBe(true);
      expect(spec.width).toBe(5);
    });

    it('should reject malformed specs', () => {
      expect(() => FormatSpec.parse('abc')).toThrow('Invalid format specifier "abc"');
      expect(() => FormatSpec.parse('3.2.1f')).toThrow('Invalid format specifier');
    });
  });

  describe('integers', () => {
    it('should zero-pad to the requested width', () => {
      expect(fmt('03d', 1)).toBe('001');
      expect(fmt('03d', 42)).toBe('042');
      expect(fmt('03d', 1234)).toBe('1234');
    });

    it('should keep the sign in front of zero padding', () => {
      expect(fmt('03d', -1)).toBe('-01');
    });

    it('should fill with zeros under an explicit alignment', () => {
      expect(fmt('<05d', 5)).toBe('50000');
      expect(fmt('^05d', 5)).toBe('00500');
      expect(fmt('*<05d', 5)).toBe('5****');
    });

    it('should group the zero padding', () => {
      expect(fmt('08,d', 1234)).toBe('0,001,234');
      expect(fmt('09,d', -1234)).toBe('-0,001,234');
      expect(fmt('010,.1f', 1234.5)).toBe('0,001,234.5');
      expect(fmt('*>8,d', 1234)).toBe('***1,234');
    });

    it('should right-align characters', () => {
      expect(fmt('3c', 65)).toBe('  A');
    });

    it('should format with no type like d', () => {
      expect(fmt('', 7)).toBe('7');
      expect(fmt('>4', 7)).toBe('   7');
    });

    it('should apply explicit signs', () => {
      expect(fmt('+d', 5)).toBe('+5');
      expect(fmt(' d', 5)).toBe(' 5');
      expect(fmt('-d', 5)).toBe('5');
    });

    it('should render other bases with optional prefixes', () => {
      expect(fmt('b', 5)).toBe('101');
      expect(fmt('#b', 5)).toBe('0b101');
      expect(fmt('#o', 8)).toBe('0o10');
      expect(fmt('x', 255)).toBe('ff');
      expect(fmt('#x', 255)).toBe('0xff');
      expect(fmt('X', 255)).toBe('FF');
    });

    it('should group digits', () => {
      expect(fmt(',', 1234567)).toBe('1,234,567');
      expect(fmt('_d', 1234567)).toBe('1_234_567');
      expect(fmt('_x', 3735928559)).toBe('dead_beef');
    });

    it('should format bigint values', () => {
      expect(fmt(',', 12345678901234567890n)).toBe('12,345,678,901,234,567,890');
      expect(fmt('04d', 7n)).toBe('0007');
    });

    it('should render code points with c', () => {
      expect(fmt('c', 65)).toBe('A');
    });

    it('should reject precision on integer types', () => {
      expect(() => fmt('.2d', 3)).toThrow('Precision not allowed in integer format specifier');
    });

    it("should reject ',' with non-decimal types", () => {
      expect(() => fmt(',x', 255)).toThrow("Cannot specify ',' with 'x'.");
    });

    it('should reject string types for integers', () => {
      expect(() => fmt('s', 3)).toThrow("Unknown format code 's' for object of type 'int'");
    });
  });

  describe('floats', () => {
    it('should format fixed point', () => {
      expect(fmt('.2f', 3.14159)).toBe('3.14');
      expect(fmt('f', 1.5)).toBe('1.500000');
    });

    it('should convert integers when a float type is requested', () => {
      expect(fmt('.2f', 2)).toBe('2.00');
    });

    it('should zero-pad after the sign', () => {
      expect(fmt('08.3f', -3.14159)).toBe('-003.142');
    });

    it('should use two-digit exponents', () => {
      expect(fmt('e', 12345.678)).toBe('1.234568e+04');
      expect(fmt('.2E', 0.00012)).toBe('1.20E-04');
    });

    it('should pick fixed or exponent notation for g', () => {
      expect(fmt('g', 100)).toBe('100');
      expect(fmt('.3g', 0.0001234)).toBe('0.000123');
      expect(fmt('g', 1234567)).toBe('1.23457e+06');
    });

    it('should format percentages', () => {
      expect(fmt('.1%', 0.256)).toBe('25.6%');
    });

    it('should use the shortest representation without a type', () => {
      expect(fmt('', 1.5)).toBe('1.5');
      expect(fmt('', 1e-7)).toBe('1e-07');
      expect(fmt('', 0.00001)).toBe('1e-05');
      expect(fmt('', 0.000015)).toBe('1.5e-05');
      expect(fmt('', 0.0001)).toBe('0.0001');
    });

    it('should format nan and infinities', () => {
      expect(fmt('f', NaN)).toBe('nan');
      expect(fmt('', Infinity)).toBe('inf');
      expect(fmt('F', -Infinity)).toBe('-INF');
    });

    it('should coerce negative zero only with z', () => {
      expect(fmt('.2f', -0.001)).toBe('-0.00');
      expect(fmt('z.2f', -0.001)).toBe('0.00');
    });

    it('should reject integer-only types', () => {
      expect(() => fmt('d', 1.5)).toThrow("Unknown format code 'd' for object of type 'float'");
      expect(() => fmt(',n', 1.5)).toThrow("Cannot specify ',' with 'n'.");
      expect(() => fmt('_n', 1.5)).toThrow("Cannot specify '_' with 'n'.");
    });
  });

  describe('strings', () => {
    it('should align left by default', () => {
      expect(fmt('6', 'ab')).toBe('ab    ');
      expect(fmt('>6', 'ab')).toBe('    ab');
      expect(fmt('^6', 'ab')).toBe('  ab  ');
      expect(fmt('*^7', 'ab')).toBe('**ab***');
    });

    it('should truncate to the precision', () => {
      expect(fmt('.3', 'abcdef')).toBe('abc');
      expect(fmt('.3s', 'abcdef')).toBe('abc');
    });

    it('should pad strings with zeros on the right when 0 is given', () => {
      expect(fmt('05', 'ab')).toBe('ab000');
      expect(fmt('>05', 'ab')).toBe('000ab');
      expect(fmt('*>05', 'ab')).toBe('***ab');
    });

    it('should format FilePath values as strings', () => {
      expect(fmt('>12', FilePath.of('/a/b'))).toBe('        /a/b');
    });

    it('should reject numeric options', () => {
      expect(() => fmt('d', 'abc')).toThrow("Unknown format code 'd' for object of type 'str'");
      expect(() => fmt('+s', 'abc')).toThrow('Sign not allowed in string format specifier');
      expect(() => fmt('#', 'abc')).toThrow('Alternate form (#) not allowed in string format specifier');
      expect(() => fmt('=5', 'abc')).toThrow("'=' alignment not allowed in string format specifier");
    });
  });
});
