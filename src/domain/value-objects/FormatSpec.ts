import { FilePath } from './FilePath.js';

/**
 * Format spec mini-language
 *
 * 語法：`[[fill]align][sign][z][#][0][width][grouping][.precision][type]`
 * 例如 `03d`、`>8`、`.2f`、`_x`。
 *
 * 單一值的格式化：字串（含 FilePath）、整數（bigint 或整數 number）、浮點數。
 * 不合法的 spec 或型別不符一律丟出 Error，由 TemplateString 包裝成 TemplateFormatError。
 */

export type Align = '<' | '>' | '^' | '=';
export type Sign = '+' | '-' | ' ';

/** 可代入 placeholder 的值 */
export type TemplateValue = string | number | bigint | FilePath;

const SPEC_PATTERN =
  /^(?:([\s\S])?([<>=^]))?([-+ ])?(z)?(#)?(0)?(\d+)?([,_])?(?:\.(\d+))?([bcdeEfFgGnosxX%])?$/;

const INTEGER_TYPES = new Set(['b', 'c', 'd', 'o', 'x', 'X', 'n']);
const FLOAT_TYPES = new Set(['e', 'E', 'f', 'F', 'g', 'G', '%']);

export function isTemplateValue(value: unknown): value is TemplateValue {
  return typeof value === 'string'
    || typeof value === 'number'
    || typeof value === 'bigint'
    || value instanceof FilePath;
}

function charLength(text: string): number {
  return Array.from(text).length;
}

/**
 * 在整數部分插入千分位（或每 4 位）分隔符號
 * minWidth > 0 時以 `0` 補足寬度，補上的零同樣分組（`0,001,234`）
 */
function group(digits: string, separator: string, size: number, minWidth = 0): string {
  const chunks: string[] = [];
  let remaining = digits.length;
  let width = minWidth;
  for (;;) {
    const length = Math.min(size, Math.max(remaining, width, 1));
    const take = Math.min(remaining, length);
    chunks.unshift('0'.repeat(length - take) + digits.slice(remaining - take, remaining));
    remaining -= take;
    width -= length;
    if (remaining <= 0 && width <= 0) break;
    width -= separator.length;
  }
  return chunks.join(separator);
}

/** JS 的指數至少兩位數，與 `1.5e+07` 的慣例一致 */
function fixExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, 'e$10$2');
}

/** 未指定格式時的浮點表示：最短位數，指數 < -4 或 >= 16 時用科學記號 */
function repr(magnitude: number): string {
  const shortest = magnitude.toExponential();
  const exponent = parseInt(shortest.split('e')[1], 10);
  return exponent < -4 || exponent >= 16 ? fixExponent(shortest) : String(magnitude);
}

function stripTrailingZeros(text: string): string {
  const [mantissa, exponent] = text.split('e');
  const trimmed = mantissa.includes('.') ? mantissa.replace(/\.?0+$/, '') : mantissa;
  return exponent === undefined ? trimmed : `${trimmed}e${exponent}`;
}

export class FormatSpec {
  private constructor(
    readonly fill: string | undefined,
    readonly align: Align | undefined,
    readonly sign: Sign | undefined,
    readonly coerceNegativeZero: boolean,
    readonly alternate: boolean,
    readonly zeroPad: boolean,
    readonly width: number,
    readonly grouping: ',' | '_' | undefined,
    readonly precision: number | undefined,
    readonly type: string | undefined,
  ) {}

  static parse(spec: string): FormatSpec {
    const match = SPEC_PATTERN.exec(spec);
    if (!match) {
      throw new Error(`Invalid format specifier "${spec}"`);
    }
    const [, fill, align, sign, z, alt, zero, width, grouping, precision, type] = match;
    return new FormatSpec(
      fill,
      align === '<' || align === '>' || align === '^' || align === '=' ? align : undefined,
      sign === '+' || sign === '-' || sign === ' ' ? sign : undefined,
      z !== undefined,
      alt !== undefined,
      zero !== undefined,
      width === undefined ? 0 : parseInt(width, 10),
      grouping === ',' || grouping === '_' ? grouping : undefined,
      precision === undefined ? undefined : parseInt(precision, 10),
      type,
    );
  }

  /** 空 spec：等同直接轉字串 */
  static readonly EMPTY = FormatSpec.parse('');

  apply(value: TemplateValue): string {
    if (typeof value === 'string') return this.formatString(value);
    if (value instanceof FilePath) return this.formatString(value.toString());
    if (typeof value === 'bigint') return this.formatInteger(value);

    const floatType = this.type !== undefined && FLOAT_TYPES.has(this.type);
    if (Number.isInteger(value) && !floatType) {
      return this.formatInteger(BigInt(value));
    }
    return this.formatFloat(value);
  }

  private formatString(text: string): string {
    if (this.type !== undefined && this.type !== 's') {
      throw new Error(`Unknown format code '${this.type}' for object of type 'str'`);
    }
    if (this.sign !== undefined) {
      throw new Error('Sign not allowed in string format specifier');
    }
    if (this.alternate) {
      throw new Error('Alternate form (#) not allowed in string format specifier');
    }
    if (this.grouping !== undefined) {
      throw new Error(`Cannot specify '${this.grouping}' with 's'.`);
    }
    if (this.align === '=') {
      throw new Error("'=' alignment not allowed in string format specifier");
    }

    const body = this.precision === undefined
      ? text
      : Array.from(text).slice(0, this.precision).join('');
    return this.pad('', body, this.fill ?? (this.zeroPad ? '0' : ' '), this.align ?? '<');
  }

  private formatInteger(n: bigint): string {
    const type = this.type ?? 'd';
    if (!INTEGER_TYPES.has(type)) {
      throw new Error(`Unknown format code '${type}' for object of type 'int'`);
    }
    if (this.precision !== undefined) {
      throw new Error('Precision not allowed in integer format specifier');
    }

    const negative = n < 0n;
    const magnitude = negative ? -n : n;
    let prefix = '';
    let digits: string;

    switch (type) {
      case 'c': {
        if (this.sign !== undefined) {
          throw new Error("Sign not allowed with integer format specifier 'c'");
        }
        if (this.alternate) {
          throw new Error("Alternate form (#) not allowed with integer format specifier 'c'");
        }
        if (this.grouping !== undefined) {
          throw new Error(`Cannot specify '${this.grouping}' with 'c'.`);
        }
        if (negative || magnitude > 0x10ffffn) {
          throw new Error('%c arg not in range(0x110000)');
        }
        return this.padNumber('', String.fromCodePoint(Number(magnitude)));
      }
      case 'b':
        digits = magnitude.toString(2);
        prefix = this.alternate ? '0b' : '';
        break;
      case 'o':
        digits = magnitude.toString(8);
        prefix = this.alternate ? '0o' : '';
        break;
      case 'x':
        digits = magnitude.toString(16);
        prefix = this.alternate ? '0x' : '';
        break;
      case 'X':
        digits = magnitude.toString(16).toUpperCase();
        prefix = this.alternate ? '0X' : '';
        break;
      default:
        digits = magnitude.toString(10);
    }

    const head = this.signFor(negative) + prefix;
    if (this.grouping !== undefined) {
      if (type === 'n') {
        throw new Error(`Cannot specify '${this.grouping}' with 'n'.`);
      }
      if (this.grouping === ',' && type !== 'd') {
        throw new Error(`Cannot specify ',' with '${type}'.`);
      }
      digits = group(digits, this.grouping, type === 'd' ? 3 : 4, this.zeroGroupWidth(head));
    }

    return this.padNumber(head, digits);
  }

  private formatFloat(x: number): string {
    const type = this.type;
    if (type !== undefined && type !== 'n' && !FLOAT_TYPES.has(type)) {
      throw new Error(`Unknown format code '${type}' for object of type 'float'`);
    }
    if (this.grouping !== undefined && type === 'n') {
      throw new Error(`Cannot specify '${this.grouping}' with 'n'.`);
    }

    let negative = x < 0 || Object.is(x, -0);
    const magnitude = Math.abs(x);
    let body: string;

    if (Number.isNaN(x)) {
      negative = false;
      body = type === 'E' || type === 'F' || type === 'G' ? 'NAN' : 'nan';
    } else if (!Number.isFinite(x)) {
      body = type === 'E' || type === 'F' || type === 'G' ? 'INF' : 'inf';
    } else {
      body = this.floatDigits(magnitude, type);
    }

    if (this.coerceNegativeZero && negative && Number.isFinite(x) && !/[1-9]/.test(body)) {
      negative = false;
    }

    const sign = this.signFor(negative);
    if (this.grouping !== undefined && Number.isFinite(x)) {
      body = this.groupFloat(sign, body, this.grouping);
    }
    return this.padNumber(sign, body);
  }

  private floatDigits(magnitude: number, type: string | undefined): string {
    const precision = this.precision;
    let text: string;

    try {
      switch (type) {
        case 'e':
        case 'E':
          text = fixExponent(magnitude.toExponential(precision ?? 6));
          if (this.alternate && !text.includes('.')) text = text.replace('e', '.e');
          if (type === 'E') text = text.toUpperCase();
          break;
        case 'f':
        case 'F':
          text = magnitude.toFixed(precision ?? 6);
          if (this.alternate && !text.includes('.')) text += '.';
          break;
        case '%':
          text = (magnitude * 100).toFixed(precision ?? 6);
          if (this.alternate && !text.includes('.')) text += '.';
          text += '%';
          break;
        case 'g':
        case 'G':
        case 'n':
          text = this.general(magnitude, precision ?? 6);
          if (type === 'G') text = text.toUpperCase();
          break;
        default:
          text = precision === undefined ? repr(magnitude) : this.general(magnitude, precision);
      }
    } catch (err) {
      if (err instanceof RangeError) {
        throw new Error(`Precision ${precision} is too large`, { cause: err });
      }
      throw err;
    }

    return text;
  }

  /** `g` 格式：依指數大小選擇定點或科學記號，預設移除尾端零 */
  private general(magnitude: number, precision: number): string {
    const p = precision === 0 ? 1 : precision;
    const exponent = magnitude === 0
      ? 0
      : parseInt(magnitude.toExponential(p - 1).split('e')[1], 10);

    const text = exponent >= -4 && exponent < p
      ? magnitude.toFixed(p - 1 - exponent)
      : fixExponent(magnitude.toExponential(p - 1));

    return this.alternate ? text : stripTrailingZeros(text);
  }

  /** 只分組開頭的整數位數，小數、指數與 `%` 原樣接在後面 */
  private groupFloat(sign: string, text: string, separator: ',' | '_'): string {
    const end = text.search(/\D|$/);
    const rest = text.slice(end);
    return group(text.slice(0, end), separator, 3, this.zeroGroupWidth(sign + rest)) + rest;
  }

  private signFor(negative: boolean): string {
    if (negative) return '-';
    if (this.sign === '+') return '+';
    if (this.sign === ' ') return ' ';
    return '';
  }

  /** `0` 旗標只在未指定 fill 時補 `0`，未指定 align 時改用 `=` */
  private numberLayout(): { fill: string; align: Align } {
    return {
      fill: this.fill ?? (this.zeroPad ? '0' : ' '),
      align: this.align ?? (this.zeroPad ? '=' : '>'),
    };
  }

  /** 以 `0` 做 `=` 填充時，分組數字須自行補足的寬度；其餘情況為 0 */
  private zeroGroupWidth(around: string): number {
    const { fill, align } = this.numberLayout();
    return fill === '0' && align === '=' ? this.width - charLength(around) : 0;
  }

  private padNumber(prefix: string, digits: string): string {
    const { fill, align } = this.numberLayout();
    return this.pad(prefix, digits, fill, align);
  }

  private pad(prefix: string, body: string, fill: string, align: Align): string {
    const missing = this.width - charLength(prefix) - charLength(body);
    if (missing <= 0) return prefix + body;

    switch (align) {
      case '<':
        return prefix + body + fill.repeat(missing);
      case '>':
        return fill.repeat(missing) + prefix + body;
      case '^': {
        const left = Math.floor(missing / 2);
        return fill.repeat(left) + prefix + body + fill.repeat(missing - left);
      }
      case '=':
        return prefix + fill.repeat(missing) + body;
    }
  }
}
