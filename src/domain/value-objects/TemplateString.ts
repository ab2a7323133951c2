import { TemplateFormatError } from '../errors/DomainErrors.js';
import { FormatSpec, isTemplateValue } from './FormatSpec.js';

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type TemplateSegment =
  | { kind: 'text'; text: string }
  | { kind: 'field'; name: string; spec: FormatSpec };

/**
 * 已解析的路徑樣板
 *
 * 格式：
 *   `{{` / `}}`        字面上的大括號
 *   `{name}`           placeholder
 *   `{name:spec}`      套用 FormatSpec 的 placeholder
 *
 * 不支援位置參數（`{}`、`{0}`）、屬性/索引存取（`{a.b}`、`{a[0]}`）、
 * conversion（`{a!r}`）以及 spec 中的巢狀 placeholder。
 */
export class TemplateString {
  private constructor(
    readonly source: string,
    readonly segments: readonly TemplateSegment[],
  ) {}

  /** 字串是否可能含有 placeholder（決定 binding 是 literal 還是 template） */
  static looksLikeTemplate(text: string): boolean {
    return text.includes('{') || text.includes('}');
  }

  static parse(source: string): TemplateString {
    const segments: TemplateSegment[] = [];
    let text = '';
    let i = 0;

    function fail(message: string, cause?: unknown): never {
      throw new TemplateFormatError(message, source, cause === undefined ? undefined : { cause });
    }

    while (i < source.length) {
      const ch = source[i];

      if (ch === '}') {
        if (source[i + 1] !== '}') fail("Single '}' encountered in format string");
        text += '}';
        i += 2;
        continue;
      }

      if (ch !== '{') {
        text += ch;
        i += 1;
        continue;
      }

      if (source[i + 1] === '{') {
        text += '{';
        i += 2;
        continue;
      }

      const close = source.indexOf('}', i + 1);
      if (close === -1) fail("Single '{' encountered in format string");

      const body = source.slice(i + 1, close);
      if (body.includes('{')) fail('Nested placeholders in format specs are not supported');

      const colon = body.indexOf(':');
      const head = colon === -1 ? body : body.slice(0, colon);
      const rawSpec = colon === -1 ? '' : body.slice(colon + 1);

      if (head.includes('!')) fail(`Conversion flags are not supported in placeholder "{${body}}"`);
      if (head === '' || /^\d+$/.test(head)) {
        fail('Positional placeholders are not supported; use named placeholders such as {subject}');
      }
      if (!FIELD_NAME.test(head)) fail(`Invalid placeholder name "${head}"`);

      let spec = FormatSpec.EMPTY;
      if (rawSpec !== '') {
        try {
          spec = FormatSpec.parse(rawSpec);
        } catch (err) {
          fail(err instanceof Error ? err.message : String(err), err);
        }
      }

      if (text !== '') {
        segments.push({ kind: 'text', text });
        text = '';
      }
      segments.push({ kind: 'field', name: head, spec });
      i = close + 1;
    }

    if (text !== '') segments.push({ kind: 'text', text });
    return new TemplateString(source, segments);
  }

  /** 不重複的 placeholder 名稱，依首次出現順序 */
  get fieldNames(): string[] {
    const names = new Set<string>();
    for (const segment of this.segments) {
      if (segment.kind === 'field') names.add(segment.name);
    }
    return [...names];
  }

  /**
   * 代入所有 placeholder
   * @param values - 每個 fieldName 對應的值；缺值由呼叫端先行檢查
   */
  render(values: ReadonlyMap<string, unknown>): string {
    let out = '';
    for (const segment of this.segments) {
      if (segment.kind === 'text') {
        out += segment.text;
        continue;
      }

      const value = values.get(segment.name);
      if (!isTemplateValue(value)) {
        const type = value === null ? 'null' : typeof value;
        throw new TemplateFormatError(
          `Placeholder "${segment.name}" received a value of unsupported type ${type}`,
          this.source,
        );
      }

      try {
        out += segment.spec.apply(value);
      } catch (err) {
        throw new TemplateFormatError(
          `Cannot format placeholder "${segment.name}": ${err instanceof Error ? err.message : String(err)}`,
          this.source,
          { cause: err },
        );
      }
    }
    return out;
  }
}
