import path from 'node:path';

const posix = path.posix;

/** 收斂重複的 `/`、移除 `.` 片段與尾端斜線；`..` 保留不解析 */
function normalize(raw: string): string {
  const absolute = raw.startsWith('/');
  const body = raw
    .split('/')
    .filter((part) => part !== '' && part !== '.')
    .join('/');
  if (absolute) return '/' + body;
  return body === '' ? '.' : body;
}

/**
 * 不可變的 POSIX 路徑值物件
 *
 * 對應 registry 在 asStr = false 時回傳的結構化路徑。
 * 只做字串層級的運算，不觸碰檔案系統。
 */
export class FilePath {
  private constructor(private readonly value: string) {}

  /** 由一或多個片段組成路徑；絕對路徑片段會重新起算 */
  static of(...segments: Array<string | FilePath>): FilePath {
    return new FilePath('.').join(...segments);
  }

  join(...segments: Array<string | FilePath>): FilePath {
    let current = this.value;
    for (const segment of segments) {
      const text = segment.toString();
      if (posix.isAbsolute(text)) {
        current = text;
      } else if (text !== '') {
        current = `${current}/${text}`;
      }
    }
    return new FilePath(normalize(current));
  }

  get isAbsolute(): boolean {
    return posix.isAbsolute(this.value);
  }

  /** 最後一個片段；根目錄與 `.` 為空字串 */
  get name(): string {
    return this.value === '.' ? '' : posix.basename(this.value);
  }

  get suffix(): string {
    const name = this.name;
    const dot = name.lastIndexOf('.');
    return dot > 0 && dot < name.length - 1 ? name.slice(dot) : '';
  }

  get stem(): string {
    const suffix = this.suffix;
    return suffix === '' ? this.name : this.name.slice(0, -suffix.length);
  }

  get parent(): FilePath {
    return new FilePath(posix.dirname(this.value));
  }

  get parts(): string[] {
    const parts = this.value.split('/').filter((part) => part !== '' && part !== '.');
    return this.isAbsolute ? ['/', ...parts] : parts;
  }

  withName(name: string): FilePath {
    if (this.name === '') {
      throw new Error(`Path "${this.value}" has an empty name`);
    }
    if (name === '' || name.includes('/') || name === '.') {
      throw new Error(`Invalid name "${name}"`);
    }
    return this.parent.join(name);
  }

  withSuffix(suffix: string): FilePath {
    if (suffix !== '' && (!suffix.startsWith('.') || suffix === '.' || suffix.includes('/'))) {
      throw new Error(`Invalid suffix "${suffix}"`);
    }
    return this.withName(this.stem + suffix);
  }

  equals(other: FilePath | string): boolean {
    return this.value === other.toString();
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
