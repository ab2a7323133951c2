import { z, type ZodType, type ZodTypeDef } from 'zod';
import type { Binding, BindingKind, PathValue, ResolveArgs } from '../domain/entities/Binding.js';
import {
  CallableInvocationError,
  CyclicReferenceError,
  InvalidAliasError,
  MissingArgumentsError,
  TemplateFormatError,
  UndefinedPlaceholderError,
  UnknownAliasError,
} from '../domain/errors/DomainErrors.js';
import { FilePath } from '../domain/value-objects/FilePath.js';
import { TemplateString } from '../domain/value-objects/TemplateString.js';
import { Logger } from '../shared/Logger.js';

export type { PathValue, ResolveArgs } from '../domain/entities/Binding.js';

/** 計算路徑的使用者函式：registry 為第一個參數，其後是具名參數與位置參數 */
export type PathFunction<P extends PathValue, A = ResolveArgs> = (
  registry: PathRegistry<P>,
  args: A,
  ...positional: unknown[]
) => P;

export type PathSource<P extends PathValue> = string | PathFunction<P>;

export interface RegistryOptions {
  asStr?: boolean;
  logger?: Logger;
}

/** alias 不可以底線或數字開頭 */
export const AliasNameSchema = z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/);

/**
 * Path Registry
 *
 * 管理 alias → 路徑（literal / template / callable）的對應，並將 alias 解析成路徑。
 *
 * 解析規則：
 * - template 的每個 placeholder 先取呼叫時的具名參數，再取同名 alias（不帶參數遞迴解析）
 * - 遞迴過程傳遞「進行中的 alias 鏈」，重複出現即為循環參照
 * - 結果不快取，每次呼叫重新計算
 *
 * @example
 * const files = PathRegistry.create();
 * files.add('subjects', '/data/subjects_dir');
 * files.add('epochs', '{subjects}/sub{subject:03d}-epo.fif');
 * files.resolve('epochs', { subject: 1 }); // FilePath('/data/subjects_dir/sub001-epo.fif')
 */
export class PathRegistry<P extends PathValue> {
  private readonly bindings = new Map<string, Binding<P>>();

  private constructor(
    readonly asStr: boolean,
    private readonly toPathValue: (raw: string) => P,
    private readonly logger: Logger,
  ) {}

  static create(options?: RegistryOptions & { asStr?: false }): PathRegistry<FilePath>;
  static create(options: RegistryOptions & { asStr: true }): PathRegistry<string>;
  static create(options: RegistryOptions): PathRegistry<FilePath> | PathRegistry<string>;
  static create(options: RegistryOptions = {}): PathRegistry<FilePath> | PathRegistry<string> {
    const logger = options.logger ?? new Logger('PathRegistry');
    if (options.asStr === true) {
      return new PathRegistry<string>(true, (raw) => raw, logger);
    }
    return new PathRegistry<FilePath>(false, (raw) => FilePath.of(raw), logger);
  }

  /**
   * 新增或覆寫一個 alias
   * 樣板內容不在此時檢查，錯誤留到解析時才丟出。
   */
  add(name: string, source: PathSource<P>): void {
    if (typeof source === 'string') {
      this.register(
        TemplateString.looksLikeTemplate(source)
          ? { kind: 'template', name, template: source }
          : { kind: 'literal', name, path: source },
      );
      return;
    }
    this.register({
      kind: 'callable',
      name,
      invoke: (args, positional) => source(this, args, ...positional),
    });
  }

  /**
   * 新增 callable，具名參數先經過 zod schema 驗證與轉換
   * 驗證失敗與函式本身的錯誤一樣包成 CallableInvocationError。
   */
  addFunction<A>(name: string, schema: ZodType<A, ZodTypeDef, unknown>, fn: PathFunction<P, A>): void {
    this.register({
      kind: 'callable',
      name,
      invoke: (args, positional) => fn(this, schema.parse(args), ...positional),
    });
  }

  /** 依序逐一 add；中途失敗時先前的項目保留 */
  addFromDict(mapping: Readonly<Record<string, PathSource<P>>> | ReadonlyMap<string, PathSource<P>>): void {
    const entries = mapping instanceof Map ? [...mapping.entries()] : Object.entries(mapping);
    for (const [name, source] of entries) {
      this.add(name, source);
    }
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /** 已註冊的 alias，依註冊順序 */
  aliases(): string[] {
    return [...this.bindings.keys()];
  }

  binding(name: string): Readonly<Binding<P>> {
    return this.lookup(name);
  }

  kind(name: string): BindingKind {
    return this.lookup(name).kind;
  }

  /** template 的 placeholder 名稱；literal 與 callable 回傳空陣列 */
  placeholders(name: string): string[] {
    const binding = this.lookup(name);
    return binding.kind === 'template' ? TemplateString.parse(binding.template).fieldNames : [];
  }

  /**
   * 必須由呼叫端提供的 placeholder
   * 沒有同名 alias，或同名 alias 是本身仍需參數的 template（逐層往下檢查）。
   */
  requiredArgs(name: string): string[] {
    const binding = this.lookup(name);
    return binding.kind === 'template' ? this.unfillable(binding.template, [binding.name]) : [];
  }

  /**
   * 不帶參數取得路徑
   * template 的 placeholder 必須全部能由其他 alias 自動填入，否則丟出 MissingArgumentsError。
   */
  get(name: string): P {
    const binding = this.lookup(name);
    if (binding.kind === 'template') {
      const missing = this.requiredArgs(name);
      if (missing.length > 0) {
        throw new MissingArgumentsError(name, missing);
      }
    }
    return this.resolveBinding(binding, {}, [], []);
  }

  /**
   * 帶參數取得路徑
   * @param args - placeholder 的值；同名 alias 存在時以參數為準
   * @param positional - 只傳給 callable binding
   */
  resolve(name: string, args: ResolveArgs = {}, ...positional: unknown[]): P {
    return this.resolveBinding(this.lookup(name), args, positional, []);
  }

  // ── 私有方法 ──

  private lookup(name: string): Binding<P> {
    const binding = this.bindings.get(name);
    if (!binding) {
      throw new UnknownAliasError(name, this.aliases());
    }
    return binding;
  }

  private register(binding: Binding<P>): void {
    if (!AliasNameSchema.safeParse(binding.name).success) {
      throw new InvalidAliasError(binding.name);
    }

    const overwritten = this.bindings.has(binding.name);
    this.bindings.set(binding.name, binding);

    this.logger.debug(overwritten ? 'Alias overwritten' : 'Alias registered', {
      alias: binding.name,
      kind: binding.kind,
    });
  }

  /** 循環參照不在此回報，留給解析時丟出 CyclicReferenceError */
  private unfillable(template: string, chain: readonly string[]): string[] {
    return TemplateString.parse(template).fieldNames.filter((placeholder) => {
      const sibling = this.bindings.get(placeholder);
      if (!sibling) return true;
      if (sibling.kind !== 'template' || chain.includes(placeholder)) return false;
      return this.unfillable(sibling.template, [...chain, placeholder]).length > 0;
    });
  }

  private resolveBinding(
    binding: Binding<P>,
    args: ResolveArgs,
    positional: readonly unknown[],
    chain: readonly string[],
  ): P {
    if (chain.includes(binding.name)) {
      throw new CyclicReferenceError([...chain, binding.name]);
    }
    const path = [...chain, binding.name];

    switch (binding.kind) {
      case 'literal':
        return this.toPathValue(binding.path);
      case 'template':
        if (positional.length > 0) {
          throw new TemplateFormatError(
            `Alias "${binding.name}" is a template and only accepts named arguments`,
            binding.template,
          );
        }
        return this.toPathValue(this.substitute(binding.name, binding.template, args, path));
      case 'callable':
        try {
          return binding.invoke(args, positional);
        } catch (err) {
          throw new CallableInvocationError(binding.name, err);
        }
    }
  }

  private substitute(
    alias: string,
    template: string,
    args: ResolveArgs,
    chain: readonly string[],
  ): string {
    const parsed = TemplateString.parse(template);
    const values = new Map<string, unknown>();
    const missing: string[] = [];

    for (const placeholder of parsed.fieldNames) {
      const explicit = Object.hasOwn(args, placeholder) ? args[placeholder] : undefined;
      if (explicit !== undefined) {
        values.set(placeholder, explicit);
        continue;
      }

      const sibling = this.bindings.get(placeholder);
      if (sibling) {
        values.set(placeholder, this.resolveBinding(sibling, {}, [], chain).toString());
        continue;
      }

      missing.push(placeholder);
    }

    if (missing.length > 0) {
      throw new UndefinedPlaceholderError(alias, missing);
    }
    return parsed.render(values);
  }
}
