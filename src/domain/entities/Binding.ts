import type { FilePath } from '../value-objects/FilePath.js';

export type PathValue = string | FilePath;

/** 呼叫時的具名參數 */
export type ResolveArgs = Readonly<Record<string, unknown>>;

export type BindingKind = 'literal' | 'template' | 'callable';

/**
 * Alias 綁定
 *
 * - literal：不含大括號的固定路徑
 * - template：含 `{placeholder}` 的樣板，每次解析時才 parse
 * - callable：使用者函式，`invoke` 已包好參數驗證與 registry 注入
 */
export type Binding<P extends PathValue> =
  | { kind: 'literal'; name: string; path: string }
  | { kind: 'template'; name: string; template: string }
  | {
    kind: 'callable';
    name: string;
    invoke: (args: ResolveArgs, positional: readonly unknown[]) => P;
  };
