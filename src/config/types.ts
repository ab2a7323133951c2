import type { LogLevel } from '../shared/Logger.js';

/** 完整設定 */
export interface PathbookConfig {
  /** true 時解析結果為字串，false 時為 FilePath */
  asStr: boolean;
  /** Logger 最低輸出等級 */
  logLevel: LogLevel;
}

/** 部分設定（用於 merge） */
export type PartialConfig = Partial<PathbookConfig>;
