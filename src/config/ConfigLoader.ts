import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../shared/Logger.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type { PathbookConfig, PartialConfig } from './types.js';

export type { PathbookConfig, PartialConfig } from './types.js';

export type Env = Readonly<Record<string, string | undefined>>;

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && LOG_LEVELS.some((level) => level === value),
  { message: `logLevel must be one of ${LOG_LEVELS.join(', ')}` },
);

const ConfigSchema = z.object({
  asStr: z.boolean({ invalid_type_error: 'asStr must be a boolean' }),
  logLevel: LogLevelSchema,
}).strict();

const BOOLEAN_ENV = new Map<string, boolean>([
  ['true', true], ['1', true], ['false', false], ['0', false],
]);

/** 環境變數覆蓋：PATHBOOK_AS_STR、PATHBOOK_LOG_LEVEL */
function readEnv(env: Env): Record<string, unknown> {
  const fromEnv: Record<string, unknown> = {};

  const asStr = env.PATHBOOK_AS_STR;
  if (asStr !== undefined && asStr !== '') {
    // 無法辨識的值原樣保留，交給 schema 回報
    fromEnv.asStr = BOOLEAN_ENV.get(asStr.toLowerCase()) ?? asStr;
  }

  const logLevel = env.PATHBOOK_LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== '') {
    fromEnv.logLevel = logLevel.toLowerCase();
  }

  return fromEnv;
}

/**
 * 載入設定
 * 合併順序：defaults < 環境變數 < overrides
 * @param overrides - 程式碼層級的覆蓋值（優先於環境變數）
 * @param env - 預設為 process.env
 */
export function loadConfig(overrides?: PartialConfig, env: Env = process.env): PathbookConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG, ...readEnv(env) };
  for (const [key, value] of Object.entries(overrides ?? {})) {
    if (value !== undefined) merged[key] = value;
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid pathbook config: ${issues}`, { cause: result.error });
  }
  return result.data;
}
