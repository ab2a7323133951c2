import { loadConfig, type Env, type PartialConfig } from '../config/ConfigLoader.js';
import type { FilePath } from '../domain/value-objects/FilePath.js';
import { Logger, type LogWriter } from '../shared/Logger.js';
import { PathRegistry } from './PathRegistry.js';

export interface CreateRegistryOptions {
  /** 程式碼層級的設定覆蓋 */
  config?: PartialConfig;
  env?: Env;
  /** 建立後立即 addFromDict 的 alias 表 */
  entries?: Readonly<Record<string, string>>;
  logWriter?: LogWriter;
}

/**
 * 依設定建立 PathRegistry
 * asStr 在執行期才決定，因此回傳兩種 registry 的 union。
 */
export function createPathRegistry(
  options: CreateRegistryOptions = {},
): PathRegistry<FilePath> | PathRegistry<string> {
  const config = loadConfig(options.config, options.env);
  const logger = new Logger('pathbook', config.logLevel, options.logWriter).child('PathRegistry');
  const registry = PathRegistry.create({ asStr: config.asStr, logger });

  if (options.entries) {
    registry.addFromDict(options.entries);
  }
  return registry;
}
