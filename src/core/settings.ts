import { LogLevel, parseLogLevel } from './logger';

/** contributes.configuration のセクション名 */
export const CONFIG_SECTION = 'uppercase';

/**
 * 設定の読み取り元。`vscode.WorkspaceConfiguration` はこの形を満たす。
 */
export interface ConfigurationReader {
  get<T>(section: string): T | undefined;
}

export interface ExtensionSettings {
  logLevel: LogLevel;
}

/**
 * 拡張機能の設定を読み取り、正規化して返す。
 */
export function readSettings(config: ConfigurationReader): ExtensionSettings {
  return {
    logLevel: parseLogLevel(config.get<unknown>('logLevel')),
  };
}
