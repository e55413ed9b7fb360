/**
 * ログレベル
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

/**
 * ログレベルの文字列表現
 */
const LogLevelNames: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.NONE]: 'NONE',
};

/**
 * ログエントリ
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  error?: Error;
}

/**
 * ロガーインターフェース
 */
export interface ILogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
  /** 出力先を利用者へ表示する */
  show(): void;
}

/**
 * ログの出力先。VS Code の OutputChannel はこの形を満たす。
 */
export interface LogSink {
  appendLine(value: string): void;
  show(preserveFocus?: boolean): void;
  dispose(): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  maxEntries?: number;
  /** テスト用。既定は現在時刻 */
  now?: () => Date;
}

/**
 * 設定値（unknown）をログレベルへ変換する。
 * 未知の値・文字列以外は INFO 扱い。
 */
export function parseLogLevel(value: unknown): LogLevel {
  if (typeof value !== 'string') {
    return LogLevel.INFO;
  }
  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'none':
      return LogLevel.NONE;
    default:
      return LogLevel.INFO;
  }
}

/**
 * LogSink へ書き出すロガー実装
 */
export class Logger implements ILogger {
  private currentLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly now: () => Date;

  constructor(private readonly sink: LogSink, options: LoggerOptions = {}) {
    this.currentLevel = options.level ?? LogLevel.INFO;
    this.maxEntries = options.maxEntries ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * ログレベルを設定
   */
  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  /**
   * 現在のログレベルを取得
   */
  getLevel(): LogLevel {
    return this.currentLevel;
  }

  /**
   * ログエントリを保存
   */
  private saveEntry(entry: LogEntry): void {
    this.logEntries.push(entry);

    // 最大エントリ数を超えた場合は古いものを削除
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries = this.logEntries.slice(-this.maxEntries);
    }
  }

  /**
   * ログを出力
   */
  private log(level: LogLevel, message: string, error?: Error): void {
    if (level < this.currentLevel) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: this.now(),
      error,
    };

    this.saveEntry(entry);

    const timestamp = entry.timestamp.toISOString();
    const levelName = LogLevelNames[level];
    this.sink.appendLine(`${timestamp} ${levelName} ${message}`);

    // エラーの場合はスタックトレースも出力
    if (error && error.stack) {
      this.sink.appendLine(error.stack);
    }
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.log(LogLevel.WARN, message);
  }

  error(message: string, error?: Error): void {
    this.log(LogLevel.ERROR, message, error);
  }

  /**
   * 保存されているログエントリを取得
   */
  getLogEntries(): LogEntry[] {
    return [...this.logEntries];
  }

  /**
   * 出力先を表示（フォーカスは移さない）
   */
  show(): void {
    this.sink.show(true);
  }

  dispose(): void {
    this.sink.dispose();
  }
}
