/**
 * vidIQ キーワードクライアント - 構造化ログ
 */

/**
 * ログレベル
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * ログエントリの構造
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  severity: string;
  message: string;
  service: string;
  version: string;
  environment: string;
  [key: string]: unknown;
}

/**
 * ログコンテキスト（呼び出しごとの情報）
 */
export interface LogContext {
  batchId?: string;
  exportId?: string;
  keyword?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  service?: string;
  minLevel?: LogLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * 文字列からログレベルを解決（不正値は info にフォールバック）
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

/**
 * 構造化ロガークラス
 */
export class StructuredLogger {
  private service: string;
  private version: string;
  private environment: string;
  private minLevel: LogLevel;
  private context: LogContext;

  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(options: LoggerOptions = {}) {
    this.service = options.service ?? "vidiq-keyword-client";
    this.version = process.env.npm_package_version || "1.0.0";
    this.environment = process.env.NODE_ENV || "development";
    this.minLevel = options.minLevel ?? parseLogLevel(process.env.LOG_LEVEL);
    this.context = {};
  }

  /**
   * ログコンテキストを設定
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * ログコンテキストをクリア
   */
  clearContext(): void {
    this.context = {};
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  private buildLogEntry(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      // Cloud Logging 互換の重大度
      severity: level.toUpperCase(),
      message,
      service: this.service,
      version: this.version,
      environment: this.environment,
      ...this.context,
      ...data,
    };
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (this.levelPriority[level] < this.levelPriority[this.minLevel]) {
      return;
    }

    const output = JSON.stringify(this.buildLogEntry(level, message, data));

    switch (level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "debug":
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  /**
   * エラーログ（Error オブジェクトは name/message/stack に展開）
   */
  error(message: string, data?: Record<string, unknown>): void {
    if (data?.error instanceof Error) {
      data = {
        ...data,
        error: {
          name: data.error.name,
          message: data.error.message,
          stack: data.error.stack,
        },
      };
    }
    this.log("error", message, data);
  }

  /**
   * 子ロガーを作成（追加のコンテキストを持つ）
   */
  child(additionalContext: LogContext): StructuredLogger {
    const childLogger = new StructuredLogger({
      service: this.service,
      minLevel: this.minLevel,
    });
    childLogger.context = { ...this.context, ...additionalContext };
    return childLogger;
  }
}

// シングルトンインスタンス
export const logger = new StructuredLogger();

export function createChildLogger(context: LogContext): StructuredLogger {
  return logger.child(context);
}
