/**
 * カスタムエラークラス
 *
 * vidIQ API 呼び出し・正規化・エクスポートの失敗を種類ごとに区別する。
 * リトライは行わない。失敗の扱いは呼び出し側に委ねる。
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // 入力エラー
  INVALID_ARGUMENT: "INVALID_ARGUMENT",

  // 上流APIエラー（ネットワーク・非2xx・JSON不正）
  API_ERROR: "API_ERROR",

  // 応答にキーワードが見つからない
  NOT_FOUND: "NOT_FOUND",

  // 応答が空
  NO_DATA: "NO_DATA",

  // CSVエクスポート
  EXPORT_ERROR: "EXPORT_ERROR",

  // 設定
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",

  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.details = options.details;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON形式でエラー情報を取得
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// 入力エラー
// =============================================================================

/**
 * 不正な引数（空キーワード・トークン未設定など）
 */
export class InvalidArgumentError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ErrorCode.INVALID_ARGUMENT,
      message,
      details,
    });
    this.name = "InvalidArgumentError";
  }
}

// =============================================================================
// 上流APIエラー
// =============================================================================

/**
 * vidIQ API エラー
 *
 * 元の原因メッセージを保持したまま再送出する
 */
export class ApiError extends AppError {
  public readonly statusCode?: number;
  public readonly endpoint: string;

  constructor(options: {
    message: string;
    endpoint: string;
    statusCode?: number;
    cause?: Error;
  }) {
    super({
      code: ErrorCode.API_ERROR,
      message: options.message,
      details: {
        endpoint: options.endpoint,
        statusCode: options.statusCode,
      },
      cause: options.cause,
    });
    this.name = "ApiError";
    this.statusCode = options.statusCode;
    this.endpoint = options.endpoint;
  }

  /**
   * HTTPステータスコードからエラーを生成
   */
  static fromHttpStatus(
    status: number,
    responseBody: string,
    endpoint: string
  ): ApiError {
    const excerpt = responseBody.trim().substring(0, 200);
    const suffix = excerpt ? ` - ${excerpt}` : "";

    switch (status) {
      case 401:
        return new ApiError({
          message: `vidIQ API authentication failed [401] at ${endpoint}${suffix}`,
          statusCode: 401,
          endpoint,
        });
      case 403:
        return new ApiError({
          message: `vidIQ API access forbidden [403] at ${endpoint}${suffix}`,
          statusCode: 403,
          endpoint,
        });
      case 429:
        return new ApiError({
          message: `vidIQ API rate limit exceeded [429] at ${endpoint}${suffix}`,
          statusCode: 429,
          endpoint,
        });
      default:
        return new ApiError({
          message: `vidIQ API error [${status}] at ${endpoint}${suffix}`,
          statusCode: status,
          endpoint,
        });
    }
  }

  static network(endpoint: string, cause: Error): ApiError {
    return new ApiError({
      message: `Network error: ${cause.message}`,
      endpoint,
      cause,
    });
  }

  static invalidJson(endpoint: string, cause: Error): ApiError {
    return new ApiError({
      message: `Invalid JSON response: ${cause.message}`,
      endpoint,
      cause,
    });
  }
}

// =============================================================================
// 応答内容エラー
// =============================================================================

/**
 * 分析応答にキーワードが見つからない
 *
 * 診断用に応答に含まれていたキーワード一覧を持つ
 */
export class NotFoundError extends AppError {
  public readonly keyword: string;
  public readonly availableKeys: string[];

  constructor(keyword: string, availableKeys: string[]) {
    super({
      code: ErrorCode.NOT_FOUND,
      message: `No analysis data found for keyword: ${keyword}. Available keywords: [${availableKeys.join(", ")}]`,
      details: { keyword, availableKeys },
    });
    this.name = "NotFoundError";
    this.keyword = keyword;
    this.availableKeys = availableKeys;
  }
}

/**
 * 補助クエリの応答が空（null・空オブジェクトなど）
 *
 * 一覧フィールドが空配列なだけの応答はこのエラーにならない
 */
export class NoDataError extends AppError {
  public readonly keyword: string;

  constructor(keyword: string, queryType: string) {
    super({
      code: ErrorCode.NO_DATA,
      message: `No ${queryType} data returned for: ${keyword}`,
      details: { keyword, queryType },
    });
    this.name = "NoDataError";
    this.keyword = keyword;
  }
}

// =============================================================================
// エクスポートエラー
// =============================================================================

export class ExportError extends AppError {
  constructor(message: string, options?: { path?: string; cause?: Error }) {
    super({
      code: ErrorCode.EXPORT_ERROR,
      message,
      details: options?.path ? { path: options.path } : undefined,
      cause: options?.cause,
    });
    this.name = "ExportError";
  }
}

// =============================================================================
// 設定エラー
// =============================================================================

export class ConfigurationError extends AppError {
  constructor(message: string, invalidConfig?: string[]) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      details: invalidConfig ? { invalidConfig } : undefined,
    });
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// エラーハンドリングユーティリティ
// =============================================================================

/**
 * 不明な値からメッセージを取り出す
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * エラーをAppErrorに変換
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError({
      code: ErrorCode.INTERNAL_ERROR,
      message: error.message,
      cause: error,
    });
  }
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: String(error),
  });
}
