/**
 * vidIQ キーワードクライアント - 定数定義
 */

// =============================================================================
// vidIQ API
// =============================================================================
export const VIDIQ_API = {
  DEFAULT_BASE_URL: "https://api.vidiq.com",
  /** キーワード分析（検索ボリューム・競合度） */
  ANALYSIS_PATH: "/v0/hottersearch",
  /** マッチングキーワード・質問キーワード（part で切り替え） */
  KEYWORD_SEARCH_PATH: "/xwords/keyword_search/",
  /** 関連キーワード */
  RELATED_PATH: "/xwords/hottersearch",
  /** 1リクエストあたりのタイムアウト */
  DEFAULT_TIMEOUT_MS: 30000,
  /** リクエスト前の固定待機時間 */
  DEFAULT_DELAY_MS: 1000,
  DEFAULT_USER_AGENT: "vidiq-keyword-client/1.0.0",
} as const;

/**
 * キーワード分析リクエストの固定パラメータ
 */
export const ANALYSIS_PARAMS = {
  IM: "4.5",
  GROUP: "V5",
  SRC: "",
} as const;

// =============================================================================
// 補助クエリのデフォルト
// =============================================================================
export const QUERY_DEFAULTS = {
  /** マッチング・質問キーワードの最大件数 */
  LIMIT: 300,
  /** 関連キーワードの最小スコア */
  MIN_RELATED_SCORE: 0,
  /** 関連キーワードのAPIグループ */
  RELATED_GROUP: "v5",
  /** CSVエクスポート時の最大件数 */
  EXPORT_LIMIT: 100,
} as const;

// =============================================================================
// レベル判定しきい値（上限を含む）
// =============================================================================
export const LEVEL_THRESHOLDS = [20, 40, 60, 80] as const;

// =============================================================================
// 欠損値
// =============================================================================
export const NOT_AVAILABLE = "N/A" as const;
