/**
 * vidIQ キーワードクライアント 型定義
 */

import { NOT_AVAILABLE } from "../constants";

// =============================================================================
// 共通型
// =============================================================================

/**
 * 欠損値は "N/A" で表す（KeywordMetrics と CSV 行で共通）
 */
export type NotAvailable = typeof NOT_AVAILABLE;

export type MetricValue = number | NotAvailable;

/**
 * 難易度レベル（スコア 0-100 を5段階に量子化）
 */
export type LevelBand = "Very Low" | "Low" | "Medium" | "High" | "Very High";

/**
 * 指標が "N/A" の場合はレベル判定を行わない
 */
export type LevelValue = LevelBand | NotAvailable;

// =============================================================================
// キーワード分析
// =============================================================================

export interface KeywordMetrics {
  volume: MetricValue;
  competition: MetricValue;
  estimatedMonthlySearch: MetricValue;
  overall: MetricValue;
}

export interface KeywordLevels {
  volume: LevelValue;
  competition: LevelValue;
  overall: LevelValue;
}

export interface AnalysisResult {
  /** 呼び出し側が渡した表記のまま（前後の空白のみ除去） */
  keyword: string;
  timestamp: string;
  metrics: KeywordMetrics;
  levels: KeywordLevels;
}

export interface BatchErrorEntry {
  error: string;
}

/**
 * 入力キーワードごとに1エントリ（重複は後勝ち）
 */
export type BatchResult = Record<string, AnalysisResult | BatchErrorEntry>;

export function isBatchError(
  entry: AnalysisResult | BatchErrorEntry
): entry is BatchErrorEntry {
  return "error" in entry;
}

// =============================================================================
// 補助クエリ（マッチング・関連・質問）
// =============================================================================

export type AuxiliaryQueryType = "matching_keywords" | "related_keywords" | "questions";

/**
 * 補助クエリ共通のエンベロープ
 */
export interface AuxiliaryResult<TData> {
  keyword: string;
  timestamp: string;
  type: AuxiliaryQueryType;
  data: TData;
  /** data 内の一覧の件数（一覧がなければ 0） */
  count: number;
}

/**
 * 上流応答はゆるい型なので unknown のまま保持する
 */
export type RawPayload = unknown;

export type MatchingKeywordsResult = AuxiliaryResult<RawPayload>;

export type QuestionsResult = AuxiliaryResult<RawPayload>;

export interface RelatedKeywordsResult extends AuxiliaryResult<unknown[]> {
  /** デバッグ用の応答全体 */
  rawResponse: RawPayload;
}

export interface MatchingKeywordsOptions {
  limit?: number;
  delayMs?: number;
}

export type QuestionsOptions = MatchingKeywordsOptions;

export interface RelatedKeywordsOptions {
  minRelatedScore?: number;
  group?: string;
  delayMs?: number;
}

// =============================================================================
// CSV
// =============================================================================

export type CsvRowType = "related" | "matching" | "question";

export interface CsvRow {
  keyword: string;
  type: CsvRowType;
  score: MetricValue;
  volume: MetricValue;
  competition: MetricValue;
  source_keyword: string;
  timestamp: string;
}
