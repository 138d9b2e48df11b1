/**
 * vidIQ API 応答の正規化
 *
 * クエリ種別ごとに異なる応答構造から、安定した内部スキーマを取り出す
 */

import { NotFoundError } from "../errors";
import {
  getArray,
  getFirstPresentPath,
  isRecord,
} from "../utils/field-mapper";
import { AnalysisResponseSchema, KeywordStatsSchema } from "./schemas";
import { KeywordMetrics } from "./types";

// =============================================================================
// キーワード表記ゆれ
// =============================================================================

/**
 * 単語ごとに先頭を大文字、残りを小文字にする
 */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

/**
 * 照合に使う表記の候補（完全一致 → 小文字 → 大文字 → タイトルケース）
 */
export function getCaseVariants(keyword: string): string[] {
  return [keyword, keyword.toLowerCase(), keyword.toUpperCase(), toTitleCase(keyword)];
}

// =============================================================================
// キーワード分析
// =============================================================================

/**
 * 分析応答からキーワードの指標を取り出す
 *
 * search_stats.compvol が無い・不正な場合も NotFoundError（候補一覧は空）
 */
export function extractKeywordMetrics(keyword: string, raw: unknown): KeywordMetrics {
  const parsed = AnalysisResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NotFoundError(keyword, []);
  }

  const compvol = parsed.data.search_stats.compvol;
  const availableKeys = Object.keys(compvol);

  const matchedKey = getCaseVariants(keyword).find((variant) =>
    Object.prototype.hasOwnProperty.call(compvol, variant)
  );
  if (matchedKey === undefined) {
    throw new NotFoundError(keyword, availableKeys);
  }

  const entry = compvol[matchedKey];
  if (!isRecord(entry) || Object.keys(entry).length === 0) {
    throw new NotFoundError(keyword, availableKeys);
  }

  const stats = KeywordStatsSchema.parse(entry);

  return {
    volume: stats.volume,
    competition: stats.competition,
    estimatedMonthlySearch: stats.estimated_monthly_search,
    overall: stats.overall,
  };
}

// =============================================================================
// マッチング・質問・関連キーワード
// =============================================================================

/**
 * 一覧フィールドを取り出す（無ければ空配列）
 */
export function extractListField(raw: unknown, field: "permutations" | "questions"): unknown[] {
  return isRecord(raw) ? getArray(raw, [field]) : [];
}

/**
 * 関連キーワード一覧の取り出し元（優先順）
 */
export const RELATED_KEYWORD_PATHS: string[][] = [
  ["keywords"],
  ["related_keywords"],
  ["search_stats", "related"],
];

/**
 * 関連キーワード一覧を取り出す
 *
 * 最初に存在したフィールドを採用する。どれも無ければ空配列（エラーではない）
 */
export function extractRelatedKeywords(raw: unknown): unknown[] {
  const { found, value } = getFirstPresentPath(raw, RELATED_KEYWORD_PATHS);
  if (!found || !Array.isArray(value)) {
    return [];
  }
  return value;
}

/**
 * null 相当の空応答か
 *
 * 空配列・空オブジェクトも含む。一覧フィールドが空なだけの応答は対象外
 */
export function isEmptyPayload(raw: unknown): boolean {
  if (raw === null || raw === undefined || raw === false || raw === 0 || raw === "") {
    return true;
  }
  if (Array.isArray(raw)) {
    return raw.length === 0;
  }
  if (isRecord(raw)) {
    return Object.keys(raw).length === 0;
  }
  return false;
}
