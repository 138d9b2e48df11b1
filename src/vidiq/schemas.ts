/**
 * vidIQ API 応答の Zod スキーマ定義
 *
 * 応答はゆるい型なので、必要な構造だけを検証し残りは passthrough で通す
 */

import { z } from "zod";
import { toMetricValue } from "../utils/field-mapper";

// =============================================================================
// キーワード分析
// =============================================================================

/**
 * 指標値（有限の数値以外は "N/A"）
 */
const MetricSchema = z.unknown().transform(toMetricValue);

/**
 * search_stats.compvol の各キーワードの統計
 */
export const KeywordStatsSchema = z
  .object({
    volume: MetricSchema,
    competition: MetricSchema,
    estimated_monthly_search: MetricSchema,
    overall: MetricSchema,
  })
  .passthrough();

export type KeywordStats = z.infer<typeof KeywordStatsSchema>;

/**
 * キーワード分析応答（統計コンテナ → キーワード別マップ）
 */
export const AnalysisResponseSchema = z
  .object({
    search_stats: z
      .object({
        compvol: z.record(z.unknown()),
      })
      .passthrough(),
  })
  .passthrough();

export type AnalysisResponse = z.infer<typeof AnalysisResponseSchema>;
