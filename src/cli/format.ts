/**
 * CLI 出力の整形
 */

import { getString, isRecord } from "../utils/field-mapper";
import { AnalysisResult, AuxiliaryResult, BatchResult, isBatchError } from "../vidiq/types";

const RULE = "=".repeat(50);

/**
 * 分析結果のサマリー
 */
export function formatAnalysisSummary(result: AnalysisResult): string[] {
  return [
    `Keyword Analysis: ${result.keyword}`,
    RULE,
    `Volume: ${result.metrics.volume}`,
    `Competition: ${result.metrics.competition}`,
    `Monthly Searches: ${result.metrics.estimatedMonthlySearch}`,
    `Overall Score: ${result.metrics.overall}`,
    `Volume Level: ${result.levels.volume}`,
    `Competition Level: ${result.levels.competition}`,
    `Overall Level: ${result.levels.overall}`,
    RULE,
  ];
}

/**
 * バッチ結果を1キーワード1行で
 */
export function formatBatchSummary(results: BatchResult): string[] {
  return Object.entries(results).map(([keyword, entry]) =>
    isBatchError(entry)
      ? `FAILED ${keyword}: ${entry.error}`
      : `OK ${keyword}: volume=${entry.metrics.volume} competition=${entry.metrics.competition} overall=${entry.levels.overall}`
  );
}

function describeItem(item: unknown): string {
  if (isRecord(item)) {
    return getString(item, ["keyword"], JSON.stringify(item));
  }
  return String(item);
}

/**
 * 補助クエリの一覧（番号付き）
 */
export function formatKeywordList(
  title: string,
  result: Pick<AuxiliaryResult<unknown>, "keyword" | "count">,
  items: unknown[]
): string[] {
  return [
    `${title} for "${result.keyword}": ${result.count}`,
    ...items.map((item, index) => `  ${index + 1}. ${describeItem(item)}`),
  ];
}
