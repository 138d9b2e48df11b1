/**
 * スコアの難易度レベル判定
 *
 * しきい値は上限を含む: ≤20 Very Low, ≤40 Low, ≤60 Medium, ≤80 High, それ以上 Very High
 */

import { LEVEL_THRESHOLDS, NOT_AVAILABLE } from "../constants";
import { LevelBand, LevelValue, MetricValue } from "./types";

export const LEVEL_BANDS: readonly LevelBand[] = [
  "Very Low",
  "Low",
  "Medium",
  "High",
  "Very High",
];

/**
 * 数値スコアをレベルに変換
 *
 * 0-100 の範囲外も同じしきい値で両端に寄せる
 */
export function classifyLevel(score: number): LevelBand {
  for (let i = 0; i < LEVEL_THRESHOLDS.length; i++) {
    if (score <= LEVEL_THRESHOLDS[i]) {
      return LEVEL_BANDS[i];
    }
  }
  return LEVEL_BANDS[LEVEL_BANDS.length - 1];
}

/**
 * 指標値をレベルに変換（"N/A" はそのまま）
 */
export function classifyMetric(value: MetricValue): LevelValue {
  return value === NOT_AVAILABLE ? NOT_AVAILABLE : classifyLevel(value);
}
