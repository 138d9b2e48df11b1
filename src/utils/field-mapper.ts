/**
 * ゆるい型のJSON応答からフィールドを取り出すユーティリティ
 *
 * 上流APIはバージョンによってフィールド名が揺れるため、
 * 候補名を優先順に試して最初に見つかった値を使う
 */

import { NOT_AVAILABLE } from "../constants";
import type { MetricValue } from "../vidiq/types";

// =============================================================================
// 型ガード
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// フィールド値取得
// =============================================================================

/**
 * 複数の候補フィールド名から値を取得（キーが存在するものを優先順に採用）
 */
export function getFieldValue(
  record: Record<string, unknown>,
  fieldNames: string[]
): unknown {
  for (const name of fieldNames) {
    if (Object.prototype.hasOwnProperty.call(record, name)) {
      return record[name];
    }
  }
  return undefined;
}

/**
 * ネストしたパスの値を取得（途中がオブジェクトでなければ undefined）
 */
export function getPathValue(value: unknown, path: string[]): unknown {
  let current: unknown = value;
  for (const segment of path) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * パス候補を優先順に試し、最初に存在したものを返す
 */
export function getFirstPresentPath(
  value: unknown,
  paths: string[][]
): { found: boolean; value: unknown } {
  for (const path of paths) {
    const parent = getPathValue(value, path.slice(0, -1));
    const last = path[path.length - 1];
    if (isRecord(parent) && Object.prototype.hasOwnProperty.call(parent, last)) {
      return { found: true, value: parent[last] };
    }
  }
  return { found: false, value: undefined };
}

/**
 * 配列として値を取得
 */
export function getArray(
  record: Record<string, unknown>,
  fieldNames: string[]
): unknown[] {
  const value = getFieldValue(record, fieldNames);
  return Array.isArray(value) ? value : [];
}

/**
 * 文字列として値を取得
 */
export function getString(
  record: Record<string, unknown>,
  fieldNames: string[],
  defaultValue: string = ""
): string {
  const value = getFieldValue(record, fieldNames);
  if (value === undefined || value === null) {
    return defaultValue;
  }
  return String(value);
}

/**
 * 指標値として取得（有限の数値以外は "N/A"）
 */
export function getMetric(
  record: Record<string, unknown>,
  fieldNames: string[]
): MetricValue {
  const value = getFieldValue(record, fieldNames);
  return toMetricValue(value);
}

export function toMetricValue(value: unknown): MetricValue {
  return typeof value === "number" && Number.isFinite(value) ? value : NOT_AVAILABLE;
}
