/**
 * キーワードリサーチ結果のCSVエクスポート
 *
 * 関連 → マッチング → 質問 の順に補助クエリを実行し、
 * 1ファイルにまとめるか種別ごとに別ファイルへ書き出す
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { stringify } from "csv-stringify/sync";
import { v4 as uuidv4 } from "uuid";
import { NOT_AVAILABLE, QUERY_DEFAULTS } from "../constants";
import { ExportError, InvalidArgumentError, getErrorMessage } from "../errors";
import { createChildLogger } from "../logger";
import { getMetric, getString, isRecord } from "../utils/field-mapper";
import type { VidiqClient } from "../vidiq/client";
import { extractListField } from "../vidiq/normalizer";
import { CsvRow, CsvRowType } from "../vidiq/types";

// =============================================================================
// 型定義
// =============================================================================

/**
 * エクスポートに必要なクライアントのメソッド
 */
export type KeywordResearchSource = Pick<
  VidiqClient,
  "getRelatedKeywords" | "getMatchingKeywords" | "getQuestions"
>;

export interface ExportCombinedOptions {
  /** 省略時は <キーワード>_keywords.csv */
  outputPath?: string;
  limit?: number;
  delayMs?: number;
}

export interface ExportSeparateOptions {
  outputDir?: string;
  limit?: number;
  delayMs?: number;
}

export type SeparateExportType = "related" | "matching" | "questions";

export type SeparateExportPaths = Partial<Record<SeparateExportType, string>>;

/**
 * CSVの列（ヘッダー順）
 */
export const CSV_COLUMNS: (keyof CsvRow)[] = [
  "keyword",
  "type",
  "score",
  "volume",
  "competition",
  "source_keyword",
  "timestamp",
];

const SEPARATE_TYPES: { type: SeparateExportType; rowType: CsvRowType }[] = [
  { type: "related", rowType: "related" },
  { type: "matching", rowType: "matching" },
  { type: "questions", rowType: "question" },
];

// =============================================================================
// 行の組み立て
// =============================================================================

/**
 * ファイル名用にキーワードを整形
 *
 * 英数字・空白・ハイフン・アンダースコアのみ残し、空白はアンダースコアにする
 */
export function sanitizeFilename(keyword: string): string {
  const sanitized = keyword
    .replace(/[^\p{L}\p{N} _-]/gu, "")
    .trim()
    .replace(/ /g, "_");
  return sanitized || "keyword";
}

/**
 * 一覧の1要素をCSV行に変換
 *
 * オブジェクトなら keyword/score/volume/competition を取り出し（欠損は "N/A"）、
 * 文字列ならキーワードのみ設定する
 */
export function toCsvRow(
  item: unknown,
  type: CsvRowType,
  sourceKeyword: string,
  timestamp: string
): CsvRow {
  if (isRecord(item)) {
    return {
      keyword: getString(item, ["keyword"], NOT_AVAILABLE),
      type,
      score: getMetric(item, ["score"]),
      volume: getMetric(item, ["volume"]),
      competition: getMetric(item, ["competition"]),
      source_keyword: sourceKeyword,
      timestamp,
    };
  }

  return {
    keyword: String(item),
    type,
    score: NOT_AVAILABLE,
    volume: NOT_AVAILABLE,
    competition: NOT_AVAILABLE,
    source_keyword: sourceKeyword,
    timestamp,
  };
}

/**
 * 3種の補助クエリを順に実行し、種別ごとの行を返す
 */
export async function collectCsvRows(
  source: KeywordResearchSource,
  keyword: string,
  options: { limit?: number; delayMs?: number } = {}
): Promise<Record<CsvRowType, CsvRow[]>> {
  const limit = options.limit ?? QUERY_DEFAULTS.EXPORT_LIMIT;
  const delayMs = options.delayMs;

  const related = await source.getRelatedKeywords(keyword, { delayMs });
  const matching = await source.getMatchingKeywords(keyword, { limit, delayMs });
  const questions = await source.getQuestions(keyword, { limit, delayMs });

  return {
    related: related.data.map((item) =>
      toCsvRow(item, "related", related.keyword, related.timestamp)
    ),
    matching: extractListField(matching.data, "permutations").map((item) =>
      toCsvRow(item, "matching", matching.keyword, matching.timestamp)
    ),
    question: extractListField(questions.data, "questions").map((item) =>
      toCsvRow(item, "question", questions.keyword, questions.timestamp)
    ),
  };
}

/**
 * 行をCSV文字列に変換（ヘッダー1行 + データ行）
 */
export function renderCsv(rows: CsvRow[]): string {
  return stringify(rows, { header: true, columns: CSV_COLUMNS });
}

async function writeCsvFile(path: string, rows: CsvRow[]): Promise<void> {
  try {
    await writeFile(path, renderCsv(rows), { encoding: "utf-8" });
  } catch (error) {
    throw new ExportError(`Failed to write CSV file ${path}: ${getErrorMessage(error)}`, {
      path,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function requireKeyword(keyword: string): string {
  const term = keyword.trim();
  if (!term) {
    throw new InvalidArgumentError("Keyword cannot be empty");
  }
  return term;
}

// =============================================================================
// エクスポート
// =============================================================================

/**
 * 全種別を1ファイルに書き出す（関連 → マッチング → 質問 の順）
 *
 * @returns 書き出したファイルのパス
 * @throws {ExportError} 行が0件、または書き込みに失敗した場合
 */
export async function exportCombined(
  source: KeywordResearchSource,
  keyword: string,
  options: ExportCombinedOptions = {}
): Promise<string> {
  const term = requireKeyword(keyword);
  const exportLogger = createChildLogger({ exportId: uuidv4(), keyword: term });

  const rowsByType = await collectCsvRows(source, term, options);
  const rows = [...rowsByType.related, ...rowsByType.matching, ...rowsByType.question];

  if (rows.length === 0) {
    throw new ExportError(`No keyword data to export for: ${term}`);
  }

  const outputPath = options.outputPath ?? `${sanitizeFilename(term)}_keywords.csv`;
  await writeCsvFile(outputPath, rows);

  exportLogger.info("Combined CSV exported", {
    path: outputPath,
    rows: rows.length,
    related: rowsByType.related.length,
    matching: rowsByType.matching.length,
    questions: rowsByType.question.length,
  });

  return outputPath;
}

/**
 * 種別ごとに別ファイルへ書き出す
 *
 * 出力先ディレクトリが無ければ作成する。行が0件の種別はスキップする
 *
 * @returns 種別 → ファイルパス
 * @throws {ExportError} 全種別とも0件、または書き込みに失敗した場合
 */
export async function exportSeparate(
  source: KeywordResearchSource,
  keyword: string,
  options: ExportSeparateOptions = {}
): Promise<SeparateExportPaths> {
  const term = requireKeyword(keyword);
  const exportLogger = createChildLogger({ exportId: uuidv4(), keyword: term });
  const outputDir = options.outputDir ?? ".";

  const rowsByType = await collectCsvRows(source, term, options);
  const total = SEPARATE_TYPES.reduce((sum, { rowType }) => sum + rowsByType[rowType].length, 0);
  if (total === 0) {
    throw new ExportError(`No keyword data to export for: ${term}`);
  }

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new ExportError(`Failed to create output directory ${outputDir}: ${getErrorMessage(error)}`, {
      path: outputDir,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const baseName = sanitizeFilename(term);
  const paths: SeparateExportPaths = {};

  for (const { type, rowType } of SEPARATE_TYPES) {
    const rows = rowsByType[rowType];
    if (rows.length === 0) {
      exportLogger.debug("Skipping empty CSV", { type });
      continue;
    }
    const path = join(outputDir, `${baseName}_${type}.csv`);
    await writeCsvFile(path, rows);
    paths[type] = path;
  }

  exportLogger.info("Separate CSVs exported", { outputDir, files: Object.keys(paths).length, rows: total });

  return paths;
}
