/**
 * vidIQ キーワードリサーチ API クライアント
 *
 * キーワード分析・マッチング・関連・質問キーワードを取得し、
 * 正規化した結果を返す。リクエストは常に逐次実行し、
 * 各リクエストの前に固定時間だけ待機する
 */

import { v4 as uuidv4 } from "uuid";
import { loadVidiqEnvConfig, ENV_VARS } from "../config";
import { ANALYSIS_PARAMS, QUERY_DEFAULTS, VIDIQ_API } from "../constants";
import {
  ApiError,
  InvalidArgumentError,
  NoDataError,
  getErrorMessage,
} from "../errors";
import { createChildLogger, logger } from "../logger";
import { SleepFn, delayBeforeCall, sleep } from "../utils/timing";
import { classifyMetric } from "./level-classifier";
import {
  extractKeywordMetrics,
  extractListField,
  extractRelatedKeywords,
  isEmptyPayload,
} from "./normalizer";
import { FetchTransport, QueryParams, VidiqTransport } from "./transport";
import {
  AnalysisResult,
  AuxiliaryQueryType,
  BatchErrorEntry,
  BatchResult,
  MatchingKeywordsOptions,
  MatchingKeywordsResult,
  QuestionsOptions,
  QuestionsResult,
  RelatedKeywordsOptions,
  RelatedKeywordsResult,
} from "./types";

// =============================================================================
// 設定
// =============================================================================

/**
 * vidIQ クライアント設定
 */
export interface VidiqClientConfig {
  authToken: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** リクエスト前の待機時間（ミリ秒）。各メソッドの delayMs 省略時に使う */
  defaultDelayMs?: number;
  userAgent?: string;
}

/**
 * 差し替え可能な依存
 */
export interface VidiqClientDeps {
  transport?: VidiqTransport;
  sleep?: SleepFn;
  now?: () => Date;
}

const QUERY_LABELS: Record<AuxiliaryQueryType, string> = {
  matching_keywords: "matching keywords",
  related_keywords: "related keywords",
  questions: "questions",
};

// =============================================================================
// APIクライアント
// =============================================================================

export class VidiqClient {
  private readonly transport: VidiqTransport;
  private readonly sleepFn: SleepFn;
  private readonly now: () => Date;
  private readonly defaultDelayMs: number;

  constructor(config: VidiqClientConfig, deps: VidiqClientDeps = {}) {
    const authToken = config.authToken.trim();
    if (!authToken) {
      throw new InvalidArgumentError(
        "No auth token provided. Either pass it directly or set VIDIQ_TOKEN environment variable."
      );
    }

    this.transport =
      deps.transport ??
      new FetchTransport({
        authToken,
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
      });
    this.sleepFn = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
    this.defaultDelayMs = config.defaultDelayMs ?? VIDIQ_API.DEFAULT_DELAY_MS;
  }

  // ===========================================================================
  // キーワード分析
  // ===========================================================================

  /**
   * 単一キーワードを分析
   *
   * @throws {InvalidArgumentError} キーワードが空の場合
   * @throws {ApiError} 通信・JSONデコードに失敗した場合
   * @throws {NotFoundError} 応答にキーワードが含まれない場合
   */
  async analyzeKeyword(
    keyword: string,
    delayMs: number = this.defaultDelayMs
  ): Promise<AnalysisResult> {
    const term = this.requireKeyword(keyword);

    await delayBeforeCall(delayMs, this.sleepFn);

    const raw = await this.request(VIDIQ_API.ANALYSIS_PATH, {
      q: term,
      im: ANALYSIS_PARAMS.IM,
      group: ANALYSIS_PARAMS.GROUP,
      src: ANALYSIS_PARAMS.SRC,
    });

    const metrics = extractKeywordMetrics(term, raw);

    return {
      keyword: term,
      timestamp: this.now().toISOString(),
      metrics,
      levels: {
        volume: classifyMetric(metrics.volume),
        competition: classifyMetric(metrics.competition),
        overall: classifyMetric(metrics.overall),
      },
    };
  }

  /**
   * 複数キーワードを逐次分析
   *
   * 失敗したキーワードは { error } として記録し、残りの処理を続ける
   */
  async analyzeKeywords(
    keywords: string[],
    delayMs: number = this.defaultDelayMs
  ): Promise<BatchResult> {
    const batchLogger = createChildLogger({ batchId: uuidv4() });
    const results = new Map<string, AnalysisResult | BatchErrorEntry>();
    let failed = 0;

    for (const keyword of keywords) {
      try {
        results.set(keyword, await this.analyzeKeyword(keyword, delayMs));
      } catch (error) {
        failed++;
        const message = getErrorMessage(error);
        batchLogger.warn("Failed to analyze keyword", { keyword, error: message });
        results.set(keyword, { error: message });
      }
    }

    batchLogger.info("Keyword batch analyzed", {
      total: keywords.length,
      succeeded: keywords.length - failed,
      failed,
    });

    return Object.fromEntries(results);
  }

  // ===========================================================================
  // 補助クエリ
  // ===========================================================================

  /**
   * マッチングキーワード（語順違い・派生語）を取得
   */
  async getMatchingKeywords(
    keyword: string,
    options: MatchingKeywordsOptions = {}
  ): Promise<MatchingKeywordsResult> {
    const { term, raw } = await this.fetchAuxiliary(
      keyword,
      "matching_keywords",
      VIDIQ_API.KEYWORD_SEARCH_PATH,
      (t) => ({ term: t, part: "permutations", limit: options.limit ?? QUERY_DEFAULTS.LIMIT }),
      options.delayMs
    );

    return {
      keyword: term,
      timestamp: this.now().toISOString(),
      type: "matching_keywords",
      data: raw,
      count: extractListField(raw, "permutations").length,
    };
  }

  /**
   * 関連キーワードを取得
   */
  async getRelatedKeywords(
    keyword: string,
    options: RelatedKeywordsOptions = {}
  ): Promise<RelatedKeywordsResult> {
    const { term, raw } = await this.fetchAuxiliary(
      keyword,
      "related_keywords",
      VIDIQ_API.RELATED_PATH,
      (t) => ({
        q: t,
        min_related_score: options.minRelatedScore ?? QUERY_DEFAULTS.MIN_RELATED_SCORE,
        group: options.group ?? QUERY_DEFAULTS.RELATED_GROUP,
      }),
      options.delayMs
    );

    const related = extractRelatedKeywords(raw);

    return {
      keyword: term,
      timestamp: this.now().toISOString(),
      type: "related_keywords",
      data: related,
      count: related.length,
      rawResponse: raw,
    };
  }

  /**
   * 質問形式のキーワードを取得
   */
  async getQuestions(
    keyword: string,
    options: QuestionsOptions = {}
  ): Promise<QuestionsResult> {
    const { term, raw } = await this.fetchAuxiliary(
      keyword,
      "questions",
      VIDIQ_API.KEYWORD_SEARCH_PATH,
      (t) => ({ term: t, part: "questions", limit: options.limit ?? QUERY_DEFAULTS.LIMIT }),
      options.delayMs
    );

    return {
      keyword: term,
      timestamp: this.now().toISOString(),
      type: "questions",
      data: raw,
      count: extractListField(raw, "questions").length,
    };
  }

  // ===========================================================================
  // 共通処理
  // ===========================================================================

  private requireKeyword(keyword: string): string {
    const term = keyword.trim();
    if (!term) {
      throw new InvalidArgumentError("Keyword cannot be empty");
    }
    return term;
  }

  /**
   * 補助クエリ共通: 検証 → 待機 → GET → 空応答チェック
   *
   * 一覧が無いだけの応答は許容し、null 相当の応答のみ NoDataError にする
   */
  private async fetchAuxiliary(
    keyword: string,
    queryType: AuxiliaryQueryType,
    path: string,
    buildParams: (term: string) => QueryParams,
    delayMs: number = this.defaultDelayMs
  ): Promise<{ term: string; raw: unknown }> {
    const term = this.requireKeyword(keyword);

    await delayBeforeCall(delayMs, this.sleepFn);

    const raw = await this.request(path, buildParams(term));
    if (isEmptyPayload(raw)) {
      throw new NoDataError(term, QUERY_LABELS[queryType]);
    }

    logger.debug("vidIQ auxiliary query completed", { keyword: term, queryType });
    return { term, raw };
  }

  /**
   * トランスポート呼び出し（ApiError 以外の失敗も ApiError に包む）
   */
  private async request(path: string, params: QueryParams): Promise<unknown> {
    try {
      return await this.transport.get(path, params);
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      throw ApiError.network(path, error instanceof Error ? error : new Error(String(error)));
    }
  }
}

// =============================================================================
// ファクトリ
// =============================================================================

export interface CreateVidiqClientOptions extends Partial<VidiqClientConfig> {
  env?: Record<string, string | undefined>;
  deps?: VidiqClientDeps;
}

/**
 * 設定からクライアントを作成
 *
 * 明示的に渡したトークンを優先し、無ければ VIDIQ_TOKEN を使う
 */
export function createVidiqClient(options: CreateVidiqClientOptions = {}): VidiqClient {
  const { env = process.env, deps, ...overrides } = options;
  const explicitToken = overrides.authToken?.trim();

  const envConfig = loadVidiqEnvConfig(
    explicitToken ? { ...env, [ENV_VARS.TOKEN]: explicitToken } : env
  );

  return new VidiqClient(
    {
      authToken: envConfig.authToken,
      baseUrl: overrides.baseUrl ?? envConfig.baseUrl,
      timeoutMs: overrides.timeoutMs ?? envConfig.timeoutMs,
      defaultDelayMs: overrides.defaultDelayMs ?? envConfig.defaultDelayMs,
      userAgent: overrides.userAgent,
    },
    deps
  );
}
