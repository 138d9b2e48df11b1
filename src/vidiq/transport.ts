/**
 * vidIQ API HTTPトランスポート
 *
 * Bearer トークン付きの GET と JSON デコードのみを担当する。
 * リトライは行わない
 */

import { VIDIQ_API } from "../constants";
import { ApiError } from "../errors";
import { logger } from "../logger";
import { TimeoutError, withTimeout } from "../utils/timing";

export type QueryParams = Record<string, string | number | undefined>;

/**
 * HTTP境界（テストではフェイクに差し替える）
 */
export interface VidiqTransport {
  /**
   * GET してデコード済み JSON を返す（本文が空なら null）
   */
  get(path: string, params: QueryParams): Promise<unknown>;
}

export interface FetchTransportConfig {
  authToken: string;
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
}

// =============================================================================
// fetch 実装
// =============================================================================

export class FetchTransport implements VidiqTransport {
  private readonly headers: Record<string, string>;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: FetchTransportConfig) {
    this.baseUrl = (config.baseUrl ?? VIDIQ_API.DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? VIDIQ_API.DEFAULT_TIMEOUT_MS;
    this.headers = {
      Authorization: `Bearer ${config.authToken}`,
      Accept: "application/json",
      "User-Agent": config.userAgent ?? VIDIQ_API.DEFAULT_USER_AGENT,
    };
  }

  buildUrl(path: string, params: QueryParams): string {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        searchParams.append(key, String(value));
      }
    }
    const queryString = searchParams.toString();
    return queryString ? `${this.baseUrl}${path}?${queryString}` : `${this.baseUrl}${path}`;
  }

  async get(path: string, params: QueryParams): Promise<unknown> {
    const url = this.buildUrl(path, params);

    logger.debug("Making vidIQ API request", { endpoint: path });

    let response: Response;
    let body: string;
    try {
      // 本文の読み込みまでをタイムアウトの対象にする
      ({ response, body } = await withTimeout(
        async (signal) => {
          const res = await fetch(url, { method: "GET", headers: this.headers, signal });
          return { response: res, body: await res.text() };
        },
        this.timeoutMs,
        path
      ));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.error("vidIQ API request failed", {
        endpoint: path,
        timedOut: error instanceof TimeoutError,
        error: cause,
      });
      throw ApiError.network(path, cause);
    }

    if (!response.ok) {
      logger.error("vidIQ API returned error status", {
        endpoint: path,
        status: response.status,
      });
      throw ApiError.fromHttpStatus(response.status, body, path);
    }

    if (body.trim() === "") {
      return null;
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw ApiError.invalidJson(path, cause);
    }
  }
}
