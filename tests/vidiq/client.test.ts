/**
 * vidIQ クライアントのテスト
 */

import {
  ApiError,
  InvalidArgumentError,
  NoDataError,
  NotFoundError,
} from "../../src/errors";
import { VidiqClient, createVidiqClient } from "../../src/vidiq/client";
import { QueryParams, VidiqTransport } from "../../src/vidiq/transport";
import { isBatchError } from "../../src/vidiq/types";

const NOW = new Date("2024-01-01T00:00:00.000Z");

interface RecordedCall {
  path: string;
  params: QueryParams;
}

class FakeTransport implements VidiqTransport {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: (path: string, params: QueryParams) => unknown) {}

  async get(path: string, params: QueryParams): Promise<unknown> {
    this.calls.push({ path, params });
    return this.respond(path, params);
  }
}

function analysisBody(compvol: Record<string, unknown>): unknown {
  return { search_stats: { compvol } };
}

const testKeywordStats = {
  volume: 50,
  competition: 30,
  estimated_monthly_search: 1000,
  overall: 40,
};

function createClient(transport: VidiqTransport, sleep = jest.fn().mockResolvedValue(undefined)) {
  const client = new VidiqClient(
    { authToken: "test-token" },
    { transport, sleep, now: () => NOW }
  );
  return { client, sleep };
}

describe("VidiqClient", () => {
  describe("constructor", () => {
    it("トークンが空白のみなら InvalidArgumentError", () => {
      expect(() => new VidiqClient({ authToken: "   " })).toThrow(InvalidArgumentError);
    });
  });

  describe("analyzeKeyword", () => {
    it("表記ゆれを吸収して指標とレベルを返す", async () => {
      const transport = new FakeTransport(() =>
        analysisBody({ "test keyword": testKeywordStats })
      );
      const { client, sleep } = createClient(transport);

      const result = await client.analyzeKeyword("Test Keyword");

      expect(result).toEqual({
        keyword: "Test Keyword",
        timestamp: "2024-01-01T00:00:00.000Z",
        metrics: {
          volume: 50,
          competition: 30,
          estimatedMonthlySearch: 1000,
          overall: 40,
        },
        levels: {
          volume: "Medium",
          competition: "Low",
          overall: "Low",
        },
      });
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1000);
    });

    it("固定パラメータ付きで分析エンドポイントを呼ぶ", async () => {
      const transport = new FakeTransport(() => analysisBody({ seo: testKeywordStats }));
      const { client } = createClient(transport);

      await client.analyzeKeyword("  seo  ");

      expect(transport.calls).toEqual([
        { path: "/v0/hottersearch", params: { q: "seo", im: "4.5", group: "V5", src: "" } },
      ]);
    });

    it("空のキーワードは通信せずに InvalidArgumentError", async () => {
      const transport = new FakeTransport(() => null);
      const { client, sleep } = createClient(transport);

      await expect(client.analyzeKeyword("  ")).rejects.toThrow(InvalidArgumentError);
      expect(transport.calls).toHaveLength(0);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("compvol が空なら availableKeys が空の NotFoundError", async () => {
      const transport = new FakeTransport(() => analysisBody({}));
      const { client } = createClient(transport);

      const error = await client.analyzeKeyword("seo").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ availableKeys: [] });
    });

    it("待機時間 0 なら待機しない", async () => {
      const transport = new FakeTransport(() => analysisBody({ seo: testKeywordStats }));
      const { client, sleep } = createClient(transport);

      await client.analyzeKeyword("seo", 0);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("トランスポートの ApiError はそのまま伝播する", async () => {
      const apiError = ApiError.fromHttpStatus(401, "", "/v0/hottersearch");
      const transport = new FakeTransport(() => {
        throw apiError;
      });
      const { client } = createClient(transport);

      await expect(client.analyzeKeyword("seo")).rejects.toBe(apiError);
    });

    it("ApiError 以外の失敗は ApiError に包む", async () => {
      const transport = new FakeTransport(() => {
        throw new Error("socket hang up");
      });
      const { client } = createClient(transport);

      await expect(client.analyzeKeyword("seo")).rejects.toMatchObject({
        name: "ApiError",
        message: "Network error: socket hang up",
        endpoint: "/v0/hottersearch",
      });
    });
  });

  describe("analyzeKeywords", () => {
    it("失敗したキーワードはエラーとして記録し、残りを続ける", async () => {
      const transport = new FakeTransport(() => analysisBody({ k1: testKeywordStats }));
      const { client, sleep } = createClient(transport);

      const results = await client.analyzeKeywords(["k1", "k2"]);

      expect(Object.keys(results)).toEqual(["k1", "k2"]);
      expect(isBatchError(results.k1)).toBe(false);
      expect(results.k2).toEqual({
        error: "No analysis data found for keyword: k2. Available keywords: [k1]",
      });
      expect(transport.calls.map((call) => call.params.q)).toEqual(["k1", "k2"]);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it("空の入力は空の結果", async () => {
      const transport = new FakeTransport(() => null);
      const { client } = createClient(transport);

      await expect(client.analyzeKeywords([])).resolves.toEqual({});
      expect(transport.calls).toHaveLength(0);
    });

    it("重複キーワードは後の結果で上書きする", async () => {
      let call = 0;
      const transport = new FakeTransport(() => {
        call++;
        return call === 1 ? analysisBody({}) : analysisBody({ seo: testKeywordStats });
      });
      const { client } = createClient(transport);

      const results = await client.analyzeKeywords(["seo", "seo"], 0);

      expect(Object.keys(results)).toEqual(["seo"]);
      expect(isBatchError(results.seo)).toBe(false);
      expect(transport.calls).toHaveLength(2);
    });

    it("空のキーワードもエラーとして記録する", async () => {
      const transport = new FakeTransport(() => analysisBody({ seo: testKeywordStats }));
      const { client } = createClient(transport);

      const results = await client.analyzeKeywords(["", "seo"], 0);

      expect(results[""]).toEqual({ error: "Keyword cannot be empty" });
      expect(transport.calls).toHaveLength(1);
    });
  });

  describe("getMatchingKeywords", () => {
    it("応答全体を data に、permutations の件数を count に入れる", async () => {
      const body = { permutations: [{ keyword: "seo tips" }, { keyword: "seo tools" }] };
      const transport = new FakeTransport(() => body);
      const { client } = createClient(transport);

      const result = await client.getMatchingKeywords("seo", { limit: 50 });

      expect(result).toEqual({
        keyword: "seo",
        timestamp: "2024-01-01T00:00:00.000Z",
        type: "matching_keywords",
        data: body,
        count: 2,
      });
      expect(transport.calls).toEqual([
        {
          path: "/xwords/keyword_search/",
          params: { term: "seo", part: "permutations", limit: 50 },
        },
      ]);
    });

    it("limit の既定値は 300", async () => {
      const transport = new FakeTransport(() => ({ permutations: [] }));
      const { client } = createClient(transport);

      const result = await client.getMatchingKeywords("seo");

      expect(result.count).toBe(0);
      expect(transport.calls[0].params.limit).toBe(300);
    });

    it("null 応答は NoDataError", async () => {
      const transport = new FakeTransport(() => null);
      const { client } = createClient(transport);

      await expect(client.getMatchingKeywords("seo")).rejects.toThrow(
        new NoDataError("seo", "matching keywords")
      );
    });
  });

  describe("getQuestions", () => {
    it("part=questions で呼び、questions の件数を数える", async () => {
      const body = { questions: ["what is seo", "how to seo", "why seo"] };
      const transport = new FakeTransport(() => body);
      const { client } = createClient(transport);

      const result = await client.getQuestions("seo", { limit: 10, delayMs: 0 });

      expect(result.type).toBe("questions");
      expect(result.count).toBe(3);
      expect(result.data).toBe(body);
      expect(transport.calls[0].params).toEqual({ term: "seo", part: "questions", limit: 10 });
    });

    it("空オブジェクトの応答は NoDataError", async () => {
      const transport = new FakeTransport(() => ({}));
      const { client } = createClient(transport);

      await expect(client.getQuestions("seo")).rejects.toThrow("No questions data returned for: seo");
    });
  });

  describe("getRelatedKeywords", () => {
    it("関連キーワード一覧と応答全体を返す", async () => {
      const body = { keywords: [{ keyword: "seo tips", score: 80 }] };
      const transport = new FakeTransport(() => body);
      const { client } = createClient(transport);

      const result = await client.getRelatedKeywords("seo");

      expect(result).toEqual({
        keyword: "seo",
        timestamp: "2024-01-01T00:00:00.000Z",
        type: "related_keywords",
        data: [{ keyword: "seo tips", score: 80 }],
        count: 1,
        rawResponse: body,
      });
      expect(transport.calls[0]).toEqual({
        path: "/xwords/hottersearch",
        params: { q: "seo", min_related_score: 0, group: "v5" },
      });
    });

    it("一覧フィールドが無い応答は空の一覧", async () => {
      const body = { something_else: true };
      const transport = new FakeTransport(() => body);
      const { client } = createClient(transport);

      const result = await client.getRelatedKeywords("seo", { minRelatedScore: 10, group: "v4" });

      expect(result.data).toEqual([]);
      expect(result.count).toBe(0);
      expect(result.rawResponse).toBe(body);
      expect(transport.calls[0].params).toEqual({ q: "seo", min_related_score: 10, group: "v4" });
    });

    it("空のキーワードは InvalidArgumentError", async () => {
      const transport = new FakeTransport(() => null);
      const { client } = createClient(transport);

      await expect(client.getRelatedKeywords("")).rejects.toThrow("Keyword cannot be empty");
    });
  });
});

describe("createVidiqClient", () => {
  it("明示的なトークンを環境変数より優先する", async () => {
    const transport = new FakeTransport(() => analysisBody({ seo: testKeywordStats }));
    const client = createVidiqClient({
      authToken: "test-token",
      env: {},
      deps: { transport, sleep: jest.fn().mockResolvedValue(undefined) },
    });

    await expect(client.analyzeKeyword("seo")).resolves.toMatchObject({ keyword: "seo" });
  });

  it("トークンがどこにも無ければ InvalidArgumentError", () => {
    expect(() => createVidiqClient({ env: {} })).toThrow(
      "No auth token provided. Either pass it directly or set VIDIQ_TOKEN environment variable."
    );
  });

  it("環境変数の待機時間を既定値に使う", async () => {
    const transport = new FakeTransport(() => analysisBody({ seo: testKeywordStats }));
    const sleep = jest.fn().mockResolvedValue(undefined);
    const client = createVidiqClient({
      env: { VIDIQ_TOKEN: "test-token", VIDIQ_REQUEST_DELAY_MS: "250" },
      deps: { transport, sleep },
    });

    await client.analyzeKeyword("seo");
    expect(sleep).toHaveBeenCalledWith(250);
  });
});
