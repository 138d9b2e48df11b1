/**
 * 環境変数設定のテスト
 */

import { loadVidiqEnvConfig } from "../src/config";
import { ConfigurationError, InvalidArgumentError } from "../src/errors";

describe("loadVidiqEnvConfig", () => {
  it("トークンのみ設定した場合は既定値で埋める", () => {
    expect(loadVidiqEnvConfig({ VIDIQ_TOKEN: "test-token" })).toEqual({
      authToken: "test-token",
      baseUrl: "https://api.vidiq.com",
      timeoutMs: 30000,
      defaultDelayMs: 1000,
    });
  });

  it("各環境変数を読み込む", () => {
    expect(
      loadVidiqEnvConfig({
        VIDIQ_TOKEN: "  test-token  ",
        VIDIQ_BASE_URL: "https://api.example.test",
        VIDIQ_TIMEOUT_MS: "5000",
        VIDIQ_REQUEST_DELAY_MS: "0",
      })
    ).toEqual({
      authToken: "test-token",
      baseUrl: "https://api.example.test",
      timeoutMs: 5000,
      defaultDelayMs: 0,
    });
  });

  it("トークンが未設定・空白のみなら InvalidArgumentError", () => {
    expect(() => loadVidiqEnvConfig({})).toThrow(InvalidArgumentError);
    expect(() => loadVidiqEnvConfig({ VIDIQ_TOKEN: "   " })).toThrow(InvalidArgumentError);
  });

  it("数値でないタイムアウトは ConfigurationError", () => {
    expect(() =>
      loadVidiqEnvConfig({ VIDIQ_TOKEN: "test-token", VIDIQ_TIMEOUT_MS: "abc" })
    ).toThrow(new ConfigurationError("Invalid environment configuration: VIDIQ_TIMEOUT_MS"));
  });

  it("負の待機時間は ConfigurationError", () => {
    expect(() =>
      loadVidiqEnvConfig({ VIDIQ_TOKEN: "test-token", VIDIQ_REQUEST_DELAY_MS: "-1" })
    ).toThrow("Invalid environment configuration: VIDIQ_REQUEST_DELAY_MS");
  });

  it("LOG_LEVEL は設定に含めない", () => {
    expect(loadVidiqEnvConfig({ VIDIQ_TOKEN: "test-token", LOG_LEVEL: "debug" })).not.toHaveProperty(
      "logLevel"
    );
  });

  it("URL でないベースURLは ConfigurationError", () => {
    expect(() =>
      loadVidiqEnvConfig({ VIDIQ_TOKEN: "test-token", VIDIQ_BASE_URL: "not a url" })
    ).toThrow(ConfigurationError);
  });
});
