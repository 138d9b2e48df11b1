/**
 * vidIQ キーワードクライアント - 環境変数設定
 *
 * 環境変数はここでのみ読み、クライアントには設定オブジェクトとして渡す
 */

import { z } from "zod";
import { VIDIQ_API } from "./constants";
import { ConfigurationError, InvalidArgumentError } from "./errors";

/**
 * 環境変数名
 */
export const ENV_VARS = {
  TOKEN: "VIDIQ_TOKEN",
  BASE_URL: "VIDIQ_BASE_URL",
  TIMEOUT_MS: "VIDIQ_TIMEOUT_MS",
  REQUEST_DELAY_MS: "VIDIQ_REQUEST_DELAY_MS",
  // ロガーが直接読む（CLI は実行時に再適用する）
  LOG_LEVEL: "LOG_LEVEL",
} as const;

/**
 * 環境変数の設定インターフェース
 */
export interface VidiqEnvConfig {
  authToken: string;
  baseUrl: string;
  timeoutMs: number;
  defaultDelayMs: number;
}

/**
 * 空文字・空白のみは未設定として扱う
 */
const optionalNonEmptyString = () =>
  z.preprocess(
    (value) => {
      if (typeof value !== "string") return value;
      const trimmed = value.trim();
      return trimmed.length === 0 ? undefined : trimmed;
    },
    z.string().min(1).optional()
  );

const envSchema = z.object({
  [ENV_VARS.TOKEN]: optionalNonEmptyString(),
  [ENV_VARS.BASE_URL]: optionalNonEmptyString().pipe(z.string().url().optional()),
  [ENV_VARS.TIMEOUT_MS]: optionalNonEmptyString().pipe(
    z.coerce.number().int().positive().optional()
  ),
  [ENV_VARS.REQUEST_DELAY_MS]: optionalNonEmptyString().pipe(
    z.coerce.number().int().nonnegative().optional()
  ),
});

/**
 * 環境変数から設定を読み込む
 *
 * @param env - テスト時は任意のオブジェクトを渡せる
 * @throws {InvalidArgumentError} VIDIQ_TOKEN が未設定の場合
 * @throws {ConfigurationError} 数値・URL が不正な場合
 */
export function loadVidiqEnvConfig(
  env: Record<string, string | undefined> = process.env
): VidiqEnvConfig {
  const parsed = envSchema.safeParse({
    [ENV_VARS.TOKEN]: env[ENV_VARS.TOKEN],
    [ENV_VARS.BASE_URL]: env[ENV_VARS.BASE_URL],
    [ENV_VARS.TIMEOUT_MS]: env[ENV_VARS.TIMEOUT_MS],
    [ENV_VARS.REQUEST_DELAY_MS]: env[ENV_VARS.REQUEST_DELAY_MS],
  });

  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigurationError(
      `Invalid environment configuration: ${invalid.join(", ")}`,
      invalid
    );
  }

  const values = parsed.data;
  const authToken = values[ENV_VARS.TOKEN];
  if (!authToken) {
    throw new InvalidArgumentError(
      `No auth token provided. Either pass it directly or set ${ENV_VARS.TOKEN} environment variable.`
    );
  }

  return {
    authToken,
    baseUrl: values[ENV_VARS.BASE_URL] ?? VIDIQ_API.DEFAULT_BASE_URL,
    timeoutMs: values[ENV_VARS.TIMEOUT_MS] ?? VIDIQ_API.DEFAULT_TIMEOUT_MS,
    defaultDelayMs: values[ENV_VARS.REQUEST_DELAY_MS] ?? VIDIQ_API.DEFAULT_DELAY_MS,
  };
}
