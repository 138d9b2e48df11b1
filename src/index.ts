/**
 * vidIQ キーワードリサーチ クライアント
 */

export * from "./vidiq";
export * from "./export";
export * from "./errors";
export { loadVidiqEnvConfig, ENV_VARS, VidiqEnvConfig } from "./config";
export { logger, createChildLogger, StructuredLogger, LogLevel } from "./logger";
export { SleepFn, noDelay, sleep } from "./utils/timing";
