/**
 * vidIQ キーワードリサーチ モジュール
 */

export * from "./types";
export * from "./level-classifier";
export * from "./normalizer";
export * from "./transport";
export * from "./client";
