/**
 * 待機・タイムアウトユーティリティ
 *
 * vidIQ API への呼び出し前の固定待機と、1リクエストごとのタイムアウトを扱う
 */

/**
 * 待機戦略（テストでは即時解決する関数を差し込む）
 */
export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const noDelay: SleepFn = () => Promise.resolve();

/**
 * 正の値のときだけ待機する
 */
export async function delayBeforeCall(delayMs: number, sleepFn: SleepFn): Promise<void> {
  if (delayMs > 0) {
    await sleepFn(delayMs);
  }
}

export class TimeoutError extends Error {
  constructor(timeoutMs: number, name: string) {
    super(`Timeout after ${timeoutMs}ms: ${name}`);
    this.name = "TimeoutError";
  }
}

/**
 * タイムアウト付きで関数を実行
 *
 * タイムアウト時は AbortSignal を中断し TimeoutError で reject する。
 * タイマーは成否にかかわらず解除する
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  name: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs, name));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
